#!/usr/bin/env node
import { Command } from "commander";
import { registerBatchCommand } from "./commands/batch";
import { registerChatCommand } from "./commands/chat";
import { registerCodeCommand } from "./commands/code";

const program = new Command();

const version = process.env.npm_package_version ?? "0.1.0";
program
  .name("deepseek-retry")
  .description("DeepSeek chat completions with transport and application retries")
  .version(version);

registerChatCommand(program);
registerCodeCommand(program);
registerBatchCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
