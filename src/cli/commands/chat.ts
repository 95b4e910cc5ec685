import { writeFile } from "node:fs/promises";
import type { Command } from "commander";
import { z } from "zod";
import { callWithRetry } from "../../application/completion/call-with-retry";
import type { ChatMessage } from "../../infrastructure/llm/types";
import { ExitCode } from "../exit-codes";
import {
  CommonArgsSchema,
  createRuntime,
  fail,
  parseArgs,
  printCallHistory,
  withCommonOptions,
} from "../shared";

const ChatArgsSchema = CommonArgsSchema.extend({
  prompt: z.string().min(1),
  system: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  temperature: z.coerce.number().optional(),
  attempts: z.coerce.number().int().positive().optional(),
  out: z.string().optional(),
  history: z.boolean().optional(),
});

export function registerChatCommand(program: Command): void {
  withCommonOptions(
    program
      .command("chat")
      .description("Send one prompt with application-level retries")
      .requiredOption("-p, --prompt <text>", "User prompt")
      .option("-s, --system <text>", "System instruction")
      .option("-m, --model <name>", "deepseek-chat or deepseek-reasoner")
      .option("-t, --temperature <n>", "Sampling temperature")
      .option("-a, --attempts <n>", "Application-level attempts")
      .option("-o, --out <path>", "Write the reply to a file instead of stdout")
      .option("--history", "Print the call history to stderr"),
  ).action(async (opts) => {
    const args = parseArgs(ChatArgsSchema, opts);

    try {
      const { config, logger, client } = await createRuntime(args);
      const messages: ChatMessage[] = [];
      if (args.system) messages.push({ role: "system", content: args.system });
      messages.push({ role: "user", content: args.prompt });

      const text = await callWithRetry(client, messages, {
        description: "chat",
        maxAttempts: args.attempts ?? config.retry.maxAttempts,
        baseDelayMs: config.retry.baseDelayMs,
        model: args.model ?? config.providers.deepseek.model,
        temperature: args.temperature ?? config.retry.temperature,
        logger,
      });

      if (args.out) {
        await writeFile(args.out, text, "utf8");
        logger.info(`Wrote ${args.out}`);
      } else {
        process.stdout.write(`${text}\n`);
      }
      if (args.history) printCallHistory(client);
      process.exit(ExitCode.success);
    } catch (error) {
      fail(error, args.debug);
    }
  });
}
