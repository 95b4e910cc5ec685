import { readFile, writeFile } from "node:fs/promises";
import type { Command } from "commander";
import { z } from "zod";
import { callWithRetry } from "../../application/completion/call-with-retry";
import { ValidationError } from "../../domain/common/errors";
import {
  CODE_GENERATOR_TEMPERATURE,
  buildCodeGenerationMessages,
} from "../../prompts/v1/code-generator.system";
import { ExitCode } from "../exit-codes";
import {
  CommonArgsSchema,
  createRuntime,
  fail,
  parseArgs,
  printCallHistory,
  withCommonOptions,
} from "../shared";

const CodeArgsSchema = CommonArgsSchema.extend({
  prompt: z.string().min(1).optional(),
  input: z.string().min(1).optional(),
  language: z.string().min(1).default("TypeScript"),
  model: z.string().min(1).optional(),
  attempts: z.coerce.number().int().positive().optional(),
  out: z.string().optional(),
  history: z.boolean().optional(),
});

export function registerCodeCommand(program: Command): void {
  withCommonOptions(
    program
      .command("code")
      .description("Generate code from a task description")
      .option("-p, --prompt <text>", "Task description")
      .option("-i, --input <path>", "Read the task description from a file")
      .option("-l, --language <name>", "Target programming language", "TypeScript")
      .option("-m, --model <name>", "deepseek-chat or deepseek-reasoner")
      .option("-a, --attempts <n>", "Application-level attempts")
      .option("-o, --out <path>", "Write the code to a file instead of stdout")
      .option("--history", "Print the call history to stderr"),
  ).action(async (opts) => {
    const args = parseArgs(CodeArgsSchema, opts);

    try {
      const prompt =
        args.prompt ?? (args.input ? await readFile(args.input, "utf8") : "");
      if (!prompt.trim()) {
        throw new ValidationError("Provide a task with --prompt or --input");
      }
      const { config, logger, client } = await createRuntime(args);

      const code = await callWithRetry(
        client,
        buildCodeGenerationMessages(prompt, args.language),
        {
          description: "code generation",
          maxAttempts: args.attempts ?? config.retry.maxAttempts,
          baseDelayMs: config.retry.baseDelayMs,
          model: args.model ?? config.providers.deepseek.model,
          temperature: CODE_GENERATOR_TEMPERATURE,
          logger,
        },
      );

      if (args.out) {
        await writeFile(args.out, code, "utf8");
        logger.info(`Wrote ${args.out}`);
      } else {
        process.stdout.write(`${code}\n`);
      }
      if (args.history) printCallHistory(client);
      process.exit(ExitCode.success);
    } catch (error) {
      fail(error, args.debug);
    }
  });
}
