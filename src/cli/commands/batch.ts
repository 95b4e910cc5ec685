import type { Command } from "commander";
import { z } from "zod";
import { loadBatchFile, runBatch } from "../../application/batch/run-batch";
import { ExitCode } from "../exit-codes";
import {
  CommonArgsSchema,
  createRuntime,
  fail,
  parseArgs,
  printCallHistory,
  withCommonOptions,
} from "../shared";

const BatchArgsSchema = CommonArgsSchema.extend({
  file: z.string().min(1),
  outDir: z.string().min(1).default("."),
  parallel: z.boolean().optional(),
  history: z.boolean().optional(),
});

export function registerBatchCommand(program: Command): void {
  withCommonOptions(
    program
      .command("batch")
      .description("Run a file of prompt jobs and write each reply to a file")
      .requiredOption("-f, --file <path>", "YAML/JSON jobs file")
      .option("-d, --out-dir <path>", "Directory for generated files", ".")
      .option("--parallel", "Run all jobs concurrently")
      .option("--history", "Print the call history to stderr"),
  ).action(async (opts) => {
    const args = parseArgs(BatchArgsSchema, opts);

    try {
      const batch = await loadBatchFile(args.file);
      const { config, logger, client } = await createRuntime(args);

      const summary = await runBatch(client, batch, {
        outDir: args.outDir,
        parallel: args.parallel,
        retry: {
          maxAttempts: config.retry.maxAttempts,
          baseDelayMs: config.retry.baseDelayMs,
          model: config.providers.deepseek.model,
          temperature: config.retry.temperature,
        },
        logger,
      });

      for (const r of summary.results) {
        process.stdout.write(
          r.ok
            ? `ok    ${r.name} -> ${r.outputPath} (${r.chars} chars)\n`
            : `fail  ${r.name}: ${r.error}\n`,
        );
      }
      if (summary.paramsPath) {
        process.stdout.write(`params -> ${summary.paramsPath}\n`);
      }
      if (args.history) printCallHistory(client);
      process.exit(
        summary.results.every((r) => r.ok) ? ExitCode.success : ExitCode.failure,
      );
    } catch (error) {
      fail(error, args.debug);
    }
  });
}
