import { toAppError } from "../domain/common/errors";

export const ExitCode = {
  success: 0,
  failure: 1,
  usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCode {
  return toAppError(error).kind === "validation"
    ? ExitCode.usage
    : ExitCode.failure;
}
