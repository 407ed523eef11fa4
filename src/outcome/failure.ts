import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "read-error"
  | "void-variable"
  | "void-function"
  | "wrong-type"
  | "wrong-arity"
  | "user-error"
  | "setting-constant"
  | "internal-error"
  | `custom:${string}`;

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
  };
}
