export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  NO_READABLE_ROOT: 3,
  WORKDIR_UNAVAILABLE: 4,
  ABORTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Aborts the whole run. Everything else that can go wrong while looking at a
 * single file or socket is handled where it happens and never reaches the CLI.
 */
export class ScanFatalError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScanFatalError";
    this.exitCode = exitCode;
  }
}

export class ScanAbortedError extends Error {
  constructor(message = "scan aborted") {
    super(message);
    this.name = "ScanAbortedError";
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new ScanAbortedError();
}

export function errnoCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}

export function formatError(err: unknown, fallback = "unknown error"): string {
  if (err instanceof Error) {
    const msg = err.message.trim();
    if (msg) return msg;
  }
  if (typeof err === "string" && err.trim()) return err.trim();
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") return String(err);
  return fallback;
}

export function exitCodeForError(err: unknown): ExitCode {
  if (err instanceof ScanFatalError) return err.exitCode;
  if (err instanceof ScanAbortedError) return ExitCode.ABORTED;
  return ExitCode.FAILURE;
}
