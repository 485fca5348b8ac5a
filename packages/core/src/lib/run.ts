import { spawn } from "node:child_process";
import { ScanAbortedError } from "./runtime/errors.js";

const KILL_GRACE_MS = 500;
const DEFAULT_MAX_OUTPUT_BYTES = 256 * 1024;

export type CaptureOpts = {
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  maxOutputBytes?: number;
  signal?: AbortSignal;
};

export type CaptureResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
};

/**
 * Runs a command that must never wait on a human.
 *
 * stdin is always ignored and the child is started in its own session, so it
 * has no controlling terminal to open for a passphrase prompt. A non-zero exit
 * resolves; spawn errors, timeouts, oversized output and aborts reject.
 */
export async function captureNonInteractive(
  cmd: string,
  args: string[],
  opts: CaptureOpts = {},
): Promise<CaptureResult> {
  if (opts.signal?.aborted) throw new ScanAbortedError();
  const maxBytes = Math.max(1, Math.trunc(opts.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES));

  return await new Promise<CaptureResult>((resolve, reject) => {
    let settled = false;
    let timeout: NodeJS.Timeout | null = null;
    let killTimeout: NodeJS.Timeout | null = null;
    let terminateError: Error | null = null;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let totalBytes = 0;

    const clearTimers = () => {
      if (timeout) {
        clearTimeout(timeout);
        timeout = null;
      }
      if (killTimeout) {
        clearTimeout(killTimeout);
        killTimeout = null;
      }
    };

    const onAbort = () => terminate(new ScanAbortedError());

    const finish = (err: Error | null, result?: CaptureResult) => {
      if (settled) return;
      settled = true;
      clearTimers();
      opts.signal?.removeEventListener("abort", onAbort);
      if (err) reject(err);
      else if (result) resolve(result);
    };

    const child = spawn(cmd, args, {
      env: opts.env,
      stdio: ["ignore", "pipe", "pipe"],
      detached: true,
    });

    const terminate = (err: Error) => {
      if (terminateError) return;
      terminateError = err;
      try {
        child.kill("SIGTERM");
      } catch {
        // already gone
      }
      killTimeout = setTimeout(() => {
        try {
          child.kill("SIGKILL");
        } catch {
          // already gone
        }
      }, KILL_GRACE_MS);
    };

    if (opts.timeoutMs) {
      const timeoutMs = Math.max(1, Math.trunc(opts.timeoutMs));
      timeout = setTimeout(() => {
        terminate(new Error(`${cmd} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    const collect = (chunks: Buffer[]) => (buf: Buffer) => {
      if (terminateError) return;
      totalBytes += buf.length;
      if (totalBytes > maxBytes) {
        terminate(new Error(`${cmd} output exceeded ${maxBytes} bytes`));
        return;
      }
      chunks.push(buf);
    };

    child.on("error", (err) => finish(err));
    child.stdout.on("data", collect(stdoutChunks));
    child.stderr.on("data", collect(stderrChunks));
    child.on("close", (exitCode, signal) => {
      if (terminateError) {
        finish(terminateError);
        return;
      }
      finish(null, {
        exitCode,
        signal,
        stdout: Buffer.concat(stdoutChunks).toString("utf8").trim(),
        stderr: Buffer.concat(stderrChunks).toString("utf8").trim(),
      });
    });
  });
}
