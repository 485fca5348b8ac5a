import { describe, expect, it } from "vitest";
import { captureNonInteractive } from "../src/lib/run.js";
import { ScanAbortedError } from "../src/lib/runtime/errors.js";

const node = process.execPath;

describe("captureNonInteractive", () => {
  it("captures stdout and stderr", async () => {
    const res = await captureNonInteractive(node, ["-e", "process.stdout.write(' ok \\n'); process.stderr.write('warn')"]);
    expect(res).toEqual({ exitCode: 0, signal: null, stdout: "ok", stderr: "warn" });
  });

  it("resolves on a non-zero exit", async () => {
    const res = await captureNonInteractive(node, ["-e", "process.stderr.write('bad'); process.exit(3)"]);
    expect(res.exitCode).toBe(3);
    expect(res.stderr).toBe("bad");
  });

  it("gives the child no terminal on stdin", async () => {
    const res = await captureNonInteractive(node, ["-e", "process.stdout.write(String(process.stdin.isTTY === true))"]);
    expect(res.stdout).toBe("false");
  });

  it("passes the given environment", async () => {
    const res = await captureNonInteractive(node, ["-e", "process.stdout.write(process.env.PROBE ?? '')"], {
      env: { PROBE: "test-value" },
    });
    expect(res.stdout).toBe("test-value");
  });

  it("kills a child that runs past the timeout", async () => {
    await expect(captureNonInteractive(node, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 200 })).rejects.toThrow(
      /timed out after 200ms/,
    );
  });

  it("kills a child whose output exceeds the cap", async () => {
    await expect(
      captureNonInteractive(node, ["-e", "process.stdout.write('x'.repeat(5000))"], { maxOutputBytes: 100 }),
    ).rejects.toThrow(/output exceeded 100 bytes/);
  });

  it("rejects with ScanAbortedError when aborted", async () => {
    const controller = new AbortController();
    const pending = captureNonInteractive(node, ["-e", "setTimeout(() => {}, 10000)"], { signal: controller.signal });
    setTimeout(() => controller.abort(), 50);
    await expect(pending).rejects.toBeInstanceOf(ScanAbortedError);
  });

  it("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(captureNonInteractive(node, ["-e", ""], { signal: controller.signal })).rejects.toBeInstanceOf(
      ScanAbortedError,
    );
  });

  it("rejects when the binary does not exist", async () => {
    await expect(captureNonInteractive("/nonexistent/keysweep-tool", [])).rejects.toMatchObject({ code: "ENOENT" });
  });
});
