import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ExitCode, ScanFatalError } from "../src/lib/runtime/errors.js";
import { withWorkDir } from "../src/lib/runtime/workdir.js";
import { makeTempDir } from "./helpers/ssh-keys.js";

describe("withWorkDir", () => {
  it("writes owner-only files and removes the directory afterwards", async () => {
    const parent = makeTempDir("workdir");
    let seenDir = "";
    const result = await withWorkDir(
      async (work) => {
        seenDir = work.dir;
        const a = await work.writeFile("derived.pub", "one\n");
        const b = await work.writeFile("derived.pub", "two\n");
        expect(a).not.toBe(b);
        expect(path.dirname(a)).toBe(work.dir);
        expect(fs.statSync(a).mode & 0o777).toBe(0o600);
        expect(fs.readFileSync(b, "utf8")).toBe("two\n");
        await work.removeFile(a);
        expect(fs.existsSync(a)).toBe(false);
        return "done";
      },
      { parent },
    );
    expect(result).toBe("done");
    expect(path.basename(seenDir).startsWith("keysweep-")).toBe(true);
    expect(fs.existsSync(seenDir)).toBe(false);
  });

  it("removes the directory when the callback rejects", async () => {
    const parent = makeTempDir("workdir");
    let seenDir = "";
    await expect(
      withWorkDir(
        async (work) => {
          seenDir = work.dir;
          await work.writeFile("x", "y");
          throw new Error("fail");
        },
        { parent },
      ),
    ).rejects.toThrow("fail");
    expect(fs.existsSync(seenDir)).toBe(false);
  });

  it("keeps scratch names inside the directory", async () => {
    const parent = makeTempDir("workdir");
    await withWorkDir(
      async (work) => {
        const p = await work.writeFile("../../escape", "z");
        expect(path.dirname(p)).toBe(work.dir);
      },
      { parent },
    );
  });

  it("fails with WORKDIR_UNAVAILABLE when the parent is missing", async () => {
    const parent = path.join(makeTempDir("workdir"), "missing");
    const err = await withWorkDir(async () => "never", { parent }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ScanFatalError);
    expect(err).toMatchObject({ exitCode: ExitCode.WORKDIR_UNAVAILABLE });
  });
});
