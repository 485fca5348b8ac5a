#!/usr/bin/env node
import path from "node:path";
import { pathToFileURL } from "node:url";
import { defineCommand, runCommand, runMain } from "citty";
import { exitCodeForError, formatError } from "@keysweep/core/lib/runtime/errors";
import { baseCommands } from "./commands/registry.js";
import { readCliVersion } from "./lib/version.js";

const main = defineCommand({
  meta: {
    name: "keysweep",
    description: "SSH credential inventory: private keys, agent identities and authorized_keys (records on stdout, logs on stderr).",
  },
  subCommands: baseCommands,
});

function wantsUsage(args: readonly string[]): boolean {
  return args.length === 0 || args.includes("--help") || args.includes("-h");
}

export async function mainEntry(): Promise<void> {
  const [nodeBin = process.execPath, script = "keysweep", ...rest] = process.argv;
  const normalized = rest.filter((a) => a !== "--");
  if (normalized.includes("--version") || normalized.includes("-v")) {
    console.log(readCliVersion());
    process.exit(0);
    return;
  }
  process.argv = [nodeBin, script, ...normalized];
  if (wantsUsage(normalized)) {
    await runMain(main);
    return;
  }
  // runMain maps every failure to exit 1; scan failures carry their own codes.
  await runCommand(main, { rawArgs: normalized });
}

function shouldRunMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  const entryUrl = pathToFileURL(path.resolve(entry)).href;
  return entryUrl === import.meta.url;
}

if (shouldRunMain()) {
  void mainEntry().catch((err: unknown) => {
    console.error(formatError(err, "keysweep failed"));
    if (process.env["KEYSWEEP_DEBUG"] === "1" && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    process.exitCode = exitCodeForError(err);
  });
}
