import { defineCommand } from "citty";
import { runKeyInventory } from "../../lib/inventory.js";
import { runtimeArgs, withCliRuntime } from "../common.js";

export const keyScanArgs = {
  mode: { type: "string", description: "home (each account's ~/.ssh) | full (whole filesystem). Default: home." },
  root: { type: "string", description: "Root of a full scan (default: /)." },
  minSize: { type: "string", description: "Smallest file looked at in a full scan, in bytes (default: 200)." },
  maxSize: { type: "string", description: "Largest file looked at in a full scan, in bytes (default: 14000)." },
  headerBytes: { type: "string", description: "Bytes read to classify a file (default: 4096)." },
} as const;

export const keys = defineCommand({
  meta: {
    name: "keys",
    description: "Find private key files and print one record per key.",
  },
  args: {
    ...keyScanArgs,
    ...runtimeArgs,
  },
  async run({ args }) {
    await withCliRuntime(args, runKeyInventory);
  },
});
