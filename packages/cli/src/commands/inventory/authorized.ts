import { defineCommand } from "citty";
import { runAuthorizedInventory } from "../../lib/inventory.js";
import { runtimeArgs, withCliRuntime } from "../common.js";

export const authorizedScanArgs = {
  sshdConfig: { type: "string", description: "sshd_config read for AuthorizedKeysFile (default: /etc/ssh/sshd_config)." },
} as const;

export const authorized = defineCommand({
  meta: {
    name: "authorized",
    description: "Fingerprint every key in each account's authorized_keys files.",
  },
  args: {
    ...authorizedScanArgs,
    ...runtimeArgs,
  },
  async run({ args }) {
    await withCliRuntime(args, runAuthorizedInventory);
  },
});
