import { defineCommand } from "citty";
import { runAgentInventory } from "../../lib/inventory.js";
import { runtimeArgs, withCliRuntime } from "../common.js";

export const agentScanArgs = {
  procDir: { type: "string", description: "procfs mount searched for SSH_AUTH_SOCK (default: /proc)." },
  tmpDir: { type: "string", description: "Directory holding ssh-*/agent.* sockets (default: OS temp dir)." },
} as const;

export const agents = defineCommand({
  meta: {
    name: "agents",
    description: "List identities held by reachable ssh-agent sockets.",
  },
  args: {
    ...agentScanArgs,
    ...runtimeArgs,
  },
  async run({ args }) {
    await withCliRuntime(args, (rt) => runAgentInventory(rt));
  },
});
