import { defineCommand } from "citty";
import { runAgentInventory, runAuthorizedInventory, runKeyInventory } from "../../lib/inventory.js";
import { runtimeArgs, withCliRuntime } from "../common.js";
import { agentScanArgs } from "./agents.js";
import { authorizedScanArgs } from "./authorized.js";
import { keyScanArgs } from "./keys.js";

export const all = defineCommand({
  meta: {
    name: "all",
    description: "Run the key, agent and authorized_keys inventories into one stream.",
  },
  args: {
    ...keyScanArgs,
    ...agentScanArgs,
    ...authorizedScanArgs,
    ...runtimeArgs,
  },
  async run({ args }) {
    await withCliRuntime(args, async (rt) => {
      // Let every inventory settle before the scratch directory goes away.
      const results = await Promise.allSettled([runKeyInventory(rt), runAgentInventory(rt), runAuthorizedInventory(rt)]);
      for (const result of results) {
        if (result.status === "rejected") throw result.reason;
      }
    });
  },
});
