import { discoverAgentSockets } from "@keysweep/core/lib/agent/sockets";
import { scanAgentSockets } from "@keysweep/core/lib/agent/identities";
import { scanAuthorizedKeys } from "@keysweep/core/lib/authorized/inventory";
import { loadAuthorizedKeysFiles } from "@keysweep/core/lib/authorized/sshd-config";
import { scanPrivateKeys, type ScanSummary } from "@keysweep/core/lib/scan/scan-keys";
import type { CliRuntime } from "../commands/common.js";

export async function runKeyInventory(rt: CliRuntime): Promise<ScanSummary> {
  const summary = await scanPrivateKeys(rt);
  rt.logger.info({ mode: rt.config.mode, ...summary }, "private key scan finished");
  return summary;
}

export async function runAgentInventory(rt: CliRuntime, env: NodeJS.ProcessEnv = process.env): Promise<ScanSummary> {
  const sockets = await discoverAgentSockets({
    procDir: rt.config.procDir,
    tmpDir: rt.config.tmpDir,
    env,
    logger: rt.logger,
  });
  rt.logger.debug({ sockets }, "agent sockets discovered");
  const summary = await scanAgentSockets({
    sockets,
    tool: rt.tool,
    accounts: rt.accounts,
    sink: rt.sink,
    concurrency: rt.config.concurrency,
    signal: rt.signal,
    logger: rt.logger,
  });
  rt.logger.info(summary, "agent scan finished");
  return summary;
}

export async function runAuthorizedInventory(rt: CliRuntime): Promise<ScanSummary> {
  const patterns = await loadAuthorizedKeysFiles(rt.config.sshdConfig);
  rt.logger.debug({ patterns }, "authorized keys files");
  const summary = await scanAuthorizedKeys({
    accounts: rt.accounts,
    patterns,
    tool: rt.tool,
    sink: rt.sink,
    concurrency: rt.config.concurrency,
    signal: rt.signal,
    logger: rt.logger,
  });
  rt.logger.info(summary, "authorized keys scan finished");
  return summary;
}
