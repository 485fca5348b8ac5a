import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import type { AccountDb } from "../host/accounts.js";
import { describeFile } from "../host/file-meta.js";
import type { KeyTool } from "../keys/keygen.js";
import { formatAgentIdentity } from "../keys/report.js";
import type { AgentIdentity } from "../keys/types.js";
import { mapWithConcurrency } from "../runtime/concurrency.js";
import { ScanAbortedError } from "../runtime/errors.js";
import { silentLogger, type ScanLogger } from "../runtime/logger.js";
import type { RecordSink } from "../runtime/sink.js";
import type { ScanSummary } from "../scan/scan-keys.js";

/**
 * Identities held by the agent at `socketPath`. The path may be a symlink to the
 * socket (`~/.ssh/ssh_auth_sock` style). A path that is not a socket, an empty
 * agent and an agent that cannot be queried all give an empty list.
 */
export async function listAgentIdentities(
  socketPath: string,
  deps: { tool: KeyTool; accounts: AccountDb; logger?: ScanLogger },
): Promise<AgentIdentity[]> {
  const logger = deps.logger ?? silentLogger;
  let stat: Stats;
  try {
    stat = await fs.stat(socketPath);
  } catch (err) {
    logger.debug({ err, socketPath }, "agent socket not accessible");
    return [];
  }
  if (!stat.isSocket()) {
    logger.debug({ socketPath }, "agent path is not a socket");
    return [];
  }

  const infos = await deps.tool.listAgentIdentities(socketPath);
  if (!infos) return [];
  const socket = describeFile(socketPath, stat, deps.accounts);
  return infos.map((info) => ({
    socket,
    keyType: info.keyType ?? "NA",
    bits: info.bits,
    fingerprint: info.fingerprint,
    remotePath: info.comment,
  }));
}

export async function scanAgentSockets(params: {
  sockets: readonly string[];
  tool: KeyTool;
  accounts: AccountDb;
  sink: RecordSink;
  concurrency: number;
  signal?: AbortSignal;
  logger?: ScanLogger;
}): Promise<ScanSummary> {
  let reported = 0;
  await mapWithConcurrency({
    items: params.sockets,
    concurrency: params.concurrency,
    signal: params.signal,
    fn: async (socketPath) => {
      let identities: AgentIdentity[];
      try {
        identities = await listAgentIdentities(socketPath, params);
      } catch (err) {
        if (err instanceof ScanAbortedError) throw err;
        params.logger?.debug({ err, socketPath }, "skipping agent socket");
        return;
      }
      for (const identity of identities) {
        await params.sink.write(formatAgentIdentity(identity));
        reported += 1;
      }
    },
  });
  return { scanned: params.sockets.length, reported };
}
