import type { ArgsDef } from "citty";
import type { Logger } from "pino";
import { resolveScanConfig, type ScanConfig } from "@keysweep/core/lib/config";
import { loadAccountDb, type AccountDb } from "@keysweep/core/lib/host/accounts";
import { createOpenSshKeyTool, toolCommand, type KeyTool } from "@keysweep/core/lib/keys/keygen";
import { createStreamSink, type RecordSink } from "@keysweep/core/lib/runtime/sink";
import { withWorkDir } from "@keysweep/core/lib/runtime/workdir";
import { createCliLogger, DEFAULT_LOG_LEVEL, parseLogLevel } from "../lib/logging/logger.js";

export const runtimeArgs = {
  concurrency: { type: "string", description: "Files or sockets processed at once (default: CPU count, max 16)." },
  timeoutMs: { type: "string", description: "Timeout for each ssh-keygen/ssh-add call in ms (default: 10000)." },
  sshKeygen: { type: "string", description: "ssh-keygen binary (env KEYSWEEP_SSH_KEYGEN)." },
  sshAdd: { type: "string", description: "ssh-add binary (env KEYSWEEP_SSH_ADD)." },
  passwdFile: { type: "string", description: "Account database (default: /etc/passwd)." },
  groupFile: { type: "string", description: "Group database (default: /etc/group)." },
  logLevel: { type: "string", description: "Log level (fatal|error|warn|info|debug|trace), logged to stderr." },
  logFile: { type: "string", description: "Also write JSON logs to this file." },
} as const satisfies ArgsDef;

export type CliRuntime = {
  config: ScanConfig;
  logger: Logger;
  accounts: AccountDb;
  tool: KeyTool;
  sink: RecordSink;
  signal: AbortSignal;
};

export type CliRuntimeDeps = {
  env?: NodeJS.ProcessEnv;
  stdout?: NodeJS.WritableStream;
  logger?: Logger;
};

function stringArg(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * Wires config, logging, the account database, a scratch directory and the key
 * tool for one command, and turns SIGINT/SIGTERM into an abort of the scan.
 */
export async function withCliRuntime<T>(
  args: Readonly<Record<string, unknown>>,
  fn: (rt: CliRuntime) => Promise<T>,
  deps: CliRuntimeDeps = {},
): Promise<T> {
  const env = deps.env ?? process.env;
  const logger =
    deps.logger ??
    createCliLogger({
      level: parseLogLevel(args["logLevel"] ?? env["KEYSWEEP_LOG_LEVEL"], DEFAULT_LOG_LEVEL),
      logFilePath: stringArg(args["logFile"]),
    });
  const config = resolveScanConfig({ args, env });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "aborting scan");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const accounts = await loadAccountDb({ passwdPath: config.passwdFile, groupPath: config.groupFile });
    const sink = createStreamSink(deps.stdout ?? process.stdout, { signal: controller.signal });
    return await withWorkDir(
      async (workDir) => {
        const tool = createOpenSshKeyTool({
          keygen: toolCommand(config.sshKeygen),
          agent: toolCommand(config.sshAdd),
          workDir,
          timeoutMs: config.timeoutMs,
          env,
          signal: controller.signal,
          logger,
        });
        return await fn({ config, logger, accounts, tool, sink, signal: controller.signal });
      },
      { parent: config.tmpDir },
    );
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}
