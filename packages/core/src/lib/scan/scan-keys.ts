import type { ScanConfig } from "../config.js";
import type { AccountDb } from "../host/accounts.js";
import { inspectKeyFile } from "../keys/inspect.js";
import type { KeyTool } from "../keys/keygen.js";
import { formatKeyReport } from "../keys/report.js";
import { forEachWithConcurrency } from "../runtime/concurrency.js";
import { ScanAbortedError, errnoCode } from "../runtime/errors.js";
import { silentLogger, type ScanLogger } from "../runtime/logger.js";
import type { RecordSink } from "../runtime/sink.js";
import { fullCandidates, homeCandidates } from "./candidates.js";
import type { Candidate } from "./walk.js";

export type ScanSummary = {
  scanned: number;
  reported: number;
};

export type ScanContext = {
  config: ScanConfig;
  accounts: AccountDb;
  tool: KeyTool;
  sink: RecordSink;
  signal?: AbortSignal;
  logger?: ScanLogger;
};

export function keyCandidates(ctx: ScanContext): AsyncIterable<Candidate> {
  const { config } = ctx;
  if (config.mode === "full") {
    return fullCandidates({
      root: config.root,
      minSize: config.minSize,
      maxSize: config.maxSize,
      logger: ctx.logger,
      signal: ctx.signal,
    });
  }
  return homeCandidates({ accounts: ctx.accounts, logger: ctx.logger, signal: ctx.signal });
}

/**
 * Classifies, decodes and reports every candidate file. A file that cannot be
 * read is skipped; only fatal scanner errors and aborts end the scan.
 */
export async function scanPrivateKeys(
  ctx: ScanContext,
  candidates: AsyncIterable<Candidate> = keyCandidates(ctx),
): Promise<ScanSummary> {
  const logger = ctx.logger ?? silentLogger;
  let reported = 0;

  const scanned = await forEachWithConcurrency({
    items: candidates,
    concurrency: ctx.config.concurrency,
    signal: ctx.signal,
    fn: async (candidate) => {
      let line: string | null = null;
      try {
        const report = await inspectKeyFile(candidate.path, candidate.stat, {
          tool: ctx.tool,
          accounts: ctx.accounts,
          headerBytes: ctx.config.headerBytes,
          signal: ctx.signal,
        });
        line = report ? formatKeyReport(report) : null;
      } catch (err) {
        if (err instanceof ScanAbortedError) throw err;
        logger.debug({ err, path: candidate.path, code: errnoCode(err) }, "skipping file");
        return;
      }
      if (!line) return;
      await ctx.sink.write(line);
      reported += 1;
    },
  });

  return { scanned, reported };
}
