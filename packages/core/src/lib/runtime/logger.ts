import pino, { type Logger } from "pino";

/** The slice of a pino logger the scanners write to. */
export type ScanLogger = Pick<Logger, "debug" | "info" | "warn">;

export const silentLogger: ScanLogger = pino({ enabled: false });
