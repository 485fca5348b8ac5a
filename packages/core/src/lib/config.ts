import os from "node:os";
import { z } from "zod";
import { DEFAULT_HEADER_BYTES } from "./keys/classify.js";
import { DEFAULT_TOOL_TIMEOUT_MS } from "./keys/keygen.js";
import { DEFAULT_MAX_SIZE, DEFAULT_MIN_SIZE } from "./scan/candidates.js";

export const SCAN_MODES = ["home", "full"] as const;
export type ScanMode = (typeof SCAN_MODES)[number];

const MAX_CONCURRENCY = 64;

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(16, os.availableParallelism()));
}

const PathSchema = z.string().trim().min(1);

export const ScanConfigSchema = z
  .object({
    mode: z.enum(SCAN_MODES).default("home"),
    root: PathSchema.default("/"),
    minSize: z.coerce.number().int().nonnegative().default(DEFAULT_MIN_SIZE),
    maxSize: z.coerce.number().int().positive().default(DEFAULT_MAX_SIZE),
    concurrency: z.coerce.number().int().min(1).max(MAX_CONCURRENCY).default(defaultConcurrency),
    timeoutMs: z.coerce.number().int().min(100).max(300_000).default(DEFAULT_TOOL_TIMEOUT_MS),
    headerBytes: z.coerce.number().int().min(64).max(65_536).default(DEFAULT_HEADER_BYTES),
    sshKeygen: PathSchema.default("ssh-keygen"),
    sshAdd: PathSchema.default("ssh-add"),
    passwdFile: PathSchema.default("/etc/passwd"),
    groupFile: PathSchema.default("/etc/group"),
    sshdConfig: PathSchema.default("/etc/ssh/sshd_config"),
    procDir: PathSchema.default("/proc"),
    tmpDir: PathSchema.default(os.tmpdir),
  })
  .refine((c) => c.minSize <= c.maxSize, {
    message: "min-size must not exceed max-size",
    path: ["minSize"],
  });

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
type ScanConfigKey = keyof ScanConfig;

/** Environment fallbacks for settings not given on the command line. */
export const SCAN_CONFIG_ENV: Readonly<Partial<Record<ScanConfigKey, string>>> = {
  mode: "KEYSWEEP_MODE",
  root: "KEYSWEEP_ROOT",
  concurrency: "KEYSWEEP_CONCURRENCY",
  timeoutMs: "KEYSWEEP_TIMEOUT_MS",
  sshKeygen: "KEYSWEEP_SSH_KEYGEN",
  sshAdd: "KEYSWEEP_SSH_ADD",
  sshdConfig: "KEYSWEEP_SSHD_CONFIG",
};

const CONFIG_KEYS: readonly ScanConfigKey[] = [
  "mode",
  "root",
  "minSize",
  "maxSize",
  "concurrency",
  "timeoutMs",
  "headerBytes",
  "sshKeygen",
  "sshAdd",
  "passwdFile",
  "groupFile",
  "sshdConfig",
  "procDir",
  "tmpDir",
];

function present(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  return typeof value !== "string" || value.trim() !== "";
}

export function resolveScanConfig(params: {
  args?: Readonly<Record<string, unknown>>;
  env?: NodeJS.ProcessEnv;
}): ScanConfig {
  const args = params.args ?? {};
  const env = params.env ?? {};
  const raw: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    const envName = SCAN_CONFIG_ENV[key];
    const fromEnv = envName ? env[envName] : undefined;
    if (present(args[key])) raw[key] = args[key];
    else if (present(fromEnv)) raw[key] = fromEnv;
  }

  const parsed = ScanConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid scan config: ${detail}`);
  }
  return parsed.data;
}
