import { captureNonInteractive, type CaptureResult } from "../run.js";
import { ScanAbortedError } from "../runtime/errors.js";
import type { ScanLogger } from "../runtime/logger.js";
import { silentLogger } from "../runtime/logger.js";
import type { WorkDir } from "../runtime/workdir.js";
import { parseFingerprintLine, parseFingerprintListing } from "./fingerprint.js";
import { firstPublicKeyLine } from "./key-types.js";
import type { FingerprintInfo } from "./types.js";

export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;
const TOOL_MAX_OUTPUT_BYTES = 64 * 1024;

/** The external derivation and fingerprinting capabilities the engine relies on. */
export type KeyTool = {
  /** Public key line derived from a private key file, or null when that is not possible without a passphrase. */
  derivePublicKey: (privateKeyPath: string) => Promise<string | null>;
  /** Listing of a key file: a public key file, or the cleartext public half of an SSH1 private key. */
  fingerprintFile: (keyPath: string) => Promise<FingerprintInfo | null>;
  fingerprintLine: (publicKeyLine: string) => Promise<FingerprintInfo | null>;
  /** Identities held by the agent behind a socket; null when the agent could not be queried. */
  listAgentIdentities: (socketPath: string) => Promise<FingerprintInfo[] | null>;
};

export type ToolCommand = {
  bin: string;
  args: readonly string[];
};

export function toolCommand(bin: string): ToolCommand {
  return { bin, args: [] };
}

/**
 * Environment for a child that must never ask for a secret: no askpass helper,
 * no display for one to pop up on.
 */
export function nonInteractiveEnv(base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base, SSH_ASKPASS_REQUIRE: "never" };
  delete env["SSH_ASKPASS"];
  delete env["DISPLAY"];
  delete env["WAYLAND_DISPLAY"];
  return env;
}

export function createOpenSshKeyTool(params: {
  keygen: ToolCommand;
  agent: ToolCommand;
  workDir: WorkDir;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  logger?: ScanLogger;
}): KeyTool {
  const logger = params.logger ?? silentLogger;
  const baseEnv = nonInteractiveEnv(params.env ?? process.env);
  const timeoutMs = params.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;

  const invoke = async (
    command: ToolCommand,
    args: string[],
    env: NodeJS.ProcessEnv = baseEnv,
  ): Promise<CaptureResult | null> => {
    try {
      return await captureNonInteractive(command.bin, [...command.args, ...args], {
        env,
        timeoutMs,
        maxOutputBytes: TOOL_MAX_OUTPUT_BYTES,
        signal: params.signal,
      });
    } catch (err) {
      if (err instanceof ScanAbortedError) throw err;
      logger.debug({ err, cmd: command.bin, args }, "key tool invocation failed");
      return null;
    }
  };

  const fingerprintFile = async (keyPath: string): Promise<FingerprintInfo | null> => {
    const res = await invoke(params.keygen, ["-E", "md5", "-l", "-f", keyPath]);
    if (!res || res.exitCode !== 0) return null;
    const firstLine = res.stdout.split(/\r?\n/)[0] ?? "";
    return parseFingerprintLine(firstLine);
  };

  return {
    derivePublicKey: async (privateKeyPath) => {
      // An empty -P makes an encrypted key fail instead of prompting.
      const res = await invoke(params.keygen, ["-y", "-P", "", "-f", privateKeyPath]);
      if (!res || res.exitCode !== 0) return null;
      return firstPublicKeyLine(res.stdout);
    },

    fingerprintFile,

    fingerprintLine: async (publicKeyLine) => {
      const scratch = await params.workDir.writeFile("derived.pub", `${publicKeyLine.trim()}\n`);
      try {
        return await fingerprintFile(scratch);
      } finally {
        await params.workDir.removeFile(scratch);
      }
    },

    listAgentIdentities: async (socketPath) => {
      const res = await invoke(params.agent, ["-E", "md5", "-l"], { ...baseEnv, SSH_AUTH_SOCK: socketPath });
      if (!res) return null;
      if (res.exitCode === 0) return parseFingerprintListing(res.stdout);
      if (res.exitCode === 1 && /no identities/i.test(`${res.stdout}\n${res.stderr}`)) return [];
      logger.debug({ socketPath, exitCode: res.exitCode, stderr: res.stderr }, "agent query failed");
      return null;
    },
  };
}
