import fs from "node:fs/promises";
import path from "node:path";
import { silentLogger, type ScanLogger } from "../runtime/logger.js";

const AUTH_SOCK_VAR = "SSH_AUTH_SOCK";

/** `/proc/<pid>/environ` is a NUL-separated list of `NAME=value` entries. */
export function parseEnvironBlock(block: Buffer | string): Map<string, string> {
  const text = typeof block === "string" ? block : block.toString("utf8");
  const out = new Map<string, string>();
  for (const entry of text.split("\0")) {
    const eq = entry.indexOf("=");
    if (eq <= 0) continue;
    const name = entry.slice(0, eq);
    if (!out.has(name)) out.set(name, entry.slice(eq + 1));
  }
  return out;
}

async function readDirNames(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch {
    return [];
  }
}

export async function socketsFromProcesses(procDir: string, logger: ScanLogger = silentLogger): Promise<string[]> {
  const out: string[] = [];
  for (const name of await readDirNames(procDir)) {
    if (!/^\d+$/.test(name)) continue;
    let block: Buffer;
    try {
      block = await fs.readFile(path.join(procDir, name, "environ"));
    } catch (err) {
      // Other users' processes are unreadable without privileges.
      logger.debug({ err, pid: name }, "cannot read process environment");
      continue;
    }
    const sock = parseEnvironBlock(block).get(AUTH_SOCK_VAR)?.trim();
    if (sock) out.push(sock);
  }
  return out;
}

/** `<tmp>/ssh-XXXX/agent.<pid>`, where ssh-agent and sshd forwarding put their sockets. */
export async function socketsFromTempDir(tmpDir: string): Promise<string[]> {
  const out: string[] = [];
  for (const name of await readDirNames(tmpDir)) {
    if (!name.startsWith("ssh-")) continue;
    const dir = path.join(tmpDir, name);
    for (const entry of await readDirNames(dir)) {
      if (entry.startsWith("agent.")) out.push(path.join(dir, entry));
    }
  }
  return out;
}

export async function discoverAgentSockets(params: {
  procDir: string;
  tmpDir: string;
  env?: NodeJS.ProcessEnv;
  logger?: ScanLogger;
}): Promise<string[]> {
  const [fromProcs, fromTmp] = await Promise.all([
    socketsFromProcesses(params.procDir, params.logger),
    socketsFromTempDir(params.tmpDir),
  ]);
  const own = params.env?.[AUTH_SOCK_VAR]?.trim();
  const all = new Set<string>([...fromProcs, ...fromTmp, ...(own ? [own] : [])]);
  return [...all].sort();
}
