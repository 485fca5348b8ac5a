import fs from "node:fs/promises";
import path from "node:path";
import type { Account } from "../host/accounts.js";
import { errnoCode } from "../runtime/errors.js";

export const DEFAULT_AUTHORIZED_KEYS_FILES: readonly string[] = [".ssh/authorized_keys", ".ssh/authorized_keys2"];

function splitArgs(value: string): string[] {
  const out: string[] = [];
  const re = /"([^"]*)"|(\S+)/g;
  for (const m of value.matchAll(re)) {
    const token = m[1] ?? m[2];
    if (token) out.push(token);
  }
  return out;
}

/**
 * `AuthorizedKeysFile` from an sshd_config text. sshd keeps the first value it
 * sees; `Match` blocks only apply to some connections, so parsing stops there.
 * `none` disables the files entirely.
 */
export function parseAuthorizedKeysFiles(text: string): string[] {
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const m = /^(\S+?)(?:\s*=\s*|\s+)(.*)$/.exec(line);
    if (!m) continue;
    const keyword = (m[1] ?? "").toLowerCase();
    if (keyword === "match") break;
    if (keyword !== "authorizedkeysfile") continue;
    const files = splitArgs(m[2] ?? "");
    if (files.length === 1 && files[0]?.toLowerCase() === "none") return [];
    return files.length > 0 ? files : [...DEFAULT_AUTHORIZED_KEYS_FILES];
  }
  return [...DEFAULT_AUTHORIZED_KEYS_FILES];
}

export async function loadAuthorizedKeysFiles(sshdConfigPath: string): Promise<string[]> {
  try {
    return parseAuthorizedKeysFiles(await fs.readFile(sshdConfigPath, "utf8"));
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "EACCES") return [...DEFAULT_AUTHORIZED_KEYS_FILES];
    throw err;
  }
}

/**
 * Expands the sshd tokens `%%`, `%h`, `%u` and `%U`. A path that is still
 * relative afterwards is taken relative to the user's home.
 */
export function expandAuthorizedKeysPath(pattern: string, account: Pick<Account, "name" | "uid" | "home">): string {
  const expanded = pattern.replace(/%(.)/g, (token: string, ch: string) => {
    switch (ch) {
      case "%":
        return "%";
      case "h":
        return account.home;
      case "u":
        return account.name;
      case "U":
        return String(account.uid);
      default:
        return token;
    }
  });
  return path.isAbsolute(expanded) ? path.normalize(expanded) : path.join(account.home, expanded);
}
