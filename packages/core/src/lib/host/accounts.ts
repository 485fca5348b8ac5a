import fs from "node:fs/promises";
import { errnoCode } from "../runtime/errors.js";

export type Account = {
  name: string;
  uid: number;
  gid: number;
  home: string;
  shell: string;
};

export type Group = {
  name: string;
  gid: number;
};

export type AccountDb = {
  accounts: readonly Account[];
  userName: (uid: number) => string;
  groupName: (gid: number) => string;
};

function parseId(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : null;
}

function dataLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

export function parsePasswd(text: string): Account[] {
  const out: Account[] = [];
  for (const line of dataLines(text)) {
    const fields = line.split(":");
    if (fields.length < 7) continue;
    const [name = "", , uidRaw, gidRaw, , home = "", shell = ""] = fields;
    const uid = parseId(uidRaw);
    const gid = parseId(gidRaw);
    if (!name || uid === null || gid === null) continue;
    out.push({ name, uid, gid, home, shell });
  }
  return out;
}

export function parseGroup(text: string): Group[] {
  const out: Group[] = [];
  for (const line of dataLines(text)) {
    const fields = line.split(":");
    if (fields.length < 3) continue;
    const name = fields[0] ?? "";
    const gid = parseId(fields[2]);
    if (!name || gid === null) continue;
    out.push({ name, gid });
  }
  return out;
}

export function createAccountDb(accounts: readonly Account[], groups: readonly Group[]): AccountDb {
  // First entry wins, as with getpwuid(3) on duplicate ids.
  const users = new Map<number, string>();
  for (const a of accounts) if (!users.has(a.uid)) users.set(a.uid, a.name);
  const groupNames = new Map<number, string>();
  for (const g of groups) if (!groupNames.has(g.gid)) groupNames.set(g.gid, g.name);

  return {
    accounts,
    userName: (uid) => users.get(uid) ?? String(uid),
    groupName: (gid) => groupNames.get(gid) ?? String(gid),
  };
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "EACCES" || code === "ENOTDIR") return null;
    throw err;
  }
}

export async function loadAccountDb(params: { passwdPath: string; groupPath: string }): Promise<AccountDb> {
  const [passwd, group] = await Promise.all([readOptional(params.passwdPath), readOptional(params.groupPath)]);
  return createAccountDb(parsePasswd(passwd ?? ""), parseGroup(group ?? ""));
}
