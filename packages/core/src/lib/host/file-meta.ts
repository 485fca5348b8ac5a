import type { Stats } from "node:fs";
import type { AccountDb } from "./accounts.js";

export type FileMeta = {
  path: string;
  owner: string;
  group: string;
  /** Permission bits in octal, e.g. `600`. */
  mode: string;
  /** Seconds since the epoch. */
  mtime: number;
};

export function describeFile(filePath: string, stat: Stats, accounts: AccountDb): FileMeta {
  return {
    path: filePath,
    owner: accounts.userName(stat.uid),
    group: accounts.groupName(stat.gid),
    mode: (stat.mode & 0o7777).toString(8),
    mtime: Math.floor(stat.mtimeMs / 1000),
  };
}
