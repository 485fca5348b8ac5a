import { agents } from "./inventory/agents.js";
import { all } from "./inventory/all.js";
import { authorized } from "./inventory/authorized.js";
import { keys } from "./inventory/keys.js";

export const baseCommands = {
  keys,
  agents,
  authorized,
  all,
};

export const baseCommandNames = Object.freeze(Object.keys(baseCommands));
