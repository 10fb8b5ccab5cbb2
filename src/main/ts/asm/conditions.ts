import { RegisterFile } from "./registers.js";

type Condition = (f: RegisterFile) => boolean;

/** Condition-code suffixes shared by `jcc`, `cmovcc` and `setcc`. */
export const CONDITIONS: ReadonlyMap<string, Condition> = new Map<string, Condition>([
  ["o", (f) => f.of],
  ["no", (f) => !f.of],
  ["b", (f) => f.cf],
  ["c", (f) => f.cf],
  ["nae", (f) => f.cf],
  ["ae", (f) => !f.cf],
  ["nb", (f) => !f.cf],
  ["nc", (f) => !f.cf],
  ["e", (f) => f.zf],
  ["z", (f) => f.zf],
  ["ne", (f) => !f.zf],
  ["nz", (f) => !f.zf],
  ["be", (f) => f.cf || f.zf],
  ["na", (f) => f.cf || f.zf],
  ["a", (f) => !f.cf && !f.zf],
  ["nbe", (f) => !f.cf && !f.zf],
  ["s", (f) => f.sf],
  ["ns", (f) => !f.sf],
  ["p", (f) => f.pf],
  ["pe", (f) => f.pf],
  ["np", (f) => !f.pf],
  ["po", (f) => !f.pf],
  ["l", (f) => f.sf !== f.of],
  ["nge", (f) => f.sf !== f.of],
  ["ge", (f) => f.sf === f.of],
  ["nl", (f) => f.sf === f.of],
  ["le", (f) => f.zf || f.sf !== f.of],
  ["ng", (f) => f.zf || f.sf !== f.of],
  ["g", (f) => !f.zf && f.sf === f.of],
  ["nle", (f) => !f.zf && f.sf === f.of],
]);
