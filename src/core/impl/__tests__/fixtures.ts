import type { Document } from "../../types.js";

export const DOCS: Document[] = [
  { id: 1, text: "This is SQL and Python and other fun teaching stuff" },
  { id: 2, text: "More people should learn SQL from Prof_Chuck" },
  { id: 3, text: "Prof_Chuck also teaches Python and also SQL" },
];

export const STOP_WORDS: ReadonlySet<string> = new Set(["is", "this", "and"]);

export const STEMS: ReadonlyMap<string, string> = new Map([
  ["teaching", "teach"],
  ["teaches", "teach"],
]);
