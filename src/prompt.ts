/**
 * Purpose: Provide the long-form usage guide printed by `matcalc --prompt`.
 * Intent: The guide lives in assets/prompt.md so it can be edited without touching code.
 */

import { readFileSync } from "node:fs";

const PROMPT_URL = new URL("../assets/prompt.md", import.meta.url);

export function generatePrompt(): string {
  return readFileSync(PROMPT_URL, "utf8");
}
