/**
 * Shell-style tokenizer for lines typed at the prompt.
 *
 * Whitespace separates tokens; single or double quotes group words; a
 * backslash escapes the next character outside single quotes.
 */

import { ValidationError } from "./errors.js";

export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: "'" | "\"" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === "\"" && i + 1 < line.length) {
        current += line[++i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === "\"") {
      quote = ch;
      inToken = true;
    } else if (ch === "\\" && i + 1 < line.length) {
      current += line[++i];
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) {
    throw new ValidationError(`Unterminated ${quote === "'" ? "single" : "double"} quote`);
  }
  if (inToken) tokens.push(current);
  return tokens;
}
