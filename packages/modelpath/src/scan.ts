/**
 * Character-level scanning helpers shared by the dispatcher and operators.
 *
 * Path syntax is ASCII. Literal content may hold any characters, but field
 * names, map keys and reference names outside the ASCII range are not
 * supported.
 */

import type { Resolution } from "./types.js";

/**
 * Scan a quoted string literal starting at the opening quote. A backslash
 * makes the following character literal. An unterminated literal runs to the
 * end of the path.
 */
export function scanStringLiteral(
  path: string,
  start: number,
  quote: string,
): Resolution<string> {
  const contentStart = start + 1;
  let index = contentStart;
  let escaping = false;
  let hasEscapes = false;

  while (index < path.length) {
    const c = path[index];
    if (escaping) {
      escaping = false;
      hasEscapes = true;
    } else if (c === quote) {
      break;
    } else if (c === "\\") {
      escaping = true;
    }
    index++;
  }

  if (!hasEscapes) {
    return { value: path.slice(contentStart, index), index: index + 1 };
  }

  let text = "";
  escaping = false;
  for (let i = contentStart; i < index; i++) {
    const c = path[i];
    if (escaping) {
      escaping = false;
      text += c;
    } else if (c === "\\") {
      escaping = true;
    } else {
      text += c;
    }
  }
  return { value: text, index: index + 1 };
}

/** Read a bare name (model sub-path or reference) up to a space, `!` or `=`. */
export function readUntilTerminator(
  path: string,
  start: number,
): { text: string; index: number } {
  let index = start;
  while (index < path.length) {
    const c = path[index];
    if (c === " " || c === "!" || c === "=") break;
    index++;
  }
  return { text: path.slice(start, index), index };
}
