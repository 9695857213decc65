export const ESC = "\x1b";

/** Clears every active attribute back to the terminal defaults. */
export const RESET = `${ESC}[0m`;

/**
 * Wraps parameter tokens in the SGR envelope. An empty list yields "" rather
 * than `ESC[m`, which terminals read as a full reset.
 */
export function sgr(tokens: readonly (string | number)[]): string {
  if (tokens.length === 0) {
    return "";
  }
  return `${ESC}[${tokens.join(";")}m`;
}

/** Makes an escape sequence printable, e.g. for `paint codes`. */
export function visibleEscapes(text: string): string {
  return text.replaceAll(ESC, "\\x1b");
}
