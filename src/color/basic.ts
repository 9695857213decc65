export const BASIC_COLORS = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
] as const;
export type BasicColorName = (typeof BASIC_COLORS)[number];

const VALID_BASIC_COLORS: ReadonlySet<string> = new Set<string>(BASIC_COLORS);

export function isBasicColorName(name: string): name is BasicColorName {
  return VALID_BASIC_COLORS.has(name);
}

/** Palette offset (0–7) added to the plane's base code. */
export function basicColorOffset(name: BasicColorName): number {
  return BASIC_COLORS.indexOf(name);
}
