import { isBasicColorName } from "./basic.js";
import { basic, indexed, rgb, type Color } from "./color.js";

export class ColorSpecError extends Error {
  readonly spec: string;

  constructor(spec: string, detail?: string) {
    super(
      `Could not parse color: "${spec}"${detail ? ` (${detail})` : ""}. Try: red, bright-red, 208, #ff8800, #f80, or rgb(255,136,0).`,
    );
    this.name = "ColorSpecError";
    this.spec = spec;
  }
}

function byte(spec: string, text: string): number {
  const n = Number(text);
  if (n > 255) {
    throw new ColorSpecError(spec, `${text} is out of range 0-255`);
  }
  return n;
}

/** Parse a human-friendly color spec into a Color. */
export function parseColor(input: string): Color {
  const raw = input.trim();
  const lower = raw.toLowerCase();

  if (isBasicColorName(lower)) {
    return basic(lower);
  }

  // "bright-red", "brightred"
  const brightMatch = lower.match(/^bright-?([a-z]+)$/);
  if (brightMatch && isBasicColorName(brightMatch[1])) {
    return basic(brightMatch[1], true);
  }

  if (/^\d{1,3}$/.test(lower)) {
    return indexed(byte(raw, lower));
  }

  const hexMatch = lower.match(/^#([0-9a-f]{3}|[0-9a-f]{6})$/);
  if (hexMatch) {
    let digits = hexMatch[1];
    if (digits.length === 3) {
      digits = digits
        .split("")
        .map((d) => d + d)
        .join("");
    }
    return rgb(
      parseInt(digits.slice(0, 2), 16),
      parseInt(digits.slice(2, 4), 16),
      parseInt(digits.slice(4, 6), 16),
    );
  }

  const rgbMatch = lower.match(/^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/);
  if (rgbMatch) {
    return rgb(byte(raw, rgbMatch[1]), byte(raw, rgbMatch[2]), byte(raw, rgbMatch[3]));
  }

  throw new ColorSpecError(raw);
}

/** Inverse of parseColor; RGB colors come out as lowercase #rrggbb. */
export function formatColor(color: Color): string {
  switch (color.kind) {
    case "basic":
      return color.bright ? `bright-${color.name}` : color.name;
    case "indexed":
      return String(color.index);
    case "rgb":
      return (
        "#" + [color.r, color.g, color.b].map((c) => c.toString(16).padStart(2, "0")).join("")
      );
  }
}
