import { basicColorOffset, type BasicColorName } from "./basic.js";

export interface BasicColor {
  readonly kind: "basic";
  readonly name: BasicColorName;
  readonly bright: boolean;
}

export interface IndexedColor {
  readonly kind: "indexed";
  readonly index: number;
}

export interface RgbColor {
  readonly kind: "rgb";
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export type Color = BasicColor | IndexedColor | RgbColor;

export const COLOR_TARGETS = ["foreground", "background"] as const;
export type ColorTarget = (typeof COLOR_TARGETS)[number];

function assertByte(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`${what} must be an integer between 0 and 255, got ${value}`);
  }
}

export function basic(name: BasicColorName, isBright = false): BasicColor {
  return { kind: "basic", name, bright: isBright };
}

export function bright(color: BasicColor): BasicColor {
  return { ...color, bright: true };
}

export function indexed(index: number): IndexedColor {
  assertByte(index, "Palette index");
  return { kind: "indexed", index };
}

export function rgb(r: number, g: number, b: number): RgbColor {
  assertByte(r, "Red channel");
  assertByte(g, "Green channel");
  assertByte(b, "Blue channel");
  return { kind: "rgb", r, g, b };
}

/** The sixteen basic colors, normal and bright. */
export const Color = {
  BLACK: basic("black"),
  RED: basic("red"),
  GREEN: basic("green"),
  YELLOW: basic("yellow"),
  BLUE: basic("blue"),
  MAGENTA: basic("magenta"),
  CYAN: basic("cyan"),
  WHITE: basic("white"),
  BRIGHT_BLACK: basic("black", true),
  BRIGHT_RED: basic("red", true),
  BRIGHT_GREEN: basic("green", true),
  BRIGHT_YELLOW: basic("yellow", true),
  BRIGHT_BLUE: basic("blue", true),
  BRIGHT_MAGENTA: basic("magenta", true),
  BRIGHT_CYAN: basic("cyan", true),
  BRIGHT_WHITE: basic("white", true),
} as const;

export function colorsEqual(a: Color | null, b: Color | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  switch (a.kind) {
    case "basic":
      return b.kind === "basic" && a.name === b.name && a.bright === b.bright;
    case "indexed":
      return b.kind === "indexed" && a.index === b.index;
    case "rgb":
      return b.kind === "rgb" && a.r === b.r && a.g === b.g && a.b === b.b;
  }
}

/**
 * SGR parameters selecting `color` on the given plane.
 *
 * Basic colors use the plane's own base code (30/40, or 90/100 when bright);
 * indexed and RGB colors go through the extended selector 38/48.
 */
export function colorParams(color: Color, target: ColorTarget): number[] {
  const extended = target === "foreground" ? 38 : 48;
  switch (color.kind) {
    case "basic": {
      const base = target === "foreground" ? 30 : 40;
      return [base + basicColorOffset(color.name) + (color.bright ? 60 : 0)];
    }
    case "indexed":
      return [extended, 5, color.index];
    case "rgb":
      return [extended, 2, color.r, color.g, color.b];
  }
}
