// Zod schemas shared by the theme config loader (config/config.ts) and the
// CLI (cli.ts).

import { z } from "zod";
import { ColorSpecError, parseColor } from "./color/parse.js";
import { EFFECTS } from "./effects/effect.js";
import { UNDERLINE_STYLES } from "./effects/underline.js";
import { Style } from "./style/style.js";

export const MAX_STYLE_NAME_LENGTH = 64;
export const STYLE_NAME_REGEX = /^[A-Za-z0-9_.-]+$/;

/** A color spec string, or a bare palette index such as `fg = 208` in TOML. */
export const colorSpecSchema = z.union([z.string(), z.number().int()]).transform((value, ctx) => {
  try {
    return parseColor(String(value));
  } catch (err) {
    if (!(err instanceof ColorSpecError)) {
      throw err;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
    return z.NEVER;
  }
});

export const EffectEnum = z.enum(EFFECTS);
export const UnderlineEnum = z.enum(UNDERLINE_STYLES);

export const styleNameSchema = z
  .string()
  .min(1, "Style name cannot be empty.")
  .max(MAX_STYLE_NAME_LENGTH, `Style name exceeds maximum length of ${MAX_STYLE_NAME_LENGTH}.`)
  .regex(STYLE_NAME_REGEX, "Style name may only contain letters, digits, '_', '.' and '-'.");

/** One `[styles.<name>]` table of the theme file, lifted into a Style. */
export const styleEntrySchema = z
  .object({
    fg: colorSpecSchema.optional(),
    bg: colorSpecSchema.optional(),
    effects: z.array(EffectEnum).default([]),
    underline: UnderlineEnum.optional(),
  })
  .strict()
  .transform((entry) => {
    let style = Style.EMPTY;
    for (const effect of entry.effects) {
      style = style.effect(effect);
    }
    if (entry.underline) {
      style = style.underlineStyle(entry.underline);
    }
    if (entry.fg) {
      style = style.fg(entry.fg);
    }
    if (entry.bg) {
      style = style.bg(entry.bg);
    }
    return style;
  });

export function formatZodError(err: z.ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
