import type { Color } from "./color/color.js";
import type { Effect } from "./effects/effect.js";
import type { UnderlineStyle } from "./effects/underline.js";
import { Style } from "./style/style.js";
import { Styled, type Displayable } from "./styled.js";

export { BASIC_COLORS, isBasicColorName, type BasicColorName } from "./color/basic.js";
export {
  COLOR_TARGETS,
  Color,
  basic,
  bright,
  colorParams,
  colorsEqual,
  indexed,
  rgb,
  type BasicColor,
  type ColorTarget,
  type IndexedColor,
  type RgbColor,
} from "./color/color.js";
export { TargetedColor, forBg, forFg, forTarget } from "./color/target.js";
export { ColorSpecError, formatColor, parseColor } from "./color/parse.js";
export { EFFECTS, EFFECT_CODES, isEffect, type Effect } from "./effects/effect.js";
export {
  UNDERLINE_STYLES,
  isUnderlineStyle,
  type UnderlineStyle,
  type UnderlineVariant,
} from "./effects/underline.js";
export { RESET, sgr } from "./style/sgr.js";
export { Style, style, type StyleAttribute, type StyleElement } from "./style/style.js";
export { Styled, type Displayable } from "./styled.js";

// Entry points for chains that start from nothing, e.g. `bold().fg(Color.RED)`.

export const bold = (): Style => Style.EMPTY.bold();
export const dim = (): Style => Style.EMPTY.dim();
export const italic = (): Style => Style.EMPTY.italic();
export const blink = (): Style => Style.EMPTY.blink();
export const reverse = (): Style => Style.EMPTY.reverse();
export const hidden = (): Style => Style.EMPTY.hidden();
export const strikethrough = (): Style => Style.EMPTY.strikethrough();
export const overline = (): Style => Style.EMPTY.overline();
export const underline = (): Style => Style.EMPTY.underline();
export const doubleUnderline = (): Style => Style.EMPTY.doubleUnderline();
export const curlyUnderline = (): Style => Style.EMPTY.curlyUnderline();
export const dottedUnderline = (): Style => Style.EMPTY.dottedUnderline();
export const dashedUnderline = (): Style => Style.EMPTY.dashedUnderline();
export const effect = (e: Effect): Style => Style.EMPTY.effect(e);
export const underlineStyle = (u: UnderlineStyle): Style => Style.EMPTY.underlineStyle(u);
export const fg = (color: Color): Style => Style.EMPTY.fg(color);
export const bg = (color: Color): Style => Style.EMPTY.bg(color);

export function styled<C extends Displayable>(content: C): Styled<C> {
  return Styled.of(content);
}
