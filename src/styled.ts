import type { Color, ColorTarget } from "./color/color.js";
import type { Effect } from "./effects/effect.js";
import type { UnderlineVariant } from "./effects/underline.js";
import { Fluent } from "./style/fluent.js";
import { RESET } from "./style/sgr.js";
import { Style, type StyleAttribute, type StyleElement } from "./style/style.js";

/** Any value with a textual representation. Content is never inspected. */
export type Displayable = { toString(): string };

/**
 * Content paired with a Style. Nothing is computed until the value is
 * rendered (`toString()`, template interpolation, `render()`).
 */
export class Styled<C extends Displayable> extends Fluent<Styled<C>> {
  private constructor(
    readonly content: C,
    readonly style: Style,
  ) {
    super();
  }

  static of<C extends Displayable>(content: C, style: Style = Style.EMPTY): Styled<C> {
    return new Styled(content, style);
  }

  withContent<D extends Displayable>(content: D): Styled<D> {
    return new Styled(content, this.style);
  }

  withStyle(style: Style): Styled<C> {
    return new Styled(this.content, style);
  }

  mapStyle(fn: (style: Style) => Style): Styled<C> {
    return this.withStyle(fn(this.style));
  }

  add(element: StyleElement): Styled<C> {
    return this.mapStyle((s) => s.add(element));
  }

  hasEffect(effect: Effect): boolean {
    return this.style.hasEffect(effect);
  }

  effects(): Effect[] {
    return this.style.effects();
  }

  setEffect(effect: Effect, on: boolean): Styled<C> {
    return this.mapStyle((s) => s.setEffect(effect, on));
  }

  getUnderline(): UnderlineVariant {
    return this.style.getUnderline();
  }

  setUnderline(variant: UnderlineVariant): Styled<C> {
    return this.mapStyle((s) => s.setUnderline(variant));
  }

  getColor(target: ColorTarget): Color | null {
    return this.style.getColor(target);
  }

  setColor(target: ColorTarget, color: Color | null): Styled<C> {
    return this.mapStyle((s) => s.setColor(target, color));
  }

  clear(attribute: StyleAttribute): Styled<C> {
    return this.mapStyle((s) => s.clear(attribute));
  }

  render(): string {
    const text = String(this.content);
    if (this.style.isEmpty()) {
      return text;
    }
    return `${this.style.toString()}${text}${RESET}`;
  }

  toString(): string {
    return this.render();
  }
}
