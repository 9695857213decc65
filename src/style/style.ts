import { colorParams, colorsEqual, type Color, type ColorTarget } from "../color/color.js";
import type { TargetedColor } from "../color/target.js";
import {
  NO_EFFECTS,
  effectParams,
  hasEffect,
  isEffect,
  listEffects,
  unionEffects,
  withEffect,
  type Effect,
  type EffectSet,
} from "../effects/effect.js";
import {
  isUnderlineStyle,
  underlineParams,
  type UnderlineStyle,
  type UnderlineVariant,
} from "../effects/underline.js";
import { Fluent } from "./fluent.js";
import { sgr } from "./sgr.js";
import { Styled, type Displayable } from "../styled.js";

/** Anything that can be lifted into a (partial) Style. */
export type StyleElement = Effect | UnderlineStyle | TargetedColor | Style;

/**
 * Something that can be cleared from a style: a single effect, a specific
 * underline style, any underline ("underline"), or a color plane.
 */
export type StyleAttribute = Effect | UnderlineStyle | "underline" | ColorTarget;

export class Style extends Fluent<Style> {
  static readonly EMPTY = new Style(null, null, NO_EFFECTS, "none");

  private constructor(
    readonly foreground: Color | null,
    readonly background: Color | null,
    readonly effectSet: EffectSet,
    readonly underlineVariant: UnderlineVariant,
  ) {
    super();
  }

  static empty(): Style {
    return Style.EMPTY;
  }

  static from(element: StyleElement): Style {
    if (element instanceof Style) {
      return element;
    }
    if (typeof element !== "string") {
      return element.toStyle();
    }
    if (isEffect(element)) {
      return Style.EMPTY.setEffect(element, true);
    }
    return Style.EMPTY.setUnderline(element);
  }

  isEmpty(): boolean {
    return this.equals(Style.EMPTY);
  }

  /**
   * Right-biased merge: colors and underline from `other` win when it sets
   * them, effects are united.
   */
  merge(other: Style): Style {
    return new Style(
      other.foreground ?? this.foreground,
      other.background ?? this.background,
      unionEffects(this.effectSet, other.effectSet),
      other.underlineVariant === "none" ? this.underlineVariant : other.underlineVariant,
    );
  }

  add(element: StyleElement): Style {
    return this.merge(Style.from(element));
  }

  hasEffect(effect: Effect): boolean {
    return hasEffect(this.effectSet, effect);
  }

  effects(): Effect[] {
    return listEffects(this.effectSet);
  }

  setEffect(effect: Effect, on: boolean): Style {
    return new Style(
      this.foreground,
      this.background,
      withEffect(this.effectSet, effect, on),
      this.underlineVariant,
    );
  }

  getUnderline(): UnderlineVariant {
    return this.underlineVariant;
  }

  setUnderline(variant: UnderlineVariant): Style {
    return new Style(this.foreground, this.background, this.effectSet, variant);
  }

  getColor(target: ColorTarget): Color | null {
    return target === "foreground" ? this.foreground : this.background;
  }

  setColor(target: ColorTarget, color: Color | null): Style {
    return target === "foreground"
      ? new Style(color, this.background, this.effectSet, this.underlineVariant)
      : new Style(this.foreground, color, this.effectSet, this.underlineVariant);
  }

  clear(attribute: StyleAttribute): Style {
    if (attribute === "foreground" || attribute === "background") {
      return this.setColor(attribute, null);
    }
    if (attribute === "underline") {
      return this.setUnderline("none");
    }
    if (isUnderlineStyle(attribute)) {
      return this.underlineVariant === attribute ? this.setUnderline("none") : this;
    }
    return this.setEffect(attribute, false);
  }

  equals(other: Style): boolean {
    return (
      this.effectSet === other.effectSet &&
      this.underlineVariant === other.underlineVariant &&
      colorsEqual(this.foreground, other.foreground) &&
      colorsEqual(this.background, other.background)
    );
  }

  /** Ordered SGR tokens: effects, underline, foreground, background. */
  params(): string[] {
    const tokens: string[] = effectParams(this.effectSet).map(String);
    tokens.push(...underlineParams(this.underlineVariant));
    if (this.foreground) {
      tokens.push(...colorParams(this.foreground, "foreground").map(String));
    }
    if (this.background) {
      tokens.push(...colorParams(this.background, "background").map(String));
    }
    return tokens;
  }

  appliedTo<C extends Displayable>(content: C): Styled<C> {
    return Styled.of(content, this);
  }

  toString(): string {
    return sgr(this.params());
  }
}

/** Merges any number of elements left to right into one Style. */
export function style(...elements: StyleElement[]): Style {
  return elements.reduce<Style>((acc, element) => acc.add(element), Style.EMPTY);
}
