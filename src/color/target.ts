import { Fluent } from "../style/fluent.js";
import { Style, type StyleElement } from "../style/style.js";
import type { Displayable, Styled } from "../styled.js";
import type { Color, ColorTarget } from "./color.js";

/**
 * A color bound to one rendering plane. It is a style element on its own:
 * it prints as its escape sequence and chains into a Style, so
 * `forFg(Color.RED).bold()` works like `fg(Color.RED).bold()`.
 */
export class TargetedColor extends Fluent<Style> {
  constructor(
    readonly value: Color,
    readonly target: ColorTarget,
  ) {
    super();
  }

  toStyle(): Style {
    return Style.EMPTY.setColor(this.target, this.value);
  }

  add(element: StyleElement): Style {
    return this.toStyle().add(element);
  }

  setColor(target: ColorTarget, color: Color | null): Style {
    return this.toStyle().setColor(target, color);
  }

  appliedTo<C extends Displayable>(content: C): Styled<C> {
    return this.toStyle().appliedTo(content);
  }

  toString(): string {
    return this.toStyle().toString();
  }
}

export function forTarget(color: Color, target: ColorTarget): TargetedColor {
  return new TargetedColor(color, target);
}

export function forFg(color: Color): TargetedColor {
  return forTarget(color, "foreground");
}

export function forBg(color: Color): TargetedColor {
  return forTarget(color, "background");
}
