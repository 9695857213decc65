import type { Color, ColorTarget } from "../color/color.js";
import type { TargetedColor } from "../color/target.js";
import type { Effect } from "../effects/effect.js";
import type { UnderlineStyle } from "../effects/underline.js";
import type { StyleElement } from "./style.js";

/**
 * Chainable sugar shared by Style, Styled and TargetedColor. Every method is
 * a single merge, so a chain is a left-to-right sequence of merges. Setting a
 * color is the same as merging it: a color on the right always wins.
 */
export abstract class Fluent<Out> {
  abstract add(element: StyleElement): Out;

  abstract setColor(target: ColorTarget, color: Color | null): Out;

  bold(): Out {
    return this.add("bold");
  }

  dim(): Out {
    return this.add("dim");
  }

  italic(): Out {
    return this.add("italic");
  }

  blink(): Out {
    return this.add("blink");
  }

  reverse(): Out {
    return this.add("reverse");
  }

  hidden(): Out {
    return this.add("hidden");
  }

  strikethrough(): Out {
    return this.add("strikethrough");
  }

  overline(): Out {
    return this.add("overline");
  }

  underline(): Out {
    return this.add("single");
  }

  doubleUnderline(): Out {
    return this.add("double");
  }

  curlyUnderline(): Out {
    return this.add("curly");
  }

  dottedUnderline(): Out {
    return this.add("dotted");
  }

  dashedUnderline(): Out {
    return this.add("dashed");
  }

  effect(effect: Effect): Out {
    return this.add(effect);
  }

  underlineStyle(style: UnderlineStyle): Out {
    return this.add(style);
  }

  fg(color: Color): Out {
    return this.setColor("foreground", color);
  }

  bg(color: Color): Out {
    return this.setColor("background", color);
  }

  color(color: TargetedColor): Out {
    return this.add(color);
  }
}
