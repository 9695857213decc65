import { describe, it, expect } from "vitest";
import { Color, indexed } from "../src/color/color.js";
import { Style } from "../src/style/style.js";
import { Styled } from "../src/styled.js";

describe("Styled", () => {
  it("renders content verbatim when the style is empty", () => {
    const s = Styled.of("text");
    expect(s.render()).toBe("text");
    expect(s.toString()).not.toContain("\x1b");
    expect(Style.EMPTY.appliedTo("text").toString()).toBe("text");
  });

  it("wraps content in the style and a reset", () => {
    expect(Style.EMPTY.bold().appliedTo("Some content").toString()).toBe(
      "\x1b[1mSome content\x1b[0m",
    );
    expect(Style.EMPTY.fg(Color.RED).appliedTo("Some content").toString()).toBe(
      "\x1b[31mSome content\x1b[0m",
    );
    expect(Style.EMPTY.bg(Color.BLUE).appliedTo("Some content").toString()).toBe(
      "\x1b[44mSome content\x1b[0m",
    );
  });

  it("chains like a style", () => {
    const s = Styled.of("CONTENT").bold().fg(Color.RED);
    expect(`${s}`).toBe("\x1b[1;31mCONTENT\x1b[0m");
    expect(Styled.of("CONTENT").curlyUnderline().render()).toBe("\x1b[4:3mCONTENT\x1b[0m");
  });

  it("accepts any displayable content", () => {
    expect(Style.EMPTY.fg(Color.GREEN).appliedTo(42).render()).toBe("\x1b[32m42\x1b[0m");
    expect(Style.EMPTY.italic().appliedTo(true).render()).toBe("\x1b[3mtrue\x1b[0m");
  });

  it("renders lazily and repeatably", () => {
    let calls = 0;
    const content = {
      toString(): string {
        calls += 1;
        return "lazy";
      },
    };
    const s = Style.EMPTY.dim().appliedTo(content);
    expect(calls).toBe(0);
    const first = s.render();
    const second = s.render();
    expect(first).toBe("\x1b[2mlazy\x1b[0m");
    expect(second).toBe(first);
    expect(calls).toBe(2);
  });

  it("exposes and replaces content and style", () => {
    const s = Styled.of("CONTENT").bold();
    expect(s.content).toBe("CONTENT");
    expect(s.style.equals(Style.EMPTY.bold())).toBe(true);

    const renamed = s.withContent("NEW CONTENT");
    expect(renamed.content).toBe("NEW CONTENT");
    expect(renamed.style.equals(Style.EMPTY.bold())).toBe(true);

    const restyled = renamed.withStyle(Style.EMPTY.fg(Color.RED));
    expect(restyled.toString()).toBe("\x1b[31mNEW CONTENT\x1b[0m");
    expect(s.toString()).toBe("\x1b[1mCONTENT\x1b[0m");
  });

  it("forwards attribute access to its style", () => {
    const s = Styled.of("x").bold().bg(indexed(4)).dashedUnderline();
    expect(s.hasEffect("bold")).toBe(true);
    expect(s.effects()).toEqual(["bold"]);
    expect(s.getUnderline()).toBe("dashed");
    expect(s.getColor("background")).toEqual(indexed(4));
    expect(s.getColor("foreground")).toBeNull();

    expect(s.setEffect("bold", false).clear("underline").setColor("background", null).render()).toBe(
      "x",
    );
    expect(s.setUnderline("single").clear("background").render()).toBe("\x1b[1;4mx\x1b[0m");
    expect(s.setColor("foreground", Color.WHITE).clear("bold").render()).toBe(
      "\x1b[4:5;37;48;5;4mx\x1b[0m",
    );
  });
});
