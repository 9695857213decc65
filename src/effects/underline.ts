export const UNDERLINE_STYLES = ["single", "double", "curly", "dotted", "dashed"] as const;
export type UnderlineStyle = (typeof UNDERLINE_STYLES)[number];

/** The single underline slot of a style; "none" means no underline at all. */
export type UnderlineVariant = "none" | UnderlineStyle;

const VALID_UNDERLINE_STYLES: ReadonlySet<string> = new Set<string>(UNDERLINE_STYLES);

export function isUnderlineStyle(value: string): value is UnderlineStyle {
  return VALID_UNDERLINE_STYLES.has(value);
}

// Sub-parameters use the colon form (ITU T.416), so each is one atomic token.
const UNDERLINE_TOKENS: Readonly<Record<UnderlineStyle, string>> = {
  single: "4",
  double: "4:2",
  curly: "4:3",
  dotted: "4:4",
  dashed: "4:5",
};

export function underlineParams(variant: UnderlineVariant): string[] {
  return variant === "none" ? [] : [UNDERLINE_TOKENS[variant]];
}
