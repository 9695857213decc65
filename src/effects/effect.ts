// Order matters: serialized parameters follow this declaration order.
export const EFFECTS = [
  "bold",
  "dim",
  "italic",
  "blink",
  "reverse",
  "hidden",
  "strikethrough",
  "overline",
] as const;
export type Effect = (typeof EFFECTS)[number];

export const EFFECT_CODES: Readonly<Record<Effect, number>> = {
  bold: 1,
  dim: 2,
  italic: 3,
  blink: 5,
  reverse: 7,
  hidden: 8,
  strikethrough: 9,
  overline: 53,
};

const VALID_EFFECTS: ReadonlySet<string> = new Set<string>(EFFECTS);

export function isEffect(value: string): value is Effect {
  return VALID_EFFECTS.has(value);
}

/** Bitmask over EFFECTS; bit i is set when EFFECTS[i] is active. */
export type EffectSet = number;

export const NO_EFFECTS: EffectSet = 0;

function bit(effect: Effect): number {
  return 1 << EFFECTS.indexOf(effect);
}

export function withEffect(set: EffectSet, effect: Effect, on: boolean): EffectSet {
  return on ? set | bit(effect) : set & ~bit(effect);
}

export function hasEffect(set: EffectSet, effect: Effect): boolean {
  return (set & bit(effect)) !== 0;
}

export function unionEffects(a: EffectSet, b: EffectSet): EffectSet {
  return a | b;
}

export function listEffects(set: EffectSet): Effect[] {
  return EFFECTS.filter((effect) => hasEffect(set, effect));
}

export function effectParams(set: EffectSet): number[] {
  return listEffects(set).map((effect) => EFFECT_CODES[effect]);
}
