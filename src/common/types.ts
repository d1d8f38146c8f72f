/** Number of faces on a die, or `"F"` for a Fate/fudge die (faces -1, 0, 1). */
export type DieSides = number | "F";

/** Arithmetic operators accepted between scalar terms. */
export type Operator = "+" | "-" | "*" | "/";

/**
 * Dice pool directives.
 * `kh`/`kl` keep the highest/lowest N dice, `dh`/`dl` drop them.
 */
export type ModifierKind = "kh" | "kl" | "dh" | "dl";

export const MODIFIER_KINDS = ["kh", "kl", "dh", "dl"] as const satisfies readonly ModifierKind[];

/** A scalar value, or the (possibly nested) values of a list expansion or sequence. */
export type RollValue = number | readonly RollValue[];

/** One die outcome. */
export interface Roll {
  readonly value: number;
  readonly sides: DieSides;
}

export const isModifierKind = (s: string): s is ModifierKind =>
  (MODIFIER_KINDS as readonly string[]).includes(s);

/** Inclusive face range of a die. */
export function faceRange(sides: DieSides): readonly [number, number] {
  return sides === "F" ? [-1, 1] : [1, sides];
}
