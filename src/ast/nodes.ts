import type { DieSides, ModifierKind, Operator } from "../common/types";

export type ScalarExpression =
  | ConstantNode
  | DiceNode
  | ModifierNode
  | BinaryOpNode;

/** Anything that may be repeated by a list expansion or listed in a sequence. */
export type RepeatableExpression = ScalarExpression | ListExpansionNode;

export type Expression = RepeatableExpression | SequenceNode;

export type ConstantNode = {
  readonly type: "constant";
  readonly value: number;
};

/// Roll `count` dice with `sides` faces each (e.g., 3d6, 4dF).
export type DiceNode = {
  readonly type: "dice";
  readonly count: number;
  readonly sides: DieSides;
};

/// Keep or drop the highest/lowest `count` dice of a dice term (e.g., 4d6 dl1).
export type ModifierNode = {
  readonly type: "modifier";
  readonly kind: ModifierKind;
  readonly count: number;
  readonly child: DiceNode;
};

export type BinaryOpNode = {
  readonly type: "binaryOp";
  readonly op: Operator;
  readonly left: ScalarExpression;
  readonly right: ScalarExpression;
};

/// Evaluate `body` independently `count` times (e.g., `6 4d6 dl1`).
export type ListExpansionNode = {
  readonly type: "listExpansion";
  readonly count: number;
  readonly body: RepeatableExpression;
};

/// Comma-separated independent expressions (e.g., `d20 + 5, 2d6 + 3`).
export type SequenceNode = {
  readonly type: "sequence";
  readonly items: readonly RepeatableExpression[];
};

export function isScalar(node: Expression): node is ScalarExpression {
  return node.type !== "listExpansion" && node.type !== "sequence";
}

export function isRepeatable(node: Expression): node is RepeatableExpression {
  return node.type !== "sequence";
}
