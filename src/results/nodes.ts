import type {
  BinaryOpNode,
  ConstantNode,
  DiceNode,
  ListExpansionNode,
  ModifierNode,
  SequenceNode,
} from "../ast/nodes";
import type { Roll, RollValue } from "../common/types";

// Each variant mirrors one evaluation-tree node: `expression` points back at
// it and `children` holds the results of its children, in the same order.

export type ScalarResult =
  | ConstantResult
  | DiceResult
  | ModifierResult
  | BinaryOpResult;

export type RepeatableResult = ScalarResult | ListExpansionResult;

export type ResultNode = RepeatableResult | SequenceResult;

export type ConstantResult = {
  readonly type: "constant";
  readonly expression: ConstantNode;
  readonly value: number;
  readonly children: readonly [];
};

export type DiceResult = {
  readonly type: "dice";
  readonly expression: DiceNode;
  /** Sum of all rolls. */
  readonly value: number;
  /** Rolls in the order they were drawn. */
  readonly rolls: readonly Roll[];
  readonly children: readonly [];
};

export type ModifierResult = {
  readonly type: "modifier";
  readonly expression: ModifierNode;
  /** Sum of the kept rolls. */
  readonly value: number;
  /** The dice term's rolls, unsorted. */
  readonly rolls: readonly Roll[];
  /** Indices into `rolls` of the dice that count, ascending. */
  readonly kept: readonly number[];
  readonly children: readonly [DiceResult];
};

export type BinaryOpResult = {
  readonly type: "binaryOp";
  readonly expression: BinaryOpNode;
  readonly value: number;
  readonly children: readonly [ScalarResult, ScalarResult];
};

export type ListExpansionResult = {
  readonly type: "listExpansion";
  readonly expression: ListExpansionNode;
  /** One value per repetition. */
  readonly value: readonly RollValue[];
  readonly children: readonly RepeatableResult[];
};

export type SequenceResult = {
  readonly type: "sequence";
  readonly expression: SequenceNode;
  readonly value: readonly RollValue[];
  readonly children: readonly RepeatableResult[];
};
