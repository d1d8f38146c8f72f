export { describe } from "./ast/describe";
export { evaluate, selectKept } from "./ast/evaluate";
export {
  binaryOp,
  constant,
  dice,
  listExpansion,
  modifier,
  sequence,
} from "./ast/factory";
export { isRepeatable, isScalar } from "./ast/nodes";
export type {
  BinaryOpNode,
  ConstantNode,
  DiceNode,
  Expression,
  ListExpansionNode,
  ModifierNode,
  RepeatableExpression,
  ScalarExpression,
  SequenceNode,
} from "./ast/nodes";

export { LRUCache } from "./common/lru-cache";
export { faceRange, isModifierKind, MODIFIER_KINDS } from "./common/types";
export type {
  DieSides,
  ModifierKind,
  Operator,
  Roll,
  RollValue,
} from "./common/types";

export {
  ConfigError,
  EvaluationError,
  RollError,
  SemanticError,
  SyntaxError,
} from "./errors";

export { ROLL_GRAMMAR, rollGrammar, rollSemantics } from "./grammar";
export {
  clearParserCache,
  getCachingEnabled,
  parse,
  parseExpression,
  parserCacheSize,
  setCachingEnabled,
  transform,
} from "./parser";
export type { ParseTree } from "./parser";

export { defaultRandom, scriptedRandom, seededRandom } from "./random";
export type { RandomSource } from "./random";

export { formatValue, render, trace } from "./results/render";
export type {
  BinaryOpResult,
  ConstantResult,
  DiceResult,
  ListExpansionResult,
  ModifierResult,
  RepeatableResult,
  ResultNode,
  ScalarResult,
  SequenceResult,
} from "./results/nodes";

export { roll } from "./roll";
export type { RollOptions, RollOutcome } from "./roll";
