import type { ModifierKind, Operator, Roll } from "../common/types";
import { faceRange } from "../common/types";
import { EvaluationError } from "../errors";
import { defaultRandom, type RandomSource } from "../random";
import type {
  BinaryOpResult,
  ConstantResult,
  DiceResult,
  ListExpansionResult,
  ModifierResult,
  RepeatableResult,
  ResultNode,
  ScalarResult,
  SequenceResult,
} from "../results/nodes";
import { describe } from "./describe";
import type {
  BinaryOpNode,
  DiceNode,
  Expression,
  ModifierNode,
  RepeatableExpression,
  ScalarExpression,
} from "./nodes";

/**
 * Evaluate an expression once, drawing fresh rolls for every dice term.
 *
 * Operands are evaluated left to right, so the order of draws (and of the
 * trace) follows the text. Any error aborts the whole evaluation.
 */
export function evaluate(node: ScalarExpression, random?: RandomSource): ScalarResult;
export function evaluate(node: RepeatableExpression, random?: RandomSource): RepeatableResult;
export function evaluate(node: Expression, random?: RandomSource): ResultNode;
export function evaluate(
  node: Expression,
  random: RandomSource = defaultRandom()
): ResultNode {
  if (node.type === "sequence") {
    const children = node.items.map((item) => evaluateRepeatable(item, random));
    const result: SequenceResult = {
      type: "sequence",
      expression: node,
      value: Object.freeze(children.map((c) => c.value)),
      children: Object.freeze(children),
    };
    return Object.freeze(result);
  }

  return evaluateRepeatable(node, random);
}

function evaluateRepeatable(
  node: RepeatableExpression,
  random: RandomSource
): RepeatableResult {
  if (node.type !== "listExpansion") return evaluateScalar(node, random);

  // each repetition rolls again; nothing is reused between them
  const children = Array.from({ length: node.count }, () =>
    evaluateRepeatable(node.body, random)
  );
  const result: ListExpansionResult = {
    type: "listExpansion",
    expression: node,
    value: Object.freeze(children.map((c) => c.value)),
    children: Object.freeze(children),
  };
  return Object.freeze(result);
}

function evaluateScalar(
  node: ScalarExpression,
  random: RandomSource
): ScalarResult {
  switch (node.type) {
    case "constant": {
      const result: ConstantResult = {
        type: "constant",
        expression: node,
        value: node.value,
        children: [],
      };
      return Object.freeze(result);
    }

    case "dice":
      return rollDice(node, random);

    case "modifier":
      return applyModifier(node, random);

    case "binaryOp": {
      const left = evaluateScalar(node.left, random);
      const right = evaluateScalar(node.right, random);
      const result: BinaryOpResult = {
        type: "binaryOp",
        expression: node,
        value: applyOperator(node, left.value, right.value),
        children: Object.freeze([left, right] as const),
      };
      return Object.freeze(result);
    }
  }
}

function rollDice(node: DiceNode, random: RandomSource): DiceResult {
  const [min, max] = faceRange(node.sides);
  const rolls: Roll[] = [];
  for (let i = 0; i < node.count; i++) {
    rolls.push(Object.freeze({ value: random.nextInt(min, max), sides: node.sides }));
  }

  const result: DiceResult = {
    type: "dice",
    expression: node,
    value: toSafeInteger(node, sum(rolls.map((r) => r.value))),
    rolls: Object.freeze(rolls),
    children: [],
  };
  return Object.freeze(result);
}

function applyModifier(node: ModifierNode, random: RandomSource): ModifierResult {
  const dice = rollDice(node.child, random);
  const kept = selectKept(dice.rolls, node.kind, node.count);

  const result: ModifierResult = {
    type: "modifier",
    expression: node,
    value: toSafeInteger(node, sum(kept.map((i) => dice.rolls[i].value))),
    rolls: dice.rolls,
    kept: Object.freeze(kept),
    children: Object.freeze([dice] as const),
  };
  return Object.freeze(result);
}

/**
 * Indices of the rolls a modifier keeps, in roll order.
 * Equal values are ranked by position, so the earlier die wins a tie.
 */
export function selectKept(
  rolls: readonly Roll[],
  kind: ModifierKind,
  count: number
): number[] {
  const highestFirst = kind === "kh" || kind === "dh";
  const ranked = rolls
    .map((roll, index) => ({ value: roll.value, index }))
    .sort(
      (a, b) =>
        (highestFirst ? b.value - a.value : a.value - b.value) ||
        a.index - b.index
    );

  const chosen =
    kind === "kh" || kind === "kl" ? ranked.slice(0, count) : ranked.slice(count);
  return chosen.map((r) => r.index).sort((a, b) => a - b);
}

function applyOperator(node: BinaryOpNode, left: number, right: number): number {
  const op: Operator = node.op;
  switch (op) {
    case "+":
      return toSafeInteger(node, left + right);
    case "-":
      return toSafeInteger(node, left - right);
    case "*":
      return toSafeInteger(node, left * right);
    case "/":
      if (right === 0) {
        throw new EvaluationError(
          `Division by zero: ${describe(node.right)} evaluated to 0 in ${describe(node)}`
        );
      }
      // integer division, truncating toward zero
      return toSafeInteger(node, Math.trunc(left / right));
  }
}

/** Rejects results that lost integer precision; maps -0 to 0. */
function toSafeInteger(node: ScalarExpression, value: number): number {
  if (!Number.isSafeInteger(value)) {
    throw new EvaluationError(
      `Result of ${describe(node)} is outside the safe integer range: ${value}`
    );
  }
  return value === 0 ? 0 : value;
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}
