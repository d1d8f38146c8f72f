import type { DieSides, ModifierKind, Operator } from "../common/types";
import { SemanticError } from "../errors";
import { describe } from "./describe";
import type {
  BinaryOpNode,
  ConstantNode,
  DiceNode,
  Expression,
  ListExpansionNode,
  ModifierNode,
  RepeatableExpression,
  SequenceNode,
} from "./nodes";
import { isRepeatable, isScalar } from "./nodes";

// Every evaluation-tree node is built here. The checks run at transform
// time, so an invalid tree never reaches the evaluator.

function assertPositive(value: number, what: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new SemanticError(`${what} must be a positive integer, got ${value}`);
  }
}

export function constant(value: number): ConstantNode {
  if (!Number.isSafeInteger(value)) {
    throw new SemanticError(`Constant must be a safe integer, got ${value}`);
  }
  return Object.freeze({ type: "constant", value });
}

export function dice(count: number, sides: DieSides): DiceNode {
  assertPositive(count, "Number of dice");
  if (sides !== "F") assertPositive(sides, "Number of sides");
  return Object.freeze({ type: "dice", count, sides });
}

export function modifier(
  kind: ModifierKind,
  count: number,
  child: DiceNode
): ModifierNode {
  const verb = kind === "kh" || kind === "kl" ? "keep" : "drop";
  assertPositive(count, `Number of dice to ${verb}`);
  if (count > child.count) {
    throw new SemanticError(
      `Cannot ${verb} ${count} dice from ${describe(child)}: only ${child.count} rolled`
    );
  }
  return Object.freeze({ type: "modifier", kind, count, child });
}

export function binaryOp(
  op: Operator,
  left: Expression,
  right: Expression
): BinaryOpNode {
  if (!isScalar(left) || !isScalar(right)) {
    const offender = isScalar(left) ? right : left;
    throw new SemanticError(
      `List expansion "${describe(offender)}" cannot be an operand of "${op}"`
    );
  }
  return Object.freeze({ type: "binaryOp", op, left, right });
}

export function listExpansion(
  count: number,
  body: Expression
): ListExpansionNode {
  assertPositive(count, "List expansion count");
  if (!isRepeatable(body)) {
    throw new SemanticError("A sequence cannot be repeated");
  }
  return Object.freeze({ type: "listExpansion", count, body });
}

export function sequence(items: readonly Expression[]): SequenceNode {
  if (items.length < 2) {
    throw new SemanticError(
      `A sequence needs at least two expressions, got ${items.length}`
    );
  }
  const repeatable: RepeatableExpression[] = [];
  for (const item of items) {
    if (!isRepeatable(item)) {
      throw new SemanticError("Sequences cannot be nested");
    }
    repeatable.push(item);
  }
  return Object.freeze({ type: "sequence", items: Object.freeze(repeatable) });
}
