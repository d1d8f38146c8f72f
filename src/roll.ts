import { evaluate } from "./ast/evaluate";
import type { Expression } from "./ast/nodes";
import type { RollValue } from "./common/types";
import { parseExpression } from "./parser";
import { defaultRandom, seededRandom, type RandomSource } from "./random";
import { render } from "./results/render";
import type { ResultNode } from "./results/nodes";

export type RollOptions = {
  /** Seed for a reproducible roll. Ignored when `random` is given. */
  seed?: string;
  /** Explicit source of die outcomes. */
  random?: RandomSource;
};

export type RollOutcome = {
  expression: Expression;
  result: ResultNode;
  value: RollValue;
  /** Rendered trace of the evaluation. */
  text: string;
};

/**
 * Parse, evaluate and render a roll string in one call.
 *
 * @example
 * roll("2 2d20 kh1 + 8").value // e.g. [21, 26]
 */
export function roll(notation: string, options: RollOptions = {}): RollOutcome {
  const random =
    options.random ??
    (options.seed !== undefined ? seededRandom(options.seed) : defaultRandom());

  const expression = parseExpression(notation);
  const result = evaluate(expression, random);

  return {
    expression,
    result,
    value: result.value,
    text: render(result),
  };
}
