import { describe } from "../ast/describe";
import type { RollValue } from "../common/types";
import type { RepeatableResult, ResultNode, ScalarResult, SequenceResult } from "./nodes";

const INDENT = "  ";

/** `7`, `[21, 26]`, `[[1, 2], [3, 4]]` */
export function formatValue(value: RollValue): string {
  if (typeof value === "number") return `${value}`;
  return `[${value.map(formatValue).join(", ")}]`;
}

/**
 * One-line trace of a scalar result:
 * `expression => expression with rolls => last step = value`.
 * Stages that would repeat the previous one (or the value) are left out.
 */
export function trace(result: ScalarResult): string {
  const valueText = formatValue(result.value);
  const stages = [describe(result.expression)];

  const substituted = substitute(result);
  if (substituted !== stages[stages.length - 1]) stages.push(substituted);

  const reduced = reduce(result);
  if (reduced !== stages[stages.length - 1] && reduced !== valueText) {
    stages.push(reduced);
  }

  return `${stages.join(" => ")} = ${valueText}`;
}

/** The expression with each dice term replaced by its raw rolls. */
function substitute(result: ScalarResult): string {
  switch (result.type) {
    case "constant":
      return `${result.value}`;
    case "dice":
    case "modifier":
      return formatValue(result.rolls.map((r) => r.value));
    case "binaryOp": {
      const [left, right] = result.children;
      return `(${substitute(left)} ${result.expression.op} ${substitute(right)})`;
    }
  }
}

/** The final step before the value: the operands, or the rolls being summed. */
function reduce(result: ScalarResult): string {
  switch (result.type) {
    case "constant":
      return `${result.value}`;
    case "dice":
      return result.rolls.map((r) => r.value).join(" + ");
    case "modifier": {
      const { rolls, kept } = result;
      if (kept.length === 0) return "0";
      return kept.map((i) => rolls[i].value).join(" + ");
    }
    case "binaryOp": {
      const [left, right] = result.children;
      return `${formatValue(left.value)} ${result.expression.op} ${formatValue(right.value)}`;
    }
  }
}

/**
 * Multi-line trace of a whole evaluation. Scalars render as a single trace
 * line; list expansions and sequences get a title, their parameters, the
 * collected results, and one indexed block per element.
 */
export function render(result: ResultNode): string {
  return renderLines(result).join("\n");
}

function renderLines(result: ResultNode): string[] {
  switch (result.type) {
    case "constant":
    case "dice":
    case "modifier":
    case "binaryOp":
      return [trace(result)];

    case "listExpansion": {
      const { count, body } = result.expression;
      return [
        `List Expansion: ${describe(result.expression)}`,
        `${INDENT}Count: ${count} => ${count}`,
        `${INDENT}Expression: ${describe(body)}`,
        `${INDENT}Results: ${formatValue(result.value)}`,
        ...indexedBlocks(result.children),
      ];
    }

    case "sequence":
      return renderSequence(result);
  }
}

function renderSequence(result: SequenceResult): string[] {
  return [
    `Sequence: ${describe(result.expression)}`,
    `${INDENT}Results: ${formatValue(result.value)}`,
    ...indexedBlocks(result.children),
  ];
}

function indexedBlocks(children: readonly RepeatableResult[]): string[] {
  return children.flatMap((child, i) => [
    `${INDENT}${i}: `,
    ...renderLines(child).map((line) => `${INDENT}${INDENT}${line}`),
  ]);
}
