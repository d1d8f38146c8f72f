import type { Expression } from "./nodes";

/**
 * Canonical text of an expression. Binary operations are always
 * parenthesized so the trace shows how the expression was grouped.
 */
export function describe(node: Expression): string {
  switch (node.type) {
    case "constant":
      return `${node.value}`;
    case "dice":
      return `${node.count}d${node.sides}`;
    case "modifier":
      return `${describe(node.child)} ${node.kind}${node.count}`;
    case "binaryOp":
      return `(${describe(node.left)} ${node.op} ${describe(node.right)})`;
    case "listExpansion":
      return `${node.count} ${describe(node.body)}`;
    case "sequence":
      return node.items.map(describe).join(", ");
  }
}
