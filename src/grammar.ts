import * as ohm from "ohm-js";
import {
  binaryOp,
  constant,
  dice,
  listExpansion,
  modifier,
  sequence,
} from "./ast/factory";
import type { Expression } from "./ast/nodes";
import type { DieSides, Operator } from "./common/types";
import { isModifierKind } from "./common/types";
import { SemanticError } from "./errors";

/**
 * Roll grammar.
 *
 * - `,` separates independent expressions (a sequence).
 * - An integer followed by whitespace repeats the rest: `6 4d6 dl1`.
 * - `*` and `/` bind tighter than `+` and `-`; dice bind tighter than both.
 * - Dice are `[count]d<sides|F>` with at most one `kh|kl|dh|dl<n>` directive.
 */
export const ROLL_GRAMMAR = String.raw`
DiceRoll {
  Roll
    = NonemptyListOf<Repeat, ",">

  Repeat
    = repeatCount Repeat  -- expand
    | Sum

  Sum
    = Sum "+" Product  -- add
    | Sum "-" Product  -- sub
    | Product

  Product
    = Product "*" Primary  -- mul
    | Product "/" Primary  -- div
    | Primary

  Primary
    = "(" Repeat ")"  -- parens
    | Dice
    | integer

  Dice
    = dice directive?

  dice
    = digit* caseInsensitive<"d"> sides

  sides
    = digit+  -- number
    | caseInsensitive<"f">  -- fudge

  directive
    = directiveKind digit+

  directiveKind
    = caseInsensitive<"kh">
    | caseInsensitive<"kl">
    | caseInsensitive<"dh">
    | caseInsensitive<"dl">

  repeatCount
    = digit+ &space

  integer
    = "-"? digit+
}
`;

export const rollGrammar: ohm.Grammar = ohm.grammar(ROLL_GRAMMAR);

function toExpression(node: ohm.Node): Expression {
  return node.toExpression();
}

function toInteger(text: string): number {
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new SemanticError(`Number out of range: ${text}`);
  }
  return value;
}

function binary(op: Operator) {
  return (left: ohm.Node, _op: ohm.Node, right: ohm.Node): Expression =>
    binaryOp(op, toExpression(left), toExpression(right));
}

/** Builds the evaluation tree from a successful match. */
export const rollSemantics: ohm.Semantics = rollGrammar
  .createSemantics()
  .addOperation<Expression>("toExpression", {
    Roll(list) {
      const items = list.asIteration().children.map(toExpression);
      return items.length === 1 ? items[0] : sequence(items);
    },

    Repeat_expand(count, body) {
      return listExpansion(toInteger(count.sourceString), toExpression(body));
    },

    Sum_add: binary("+"),
    Sum_sub: binary("-"),
    Product_mul: binary("*"),
    Product_div: binary("/"),

    Primary_parens(_open, inner, _close) {
      return toExpression(inner);
    },

    Dice(term, directive) {
      const [countNode, , sidesNode] = term.children;
      const countText = countNode.sourceString;
      const sidesText = sidesNode.sourceString;

      const sides: DieSides =
        sidesText.toLowerCase() === "f" ? "F" : toInteger(sidesText);
      const base = dice(countText === "" ? 1 : toInteger(countText), sides);

      const [applied] = directive.children;
      if (applied === undefined) return base;

      const [kindNode, amountNode] = applied.children;
      const kind = kindNode.sourceString.toLowerCase();
      if (!isModifierKind(kind)) {
        throw new SemanticError(`Unknown dice directive: ${kindNode.sourceString}`);
      }
      return modifier(kind, toInteger(amountNode.sourceString), base);
    },

    integer(_sign, _digits) {
      return constant(toInteger(this.sourceString));
    },
  });
