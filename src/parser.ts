import type { MatchResult } from "ohm-js";
import type { Expression } from "./ast/nodes";
import { LRUCache } from "./common/lru-cache";
import { SyntaxError } from "./errors";
import { rollGrammar, rollSemantics } from "./grammar";

/** Concrete parse tree produced by the grammar engine. */
export type ParseTree = MatchResult;

/**
 * Internal cache of evaluation trees produced from roll strings.
 * Keyed by the trimmed, lowercased roll string. Trees are immutable, so a
 * cached tree can be evaluated any number of times.
 */
const parseCache = new LRUCache<string, Expression>(1000);

let cachingEnabled = true;

/** Enable or disable the internal parse cache. */
export function setCachingEnabled(enabled: boolean): void {
  cachingEnabled = enabled;
  if (!enabled) clearParserCache();
}

/** Returns whether the internal parse cache is currently enabled. */
export function getCachingEnabled(): boolean {
  return cachingEnabled;
}

/** Clears the internal parse cache. */
export function clearParserCache(): void {
  parseCache.clear();
}

/** Number of trees currently cached. */
export function parserCacheSize(): number {
  return parseCache.size;
}

/**
 * Match a roll string against the grammar.
 * @throws {SyntaxError} when the text is not a valid roll.
 */
export function parse(rollString: string): ParseTree {
  const match = rollGrammar.match(rollString);
  if (match.failed()) {
    throw new SyntaxError(
      `Cannot parse roll [${rollString}]: ${match.shortMessage ?? "invalid syntax"}`
    );
  }
  return match;
}

/**
 * Build the evaluation tree for a successful match.
 * @throws {SemanticError} for out-of-range counts or sides.
 */
export function transform(parseTree: ParseTree): Expression {
  return rollSemantics(parseTree).toExpression();
}

/** Parse and transform in one step, going through the cache. */
export function parseExpression(rollString: string): Expression {
  const key = rollString.trim().toLowerCase();

  if (cachingEnabled) {
    const cached = parseCache.get(key);
    if (cached) return cached;
  }

  const expression = transform(parse(rollString));

  if (cachingEnabled) parseCache.set(key, expression);
  return expression;
}
