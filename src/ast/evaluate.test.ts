import { describe, expect, it } from "vitest";
import { EvaluationError } from "../errors";
import { scriptedRandom, seededRandom } from "../random";
import { render } from "../results/render";
import { evaluate, selectKept } from "./evaluate";
import {
  binaryOp,
  constant,
  dice,
  listExpansion,
  modifier,
  sequence,
} from "./factory";

const rollsOf = (values: number[], sides = 6) => values.map((value) => ({ value, sides }));

describe("evaluate", () => {
  describe("constants", () => {
    it("should evaluate to the constant without drawing", () => {
      const result = evaluate(constant(7), scriptedRandom([]));
      expect(result.value).toBe(7);
      expect(result.children).toEqual([]);
    });
  });

  describe("dice", () => {
    it("should sum the rolls and keep them in draw order", () => {
      const result = evaluate(dice(3, 6), scriptedRandom([2, 5, 1]));
      expect(result.type).toBe("dice");
      expect(result.value).toBe(8);
      if (result.type !== "dice") return;
      expect(result.rolls).toEqual(rollsOf([2, 5, 1]));
    });

    it("should always roll 1 on a one-sided die", () => {
      const result = evaluate(dice(5, 1), seededRandom("one-sided"));
      expect(result.value).toBe(5);
    });

    it("should roll fudge dice between -1 and 1", () => {
      const result = evaluate(dice(4, "F"), scriptedRandom([1, 1, 1, 1]));
      expect(result.value).toBe(4);
    });

    it("should ask the random source for the die's face range", () => {
      const calls: [number, number][] = [];
      const random = {
        nextInt(min: number, max: number) {
          calls.push([min, max]);
          return max;
        },
      };
      evaluate(binaryOp("+", dice(2, 8), dice(1, "F")), random);
      expect(calls).toEqual([
        [1, 8],
        [1, 8],
        [-1, 1],
      ]);
    });
  });

  describe("modifiers", () => {
    const cases = [
      { label: "4d6 dl1", node: modifier("dl", 1, dice(4, 6)), rolls: [1, 2, 3, 4], value: 9, kept: [1, 2, 3] },
      { label: "5d8 kh3", node: modifier("kh", 3, dice(5, 8)), rolls: [1, 2, 3, 4, 5], value: 12, kept: [2, 3, 4] },
      { label: "6d10 dh2", node: modifier("dh", 2, dice(6, 10)), rolls: [1, 2, 3, 4, 5, 6], value: 10, kept: [0, 1, 2, 3] },
      { label: "4dF kl2", node: modifier("kl", 2, dice(4, "F")), rolls: [-1, 0, 1, -1], value: -2, kept: [0, 3] },
      { label: "4d6 kl2", node: modifier("kl", 2, dice(4, 6)), rolls: [4, 1, 6, 1], value: 2, kept: [1, 3] },
    ];

    for (const { label, node, rolls, value, kept } of cases) {
      it(`should evaluate ${label}`, () => {
        const result = evaluate(node, scriptedRandom(rolls));
        expect(result.value).toBe(value);
        if (result.type !== "modifier") throw new Error("expected a modifier result");
        expect(result.kept).toEqual(kept);
        expect(result.rolls.map((r) => r.value)).toEqual(rolls);
        expect(result.children[0].rolls).toBe(result.rolls);
      });
    }

    it("should keep the earlier of two equal rolls", () => {
      const result = evaluate(modifier("kh", 1, dice(3, 6)), scriptedRandom([5, 5, 3]));
      if (result.type !== "modifier") throw new Error("expected a modifier result");
      expect(result.kept).toEqual([0]);
      expect(result.value).toBe(5);
    });

    it("should equal the plain sum when keeping every die", () => {
      const kept = evaluate(modifier("kh", 3, dice(3, 6)), scriptedRandom([2, 6, 4]));
      const plain = evaluate(dice(3, 6), scriptedRandom([2, 6, 4]));
      expect(kept.value).toBe(12);
      expect(kept.value).toBe(plain.value);
    });

    it("should evaluate to zero when every die is dropped", () => {
      const result = evaluate(modifier("dl", 2, dice(2, 6)), scriptedRandom([3, 4]));
      expect(result.value).toBe(0);
      expect(render(result)).toBe("2d6 dl2 => [3, 4] = 0");
    });
  });

  describe("binary operations", () => {
    const evalOp = (op: "+" | "-" | "*" | "/", a: number, b: number) =>
      evaluate(binaryOp(op, constant(a), constant(b)), scriptedRandom([])).value;

    it("should apply integer arithmetic", () => {
      expect(evalOp("+", 3, 4)).toBe(7);
      expect(evalOp("-", 3, 5)).toBe(-2);
      expect(evalOp("*", -4, 3)).toBe(-12);
    });

    it("should truncate division toward zero", () => {
      expect(evalOp("/", 7, 2)).toBe(3);
      expect(evalOp("/", -7, 2)).toBe(-3);
      expect(evalOp("/", 7, -2)).toBe(-3);
      expect(evalOp("/", 8, 2)).toBe(4);
    });

    it("should never produce negative zero", () => {
      expect(Object.is(evalOp("/", -1, 5), 0)).toBe(true);
      expect(Object.is(evalOp("*", 0, -3), 0)).toBe(true);
    });

    it("should fail when a result leaves the safe integer range", () => {
      expect(() => evalOp("*", Number.MAX_SAFE_INTEGER, 3)).toThrow(EvaluationError);
      expect(() => evalOp("+", Number.MAX_SAFE_INTEGER, 1)).toThrow(
        "Result of (9007199254740991 + 1) is outside the safe integer range: 9007199254740992"
      );
      expect(evalOp("-", Number.MAX_SAFE_INTEGER, 1)).toBe(9007199254740990);
    });

    it("should fail when dividing by zero", () => {
      expect(() => evalOp("/", 5, 0)).toThrow(EvaluationError);
      expect(() => evalOp("/", 5, 0)).toThrow("Division by zero: 0 evaluated to 0 in (5 / 0)");
    });

    it("should fail when a divisor rolls zero", () => {
      const node = binaryOp("/", constant(5), dice(1, "F"));
      expect(() => evaluate(node, scriptedRandom([0]))).toThrow(EvaluationError);
    });

    it("should evaluate the left operand first", () => {
      const result = evaluate(binaryOp("-", dice(1, 6), dice(1, 8)), scriptedRandom([2, 7]));
      expect(result.value).toBe(-5);
      if (result.type !== "binaryOp") throw new Error("expected a binaryOp result");
      expect(result.children.map((c) => c.value)).toEqual([2, 7]);
    });
  });

  describe("list expansion", () => {
    it("should roll the body once per repetition", () => {
      const result = evaluate(listExpansion(3, dice(1, 6)), scriptedRandom([1, 2, 3]));
      expect(result.value).toEqual([1, 2, 3]);
      expect(result.children).toHaveLength(3);
    });

    it("should nest lists", () => {
      const node = listExpansion(2, listExpansion(3, constant(4)));
      expect(evaluate(node, scriptedRandom([])).value).toEqual([
        [4, 4, 4],
        [4, 4, 4],
      ]);
    });
  });

  describe("sequences", () => {
    it("should evaluate each item in order", () => {
      const node = sequence([dice(1, 20), binaryOp("+", dice(2, 6), constant(3))]);
      const result = evaluate(node, scriptedRandom([17, 2, 5]));
      expect(result.value).toEqual([17, 10]);
    });
  });

  it("should leave the expression untouched so it can be rolled again", () => {
    const node = dice(2, 6);
    const first = evaluate(node, scriptedRandom([1, 1]));
    const second = evaluate(node, scriptedRandom([6, 6]));
    expect(first.value).toBe(2);
    expect(second.value).toBe(12);
    expect(first.expression).toBe(second.expression);
    expect(node).toEqual({ type: "dice", count: 2, sides: 6 });
  });

  it("should abort when the random source fails", () => {
    expect(() => evaluate(dice(3, 6), scriptedRandom([1, 2]))).toThrow(
      "Scripted random source exhausted after 2 values"
    );
  });
});

describe("selectKept", () => {
  it("should rank lowest-first for keep-lowest and break ties by position", () => {
    expect(selectKept(rollsOf([2, 1, 1, 2]), "kl", 1)).toEqual([1]);
    expect(selectKept(rollsOf([2, 1, 1, 2]), "kl", 3)).toEqual([0, 1, 2]);
  });

  it("should drop the first-ranked dice", () => {
    expect(selectKept(rollsOf([3, 3, 5]), "dl", 1)).toEqual([1, 2]);
    expect(selectKept(rollsOf([6, 2, 6]), "dh", 1)).toEqual([1, 2]);
  });
});
