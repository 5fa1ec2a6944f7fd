import { describe, it, expect } from "vitest";

import { bigints, dates, intervalsOver, numeric, strings } from "../algebra";
import { closed, open, unbounded } from "../endpoint";
import type { IntervalSetError } from "../errors";
import { Interval } from "../interval";
import { defineOrder, numberOrder } from "../order";
import { type Result, unwrap } from "../result";

function errorKind(result: Result<unknown, IntervalSetError>) {
  return result.ok ? undefined : result.error.kind;
}

describe("constructing intervals", () => {
  it("requires low < high unless both ends are closed", () => {
    expect(numeric.open(0, 1).ok).toBe(true);
    expect(errorKind(numeric.open(1, 1))).toBe("InvalidInterval");
    expect(errorKind(numeric.open(2, 1))).toBe("InvalidInterval");
    expect(numeric.closed(1, 1).ok).toBe(true);
    expect(errorKind(numeric.closed(2, 1))).toBe("InvalidInterval");
    expect(errorKind(numeric.openClosed(0, 0))).toBe("InvalidInterval");
    expect(errorKind(numeric.closedOpen(0, 0))).toBe("InvalidInterval");
    expect(numeric.closedOpen(0, 1).ok).toBe(true);
  });

  it("accepts any value on the bounded side of a half-line", () => {
    expect(Interval.create(open(0), unbounded(), numberOrder).ok).toBe(true);
    expect(numeric.interval(unbounded(), closed(-3)).ok).toBe(true);
    expect(numeric.interval(unbounded(), unbounded()).ok).toBe(true);
  });

  it("names the offending endpoints", () => {
    expect(() => unwrap(numeric.open(1, 0))).toThrow("invalid interval: (1, 0)");
    expect(() => unwrap(numeric.openClosed(0, 0))).toThrow("invalid interval: (0, 0]");
  });

  it("rejects incomparable values", () => {
    expect(errorKind(numeric.open(NaN, 1))).toBe("IncomparableEndpoints");
    expect(errorKind(numeric.closed(NaN, NaN))).toBe("IncomparableEndpoints");
    expect(errorKind(numeric.openUnbounded(NaN))).toBe("IncomparableEndpoints");
    expect(errorKind(dates.closed(new Date(NaN), new Date(0)))).toBe("IncomparableEndpoints");
  });
});

describe("interval queries", () => {
  it("exposes low and high values", () => {
    const iv = unwrap(numeric.closedOpen(1, 3));
    expect(iv.low()).toBe(1);
    expect(iv.high()).toBe(3);
    expect(iv.left).toEqual({ kind: "closed", value: 1 });
    expect(iv.right).toEqual({ kind: "open", value: 3 });

    const ray = unwrap(numeric.openUnbounded(2));
    expect(ray.low()).toBe(2);
    expect(ray.high()).toBeUndefined();
  });

  it("classifies intervals", () => {
    expect(unwrap(numeric.closed(5, 5)).isDegenerate()).toBe(true);
    expect(unwrap(numeric.closed(5, 6)).isDegenerate()).toBe(false);
    expect(unwrap(numeric.closed(0, 1)).isBounded()).toBe(true);
    expect(unwrap(numeric.unboundedOpen(1)).isUnbounded()).toBe(true);

    const universe = numeric.universe();
    expect(universe.isUniverse()).toBe(true);
    expect(universe.isBounded()).toBe(false);
    expect(universe.isUnbounded()).toBe(true);
  });

  it("copies date values in and out", () => {
    const start = new Date(0);
    const iv = unwrap(dates.closed(start, new Date(1000)));
    start.setTime(500);
    expect(iv.low()?.getTime()).toBe(0);
    expect(iv.low()).not.toBe(iv.low());
  });

  it("tests membership of a point", () => {
    const iv = unwrap(numeric.closedOpen(0, 1));
    expect(iv.includes(0)).toBe(true);
    expect(iv.includes(0.5)).toBe(true);
    expect(iv.includes(1)).toBe(false);

    const ray = unwrap(numeric.unboundedClosed(0));
    expect(ray.includes(-100)).toBe(true);
    expect(ray.includes(0)).toBe(true);
    expect(ray.includes(0.1)).toBe(false);
  });

  it("tests containment of another interval", () => {
    expect(unwrap(numeric.closed(0, 3)).contains(unwrap(numeric.open(0, 3)))).toBe(true);
    expect(unwrap(numeric.open(0, 3)).contains(unwrap(numeric.closed(0, 3)))).toBe(false);
    expect(numeric.universe().contains(unwrap(numeric.closed(1, 2)))).toBe(true);
    expect(unwrap(numeric.closed(1, 2)).contains(numeric.universe())).toBe(false);
  });
});

describe("separation", () => {
  const cases: [string, Interval<number>, Interval<number>, boolean][] = [
    ["(0, 1) and (1, 2)", unwrap(numeric.open(0, 1)), unwrap(numeric.open(1, 2)), true],
    ["(0, 1) and [1, 2)", unwrap(numeric.open(0, 1)), unwrap(numeric.closedOpen(1, 2)), false],
    ["[0, 1] and [1, 2)", unwrap(numeric.closed(0, 1)), unwrap(numeric.closedOpen(1, 2)), false],
    ["(0, 2) and (1, 3)", unwrap(numeric.open(0, 2)), unwrap(numeric.open(1, 3)), false],
    ["(0, +∞) and (1, 2)", unwrap(numeric.openUnbounded(0)), unwrap(numeric.open(1, 2)), false],
    ["universe and (1, +∞)", numeric.universe(), unwrap(numeric.openUnbounded(1)), false],
    ["(-∞, 0) and (0, +∞)", unwrap(numeric.unboundedOpen(0)), unwrap(numeric.openUnbounded(0)), true],
    ["(-∞, 0) and [0, +∞)", unwrap(numeric.unboundedOpen(0)), unwrap(numeric.closedUnbounded(0)), false],
    ["(0, 2) and [1]", unwrap(numeric.open(0, 2)), unwrap(numeric.closed(1, 1)), false],
    ["[0, 1] and [2, 3]", unwrap(numeric.closed(0, 1)), unwrap(numeric.closed(2, 3)), true],
  ];

  for (const [name, a, b, separated] of cases) {
    it(`${name} ${separated ? "are" : "are not"} separated`, () => {
      expect(a.isSeparatedFrom(b)).toBe(separated);
      expect(b.isSeparatedFrom(a)).toBe(separated);
    });
  }

  it("knows which side the gap is on", () => {
    const a = unwrap(numeric.open(0, 1));
    const b = unwrap(numeric.open(1, 2));
    expect(a.precedes(b)).toBe(true);
    expect(b.precedes(a)).toBe(false);
  });
});

describe("merge", () => {
  it("merges touching intervals", () => {
    const merged = unwrap(unwrap(numeric.open(0, 1)).merge(unwrap(numeric.closed(1, 2))));
    expect(merged.equals(unwrap(numeric.openClosed(0, 2)))).toBe(true);
  });

  it("refuses to merge separated intervals", () => {
    const result = unwrap(numeric.open(0, 1)).merge(unwrap(numeric.open(1, 2)));
    expect(errorKind(result)).toBe("MergeSeparatedIntervals");
    expect(() => unwrap(result)).toThrow("separated intervals cannot be merged: (0, 1) and (1, 2)");
  });

  it("keeps the more inclusive endpoint on ties", () => {
    const merged = unwrap(unwrap(numeric.open(0, 2)).merge(unwrap(numeric.closed(0, 1))));
    expect(merged.toString()).toBe("[0, 2)");
  });

  it("lets unbounded endpoints win", () => {
    const left = unwrap(unwrap(numeric.unboundedOpen(1)).merge(unwrap(numeric.closed(0, 5))));
    expect(left.toString()).toBe("(-∞, 5]");

    const both = unwrap(unwrap(numeric.closedUnbounded(3)).merge(unwrap(numeric.unboundedOpen(3))));
    expect(both.isUniverse()).toBe(true);
  });
});

describe("intersect", () => {
  it("is empty when the intervals only touch at an excluded point", () => {
    const a = unwrap(numeric.closed(0, 1));
    expect(a.intersect(unwrap(numeric.openClosed(1, 2)))).toBeUndefined();
    expect(unwrap(numeric.open(0, 1)).intersect(unwrap(numeric.open(1, 2)))).toBeUndefined();
  });

  it("keeps the less inclusive endpoint on ties", () => {
    const a = unwrap(numeric.closed(0, 1));
    expect(a.intersect(unwrap(numeric.closed(1, 2)))?.toString()).toBe("[1]");
    expect(unwrap(numeric.closed(0, 2)).intersect(unwrap(numeric.open(0, 2)))?.toString()).toBe(
      "(0, 2)",
    );
    expect(unwrap(numeric.open(0, 2)).intersect(unwrap(numeric.closedOpen(1, 3)))?.toString()).toBe(
      "[1, 2)",
    );
  });

  it("lets bounded endpoints win over unbounded ones", () => {
    const overlap = numeric.universe().intersect(unwrap(numeric.closed(1, 2)));
    expect(overlap?.toString()).toBe("[1, 2]");
  });
});

describe("display", () => {
  it("renders every endpoint combination", () => {
    expect(String(unwrap(numeric.open(0, 1)))).toBe("(0, 1)");
    expect(String(unwrap(numeric.openClosed(0, 1)))).toBe("(0, 1]");
    expect(String(unwrap(numeric.closedOpen(0, 1)))).toBe("[0, 1)");
    expect(String(unwrap(numeric.closed(0, 1)))).toBe("[0, 1]");
    expect(String(unwrap(numeric.closed(0, 0)))).toBe("[0]");
    expect(String(unwrap(numeric.openUnbounded(0)))).toBe("(0, +∞)");
    expect(String(unwrap(numeric.closedUnbounded(0)))).toBe("[0, +∞)");
    expect(String(unwrap(numeric.unboundedOpen(0)))).toBe("(-∞, 0)");
    expect(String(unwrap(numeric.unboundedClosed(0)))).toBe("(-∞, 0]");
    expect(String(numeric.universe())).toBe("(-∞, +∞)");
  });

  it("formats values with the order", () => {
    expect(String(unwrap(strings.closedOpen("a", "m")))).toBe("[a, m)");
    expect(String(unwrap(bigints.closed(1n, 1n)))).toBe("[1]");
    expect(String(unwrap(dates.closed(new Date(0), new Date(86_400_000))))).toBe(
      "[1970-01-01T00:00:00.000Z, 1970-01-02T00:00:00.000Z]",
    );
  });
});

describe("equals", () => {
  it("compares endpoint kinds and values", () => {
    expect(unwrap(numeric.open(0, 1)).equals(unwrap(numeric.open(0, 1)))).toBe(true);
    expect(unwrap(numeric.open(0, 1)).equals(unwrap(numeric.closedOpen(0, 1)))).toBe(false);
    expect(numeric.universe().equals(numeric.universe())).toBe(true);
  });
});

describe("orders that leave values unranked", () => {
  type Pair = [number, number];

  // (x1; y1) <= (x2; y2) only when both coordinates are.
  const pairs = intervalsOver(
    defineOrder(
      (a: Pair, b: Pair) => {
        const x = numberOrder.compare(a[0], b[0]);
        const y = numberOrder.compare(a[1], b[1]);
        if (x === y || y === 0) return x;
        return x === 0 ? y : NaN;
      },
      { format: ([x, y]) => `(${x};${y})` },
    ),
  );
  const a = unwrap(pairs.closed([0, 5], [1, 6]));
  const b = unwrap(pairs.closed([5, 0], [6, 1]));

  it("refuses to merge intervals it cannot rank against each other", () => {
    const merged = a.merge(b);
    expect(errorKind(merged)).toBe("IncomparableEndpoints");
    expect(() => unwrap(merged)).toThrow(
      "incomparable endpoints: [(0;5), (1;6)] and [(5;0), (6;1)]",
    );
    expect(errorKind(b.merge(a))).toBe("IncomparableEndpoints");
  });

  it("throws instead of dropping an interval from a set", () => {
    expect(() => pairs.set.of(a, b)).toThrow("incomparable endpoints");
    expect(() => a.intersect(b)).toThrow("incomparable endpoints");
    expect(() => pairs.set.of(a).intersection(pairs.set.of(b))).toThrow("incomparable endpoints");
  });

  it("still works on intervals that do rank", () => {
    const c = unwrap(pairs.closed([1, 6], [2, 7]));
    expect(pairs.set.of(a, c).toString()).toBe("{[(0;5), (2;7)]}");
  });
});
