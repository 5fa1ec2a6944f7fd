import { getLogger } from "./config";
import { type Endpoint, compareRightEndpoints, flip, isBounded, unbounded } from "./endpoint";
import { Interval } from "./interval";
import type { Order } from "./order";
import { unwrap } from "./result";

/**
 * A subset of an ordered domain, stored as a union of intervals.
 *
 * Sets are immutable; every operation returns a new set.
 */
export class IntervalSet<T> {
  // Invariant: sorted by left endpoint, and no two intervals can be merged.
  private readonly intervals: readonly Interval<T>[];

  private constructor(
    readonly order: Order<T>,
    intervals: Interval<T>[],
  ) {
    this.intervals = Object.freeze(intervals);
  }

  static empty<T>(order: Order<T>): IntervalSet<T> {
    return new IntervalSet(order, []);
  }

  static universe<T>(order: Order<T>): IntervalSet<T> {
    return new IntervalSet(order, [Interval.universe(order)]);
  }

  static from<T>(interval: Interval<T>): IntervalSet<T> {
    return new IntervalSet(interval.order, [interval]);
  }

  /** Intervals need not be sorted or disjoint. */
  static of<T>(order: Order<T>, intervals: Iterable<Interval<T>>): IntervalSet<T> {
    let set = IntervalSet.empty(order);
    for (const interval of intervals) {
      set = set.unionInterval(interval);
    }
    return set;
  }

  get size(): number {
    return this.intervals.length;
  }

  isEmpty(): boolean {
    return this.intervals.length === 0;
  }

  isUniverse(): boolean {
    return this.intervals.length === 1 && this.intervals[0].isUniverse();
  }

  /**
   * Adds one interval. The stored intervals it touches form a contiguous
   * run; they are merged with it into a single interval. Throws when
   * the order can't rank the new interval against the stored ones.
   */
  unionInterval(interval: Interval<T>): IntervalSet<T> {
    const { intervals } = this;
    const start = firstNotPreceding(intervals, interval);
    let end = start;
    let merged = interval;
    while (end < intervals.length && !interval.precedes(intervals[end])) {
      merged = unwrap(merged.merge(intervals[end]));
      end++;
    }
    return new IntervalSet(this.order, [
      ...intervals.slice(0, start),
      merged,
      ...intervals.slice(end),
    ]);
  }

  union(other: IntervalSet<T>): IntervalSet<T> {
    let result: IntervalSet<T> = this;
    for (const interval of other.intervals) {
      result = result.unionInterval(interval);
    }
    getLogger().debug("union", this.size, other.size, "->", result.size);
    return result;
  }

  or(other: IntervalSet<T>): IntervalSet<T> {
    return this.union(other);
  }

  intersection(other: IntervalSet<T>): IntervalSet<T> {
    const a = this.intervals;
    const b = other.intervals;
    const overlaps: Interval<T>[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const overlap = a[i].intersect(b[j]);
      if (overlap) {
        overlaps.push(overlap);
      }
      // Whichever ends first cannot reach the other side's next interval.
      const c = compareRightEndpoints(a[i].right, b[j].right, this.order);
      if (c <= 0) i++;
      if (c >= 0) j++;
    }
    getLogger().debug("intersection", this.size, other.size, "->", overlaps.length);
    return new IntervalSet(this.order, overlaps);
  }

  and(other: IntervalSet<T>): IntervalSet<T> {
    return this.intersection(other);
  }

  /** Everything in the domain that is not in this set. */
  complement(): IntervalSet<T> {
    const gaps: Interval<T>[] = [];
    let start: Endpoint<T> | undefined = unbounded();
    for (const interval of this.intervals) {
      if (start !== undefined && isBounded(interval.left)) {
        gaps.push(unwrap(Interval.create(start, flip(interval.left), this.order)));
      }
      start = isBounded(interval.right) ? flip(interval.right) : undefined;
    }
    if (start !== undefined) {
      gaps.push(unwrap(Interval.create(start, unbounded(), this.order)));
    }
    getLogger().debug("complement", this.size, "->", gaps.length);
    return new IntervalSet(this.order, gaps);
  }

  difference(other: IntervalSet<T>): IntervalSet<T> {
    return this.intersection(other.complement());
  }

  /** Returns the parts of interval that are not covered in this set. */
  uncovered(interval: Interval<T>): IntervalSet<T> {
    return IntervalSet.from(interval).difference(this);
  }

  includes(value: T): boolean {
    return this.intervals.some((iv) => iv.includes(value));
  }

  contains(interval: Interval<T>): boolean {
    return this.intervals.some((iv) => iv.contains(interval));
  }

  intersects(interval: Interval<T>): boolean {
    return this.intervals.some((iv) => iv.intersect(interval) !== undefined);
  }

  getIntervals(): Interval<T>[] {
    return [...this.intervals];
  }

  [Symbol.iterator](): Iterator<Interval<T>> {
    return this.intervals[Symbol.iterator]();
  }

  equals(other: IntervalSet<T>): boolean {
    return (
      this.intervals.length === other.intervals.length &&
      this.intervals.every((iv, i) => iv.equals(other.intervals[i]))
    );
  }

  toString(): string {
    return `{${this.intervals.join(", ")}}`;
  }
}

/** Index of the first interval that does not lie wholly below `interval`. */
function firstNotPreceding<T>(intervals: readonly Interval<T>[], interval: Interval<T>): number {
  let lo = 0;
  let hi = intervals.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (intervals[mid].precedes(interval)) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
