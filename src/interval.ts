import {
  type Endpoint,
  compareLeftEndpoints,
  compareRightEndpoints,
  endpointValue,
  isBounded,
  mapEndpoint,
  unbounded,
} from "./endpoint";
import { IntervalSetError, type IntervalSetErrorKind } from "./errors";
import type { Order } from "./order";
import { type Result, err, ok } from "./result";

/**
 * A contiguous range of values between two endpoints.
 *
 * Intervals are immutable: `merge` and `intersect` build new ones. The
 * endpoint values are shared with the interval, so don't mutate them;
 * `low()` and `high()` hand out copies.
 */
export class Interval<T> {
  private constructor(
    readonly left: Endpoint<T>,
    readonly right: Endpoint<T>,
    readonly order: Order<T>,
  ) {}

  /**
   * Builds an interval from two endpoints. Bounded sides need
   * `low < high`, or `low <= high` when both sides are closed.
   */
  static create<T>(
    left: Endpoint<T>,
    right: Endpoint<T>,
    order: Order<T>,
  ): Result<Interval<T>, IntervalSetError> {
    const problem = violation(left, right, order);
    if (problem === "InvalidInterval") {
      return err(new IntervalSetError(problem, render(left, right, order)));
    }
    if (problem) {
      return err(new IntervalSetError(problem));
    }
    const clone = (value: T) => order.clone(value);
    return ok(new Interval(mapEndpoint(left, clone), mapEndpoint(right, clone), order));
  }

  static universe<T>(order: Order<T>): Interval<T> {
    return new Interval<T>(unbounded(), unbounded(), order);
  }

  /** Undefined when unbounded on the left. */
  low(): T | undefined {
    const value = endpointValue(this.left);
    return value === undefined ? undefined : this.order.clone(value);
  }

  /** Undefined when unbounded on the right. */
  high(): T | undefined {
    const value = endpointValue(this.right);
    return value === undefined ? undefined : this.order.clone(value);
  }

  isUniverse(): boolean {
    return !isBounded(this.left) && !isBounded(this.right);
  }

  /** A closed interval holding a single point, `[a, a]`. */
  isDegenerate(): boolean {
    return (
      this.left.kind === "closed" &&
      this.right.kind === "closed" &&
      this.order.compare(this.left.value, this.right.value) === 0
    );
  }

  isBounded(): boolean {
    return isBounded(this.left) && isBounded(this.right);
  }

  isUnbounded(): boolean {
    return !this.isBounded();
  }

  /**
   * Two intervals are separated when the closure of each is disjoint
   * from the other, i.e. there is a gap between them. `(0, 1)` and
   * `(1, 2)` are separated; `(0, 1)` and `[1, 2)` are not.
   */
  isSeparatedFrom(other: Interval<T>): boolean {
    return lowerWithGap(this, other) || lowerWithGap(other, this);
  }

  /** This interval lies entirely below `other`, with a gap between them. */
  precedes(other: Interval<T>): boolean {
    return lowerWithGap(other, this);
  }

  /** The convex hull of both intervals, provided they are not separated. */
  merge(other: Interval<T>): Result<Interval<T>, IntervalSetError> {
    if (!comparable(this, other)) {
      return err(new IntervalSetError("IncomparableEndpoints", `${this} and ${other}`));
    }
    if (this.isSeparatedFrom(other)) {
      return err(new IntervalSetError("MergeSeparatedIntervals", `${this} and ${other}`));
    }
    const left =
      compareLeftEndpoints(this.left, other.left, this.order) <= 0 ? this.left : other.left;
    const right =
      compareRightEndpoints(this.right, other.right, this.order) >= 0 ? this.right : other.right;
    return ok(new Interval(left, right, this.order));
  }

  /**
   * The values in both intervals, or undefined when there are none.
   * Throws an `IncomparableEndpoints` error if the order can't rank the
   * two intervals' endpoints against each other.
   */
  intersect(other: Interval<T>): Interval<T> | undefined {
    if (!comparable(this, other)) {
      throw new IntervalSetError("IncomparableEndpoints", `${this} and ${other}`);
    }
    if (this.isSeparatedFrom(other)) {
      return undefined;
    }
    const left =
      compareLeftEndpoints(this.left, other.left, this.order) >= 0 ? this.left : other.left;
    const right =
      compareRightEndpoints(this.right, other.right, this.order) <= 0 ? this.right : other.right;
    // [0, 1] and (1, 2] touch without sharing a point.
    if (violation(left, right, this.order)) {
      return undefined;
    }
    return new Interval(left, right, this.order);
  }

  includes(value: T): boolean {
    const { left, right, order } = this;
    const aboveLeft =
      left.kind === "unbounded" ||
      (left.kind === "open"
        ? order.compare(left.value, value) < 0
        : order.compare(left.value, value) <= 0);
    const belowRight =
      right.kind === "unbounded" ||
      (right.kind === "open"
        ? order.compare(value, right.value) < 0
        : order.compare(value, right.value) <= 0);
    return aboveLeft && belowRight;
  }

  /** Every value of `other` is also in this interval. */
  contains(other: Interval<T>): boolean {
    return (
      compareLeftEndpoints(this.left, other.left, this.order) <= 0 &&
      compareRightEndpoints(other.right, this.right, this.order) <= 0
    );
  }

  equals(other: Interval<T>): boolean {
    return (
      sameEndpoint(this.left, other.left, this.order) &&
      sameEndpoint(this.right, other.right, this.order)
    );
  }

  toString(): string {
    return render(this.left, this.right, this.order);
  }
}

function violation<T>(
  left: Endpoint<T>,
  right: Endpoint<T>,
  order: Order<T>,
): IntervalSetErrorKind | undefined {
  for (const endpoint of [left, right]) {
    if (isBounded(endpoint) && order.compare(endpoint.value, endpoint.value) !== 0) {
      return "IncomparableEndpoints";
    }
  }
  if (!isBounded(left) || !isBounded(right)) {
    return undefined;
  }
  const c = order.compare(left.value, right.value);
  if (Number.isNaN(c)) {
    return "IncomparableEndpoints";
  }
  const bothClosed = left.kind === "closed" && right.kind === "closed";
  if (bothClosed ? c > 0 : c >= 0) {
    return "InvalidInterval";
  }
  return undefined;
}

/** Every bounded endpoint of `a` ranks against every bounded endpoint of `b`. */
function comparable<T>(a: Interval<T>, b: Interval<T>): boolean {
  for (const x of [a.left, a.right]) {
    for (const y of [b.left, b.right]) {
      if (isBounded(x) && isBounded(y) && Number.isNaN(a.order.compare(x.value, y.value))) {
        return false;
      }
    }
  }
  return true;
}

/**
 * Does `lower` end before `upper` starts, leaving a gap? Touching at a
 * value is a gap only if both sides exclude it.
 */
function lowerWithGap<T>(upper: Interval<T>, lower: Interval<T>): boolean {
  const start = upper.left;
  const end = lower.right;
  if (!isBounded(start) || !isBounded(end)) {
    return false;
  }
  const c = upper.order.compare(start.value, end.value);
  return start.kind === "open" && end.kind === "open" ? c >= 0 : c > 0;
}

function sameEndpoint<T>(a: Endpoint<T>, b: Endpoint<T>, order: Order<T>): boolean {
  if (!isBounded(a) || !isBounded(b)) {
    return a.kind === b.kind;
  }
  return a.kind === b.kind && order.compare(a.value, b.value) === 0;
}

function render<T>(left: Endpoint<T>, right: Endpoint<T>, order: Order<T>): string {
  if (
    left.kind === "closed" &&
    right.kind === "closed" &&
    order.compare(left.value, right.value) === 0
  ) {
    return `[${order.format(left.value)}]`;
  }
  const start = isBounded(left)
    ? `${left.kind === "open" ? "(" : "["}${order.format(left.value)}`
    : "(-∞";
  const end = isBounded(right)
    ? `${order.format(right.value)}${right.kind === "open" ? ")" : "]"}`
    : "+∞)";
  return `${start}, ${end}`;
}
