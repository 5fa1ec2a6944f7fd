import { type Endpoint, closed, open, unbounded } from "./endpoint";
import type { IntervalSetError } from "./errors";
import { Interval } from "./interval";
import { IntervalSet } from "./interval-set";
import { type Order, bigintOrder, dateOrder, numberOrder, stringOrder } from "./order";
import { type Result, mapResult } from "./result";

export type Built<R> = Result<R, IntervalSetError>;

/** Named constructors for one kind of interval, shared by intervals and sets. */
export interface Constructors<R, T> {
  open(low: T, high: T): Built<R>;
  closed(low: T, high: T): Built<R>;
  openClosed(low: T, high: T): Built<R>;
  closedOpen(low: T, high: T): Built<R>;
  unboundedOpen(high: T): Built<R>;
  unboundedClosed(high: T): Built<R>;
  openUnbounded(low: T): Built<R>;
  closedUnbounded(low: T): Built<R>;
  universe(): R;
}

export interface Algebra<T> extends Constructors<Interval<T>, T> {
  readonly order: Order<T>;
  interval(left: Endpoint<T>, right: Endpoint<T>): Built<Interval<T>>;
  set: Constructors<IntervalSet<T>, T> & {
    empty(): IntervalSet<T>;
    of(...intervals: Interval<T>[]): IntervalSet<T>;
  };
}

function constructors<R, T>(
  build: (left: Endpoint<T>, right: Endpoint<T>) => Built<R>,
  universe: () => R,
): Constructors<R, T> {
  return {
    open: (low, high) => build(open(low), open(high)),
    closed: (low, high) => build(closed(low), closed(high)),
    openClosed: (low, high) => build(open(low), closed(high)),
    closedOpen: (low, high) => build(closed(low), open(high)),
    unboundedOpen: (high) => build(unbounded(), open(high)),
    unboundedClosed: (high) => build(unbounded(), closed(high)),
    openUnbounded: (low) => build(open(low), unbounded()),
    closedUnbounded: (low) => build(closed(low), unbounded()),
    universe,
  };
}

/**
 * Binds the interval and set constructors to an order:
 *
 *     const iv = intervalsOver(numberOrder);
 *     iv.open(0, 1);           // ok((0, 1))
 *     iv.set.closed(2, 3);     // ok({[2, 3]})
 */
export function intervalsOver<T>(order: Order<T>): Algebra<T> {
  const interval = (left: Endpoint<T>, right: Endpoint<T>) => Interval.create(left, right, order);
  return {
    order,
    interval,
    ...constructors<Interval<T>, T>(interval, () => Interval.universe(order)),
    set: {
      ...constructors<IntervalSet<T>, T>(
        (left, right) => mapResult(interval(left, right), (iv) => IntervalSet.from(iv)),
        () => IntervalSet.universe(order),
      ),
      empty: () => IntervalSet.empty(order),
      of: (...intervals) => IntervalSet.of(order, intervals),
    },
  };
}

export const numeric = intervalsOver(numberOrder);
export const bigints = intervalsOver(bigintOrder);
export const strings = intervalsOver(stringOrder);
export const dates = intervalsOver(dateOrder);
