/**
 * What an interval needs to know about its values: how to order them,
 * how to copy them and how to print them.
 *
 * `compare` must be a total order: it returns a negative number, zero
 * or a positive number. `NaN` marks a value the order does not rank at
 * all (`NaN` itself, an invalid `Date`); intervals refuse such values.
 * An order that leaves two valid values unranked makes `merge` fail and
 * set operations throw `IncomparableEndpoints`.
 */
export interface Order<T> {
  compare(a: T, b: T): number;
  clone(value: T): T;
  format(value: T): string;
}

export function defineOrder<T>(
  compare: (a: T, b: T) => number,
  options: Partial<Pick<Order<T>, "clone" | "format">> = {},
): Order<T> {
  return {
    compare,
    clone: options.clone ?? ((value) => value),
    format: options.format ?? ((value) => String(value)),
  };
}

export const numberOrder: Order<number> = defineOrder((a, b) =>
  a < b ? -1 : a > b ? 1 : a === b ? 0 : NaN,
);

export const bigintOrder: Order<bigint> = defineOrder((a, b) =>
  a < b ? -1 : a > b ? 1 : 0,
);

export const stringOrder: Order<string> = defineOrder((a, b) =>
  a < b ? -1 : a > b ? 1 : 0,
);

/** Invalid dates compare as NaN. */
export const dateOrder: Order<Date> = defineOrder(
  (a, b) => numberOrder.compare(a.getTime(), b.getTime()),
  {
    clone: (value) => new Date(value.getTime()),
    format: (value) => value.toISOString(),
  },
);
