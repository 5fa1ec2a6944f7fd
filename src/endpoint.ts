import type { Order } from "./order";

export type Endpoint<T> =
  | { readonly kind: "open"; readonly value: T }
  | { readonly kind: "closed"; readonly value: T }
  | { readonly kind: "unbounded" };

export type BoundedEndpoint<T> = Extract<Endpoint<T>, { value: T }>;

export function open<T>(value: T): Endpoint<T> {
  return { kind: "open", value };
}

export function closed<T>(value: T): Endpoint<T> {
  return { kind: "closed", value };
}

export function unbounded<T>(): Endpoint<T> {
  return { kind: "unbounded" };
}

export function isBounded<T>(endpoint: Endpoint<T>): endpoint is BoundedEndpoint<T> {
  return endpoint.kind !== "unbounded";
}

/** The endpoint's value, or undefined on an unbounded side. */
export function endpointValue<T>(endpoint: Endpoint<T>): T | undefined {
  return isBounded(endpoint) ? endpoint.value : undefined;
}

/** Same kind, value passed through `fn`. */
export function mapEndpoint<T>(endpoint: Endpoint<T>, fn: (value: T) => T): Endpoint<T> {
  return isBounded(endpoint) ? { kind: endpoint.kind, value: fn(endpoint.value) } : endpoint;
}

/**
 * Orders two endpoints used as the start of a range. Unbounded comes
 * first; at equal values closed comes before open, since it starts by
 * including the value.
 */
export function compareLeftEndpoints<T>(
  a: Endpoint<T>,
  b: Endpoint<T>,
  order: Order<T>,
): number {
  if (!isBounded(a) || !isBounded(b)) {
    return (isBounded(a) ? 1 : 0) - (isBounded(b) ? 1 : 0);
  }
  const c = order.compare(a.value, b.value);
  if (c !== 0) return c;
  return rank(a) - rank(b);
}

/**
 * Orders two endpoints used as the end of a range. Unbounded comes
 * last; at equal values open comes before closed.
 */
export function compareRightEndpoints<T>(
  a: Endpoint<T>,
  b: Endpoint<T>,
  order: Order<T>,
): number {
  if (!isBounded(a) || !isBounded(b)) {
    return (isBounded(b) ? 1 : 0) - (isBounded(a) ? 1 : 0);
  }
  const c = order.compare(a.value, b.value);
  if (c !== 0) return c;
  return rank(b) - rank(a);
}

function rank<T>(endpoint: BoundedEndpoint<T>): number {
  return endpoint.kind === "closed" ? 0 : 1;
}

/** Open becomes closed and closed becomes open, at the same value. */
export function flip<T>(endpoint: BoundedEndpoint<T>): Endpoint<T> {
  return endpoint.kind === "open" ? closed(endpoint.value) : open(endpoint.value);
}
