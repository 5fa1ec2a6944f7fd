export type IntervalSetErrorKind =
  | "InvalidInterval"
  | "MergeSeparatedIntervals"
  | "IncomparableEndpoints";

const messages: Record<IntervalSetErrorKind, string> = {
  InvalidInterval: "invalid interval",
  MergeSeparatedIntervals: "separated intervals cannot be merged",
  IncomparableEndpoints: "incomparable endpoints",
};

export class IntervalSetError extends Error {
  readonly kind: IntervalSetErrorKind;

  constructor(kind: IntervalSetErrorKind, detail?: string) {
    super(detail === undefined ? messages[kind] : `${messages[kind]}: ${detail}`);
    this.name = "IntervalSetError";
    this.kind = kind;
  }
}
