export { type Algebra, type Built, type Constructors, bigints, dates, intervalsOver, numeric, strings } from "./algebra";
export { type Configuration, getLogger, loadConfiguration, setLogLevel } from "./config";
export {
  type BoundedEndpoint,
  type Endpoint,
  closed,
  compareLeftEndpoints,
  compareRightEndpoints,
  endpointValue,
  isBounded,
  open,
  unbounded,
} from "./endpoint";
export { IntervalSetError, type IntervalSetErrorKind } from "./errors";
export { Interval } from "./interval";
export { IntervalSet } from "./interval-set";
export { type LogLevel, type Logger, createLogger, isLogLevel, logLevels } from "./logging";
export { type Order, bigintOrder, dateOrder, defineOrder, numberOrder, stringOrder } from "./order";
export { type Result, err, isErr, isOk, mapResult, ok, unwrap } from "./result";
