/**
 * Indicator engine. Every indicator exposes a pure step function over an
 * immutable, caller-owned state plus a batch form that folds the step over a
 * full history and returns an output aligned index-for-index with its input.
 */
export * from "./types";
export * from "./errors";
export { assertMultiplier, assertPeriod, classifyObservation } from "./validation";
export type { BarTransition } from "./validation";
export * from "./windowedAggregator";
export * from "./exponentialSmoother";
export * from "./series";
export * from "./sma";
export * from "./ema";
export * from "./bollinger";
export * from "./rsi";
export * from "./evaluate";
