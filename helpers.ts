import {PerformanceEvent, type EventMetadata} from "./events.js";

/**
 * Result of a measurement operation
 */
export interface MeasureResult<T> {
  result: T;
  event: PerformanceEvent;
}

function elapsedSince(startTime: number): number {
  return Math.round((performance.now() - startTime) * 100) / 100;
}

/**
 * Measures the execution time of an async function. Errors are rethrown
 * unchanged; the caller decides how a failure is reported.
 */
export async function measureAsync<T>(
  name: string,
  fn: () => Promise<T>,
  metadata: EventMetadata = {}
): Promise<MeasureResult<T>> {
  const startTime = performance.now();
  const result = await fn();
  return {
    result,
    event: new PerformanceEvent(name, elapsedSince(startTime), metadata),
  };
}

/**
 * Measures the execution time of a synchronous function
 */
export function measure<T>(
  name: string,
  fn: () => T,
  metadata: EventMetadata = {}
): MeasureResult<T> {
  const startTime = performance.now();
  const result = fn();
  return {
    result,
    event: new PerformanceEvent(name, elapsedSince(startTime), metadata),
  };
}
