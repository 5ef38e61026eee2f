import { InvariantViolationError } from "./errors";

/**
 * Bounds-checked period read. A missing period is a bug in the caller's
 * horizon arithmetic, never a zero.
 */
export function itemAt<T>(items: readonly T[], index: number, label: string): T {
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    throw new InvariantViolationError(`Series "${label}" has no period ${index}`, {
      series: label,
      index,
      length: items.length,
    });
  }
  return items[index];
}

export function seriesAt(series: readonly number[], index: number, label: string): number {
  return itemAt(series, index, label);
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function sumRange(series: readonly number[], from: number, to: number, label: string): number {
  let total = 0;
  for (let t = from; t <= to; t++) total += seriesAt(series, t, label);
  return total;
}
