/**
 * Returns Engine — Root finding
 *
 * Newton–Raphson from the caller's guess. When Newton stalls, leaves the
 * domain (r <= -1) or runs out of iterations, a bracketed bisection over
 * [-0.99, 10] takes over. If neither converges the solve fails; an
 * unconverged estimate is never returned.
 */

import { ConvergenceError } from "@/lib/proforma/errors";
import type { SolverOptions } from "./types";

export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  guess: 0.1,
  tolerance: 1e-7,
  maxIterations: 100,
};

export const BISECTION_BRACKET: readonly [number, number] = [-0.99, 10];
const BISECTION_MAX_ITERATIONS = 200;

export interface RateFunction {
  value(rate: number): number;
  derivative(rate: number): number;
}

export function newton(fn: RateFunction, opts: SolverOptions): number | null {
  let rate = opts.guess;
  for (let i = 0; i < opts.maxIterations; i++) {
    const value = fn.value(rate);
    const slope = fn.derivative(rate);
    if (!Number.isFinite(value) || !Number.isFinite(slope) || slope === 0) return null;

    const next = rate - value / slope;
    if (!Number.isFinite(next) || next <= -1) return null;
    if (Math.abs(next - rate) < opts.tolerance) return next;
    rate = next;
  }
  return null;
}

export function bisect(fn: RateFunction, tolerance: number): number | null {
  let [low, high] = BISECTION_BRACKET;
  let valueLow = fn.value(low);
  const valueHigh = fn.value(high);

  if (valueLow === 0) return low;
  if (valueHigh === 0) return high;
  if (!Number.isFinite(valueLow) || !Number.isFinite(valueHigh) || valueLow * valueHigh > 0) {
    return null;
  }

  for (let i = 0; i < BISECTION_MAX_ITERATIONS; i++) {
    const mid = (low + high) / 2;
    const valueMid = fn.value(mid);
    if (valueMid === 0 || (high - low) / 2 < tolerance) return mid;

    if (valueLow * valueMid < 0) {
      high = mid;
    } else {
      low = mid;
      valueLow = valueMid;
    }
  }
  return null;
}

export function solveRate(fn: RateFunction, opts: SolverOptions, label: string): number {
  const viaNewton = newton(fn, opts);
  if (viaNewton !== null) return viaNewton;

  const viaBisection = bisect(fn, opts.tolerance);
  if (viaBisection !== null) return viaBisection;

  throw new ConvergenceError(`${label} did not converge`, {
    guess: opts.guess,
    tolerance: opts.tolerance,
    maxIterations: opts.maxIterations,
    bracket: [...BISECTION_BRACKET],
  });
}
