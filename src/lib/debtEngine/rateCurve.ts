/**
 * Debt Engine — Rate curve
 *
 * Step lookup: the rate of the latest point on or before the date. Dates
 * outside [first point, last point] fail rather than extrapolate.
 */

import { RateCurveRangeError, ValidationError } from "@/lib/proforma/errors";
import { parseIsoDate } from "@/lib/proforma/calendar";
import type { RateCurve, RateCurvePoint } from "./types";

export function createRateCurve(points: readonly RateCurvePoint[]): RateCurve {
  if (points.length === 0) {
    throw new ValidationError([{ path: "rateCurve", message: "Rate curve needs at least one point" }]);
  }
  for (let i = 1; i < points.length; i++) {
    if (parseIsoDate(points[i].date) <= parseIsoDate(points[i - 1].date)) {
      throw new ValidationError([
        { path: `rateCurve.${i}.date`, message: "Rate curve dates must be strictly increasing" },
      ]);
    }
  }
  return { points: points.map((p) => ({ ...p })) };
}

export function rateAt(curve: RateCurve, date: string): number {
  const { points } = curve;
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) {
    throw new RateCurveRangeError(date, "<empty>", "<empty>");
  }

  const target = parseIsoDate(date).getTime();
  if (target < parseIsoDate(first.date).getTime() || target > parseIsoDate(last.date).getTime()) {
    throw new RateCurveRangeError(date, first.date, last.date);
  }

  // Latest point on or before the date
  let lo = 0;
  let hi = points.length - 1;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (parseIsoDate(points[mid].date).getTime() <= target) lo = mid;
    else hi = mid - 1;
  }
  return points[lo].rate;
}
