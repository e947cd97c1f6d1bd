/**
 * Breakeven finder: locates zero-crossings of a sampled payoff curve.
 *
 * Crossings are linearly interpolated between adjacent samples. Segments
 * whose rise is at most `tolerance` are skipped, even if they straddle zero,
 * so a curve that sits flat on zero records no breakeven there.
 */

import { roundTo } from "../lib/decimal/index.js";
import type { BreakevenSet } from "./types.js";

export const DEFAULT_BREAKEVEN_TOLERANCE = 0.01;

const BREAKEVEN_DECIMALS = 2;

/**
 * Safe indexed access for number arrays.
 * Callers ensure bounds via length checks before calling.
 */
function at(arr: readonly number[], i: number): number {
	// biome-ignore lint/style/noNonNullAssertion: bounds validated by callers
	return arr[i]!;
}

/**
 * Spot prices where `payoff` changes sign, interpolated and rounded to 2 decimals.
 * Scans the common prefix of `payoff` and `spotPrices`.
 *
 * @param tolerance - Minimum `|payoff[i+1] - payoff[i]|` for a crossing to count
 * @returns Set of breakevens; empty when the curve never crosses zero
 */
export function findBreakevens(
	payoff: readonly number[],
	spotPrices: readonly number[],
	tolerance: number = DEFAULT_BREAKEVEN_TOLERANCE,
): BreakevenSet {
	const breakevens = new Set<number>();
	const n = Math.min(payoff.length, spotPrices.length);

	for (let i = 0; i < n - 1; i++) {
		const left = at(payoff, i);
		const right = at(payoff, i + 1);
		const crosses = (left <= 0 && right >= 0) || (left >= 0 && right <= 0);
		if (!crosses) continue;

		const rise = Math.abs(right - left);
		if (rise <= tolerance) continue;

		const ratio = Math.abs(left) / rise;
		const spot = at(spotPrices, i);
		const price = spot + ratio * (at(spotPrices, i + 1) - spot);
		breakevens.add(roundTo(price, BREAKEVEN_DECIMALS));
	}

	return breakevens;
}

/** Breakevens in ascending order, for display. */
export function sortBreakevens(breakevens: BreakevenSet): number[] {
	return [...breakevens].sort((a, b) => a - b);
}
