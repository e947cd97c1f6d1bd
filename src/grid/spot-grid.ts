/**
 * Spot price grid: the hypothetical underlying prices at expiration that a
 * payoff curve is sampled at.
 */

import { type GridConfig, DEFAULT_GRID_CONFIG } from "../shared/config.js";

/** Immutable, ascending sequence of spot prices. */
export type SpotGrid = readonly number[];

/**
 * Evenly spaced samples from `start` to `end`, both inclusive.
 * Element `i` is `start + i * step`; the last element is exactly `end`.
 *
 * @param count - Number of samples; 0 yields an empty grid, 1 yields `[start]`
 */
export function linspace(start: number, end: number, count: number): number[] {
	if (count <= 0) return [];
	if (count === 1) return [start];

	const step = (end - start) / (count - 1);
	const out: number[] = new Array<number>(count);
	for (let i = 0; i < count - 1; i++) {
		out[i] = start + i * step;
	}
	out[count - 1] = end;
	return out;
}

/** Builds a frozen spot grid, 1000 points over [0, 5000] unless configured otherwise. */
export function createSpotGrid(config: GridConfig = DEFAULT_GRID_CONFIG): SpotGrid {
	return Object.freeze(linspace(config.start, config.end, config.points));
}

/** Distance between adjacent samples of a grid configuration. */
export function gridStep(config: GridConfig = DEFAULT_GRID_CONFIG): number {
	return (config.end - config.start) / (config.points - 1);
}
