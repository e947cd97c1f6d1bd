/**
 * ASCII payoff chart.
 *
 * Samples are bucketed into a fixed grid of character cells: one `*` per
 * column, a dashed row at zero when zero lies between the plotted bounds,
 * payoff labels on the left and the window's first and last spot below.
 * Axis titles carry the currency symbol.
 */

import { LibDecimal } from "../lib/decimal/index.js";
import { DEFAULT_SIMULATOR_CONFIG } from "../shared/config.js";
import type { ChartOptions } from "./types.js";

const DEFAULT_WIDTH = 60;
const DEFAULT_HEIGHT = 15;

const POINT = "*";
const ZERO = "-";
const BLANK = " ";

interface Sample {
	readonly spot: number;
	readonly value: number;
}

function visibleSamples(
	spotPrices: readonly number[],
	payoff: readonly number[],
	options: ChartOptions,
): Sample[] {
	const n = Math.min(spotPrices.length, payoff.length);
	const samples: Sample[] = [];
	for (let i = 0; i < n; i++) {
		const spot = spotPrices[i];
		const value = payoff[i];
		if (spot === undefined || value === undefined || !Number.isFinite(value)) continue;
		if (options.window && (spot < options.window.min || spot > options.window.max)) continue;
		samples.push({ spot, value });
	}
	return samples;
}

function rowOf(value: number, top: number, span: number, height: number): number {
	return Math.round(((top - value) / span) * (height - 1));
}

function payoffLabel(value: number): string {
	return LibDecimal.fromExact(value).toFixed(2);
}

/**
 * Renders `payoff` against `spotPrices` as a block of text lines.
 * Returns a one-line notice when no finite sample falls inside the window.
 */
export function renderPayoffChart(
	spotPrices: readonly number[],
	payoff: readonly number[],
	options: ChartOptions = {},
): string {
	const width = Math.max(2, Math.floor(options.width ?? DEFAULT_WIDTH));
	const height = Math.max(2, Math.floor(options.height ?? DEFAULT_HEIGHT));
	const samples = visibleSamples(spotPrices, payoff, options);

	const first = samples[0];
	const last = samples[samples.length - 1];
	if (first === undefined || last === undefined) {
		return "(no spot prices in range)";
	}

	let top = Number.NEGATIVE_INFINITY;
	let bottom = Number.POSITIVE_INFINITY;
	for (const s of samples) {
		if (s.value > top) top = s.value;
		if (s.value < bottom) bottom = s.value;
	}
	if (top === bottom) {
		top += 1;
		bottom -= 1;
	}
	const span = top - bottom;

	const cells: string[][] = Array.from({ length: height }, () =>
		new Array<string>(width).fill(BLANK),
	);
	const labels = new Map<number, string>([
		[0, payoffLabel(top)],
		[height - 1, payoffLabel(bottom)],
	]);

	if (bottom <= 0 && top >= 0) {
		const zeroRow = rowOf(0, top, span, height);
		cells[zeroRow]?.fill(ZERO);
		labels.set(zeroRow, payoffLabel(0));
	}

	for (let col = 0; col < width; col++) {
		const sample = samples[Math.round((col * (samples.length - 1)) / (width - 1))];
		if (sample === undefined) continue;
		const row = cells[rowOf(sample.value, top, span, height)];
		if (row) row[col] = POINT;
	}

	const symbol = options.currencySymbol ?? DEFAULT_SIMULATOR_CONFIG.currencySymbol;
	const labelWidth = Math.max(...[...labels.values()].map((l) => l.length));
	const lines = [`Net P/L (${symbol})`];
	lines.push(
		...cells.map((row, r) =>
			`${(labels.get(r) ?? "").padStart(labelWidth)} |${row.join("")}`.trimEnd(),
		),
	);

	const gutter = " ".repeat(labelWidth);
	lines.push(`${gutter} +${ZERO.repeat(width)}`);

	const left = first.spot.toFixed(0);
	const right = last.spot.toFixed(0);
	const gap = Math.max(1, width - left.length - right.length);
	lines.push(`${gutter}  ${left}${" ".repeat(gap)}${right}`);
	lines.push(`${gutter}  Spot Price (${symbol})`);

	return lines.join("\n");
}
