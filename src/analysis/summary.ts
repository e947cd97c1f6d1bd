import type { BreakevenSet, PayoffSummary } from "./types.js";

/**
 * Reduces a payoff vector to its sampled max profit and max loss.
 * Accuracy is limited by grid resolution. An empty vector yields NaN bounds.
 */
export function summarize(payoff: readonly number[], breakevens: BreakevenSet): PayoffSummary {
	if (payoff.length === 0) {
		return { maxProfit: Number.NaN, maxLoss: Number.NaN, breakevens };
	}

	let maxProfit = Number.NEGATIVE_INFINITY;
	let maxLoss = Number.POSITIVE_INFINITY;
	for (const value of payoff) {
		if (value > maxProfit) maxProfit = value;
		if (value < maxLoss) maxLoss = value;
	}

	return { maxProfit, maxLoss, breakevens };
}
