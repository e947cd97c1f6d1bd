/** Spot prices where a payoff vector crosses zero, rounded to 2 decimals. Unordered. */
export type BreakevenSet = ReadonlySet<number>;

/** Bounds of a sampled payoff curve and its breakevens, ready for display. */
export interface PayoffSummary {
	/** Largest sampled payoff (not the analytic maximum) */
	readonly maxProfit: number;
	/** Smallest sampled payoff, negative for a loss */
	readonly maxLoss: number;
	readonly breakevens: BreakevenSet;
}
