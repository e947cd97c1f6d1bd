/**
 * Payoff engine: dispatches a strategy to its payoff formula.
 *
 * Every output point depends only on the spot price at the same index, so
 * the grid only needs to be ascending for the downstream breakeven scan.
 */

import { type Strategy, StrategyKind } from "../strategy/types.js";
import { computeBullCallSpreadPayoff } from "./bull-call-spread.js";
import { computeIronCondorPayoff } from "./iron-condor.js";

/** Net payoff of `strategy` at each spot price, scaled by its lot size. */
export function computePayoff(strategy: Strategy, spotPrices: readonly number[]): number[] {
	switch (strategy.kind) {
		case StrategyKind.BullCallSpread:
			return computeBullCallSpreadPayoff(
				spotPrices,
				strategy.buyCall.strike,
				strategy.buyCall.premium,
				strategy.sellCall.strike,
				strategy.sellCall.premium,
				strategy.lotSize,
			);
		case StrategyKind.IronCondor:
			return computeIronCondorPayoff(
				spotPrices,
				strategy.buyPut.strike,
				strategy.buyPut.premium,
				strategy.sellPut.strike,
				strategy.sellPut.premium,
				strategy.sellCall.strike,
				strategy.sellCall.premium,
				strategy.buyCall.strike,
				strategy.buyCall.premium,
				strategy.lotSize,
			);
	}
}

/** Net payoff of `strategy` at a single spot price. */
export function payoffAt(strategy: Strategy, spot: number): number {
	const [value = Number.NaN] = computePayoff(strategy, [spot]);
	return value;
}
