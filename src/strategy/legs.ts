import {
	type BullCallSpread,
	type IronCondor,
	type LegQuote,
	type OptionLeg,
	OptionKind,
	OptionSide,
	type Strategy,
	StrategyKind,
} from "./types.js";

function leg(quote: LegQuote, side: OptionSide, kind: OptionKind): OptionLeg {
	return { strike: quote.strike, premium: quote.premium, side, kind };
}

/**
 * Expands a strategy into its legs, in canonical strike order:
 * `[buyCall, sellCall]` for the spread and
 * `[buyPut, sellPut, sellCall, buyCall]` for the condor.
 */
export function legsOf(strategy: Strategy): readonly OptionLeg[] {
	switch (strategy.kind) {
		case StrategyKind.BullCallSpread:
			return [
				leg(strategy.buyCall, OptionSide.Buy, OptionKind.Call),
				leg(strategy.sellCall, OptionSide.Sell, OptionKind.Call),
			];
		case StrategyKind.IronCondor:
			return [
				leg(strategy.buyPut, OptionSide.Buy, OptionKind.Put),
				leg(strategy.sellPut, OptionSide.Sell, OptionKind.Put),
				leg(strategy.sellCall, OptionSide.Sell, OptionKind.Call),
				leg(strategy.buyCall, OptionSide.Buy, OptionKind.Call),
			];
	}
}

/** Premiums in canonical leg order, as submitted to the input validator. */
export function premiumsOf(strategy: Strategy): number[] {
	return legsOf(strategy).map((l) => l.premium);
}

/** Strikes in canonical leg order, as submitted to the input validator. */
export function strikesOf(strategy: Strategy): number[] {
	return legsOf(strategy).map((l) => l.strike);
}

/** Human-readable strategy name. */
export function strategyLabel(kind: StrategyKind): string {
	switch (kind) {
		case StrategyKind.BullCallSpread:
			return "Bull Call Spread";
		case StrategyKind.IronCondor:
			return "Iron Condor";
	}
}

export function bullCallSpread(
	buyCall: LegQuote,
	sellCall: LegQuote,
	lotSize = 1,
): BullCallSpread {
	return { kind: StrategyKind.BullCallSpread, buyCall, sellCall, lotSize };
}

export function ironCondor(
	legs: Pick<IronCondor, "buyPut" | "sellPut" | "sellCall" | "buyCall">,
	lotSize = 1,
): IronCondor {
	return { kind: StrategyKind.IronCondor, ...legs, lotSize };
}
