/**
 * Strategy model: option legs and the two supported strategies.
 *
 * A strategy is a tagged variant carrying a fixed-shape set of legs per kind,
 * so dispatch over `kind` is exhaustive and checked by the compiler.
 */

/** Whether the position is bought (premium paid) or sold (premium received). */
export const OptionSide = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type OptionSide = (typeof OptionSide)[keyof typeof OptionSide];

/** Call or put. */
export const OptionKind = {
	Call: "call",
	Put: "put",
} as const;

export type OptionKind = (typeof OptionKind)[keyof typeof OptionKind];

/** One option position within a strategy. */
export interface OptionLeg {
	readonly strike: number;
	readonly premium: number;
	readonly side: OptionSide;
	readonly kind: OptionKind;
}

/** Strike and premium of a leg whose side and kind are fixed by its slot in a strategy. */
export interface LegQuote {
	readonly strike: number;
	readonly premium: number;
}

export const StrategyKind = {
	BullCallSpread: "bull_call_spread",
	IronCondor: "iron_condor",
} as const;

export type StrategyKind = (typeof StrategyKind)[keyof typeof StrategyKind];

/** Buy a call at the lower strike, sell a call at the higher strike. */
export interface BullCallSpread {
	readonly kind: typeof StrategyKind.BullCallSpread;
	readonly buyCall: LegQuote;
	readonly sellCall: LegQuote;
	/** Contract multiplier, a positive integer */
	readonly lotSize: number;
}

/** Long put spread plus short call spread around a range the trader expects spot to stay in. */
export interface IronCondor {
	readonly kind: typeof StrategyKind.IronCondor;
	readonly buyPut: LegQuote;
	readonly sellPut: LegQuote;
	readonly sellCall: LegQuote;
	readonly buyCall: LegQuote;
	/** Contract multiplier, a positive integer */
	readonly lotSize: number;
}

export type Strategy = BullCallSpread | IronCondor;
