import { type OptionLeg, OptionKind, OptionSide } from "../strategy/types.js";

/** Value of a call at expiration: max(S - K, 0). */
export function callIntrinsic(spot: number, strike: number): number {
	return Math.max(spot - strike, 0);
}

/** Value of a put at expiration: max(K - S, 0). */
export function putIntrinsic(spot: number, strike: number): number {
	return Math.max(strike - spot, 0);
}

/**
 * Profit/loss of a single leg at expiration, per unit.
 * A bought leg earns intrinsic value minus the premium paid; a sold leg keeps
 * the premium minus the intrinsic value it owes.
 */
export function legPayoff(leg: OptionLeg, spot: number): number {
	const intrinsic =
		leg.kind === OptionKind.Call ? callIntrinsic(spot, leg.strike) : putIntrinsic(spot, leg.strike);
	return leg.side === OptionSide.Buy ? intrinsic - leg.premium : leg.premium - intrinsic;
}
