import { callIntrinsic } from "./leg-payoff.js";

/**
 * Net payoff of a bull call spread at each spot price, scaled by lot size.
 *
 * Piecewise linear with slope changes at the two strikes: flat at
 * `-netDebit * lotSize` below the bought strike and flat at
 * `(sellStrike - buyStrike - netDebit) * lotSize` above the sold strike.
 */
export function computeBullCallSpreadPayoff(
	spotPrices: readonly number[],
	buyCallStrike: number,
	buyCallPremium: number,
	sellCallStrike: number,
	sellCallPremium: number,
	lotSize: number,
): number[] {
	return spotPrices.map((spot) => {
		const buyLeg = callIntrinsic(spot, buyCallStrike) - buyCallPremium;
		const sellLeg = sellCallPremium - callIntrinsic(spot, sellCallStrike);
		return (buyLeg + sellLeg) * lotSize;
	});
}
