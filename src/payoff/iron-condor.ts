import { callIntrinsic, putIntrinsic } from "./leg-payoff.js";

/**
 * Net payoff of an iron condor at each spot price, scaled by lot size.
 *
 * Flat at the net credit between the two sold strikes, falling linearly on
 * each side until the bought wing caps the loss.
 */
export function computeIronCondorPayoff(
	spotPrices: readonly number[],
	buyPutStrike: number,
	buyPutPremium: number,
	sellPutStrike: number,
	sellPutPremium: number,
	sellCallStrike: number,
	sellCallPremium: number,
	buyCallStrike: number,
	buyCallPremium: number,
	lotSize: number,
): number[] {
	return spotPrices.map((spot) => {
		const putSpread =
			putIntrinsic(spot, buyPutStrike) -
			buyPutPremium +
			(sellPutPremium - putIntrinsic(spot, sellPutStrike));
		const callSpread =
			callIntrinsic(spot, buyCallStrike) -
			buyCallPremium +
			(sellCallPremium - callIntrinsic(spot, sellCallStrike));
		return (putSpread + callSpread) * lotSize;
	});
}
