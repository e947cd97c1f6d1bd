import { bullCallSpread, ironCondor } from "./legs.js";
import type { BullCallSpread, IronCondor } from "./types.js";

/** 100/110 call spread: 5 paid, 2 received. */
export function sampleBullCallSpread(lotSize = 1): BullCallSpread {
	return bullCallSpread({ strike: 100, premium: 5 }, { strike: 110, premium: 2 }, lotSize);
}

/** 90/100/110/120 condor: 2 paid on each wing, 5 received on each body leg. */
export function sampleIronCondor(lotSize = 1): IronCondor {
	return ironCondor(
		{
			buyPut: { strike: 90, premium: 2 },
			sellPut: { strike: 100, premium: 5 },
			sellCall: { strike: 110, premium: 5 },
			buyCall: { strike: 120, premium: 2 },
		},
		lotSize,
	);
}
