import type { PayoffSummary } from "../analysis/types.js";
import type { SpotGrid } from "../grid/spot-grid.js";
import type { Logger } from "../lib/logger/index.js";
import type { SimulatorConfigOverrides } from "../shared/config.js";
import type { Strategy } from "../strategy/types.js";

/** Everything computed for one strategy; discarded once rendered. */
export interface Simulation {
	readonly strategy: Strategy;
	readonly spotPrices: SpotGrid;
	/** Net payoff at each spot price, scaled by lot size */
	readonly payoff: readonly number[];
	readonly summary: PayoffSummary;
}

export interface SimulatorOptions {
	/** Overrides merged onto the default configuration */
	readonly config?: SimulatorConfigOverrides | undefined;
	/** Defaults to a silent logger */
	readonly logger?: Logger | undefined;
}
