import { bench, describe } from "vitest";
import { findBreakevens } from "../src/analysis/breakeven.js";
import { summarize } from "../src/analysis/summary.js";
import { createSpotGrid } from "../src/grid/spot-grid.js";
import { computePayoff } from "../src/payoff/engine.js";
import { Simulator } from "../src/simulator/simulator.js";
import { sampleIronCondor } from "../src/strategy/test-fixtures.js";

const grid = createSpotGrid();
const condor = sampleIronCondor();
const payoff = computePayoff(condor, grid);
const simulator = Simulator.withDefaults();

describe("analysis", () => {
	bench("breakevens over 1000 points", () => {
		findBreakevens(payoff, grid);
	});

	bench("summary over 1000 points", () => {
		summarize(payoff, findBreakevens(payoff, grid));
	});

	bench("full simulation", () => {
		simulator.run(condor);
	});
});
