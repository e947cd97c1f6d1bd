import { bench, describe } from "vitest";
import { createSpotGrid, linspace } from "../src/grid/spot-grid.js";
import { computePayoff } from "../src/payoff/engine.js";
import { sampleBullCallSpread, sampleIronCondor } from "../src/strategy/test-fixtures.js";

const grid = createSpotGrid();
const fineGrid = Object.freeze(linspace(0, 5000, 100_000));
const spread = sampleBullCallSpread();
const condor = sampleIronCondor();

describe("payoff engine", () => {
	bench("bull call spread, 1000 points", () => {
		computePayoff(spread, grid);
	});

	bench("iron condor, 1000 points", () => {
		computePayoff(condor, grid);
	});

	bench("iron condor, 100k points", () => {
		computePayoff(condor, fineGrid);
	});
});
