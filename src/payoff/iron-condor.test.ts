import { describe, expect, it } from "vitest";
import { createSpotGrid } from "../grid/spot-grid.js";
import { computeIronCondorPayoff } from "./iron-condor.js";

const condor = (spots: readonly number[], lotSize = 1): number[] =>
	computeIronCondorPayoff(spots, 90, 2, 100, 5, 110, 5, 120, 2, lotSize);

describe("computeIronCondorPayoff", () => {
	it("returns one value per spot price", () => {
		const grid = createSpotGrid();
		expect(condor(grid)).toHaveLength(grid.length);
	});

	it("keeps the full credit between the sold strikes", () => {
		expect(condor([100, 101.5, 105, 109.99, 110])).toEqual([6, 6, 6, 6, 6]);
	});

	it("caps the loss beyond either bought strike", () => {
		expect(condor([0, 50, 90])).toEqual([-4, -4, -4]);
		expect(condor([120, 500, 5000])).toEqual([-4, -4, -4]);
	});

	it("crosses zero at 94 and 116", () => {
		expect(condor([94, 116])).toEqual([0, 0]);
	});

	it("slopes linearly on each wing", () => {
		expect(condor([95, 97.5])).toEqual([1, 3.5]);
		expect(condor([115, 112.5])).toEqual([1, 3.5]);
	});

	it("scales by lot size", () => {
		expect(condor([0, 105, 5000], 10)).toEqual([-40, 60, -40]);
	});
});
