import { describe, expect, it } from "vitest";
import { unwrap } from "../shared/result.js";
import { Simulator } from "../simulator/simulator.js";
import { sampleBullCallSpread, sampleIronCondor } from "../strategy/test-fixtures.js";
import { BOLD, RESET } from "./ansi.js";
import { ReportRenderer } from "./renderer.js";

const chart = { width: 20, height: 5 };

describe("ReportRenderer", () => {
	it("titles the report after the strategy", () => {
		const simulation = unwrap(Simulator.withDefaults().run(sampleBullCallSpread()));
		const lines = ReportRenderer.render(simulation, { chart }).split("\n");

		expect(lines[0]).toBe("Bull Call Spread Payoff Curve");
		expect(lines[1]).toBe("═".repeat(29));
	});

	it("ends with the summary block", () => {
		const simulation = unwrap(Simulator.withDefaults().run(sampleBullCallSpread()));
		const lines = ReportRenderer.render(simulation, { chart }).split("\n");

		// title, rule, chart (P/L title, 5 plot rows, axis, spot labels, spot title), blank, 3 summary lines
		expect(lines).toHaveLength(15);
		expect(lines.slice(-3)).toEqual([
			"Max Profit: ₹7.00",
			"Max Loss: ₹-3.00",
			"Breakeven Point(s): ₹103.00",
		]);
	});

	it("uses the given currency symbol", () => {
		const simulation = unwrap(Simulator.withDefaults().run(sampleIronCondor()));
		const lines = ReportRenderer.render(simulation, { chart, currencySymbol: "$" }).split("\n");

		expect(lines[0]).toBe("Iron Condor Payoff Curve");
		expect(lines[2]).toBe("Net P/L ($)");
		expect(lines.at(-1)).toBe("Breakeven Point(s): $94.00, $116.02");
	});

	it("bolds the title when colour is on", () => {
		const simulation = unwrap(Simulator.withDefaults().run(sampleIronCondor()));
		const lines = ReportRenderer.render(simulation, { chart, color: true }).split("\n");

		expect(lines[0]).toBe(`${BOLD}Iron Condor Payoff Curve${RESET}`);
	});
});
