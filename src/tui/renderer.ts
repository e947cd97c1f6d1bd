import { DEFAULT_SIMULATOR_CONFIG } from "../shared/config.js";
import type { Simulation } from "../simulator/types.js";
import { strategyLabel } from "../strategy/legs.js";
import { bold } from "./ansi.js";
import { renderPayoffChart } from "./chart.js";
import { renderSummary } from "./format.js";
import type { ReportOptions } from "./types.js";

/** Pure renderer: converts a Simulation to a terminal report: title, chart, summary. */
export const ReportRenderer = {
	render(simulation: Simulation, options: ReportOptions = {}): string {
		const symbol = options.currencySymbol ?? DEFAULT_SIMULATOR_CONFIG.currencySymbol;
		const color = options.color ?? false;
		const title = `${strategyLabel(simulation.strategy.kind)} Payoff Curve`;

		const lines: string[] = [];
		lines.push(color ? bold(title) : title);
		lines.push("═".repeat(title.length));
		lines.push(
			renderPayoffChart(simulation.spotPrices, simulation.payoff, {
				...options.chart,
				currencySymbol: symbol,
			}),
		);
		lines.push("");
		lines.push(renderSummary(simulation.summary, symbol, color));
		return lines.join("\n");
	},
};
