/**
 * Scenario File Demo
 *
 * Loads strategies from a JSON file, validates each against the strategy
 * schema and prints one summary per scenario. Rejected scenarios are logged
 * and skipped.
 *
 * Run: npx tsx examples/scenario-json.ts [path/to/scenarios.json]
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import {
	Simulator,
	createLogger,
	renderSummary,
	strategyLabel,
	z,
} from "../src/index.js";

const logger = createLogger({ level: "info" });

const defaultPath = fileURLToPath(new URL("./scenarios.json", import.meta.url));
const path = process.argv[2] ?? defaultPath;

const scenarios = z
	.array(z.object({ name: z.string(), strategy: z.unknown() }))
	.parse(JSON.parse(readFileSync(path, "utf8")));

const simulator = Simulator.withDefaults(logger);

for (const scenario of scenarios) {
	const result = simulator.runInput(scenario.strategy);
	if (!result.ok) {
		logger.warn({ scenario: scenario.name, code: result.error.code }, "Scenario skipped");
		continue;
	}
	console.log(`${scenario.name} (${strategyLabel(result.value.strategy.kind)})`);
	console.log(renderSummary(result.value.summary, simulator.config.currencySymbol));
	console.log("");
}
