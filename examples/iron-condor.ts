/**
 * Iron Condor Demo
 *
 * Reads grid and currency overrides from PAYOFF_* environment variables, then
 * prints the condor's payoff curve and summary.
 *
 * Run: PAYOFF_GRID_END=300 PAYOFF_GRID_POINTS=301 npx tsx examples/iron-condor.ts
 */

import {
	ReportRenderer,
	Simulator,
	configFromEnv,
	createLogger,
	ironCondor,
} from "../src/index.js";

const overrides = configFromEnv();
const logger = createLogger({ level: overrides.logLevel ?? "info" });

const created = Simulator.create({ config: overrides, logger });
if (!created.ok) {
	logger.error({ error: created.error.toJSON() }, "Invalid configuration");
	process.exit(1);
}
const simulator = created.value;

// ── Condor: long 90 put, short 100 put, short 110 call, long 120 call ──

const strategy = ironCondor({
	buyPut: { strike: 90, premium: 2 },
	sellPut: { strike: 100, premium: 5 },
	sellCall: { strike: 110, premium: 5 },
	buyCall: { strike: 120, premium: 2 },
});

const result = simulator.run(strategy);
if (!result.ok) {
	process.exit(1);
}

console.log(
	ReportRenderer.render(result.value, {
		currencySymbol: simulator.config.currencySymbol,
		color: process.stdout.isTTY,
		chart: { window: { min: 70, max: 140 } },
	}),
);
