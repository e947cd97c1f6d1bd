/**
 * Bull Call Spread Demo
 *
 * Buys the 100 call for 5, sells the 110 call for 2 and prints the payoff
 * curve around the strikes with max profit, max loss and breakeven.
 *
 * Run: npx tsx examples/bull-call-spread.ts
 */

import { ReportRenderer, bullCallSpread, createLogger, simulate } from "../src/index.js";

const logger = createLogger({ level: "info" });

const strategy = bullCallSpread({ strike: 100, premium: 5 }, { strike: 110, premium: 2 }, 50);

const result = simulate(strategy, logger);
if (!result.ok) {
	console.error(`${result.error.message} (${result.error.hint ?? result.error.code})`);
	process.exitCode = 1;
} else {
	console.log(
		ReportRenderer.render(result.value, {
			color: process.stdout.isTTY,
			chart: { window: { min: 80, max: 130 } },
		}),
	);
}
