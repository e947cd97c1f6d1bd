/**
 * Simulator: runs one strategy through validation, payoff, breakeven and
 * summary.
 *
 * Stateless apart from its configuration: every run allocates its own grid
 * and vectors, so one instance can serve concurrent callers.
 */

import { findBreakevens } from "../analysis/breakeven.js";
import { summarize } from "../analysis/summary.js";
import { createSpotGrid } from "../grid/spot-grid.js";
import { type Logger, createSilentLogger } from "../lib/logger/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { computePayoff } from "../payoff/engine.js";
import {
	DEFAULT_SIMULATOR_CONFIG,
	type SimulatorConfig,
	resolveConfig,
} from "../shared/config.js";
import type { ConfigError, InputError } from "../shared/errors.js";
import { type Result, flatMap, map, ok } from "../shared/result.js";
import { checkInputs } from "../strategy/input-validator.js";
import { premiumsOf, strikesOf } from "../strategy/legs.js";
import { parseStrategy } from "../strategy/schema.js";
import type { Strategy } from "../strategy/types.js";
import type { Simulation, SimulatorOptions } from "./types.js";

export class Simulator {
	readonly config: SimulatorConfig;
	private readonly logger: Logger;

	private constructor(config: SimulatorConfig, logger: Logger) {
		this.config = config;
		this.logger = logger.child({ module: "simulator" }, { level: config.logLevel });
	}

	/**
	 * Resolves configuration overrides; fails on an unusable grid or tolerance.
	 * `config.logLevel` sets the simulator's own threshold on the given logger.
	 */
	static create(options: SimulatorOptions = {}): Result<Simulator, ConfigError> {
		const logger = options.logger ?? createSilentLogger();
		return map(resolveConfig(options.config), (config) => new Simulator(config, logger));
	}

	/** A simulator on the default 1000-point grid over [0, 5000]. */
	static withDefaults(logger: Logger = createSilentLogger()): Simulator {
		return new Simulator(DEFAULT_SIMULATOR_CONFIG, logger);
	}

	/**
	 * Computes the payoff curve, breakevens and summary of `strategy`.
	 * Returns the first input violation without computing anything when the
	 * premiums or canonical strike order are invalid.
	 */
	run(strategy: Strategy): Result<Simulation, InputError> {
		const check = checkInputs(premiumsOf(strategy), strikesOf(strategy));
		if (!check.ok) {
			this.logger.warn({ kind: strategy.kind, error: check.error.toJSON() }, check.error.message);
			return check;
		}

		const spotPrices = createSpotGrid(this.config.grid);
		const payoff = computePayoff(strategy, spotPrices);
		const breakevens = findBreakevens(payoff, spotPrices, this.config.breakevenTolerance);
		const summary = summarize(payoff, breakevens);

		this.logger.debug(
			{
				kind: strategy.kind,
				lotSize: strategy.lotSize,
				points: spotPrices.length,
				maxProfit: summary.maxProfit,
				maxLoss: summary.maxLoss,
				breakevens: [...breakevens],
			},
			"Payoff computed",
		);

		return ok({ strategy, spotPrices, payoff, summary });
	}

	/** Parses untrusted input into a strategy, then runs it. */
	runInput(input: unknown): Result<Simulation, ValidationError | InputError> {
		const parsed = parseStrategy(input);
		if (!parsed.ok) {
			this.logger.warn({ issues: parsed.error.context["issues"] }, "Rejected strategy input");
		}
		return flatMap(parsed, (strategy) => this.run(strategy));
	}
}

/** Runs `strategy` on the default grid. */
export function simulate(strategy: Strategy, logger?: Logger): Result<Simulation, InputError> {
	return Simulator.withDefaults(logger).run(strategy);
}
