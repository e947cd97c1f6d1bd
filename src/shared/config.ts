/**
 * Simulator configuration.
 *
 * The grid bounds and point count are presentation-layer settings, but they
 * must match between runs for results to be reproducible, so they live here
 * rather than being hard-coded in the grid module.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

/** Spot price grid bounds (inclusive) and number of samples. */
export interface GridConfig {
	readonly start: number;
	readonly end: number;
	readonly points: number;
}

export interface SimulatorConfig {
	/** Spot prices the payoff is evaluated at */
	readonly grid: GridConfig;
	/** Minimum segment slope for a zero-crossing to be recorded as a breakeven */
	readonly breakevenTolerance: number;
	/** Symbol prefixed to money values in rendered output */
	readonly currencySymbol: string;
	/** Minimum severity emitted by the simulator logger */
	readonly logLevel: LogLevel;
}

/** Partial configuration accepted by `resolveConfig`; grid fields may be overridden individually. */
export interface SimulatorConfigOverrides {
	readonly grid?: Partial<GridConfig> | undefined;
	readonly breakevenTolerance?: number | undefined;
	readonly currencySymbol?: string | undefined;
	readonly logLevel?: LogLevel | undefined;
}

export const DEFAULT_GRID_CONFIG: GridConfig = {
	start: 0,
	end: 5_000,
	points: 1_000,
};

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
	grid: DEFAULT_GRID_CONFIG,
	breakevenTolerance: 0.01,
	currencySymbol: "₹",
	logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Mutable builder shapes for assembling overrides from the environment. */
interface MutableGridConfig {
	start?: number;
	end?: number;
	points?: number;
}

interface MutableSimulatorConfig {
	grid?: MutableGridConfig;
	breakevenTolerance?: number;
	currencySymbol?: string;
	logLevel?: LogLevel;
}

/**
 * Reads simulator overrides from environment variables.
 * Supported: PAYOFF_GRID_START, PAYOFF_GRID_END, PAYOFF_GRID_POINTS,
 * PAYOFF_BREAKEVEN_TOLERANCE, PAYOFF_CURRENCY_SYMBOL, PAYOFF_LOG_LEVEL.
 * @throws ConfigError if a variable holds a malformed value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SimulatorConfigOverrides {
	const result: MutableSimulatorConfig = {};
	const grid: MutableGridConfig = {};

	const start = parseFiniteEnv(env, "PAYOFF_GRID_START");
	if (start !== undefined) grid.start = start;
	const end = parseFiniteEnv(env, "PAYOFF_GRID_END");
	if (end !== undefined) grid.end = end;
	const points = parsePositiveIntEnv(env, "PAYOFF_GRID_POINTS");
	if (points !== undefined) grid.points = points;
	if (Object.keys(grid).length > 0) result.grid = grid;

	const tolerance = parseFiniteEnv(env, "PAYOFF_BREAKEVEN_TOLERANCE");
	if (tolerance !== undefined) {
		if (tolerance < 0) {
			throw new ConfigError(
				`Invalid PAYOFF_BREAKEVEN_TOLERANCE: "${tolerance}" must be non-negative`,
			);
		}
		result.breakevenTolerance = tolerance;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const symbol = env["PAYOFF_CURRENCY_SYMBOL"];
	if (symbol) {
		result.currencySymbol = symbol;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["PAYOFF_LOG_LEVEL"];
	if (level) {
		const match = LOG_LEVELS.find((l) => l === level.trim().toLowerCase());
		if (match === undefined) {
			throw new ConfigError(
				`Invalid PAYOFF_LOG_LEVEL: "${level}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = match;
	}

	return result;
}

/**
 * Merges overrides onto the defaults and checks the combined grid.
 * @param overrides - Values that replace the defaults
 */
export function resolveConfig(
	overrides: SimulatorConfigOverrides = {},
): Result<SimulatorConfig, ConfigError> {
	const grid: GridConfig = {
		start: overrides.grid?.start ?? DEFAULT_GRID_CONFIG.start,
		end: overrides.grid?.end ?? DEFAULT_GRID_CONFIG.end,
		points: overrides.grid?.points ?? DEFAULT_GRID_CONFIG.points,
	};

	if (!Number.isFinite(grid.start) || !Number.isFinite(grid.end)) {
		return err(new ConfigError("Grid bounds must be finite numbers", { ...grid }));
	}
	if (grid.end <= grid.start) {
		return err(new ConfigError("Grid end must be greater than grid start", { ...grid }));
	}
	if (!Number.isInteger(grid.points) || grid.points < 2) {
		return err(new ConfigError("Grid must have at least 2 points", { points: grid.points }));
	}

	const breakevenTolerance =
		overrides.breakevenTolerance ?? DEFAULT_SIMULATOR_CONFIG.breakevenTolerance;
	if (!Number.isFinite(breakevenTolerance) || breakevenTolerance < 0) {
		return err(
			new ConfigError("Breakeven tolerance must be a non-negative number", {
				breakevenTolerance,
			}),
		);
	}

	return ok({
		grid,
		breakevenTolerance,
		currencySymbol: overrides.currencySymbol ?? DEFAULT_SIMULATOR_CONFIG.currencySymbol,
		logLevel: overrides.logLevel ?? DEFAULT_SIMULATOR_CONFIG.logLevel,
	});
}

function parseFiniteEnv(env: NodeJS.ProcessEnv, envKey: string): number | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const parsed = Number(raw.trim());
	if (raw.trim().length === 0 || !Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a finite number`);
	}
	return parsed;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parsePositiveIntEnv(env: NodeJS.ProcessEnv, envKey: string): number | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a positive integer`);
	}
	return parsed;
}
