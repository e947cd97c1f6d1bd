// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	ErrorCategory,
	PayoffError,
	InvalidPremiumError,
	UnorderedStrikesError,
	ConfigError,
	type InputError,
	isInvalidPremium,
	isUnorderedStrikes,
	isInputError,
	isConfigError,
	type GridConfig,
	type SimulatorConfig,
	type SimulatorConfigOverrides,
	DEFAULT_GRID_CONFIG,
	DEFAULT_SIMULATOR_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Library Wrappers ─────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type ChildLoggerOptions,
	type LogLevel,
	createLogger,
	createSilentLogger,
} from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue, validateSchema, z } from "./lib/validation/index.js";
export { LibDecimal, roundTo } from "./lib/decimal/index.js";

// ── Spot Grid ────────────────────────────────────────────────────────
export { type SpotGrid, linspace, createSpotGrid, gridStep } from "./grid/index.js";

// ── Strategy ─────────────────────────────────────────────────────────
export {
	OptionSide,
	OptionKind,
	StrategyKind,
	type OptionLeg,
	type LegQuote,
	type BullCallSpread,
	type IronCondor,
	type Strategy,
	legsOf,
	premiumsOf,
	strikesOf,
	strategyLabel,
	bullCallSpread,
	ironCondor,
	type ViolationReporter,
	checkInputs,
	validate,
	strategySchema,
	parseStrategy,
} from "./strategy/index.js";

// ── Payoff ───────────────────────────────────────────────────────────
export {
	callIntrinsic,
	putIntrinsic,
	legPayoff,
	computeBullCallSpreadPayoff,
	computeIronCondorPayoff,
	computePayoff,
	payoffAt,
} from "./payoff/index.js";

// ── Analysis ─────────────────────────────────────────────────────────
export {
	type BreakevenSet,
	type PayoffSummary,
	DEFAULT_BREAKEVEN_TOLERANCE,
	findBreakevens,
	sortBreakevens,
	summarize,
} from "./analysis/index.js";

// ── Simulator ────────────────────────────────────────────────────────
export { type Simulation, type SimulatorOptions, Simulator, simulate } from "./simulator/index.js";

// ── Terminal Report ──────────────────────────────────────────────────
export {
	type ChartOptions,
	type ReportOptions,
	type SpotWindow,
	ReportRenderer,
	renderPayoffChart,
	formatMoney,
	renderSummary,
} from "./tui/index.js";
