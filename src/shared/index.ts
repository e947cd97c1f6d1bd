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
} from "./result.js";

export {
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
} from "./errors.js";

export {
	type GridConfig,
	type SimulatorConfig,
	type SimulatorConfigOverrides,
	DEFAULT_GRID_CONFIG,
	DEFAULT_SIMULATOR_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
