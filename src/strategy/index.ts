/**
 * Strategy model, canonical leg ordering, input validation and schemas.
 */

export {
	OptionSide,
	OptionKind,
	StrategyKind,
	type OptionLeg,
	type LegQuote,
	type BullCallSpread,
	type IronCondor,
	type Strategy,
} from "./types.js";
export {
	legsOf,
	premiumsOf,
	strikesOf,
	strategyLabel,
	bullCallSpread,
	ironCondor,
} from "./legs.js";
export { type ViolationReporter, checkInputs, validate } from "./input-validator.js";
export {
	bullCallSpreadSchema,
	ironCondorSchema,
	strategySchema,
	parseStrategy,
} from "./schema.js";
