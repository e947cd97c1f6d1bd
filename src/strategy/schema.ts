/**
 * Schemas for strategy parameters arriving from outside the process
 * (JSON files, request bodies). Premium positivity is deliberately left to
 * the input validator so that it reports InvalidPremium rather than a schema
 * failure.
 */

import type { ValidationError } from "../lib/validation/index.js";
import { validateSchema, z } from "../lib/validation/index.js";
import type { Result } from "../shared/result.js";
import { type Strategy, StrategyKind } from "./types.js";

const legQuoteSchema = z.object({
	strike: z.number().finite().positive(),
	premium: z.number().finite(),
});

const lotSizeSchema = z.number().int().min(1);

export const bullCallSpreadSchema = z.object({
	kind: z.literal(StrategyKind.BullCallSpread),
	buyCall: legQuoteSchema,
	sellCall: legQuoteSchema,
	lotSize: lotSizeSchema,
});

export const ironCondorSchema = z.object({
	kind: z.literal(StrategyKind.IronCondor),
	buyPut: legQuoteSchema,
	sellPut: legQuoteSchema,
	sellCall: legQuoteSchema,
	buyCall: legQuoteSchema,
	lotSize: lotSizeSchema,
});

export const strategySchema = z.discriminatedUnion("kind", [bullCallSpreadSchema, ironCondorSchema]);

/** Parses untrusted input into a Strategy. */
export function parseStrategy(input: unknown): Result<Strategy, ValidationError> {
	return validateSchema<Strategy>(strategySchema, input);
}
