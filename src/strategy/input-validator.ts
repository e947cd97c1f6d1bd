/**
 * Input validator: gates a payoff computation on well-formed leg inputs.
 *
 * Premiums must be strictly positive; the strike sequence the caller submits
 * must be non-decreasing. The validator never reorders strikes or derives a
 * strategy's canonical order itself: `strikesOf` does that on the caller side.
 */

import {
	type InputError,
	InvalidPremiumError,
	UnorderedStrikesError,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

/** Receives the first violation found when validation fails. */
export type ViolationReporter = (violation: InputError) => void;

/** Returns the first violation, premiums before strikes. */
export function checkInputs(
	premiums: readonly number[],
	strikes: readonly number[],
): Result<void, InputError> {
	for (let i = 0; i < premiums.length; i++) {
		const premium = premiums[i];
		// NaN fails this comparison too
		if (premium === undefined || !(premium > 0)) {
			return err(new InvalidPremiumError(i, premium ?? Number.NaN));
		}
	}

	for (let i = 0; i < strikes.length - 1; i++) {
		const current = strikes[i];
		const next = strikes[i + 1];
		if (current === undefined || next === undefined || !(current <= next)) {
			return err(new UnorderedStrikesError(strikes, { index: i }));
		}
	}

	return ok(undefined);
}

/**
 * Returns true when every premium is positive and the strikes are non-decreasing.
 * On failure, `report` receives the violation before false is returned.
 */
export function validate(
	premiums: readonly number[],
	strikes: readonly number[],
	report: ViolationReporter = () => {},
): boolean {
	const result = checkInputs(premiums, strikes);
	if (!result.ok) {
		report(result.error);
		return false;
	}
	return true;
}
