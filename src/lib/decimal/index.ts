/**
 * LibDecimal: domain-agnostic wrapper around decimal.js-light.
 *
 * Payoff vectors are plain float arrays; decimal arithmetic is only used where
 * a value leaves the engine: rounding breakevens and formatting money.
 * Domain code never imports decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

/** decimal.js rounding mode 6: ties go to the even neighbour. */
const ROUND_HALF_EVEN = 6;

/** Enough fraction digits to spell out any double in the grid's range exactly. */
const EXACT_PLACES = 100;

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example LibDecimal.from("123.45")
	 * @example LibDecimal.from(100)
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	/**
	 * Creates a LibDecimal holding the exact binary value of a float, not its
	 * shortest decimal form: `fromExact(2.675)` is 2.67499999999999982236...
	 * @throws Error if value is not finite
	 */
	static fromExact(value: number): LibDecimal {
		if (!Number.isFinite(value)) {
			throw new Error(`LibDecimal.fromExact: invalid number ${value}`);
		}
		return new LibDecimal(new DecimalLight(value.toFixed(EXACT_PLACES)));
	}

	/**
	 * Rounds to a fixed number of decimal places, ties to even.
	 * @example LibDecimal.from("2.345").round(2).toString() // "2.34"
	 */
	round(places: number): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(places, ROUND_HALF_EVEN));
	}

	toString(): string {
		return this.raw.toString();
	}

	/**
	 * Formats with exactly `places` decimals, ties to even.
	 * @example LibDecimal.from(7).toFixed(2) // "7.00"
	 */
	toFixed(places: number): string {
		return this.raw.toFixed(places, ROUND_HALF_EVEN);
	}

	toNumber(): number {
		return this.raw.toNumber();
	}
}

/**
 * Rounds a float to `places` decimals, ties to even, judged on its exact
 * binary value: 2.675 is stored just below the tie and becomes 2.67.
 */
export function roundTo(value: number, places: number): number {
	return LibDecimal.fromExact(value).round(places).toNumber();
}
