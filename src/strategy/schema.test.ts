import { describe, expect, it } from "vitest";
import { ValidationError } from "../lib/validation/index.js";
import { parseStrategy } from "./schema.js";
import { sampleBullCallSpread, sampleIronCondor } from "./test-fixtures.js";

describe("parseStrategy", () => {
	it("accepts a bull call spread", () => {
		const input = {
			kind: "bull_call_spread",
			buyCall: { strike: 100, premium: 5 },
			sellCall: { strike: 110, premium: 2 },
			lotSize: 1,
		};
		expect(parseStrategy(input)).toEqual({ ok: true, value: sampleBullCallSpread() });
	});

	it("accepts an iron condor", () => {
		const input = JSON.parse(JSON.stringify(sampleIronCondor(2))) as unknown;
		expect(parseStrategy(input)).toEqual({ ok: true, value: sampleIronCondor(2) });
	});

	it("rejects an unknown strategy kind", () => {
		const result = parseStrategy({ kind: "butterfly", lotSize: 1 });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(ValidationError);
	});

	it("rejects a missing leg with its path", () => {
		const result = parseStrategy({
			kind: "bull_call_spread",
			buyCall: { strike: 100, premium: 5 },
			lotSize: 1,
		});
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.issues.map((i) => i.path.join("."))).toEqual(["sellCall"]);
	});

	it("rejects a fractional or zero lot size", () => {
		const base = { ...sampleBullCallSpread() };
		expect(parseStrategy({ ...base, lotSize: 1.5 }).ok).toBe(false);
		expect(parseStrategy({ ...base, lotSize: 0 }).ok).toBe(false);
	});

	it("rejects a non-positive strike", () => {
		const result = parseStrategy({ ...sampleBullCallSpread(), buyCall: { strike: 0, premium: 5 } });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.issues[0]?.path).toEqual(["buyCall", "strike"]);
	});

	it("leaves premium positivity to the input validator", () => {
		const result = parseStrategy({
			...sampleBullCallSpread(),
			sellCall: { strike: 110, premium: -2 },
		});
		expect(result.ok).toBe(true);
	});
});
