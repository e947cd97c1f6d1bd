import { describe, expect, it } from "vitest";
import { callIntrinsic, legPayoff, putIntrinsic } from "./leg-payoff.js";

describe("intrinsic value", () => {
	it("call is worth S - K above the strike and nothing below", () => {
		expect(callIntrinsic(120, 100)).toBe(20);
		expect(callIntrinsic(100, 100)).toBe(0);
		expect(callIntrinsic(80, 100)).toBe(0);
	});

	it("put is worth K - S below the strike and nothing above", () => {
		expect(putIntrinsic(80, 100)).toBe(20);
		expect(putIntrinsic(100, 100)).toBe(0);
		expect(putIntrinsic(120, 100)).toBe(0);
	});
});

describe("legPayoff", () => {
	it("bought call earns intrinsic minus premium", () => {
		expect(legPayoff({ strike: 100, premium: 5, side: "buy", kind: "call" }, 120)).toBe(15);
		expect(legPayoff({ strike: 100, premium: 5, side: "buy", kind: "call" }, 90)).toBe(-5);
	});

	it("sold call keeps premium minus intrinsic", () => {
		expect(legPayoff({ strike: 110, premium: 2, side: "sell", kind: "call" }, 100)).toBe(2);
		expect(legPayoff({ strike: 110, premium: 2, side: "sell", kind: "call" }, 120)).toBe(-8);
	});

	it("bought put earns intrinsic minus premium", () => {
		expect(legPayoff({ strike: 90, premium: 2, side: "buy", kind: "put" }, 80)).toBe(8);
	});

	it("sold put keeps premium minus intrinsic", () => {
		expect(legPayoff({ strike: 100, premium: 5, side: "sell", kind: "put" }, 90)).toBe(-5);
		expect(legPayoff({ strike: 100, premium: 5, side: "sell", kind: "put" }, 105)).toBe(5);
	});
});
