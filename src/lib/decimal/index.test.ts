import { describe, expect, it } from "vitest";
import { LibDecimal, roundTo } from "./index.js";

describe("LibDecimal", () => {
	describe("factories", () => {
		it("creates from string", () => {
			expect(LibDecimal.from("1.5").toString()).toBe("1.5");
			expect(LibDecimal.from(" 100 ").toString()).toBe("100");
		});

		it("creates from number", () => {
			expect(LibDecimal.from(1.5).toString()).toBe("1.5");
			expect(LibDecimal.from(0).toString()).toBe("0");
		});

		it("rejects empty string", () => {
			expect(() => LibDecimal.from("  ")).toThrow("empty string");
		});

		it("rejects NaN and Infinity", () => {
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid");
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid");
			expect(() => LibDecimal.fromExact(Number.NaN)).toThrow("invalid");
		});

		it("fromExact keeps the binary value of the float", () => {
			expect(LibDecimal.fromExact(0.5).toString()).toBe("0.5");
			expect(LibDecimal.fromExact(2.675).toFixed(20)).toBe("2.67499999999999982236");
			expect(LibDecimal.fromExact(-7).toFixed(2)).toBe("-7.00");
		});
	});

	describe("round", () => {
		it("rounds ties to the even neighbour", () => {
			expect(LibDecimal.from("2.345").round(2).toString()).toBe("2.34");
			expect(LibDecimal.from("2.355").round(2).toString()).toBe("2.36");
		});

		it("rounds non-ties to the nearest value", () => {
			expect(LibDecimal.from("116.02175946438241").round(2).toString()).toBe("116.02");
			expect(LibDecimal.from("-3.456").round(2).toString()).toBe("-3.46");
		});
	});

	describe("toFixed", () => {
		it("pads to the requested places", () => {
			expect(LibDecimal.from(7).toFixed(2)).toBe("7.00");
			expect(LibDecimal.from(-3).toFixed(2)).toBe("-3.00");
			expect(LibDecimal.from("103.5").toFixed(2)).toBe("103.50");
		});
	});

	describe("toNumber", () => {
		it("converts back to a float", () => {
			expect(LibDecimal.from("94.25").toNumber()).toBe(94.25);
		});
	});
});

describe("roundTo", () => {
	it("absorbs float noise from interpolation", () => {
		expect(roundTo(103.00000000000001, 2)).toBe(103);
		expect(roundTo(93.99999999999999, 2)).toBe(94);
	});

	it("keeps two decimals", () => {
		expect(roundTo(116.02175946438241, 2)).toBe(116.02);
	});

	it("rounds floats stored just below a tie downwards", () => {
		expect(roundTo(1.015, 2)).toBe(1.01);
		expect(roundTo(2.675, 2)).toBe(2.67);
		expect(roundTo(-2.675, 2)).toBe(-2.67);
	});

	it("rounds exact binary ties to even", () => {
		expect(roundTo(0.125, 2)).toBe(0.12);
		expect(roundTo(0.375, 2)).toBe(0.38);
	});
});
