/**
 * Tests for Demand arithmetic
 */

import { describe, expect, test } from "vitest";
import { ContractViolationError, Demand } from "../src/index.js";

describe("Demand.max", () => {
	test("creates a finite demand", () => {
		const demand = Demand.max(3);

		expect(demand.count).toBe(3);
		expect(demand.isUnlimited).toBe(false);
		expect(demand.toString()).toBe("max(3)");
	});

	test("max(0) is none", () => {
		expect(Demand.max(0)).toBe(Demand.none);
		expect(Demand.none.isPositive).toBe(false);
	});

	test("rejects negative counts", () => {
		expect(() => Demand.max(-1)).toThrow(ContractViolationError);
	});

	test("rejects fractional counts", () => {
		expect(() => Demand.max(1.5)).toThrow(
			"demand must be a non-negative integer, got 1.5",
		);
	});
});

describe("Demand.unlimited", () => {
	test("has no count and is positive", () => {
		expect(Demand.unlimited.count).toBeUndefined();
		expect(Demand.unlimited.isUnlimited).toBe(true);
		expect(Demand.unlimited.isPositive).toBe(true);
		expect(Demand.unlimited.toString()).toBe("unlimited");
	});
});

describe("Demand arithmetic", () => {
	test("adds finite demands", () => {
		expect(Demand.max(3).add(Demand.max(2)).count).toBe(5);
		expect(Demand.max(3).add(2).equals(5)).toBe(true);
	});

	test("adding to unlimited stays unlimited", () => {
		expect(Demand.unlimited.add(1)).toBe(Demand.unlimited);
		expect(Demand.max(1).add(Demand.unlimited)).toBe(Demand.unlimited);
	});

	test("saturates at unlimited past the safe integer range", () => {
		expect(Demand.max(Number.MAX_SAFE_INTEGER).add(1)).toBe(Demand.unlimited);
	});

	test("subtraction clamps at zero", () => {
		expect(Demand.max(3).subtract(5)).toBe(Demand.none);
		expect(Demand.max(5).subtract(Demand.max(3)).count).toBe(2);
	});

	test("subtracting unlimited from a finite demand gives none", () => {
		expect(Demand.max(4).subtract(Demand.unlimited)).toBe(Demand.none);
	});

	test("unlimited minus anything is unlimited", () => {
		expect(Demand.unlimited.subtract(100)).toBe(Demand.unlimited);
		expect(Demand.unlimited.subtract(Demand.unlimited)).toBe(Demand.unlimited);
	});

	test("equals compares counts", () => {
		expect(Demand.max(2).equals(Demand.max(2))).toBe(true);
		expect(Demand.max(2).equals(Demand.unlimited)).toBe(false);
		expect(Demand.unlimited.equals(Demand.unlimited)).toBe(true);
	});
});
