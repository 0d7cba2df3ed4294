/**
 * Demand value type for demand-streams - how many more values a subscriber accepts
 */

import { ContractViolationError } from "./errors.js";

/**
 * A requested number of values: either a finite non-negative count or
 * unlimited. Instances are immutable and arithmetic saturates at both ends,
 * so a demand can never become negative.
 *
 * @example
 * ```typescript
 * const demand = Demand.max(2).add(3)       // max(5)
 * demand.subtract(10)                        // max(0)
 * Demand.unlimited.subtract(Demand.max(1))   // unlimited
 * ```
 */
export class Demand {
	/** Unlimited demand. Absorbs every addition and subtraction. */
	static readonly unlimited = new Demand(undefined);

	/** Zero demand, the neutral response to a delivered value. */
	static readonly none = new Demand(0);

	private constructor(private readonly limit: number | undefined) {}

	/**
	 * Create a finite demand.
	 * Throws a ContractViolationError for negative or non-integer counts.
	 */
	static max(count: number): Demand {
		if (!Number.isSafeInteger(count) || count < 0) {
			throw new ContractViolationError(
				`demand must be a non-negative integer, got ${count}`,
			);
		}
		if (count === 0) return Demand.none;
		return new Demand(count);
	}

	/**
	 * The finite count, or undefined for unlimited demand.
	 */
	get count(): number | undefined {
		return this.limit;
	}

	get isUnlimited(): boolean {
		return this.limit === undefined;
	}

	get isPositive(): boolean {
		return this.limit === undefined || this.limit > 0;
	}

	add(other: Demand | number): Demand {
		const right = toDemand(other);
		if (this.limit === undefined || right.limit === undefined) {
			return Demand.unlimited;
		}
		const sum = this.limit + right.limit;
		// Past the safe integer range a count stops being exact
		if (!Number.isSafeInteger(sum)) return Demand.unlimited;
		return Demand.max(sum);
	}

	subtract(other: Demand | number): Demand {
		const right = toDemand(other);
		if (this.limit === undefined) return Demand.unlimited;
		if (right.limit === undefined) return Demand.none;
		return Demand.max(Math.max(0, this.limit - right.limit));
	}

	equals(other: Demand | number): boolean {
		return this.limit === toDemand(other).limit;
	}

	toString(): string {
		return this.limit === undefined ? "unlimited" : `max(${this.limit})`;
	}
}

function toDemand(value: Demand | number): Demand {
	return typeof value === "number" ? Demand.max(value) : value;
}
