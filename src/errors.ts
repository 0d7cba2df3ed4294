/**
 * Built-in error classes for demand-streams
 */

/**
 * ContractViolationError - A broken producer or consumer.
 *
 * Thrown synchronously at the call site when the publisher/subscriber
 * protocol is misused: a value sent without outstanding demand, a value or
 * completion after the stream already completed, a signal before the
 * subscription, or an invalid demand count. It is never delivered through
 * a completion and the runtime never catches it.
 *
 * @example
 * ```typescript
 * import { Demand, ContractViolationError } from 'demand-streams'
 *
 * try {
 *   Demand.max(-1)
 * } catch (err) {
 *   err instanceof ContractViolationError // true
 * }
 * ```
 */
export class ContractViolationError extends Error {
	readonly _tag = "ContractViolationError" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ContractViolationError";
	}
}

/**
 * BufferOverflowError - A ready-made failure for the `customError` policy.
 *
 * Return it from the factory when a full buffer should end the stream:
 *
 * ```typescript
 * buffer(source, {
 *   size: 100,
 *   prefetch: "byRequest",
 *   whenFull: { customError: () => new BufferOverflowError(100) },
 * })
 * ```
 */
export class BufferOverflowError extends Error {
	readonly _tag = "BufferOverflowError" as const;
	readonly size: number;

	constructor(size: number, options?: { cause?: unknown }) {
		super(`buffer of size ${size} overflowed`, options);
		this.name = "BufferOverflowError";
		this.size = size;
	}
}
