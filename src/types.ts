/**
 * Type definitions and interfaces for demand-streams
 */

import type { Demand } from "./demand.js";

/**
 * The single terminal event of a stream: success or failure.
 */
export type Completion<Failure> =
	| { readonly kind: "finished" }
	| { readonly kind: "failure"; readonly error: Failure };

export const Completion = {
	finished: { kind: "finished" } as const,
	failure<Failure>(error: Failure): Completion<Failure> {
		return { kind: "failure", error };
	},
};

/**
 * Anything that can be cancelled. Cancelling twice is the same as once.
 */
export interface Cancellable {
	cancel(): void;
}

/**
 * The live link between one publisher and one subscriber.
 *
 * `request` is additive and may be called from any context, including from
 * inside the subscriber's own `receive`. After `cancel` every further
 * `request` is accepted and ignored.
 */
export interface Subscription extends Cancellable {
	request(demand: Demand): void;
}

/**
 * A consumer of values.
 *
 * It receives exactly one subscription, then values (each return value is
 * additional demand on top of what remains), then at most one completion.
 */
export interface Subscriber<Input, Failure> {
	receiveSubscription(subscription: Subscription): void;
	receive(value: Input): Demand;
	receiveCompletion(completion: Completion<Failure>): void;
}

/**
 * A producer of values gated by demand.
 *
 * A publisher emits a value only while the demand its subscriber granted is
 * positive, consumes one unit per value, emits at most one completion and
 * nothing after it.
 */
export interface Publisher<Output, Failure> {
	subscribe(subscriber: Subscriber<Output, Failure>): void;
}

/**
 * How much the buffer asks of its upstream.
 * - `keepFull`: request `size` values up front and replace every value
 *   delivered downstream, keeping the queue topped up.
 * - `byRequest`: request unlimited values up front and forward every
 *   downstream request; the queue bound is the only throttle.
 */
export type PrefetchStrategy = "keepFull" | "byRequest";

/**
 * What the buffer does with a value that arrives while the queue is full.
 * - `dropNewest`: discard the incoming value.
 * - `dropOldest`: evict the front of the queue and append the incoming value.
 * - `customError`: cancel upstream and fail downstream with the error the
 *   factory returns. The factory runs only when an overflow happens.
 */
export type BufferingStrategy<Failure> =
	| "dropNewest"
	| "dropOldest"
	| { readonly customError: () => Failure };

/**
 * Logger interface for structured logging
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Options for operators with logging
 */
export interface LoggingOptions {
	/** Logger instance */
	logger?: Logger;
	/** Minimum log level for the default console logger */
	logLevel?: LogLevel;
}

/**
 * Configuration of a buffer operator. Fixed at construction.
 */
export interface BufferOptions<Failure> extends LoggingOptions {
	/** Maximum number of queued values. Non-negative integer. */
	size: number;
	prefetch: PrefetchStrategy;
	whenFull: BufferingStrategy<Failure>;
	/**
	 * Name used in log output and as the subscription's description.
	 * Default: "Buffer"
	 */
	name?: string;
}
