/**
 * demand-streams - Push-based reactive streams with explicit demand
 *
 * Publishers, subscribers and subscriptions that agree on how many values may
 * flow, plus a bounded buffer operator that decouples a fast producer from a
 * slow consumer without unbounded memory growth.
 */

export { BufferPublisher, buffer } from "./buffer.js";
export { Demand } from "./demand.js";
export { BufferOverflowError, ContractViolationError } from "./errors.js";
export { ConsoleLogger, NoOpLogger, createLogger } from "./logger.js";
export { empty, emptySubscription, fail, from } from "./publishers.js";
export { sink } from "./sink.js";
export type { SinkHandle, SinkOptions } from "./sink.js";
export { Completion } from "./types.js";
export type {
	BufferOptions,
	BufferingStrategy,
	Cancellable,
	Logger,
	LoggingOptions,
	LogLevel,
	PrefetchStrategy,
	Publisher,
	Subscriber,
	Subscription,
} from "./types.js";
