/**
 * Buffer operator for demand-streams - bounded queue between a fast upstream
 * and a slow downstream
 */

import createDebug from "debug";
import { Demand } from "./demand.js";
import { ContractViolationError } from "./errors.js";
import { createLogger } from "./logger.js";
import {
	type BufferOptions,
	type BufferingStrategy,
	Completion,
	type Logger,
	type PrefetchStrategy,
	type Publisher,
	type Subscriber,
	type Subscription,
} from "./types.js";

const debugBuffer = createDebug("demand-streams:buffer");

type BufferState = "awaitingSubscription" | "ready" | "finished" | "cancelled";

interface BufferConfig<Failure> {
	name: string;
	size: number;
	prefetch: PrefetchStrategy;
	whenFull: BufferingStrategy<Failure>;
	logger: Logger;
}

/**
 * A completion received (or synthesized) but not yet delivered downstream.
 * One recorded while values are queued waits until they are drained and the
 * downstream still has demand; one recorded against an empty queue goes out
 * at once.
 */
interface PendingTerminal<Failure> {
	completion: Completion<Failure>;
	requiresDemand: boolean;
}

/**
 * A publisher that decouples its upstream from its downstream with a bounded
 * FIFO queue.
 *
 * Every downstream subscriber gets its own queue and its own subscription to
 * upstream. Towards upstream the buffer manages demand itself according to
 * `prefetch`; towards downstream it only emits what was requested.
 *
 * @example
 * ```typescript
 * const buffered = buffer(source, {
 *   size: 3,
 *   prefetch: "byRequest",
 *   whenFull: "dropOldest",
 * })
 *
 * sink(buffered, {
 *   demand: Demand.max(3),
 *   receiveValue: (value) => console.log(value),
 * })
 * ```
 */
export class BufferPublisher<Output, Failure>
	implements Publisher<Output, Failure>
{
	private readonly config: BufferConfig<Failure>;

	constructor(
		private readonly upstream: Publisher<Output, Failure>,
		options: BufferOptions<Failure>,
	) {
		validateOptions(options);
		const name = options.name ?? "Buffer";
		this.config = {
			name,
			size: options.size,
			prefetch: options.prefetch,
			whenFull: options.whenFull,
			logger: createLogger(name, options.logger, options.logLevel),
		};
	}

	subscribe(subscriber: Subscriber<Output, Failure>): void {
		debugBuffer(
			"[%s] subscribing (size=%d, prefetch=%s)",
			this.config.name,
			this.config.size,
			this.config.prefetch,
		);
		this.upstream.subscribe(new BufferSubscription(subscriber, this.config));
	}
}

/**
 * Buffer `upstream` into a queue of at most `options.size` values.
 */
export function buffer<Output, Failure>(
	upstream: Publisher<Output, Failure>,
	options: BufferOptions<Failure>,
): Publisher<Output, Failure> {
	return new BufferPublisher(upstream, options);
}

function validateOptions<Failure>(options: BufferOptions<Failure>): void {
	if (!Number.isSafeInteger(options.size) || options.size < 0) {
		throw new ContractViolationError(
			`buffer size must be a non-negative integer, got ${options.size}`,
		);
	}
	if (options.prefetch !== "keepFull" && options.prefetch !== "byRequest") {
		throw new ContractViolationError(
			`unknown prefetch strategy: ${String(options.prefetch)}`,
		);
	}
	const { whenFull } = options;
	if (
		whenFull !== "dropNewest" &&
		whenFull !== "dropOldest" &&
		typeof whenFull?.customError !== "function"
	) {
		throw new ContractViolationError("unknown buffering strategy");
	}
}

/**
 * State of one buffered stream. It is the subscriber handed to upstream and
 * the subscription handed to downstream; both facets mutate the same fields,
 * and no other object touches them.
 */
class BufferSubscription<Output, Failure>
	implements Subscriber<Output, Failure>, Subscription
{
	private state: BufferState = "awaitingSubscription";
	private upstream: Subscription | undefined;
	private upstreamCancelled = false;
	private queue: Output[] = [];
	private queueHead = 0; // Index of first queued value (avoids O(n) shift)
	private downstreamDemand = Demand.none;
	private terminal: PendingTerminal<Failure> | undefined;
	// Work-in-progress flag: nested drains only mark `missed`
	private draining = false;
	private missed = false;
	private overflowing = false;
	private reentrantOverflows = 0;

	constructor(
		private readonly downstream: Subscriber<Output, Failure>,
		private readonly config: BufferConfig<Failure>,
	) {}

	private get queued(): number {
		return this.queue.length - this.queueHead;
	}

	// --- upstream facet ---

	receiveSubscription(subscription: Subscription): void {
		if (this.state !== "awaitingSubscription") {
			debugBuffer("[%s] cancelling extra upstream subscription", this.config.name);
			subscription.cancel();
			return;
		}

		this.state = "ready";
		this.upstream = subscription;
		const initial =
			this.config.prefetch === "keepFull"
				? Demand.max(this.config.size)
				: Demand.unlimited;
		debugBuffer("[%s] requesting %s from upstream", this.config.name, initial);

		// Nothing reaches downstream before it holds its subscription
		this.draining = true;
		try {
			subscription.request(initial);
			this.downstream.receiveSubscription(this);
		} finally {
			this.draining = false;
		}
		if (this.missed) this.drain();
	}

	receive(value: Output): Demand {
		if (this.overflowing) {
			this.reentrantOverflows++;
			if (debugBuffer.enabled) {
				debugBuffer(
					"[%s] value re-entered overflow handling (#%d), ignoring",
					this.config.name,
					this.reentrantOverflows,
				);
			}
			this.config.logger.warn(
				"value received while handling an overflow, ignored (%d so far)",
				this.reentrantOverflows,
			);
			return Demand.none;
		}

		switch (this.state) {
			case "awaitingSubscription":
				throw new ContractViolationError(
					`${this.config.name} received a value before its subscription`,
				);
			case "cancelled":
				return Demand.none;
			case "finished":
				if (this.upstreamCancelled) return Demand.none;
				throw new ContractViolationError(
					`${this.config.name} received a value after completion`,
				);
			case "ready":
				break;
		}

		if (this.terminal !== undefined) {
			// Stragglers after our own cancellation are expected
			if (this.upstreamCancelled) return Demand.none;
			throw new ContractViolationError(
				`${this.config.name} received a value after completion`,
			);
		}

		if (this.queued < this.config.size) {
			this.queue.push(value);
		} else {
			this.overflow(value);
		}

		this.drain();
		return Demand.none;
	}

	receiveCompletion(completion: Completion<Failure>): void {
		if (this.upstreamCancelled || this.state === "cancelled") return;

		if (this.state === "awaitingSubscription") {
			throw new ContractViolationError(
				`${this.config.name} received a completion before its subscription`,
			);
		}
		if (this.state === "finished" || this.terminal !== undefined) {
			throw new ContractViolationError(
				`${this.config.name} received more than one completion`,
			);
		}

		if (debugBuffer.enabled) {
			debugBuffer(
				"[%s] upstream %s with %d queued",
				this.config.name,
				completion.kind,
				this.queued,
			);
		}
		this.upstream = undefined;
		this.terminal = { completion, requiresDemand: this.queued > 0 };
		this.drain();
	}

	// --- downstream facet ---

	request(demand: Demand): void {
		if (this.state !== "ready") return;

		this.downstreamDemand = this.downstreamDemand.add(demand);
		if (
			this.config.prefetch === "byRequest" &&
			demand.isPositive &&
			this.upstream !== undefined
		) {
			this.upstream.request(demand);
		}
		this.drain();
	}

	cancel(): void {
		if (this.state === "finished" || this.state === "cancelled") return;
		debugBuffer("[%s] cancelled by downstream", this.config.name);
		this.state = "cancelled";
		this.cancelUpstream();
		this.release();
	}

	toString(): string {
		return this.config.name;
	}

	// --- internals ---

	private overflow(value: Output): void {
		const { whenFull } = this.config;

		if (whenFull === "dropNewest") {
			this.config.logger.debug("buffer full, dropped newest value");
			return;
		}

		if (whenFull === "dropOldest") {
			if (this.queued > 0) this.queueHead++;
			if (this.queued < this.config.size) this.queue.push(value);
			this.compact();
			this.config.logger.debug("buffer full, dropped oldest value");
			return;
		}

		this.failOnOverflow(whenFull.customError);
	}

	private failOnOverflow(makeError: () => Failure): void {
		this.overflowing = true;
		try {
			this.cancelUpstream();
			// The factory may push into this buffer again; the guard in
			// receive() turns those calls into no-ops
			const error = makeError();
			if (this.terminal === undefined) {
				this.terminal = {
					completion: Completion.failure(error),
					requiresDemand: this.queued > 0,
				};
			}
		} catch (error) {
			// Upstream is already gone and no failure could be made
			this.state = "cancelled";
			this.release();
			throw error;
		} finally {
			this.overflowing = false;
		}
		debugBuffer("[%s] overflow, failing downstream", this.config.name);
		this.config.logger.warn(
			"buffer of size %d overflowed, upstream cancelled",
			this.config.size,
		);
	}

	private drain(): void {
		if (this.draining) {
			this.missed = true;
			return;
		}
		this.draining = true;
		try {
			do {
				this.missed = false;
				this.drainOnce();
			} while (this.missed && this.state === "ready");
		} finally {
			this.draining = false;
		}
	}

	private drainOnce(): void {
		let delivered = 0;
		while (
			this.state === "ready" &&
			this.downstreamDemand.isPositive &&
			this.queued > 0
		) {
			const value = this.queue[this.queueHead++];
			this.compact();
			this.downstreamDemand = this.downstreamDemand.subtract(1);
			delivered++;
			const additional = this.downstream.receive(value);
			if (this.state !== "ready") return;
			this.downstreamDemand = this.downstreamDemand.add(additional);
		}
		if (this.state !== "ready") return;

		const terminal = this.terminal;
		if (
			terminal !== undefined &&
			this.queued === 0 &&
			(!terminal.requiresDemand || this.downstreamDemand.isPositive)
		) {
			this.finish(terminal.completion);
			return;
		}

		if (
			delivered > 0 &&
			this.config.prefetch === "keepFull" &&
			this.upstream !== undefined
		) {
			this.upstream.request(Demand.max(delivered));
		}
	}

	private finish(completion: Completion<Failure>): void {
		debugBuffer("[%s] delivering %s downstream", this.config.name, completion.kind);
		this.state = "finished";
		this.release();
		this.downstream.receiveCompletion(completion);
	}

	private cancelUpstream(): void {
		const upstream = this.upstream;
		this.upstream = undefined;
		if (upstream === undefined || this.upstreamCancelled) return;
		this.upstreamCancelled = true;
		upstream.cancel();
	}

	private release(): void {
		this.upstream = undefined;
		this.queue = [];
		this.queueHead = 0;
		this.terminal = undefined;
		this.downstreamDemand = Demand.none;
	}

	// Compact occasionally so evicted slots do not pile up
	private compact(): void {
		if (this.queueHead > 32 && this.queueHead > this.queue.length / 2) {
			this.queue = this.queue.slice(this.queueHead);
			this.queueHead = 0;
		}
	}
}
