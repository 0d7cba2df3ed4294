/**
 * Source publishers for demand-streams
 */

import createDebug from "debug";
import { Demand } from "./demand.js";
import {
	Completion,
	type Publisher,
	type Subscriber,
	type Subscription,
} from "./types.js";

const debugSource = createDebug("demand-streams:source");

class EmptySubscription implements Subscription {
	request(): void {}
	cancel(): void {}
	toString(): string {
		return "Empty";
	}
}

/**
 * A subscription with nothing behind it, for publishers that complete as
 * soon as they are subscribed to.
 */
export const emptySubscription: Subscription = new EmptySubscription();

/**
 * Emit the items of an iterable within the subscriber's demand, then finish.
 *
 * The iterable is read lazily, one item ahead, so the completion follows the
 * last item without waiting for another request. Requests made from inside
 * `receive` are folded into the running loop instead of recursing.
 *
 * @example
 * ```typescript
 * sink(from([1, 2, 3]), {
 *   receiveValue: (value) => console.log(value),
 *   receiveCompletion: (completion) => console.log(completion.kind),
 * })
 * // 1, 2, 3, finished
 * ```
 */
export function from<Output, Failure = never>(
	iterable: Iterable<Output>,
): Publisher<Output, Failure> {
	return {
		subscribe(subscriber: Subscriber<Output, Failure>): void {
			const subscription = new IterableSubscription(
				subscriber,
				iterable[Symbol.iterator](),
			);
			subscriber.receiveSubscription(subscription);
			subscription.completeIfExhausted();
		},
	};
}

/**
 * Complete immediately with a failure.
 */
export function fail<Output, Failure>(
	error: Failure,
): Publisher<Output, Failure> {
	return {
		subscribe(subscriber: Subscriber<Output, Failure>): void {
			subscriber.receiveSubscription(emptySubscription);
			subscriber.receiveCompletion(Completion.failure(error));
		},
	};
}

/**
 * Complete immediately without emitting anything.
 */
export function empty<Output, Failure = never>(): Publisher<Output, Failure> {
	return {
		subscribe(subscriber: Subscriber<Output, Failure>): void {
			subscriber.receiveSubscription(emptySubscription);
			subscriber.receiveCompletion(Completion.finished);
		},
	};
}

class IterableSubscription<Output, Failure> implements Subscription {
	private demand = Demand.none;
	private next: IteratorResult<Output> | undefined;
	private emitting = false;
	private done = false;

	constructor(
		private readonly subscriber: Subscriber<Output, Failure>,
		private readonly iterator: Iterator<Output>,
	) {}

	request(demand: Demand): void {
		if (this.done) return;
		this.demand = this.demand.add(demand);
		if (this.emitting) return;

		this.emitting = true;
		try {
			this.emit();
		} finally {
			this.emitting = false;
		}
	}

	cancel(): void {
		if (this.done) return;
		debugSource("iterable subscription cancelled");
		this.done = true;
		this.iterator.return?.();
	}

	completeIfExhausted(): void {
		if (this.done || this.emitting) return;
		if (this.peek().done) this.complete();
	}

	toString(): string {
		return "Iterable";
	}

	private emit(): void {
		while (!this.done) {
			const next = this.peek();
			if (next.done) {
				this.complete();
				return;
			}
			if (!this.demand.isPositive) return;

			this.next = undefined;
			this.demand = this.demand.subtract(1);
			const additional = this.subscriber.receive(next.value);
			this.demand = this.demand.add(additional);
		}
	}

	private peek(): IteratorResult<Output> {
		if (this.next === undefined) {
			this.next = this.iterator.next();
		}
		return this.next;
	}

	private complete(): void {
		this.done = true;
		debugSource("iterable exhausted");
		this.subscriber.receiveCompletion(Completion.finished);
	}
}
