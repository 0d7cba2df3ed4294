/**
 * Sink subscriber for demand-streams - callbacks at the end of a pipeline
 */

import { Demand } from "./demand.js";
import type {
	Cancellable,
	Completion,
	Publisher,
	Subscriber,
	Subscription,
} from "./types.js";

export interface SinkOptions<Input, Failure> {
	/**
	 * Demand requested as soon as the subscription arrives.
	 * Default: unlimited
	 */
	demand?: Demand;
	receiveValue?: (value: Input) => void;
	receiveCompletion?: (completion: Completion<Failure>) => void;
}

/**
 * Handle returned by {@link sink}. `request` asks for more values when the
 * initial demand was finite.
 */
export interface SinkHandle extends Cancellable {
	request(demand: Demand): void;
}

/**
 * Attach callbacks to a publisher.
 *
 * @example
 * ```typescript
 * const handle = sink(buffered, {
 *   demand: Demand.max(1),
 *   receiveValue: (value) => {
 *     process(value)
 *     handle.request(Demand.max(1))
 *   },
 * })
 * ```
 */
export function sink<Input, Failure>(
	publisher: Publisher<Input, Failure>,
	options: SinkOptions<Input, Failure> = {},
): SinkHandle {
	const subscriber = new SinkSubscriber(options);
	publisher.subscribe(subscriber);
	return subscriber;
}

class SinkSubscriber<Input, Failure>
	implements Subscriber<Input, Failure>, SinkHandle
{
	private status: "pending" | "active" | "done" = "pending";
	private subscription: Subscription | undefined;

	constructor(private readonly options: SinkOptions<Input, Failure>) {}

	receiveSubscription(subscription: Subscription): void {
		if (this.status !== "pending") {
			subscription.cancel();
			return;
		}
		this.status = "active";
		this.subscription = subscription;
		subscription.request(this.options.demand ?? Demand.unlimited);
	}

	receive(value: Input): Demand {
		if (this.status === "active") {
			this.options.receiveValue?.(value);
		}
		return Demand.none;
	}

	receiveCompletion(completion: Completion<Failure>): void {
		if (this.status === "done") return;
		this.status = "done";
		this.subscription = undefined;
		this.options.receiveCompletion?.(completion);
	}

	request(demand: Demand): void {
		this.subscription?.request(demand);
	}

	cancel(): void {
		if (this.status === "done") return;
		this.status = "done";
		const subscription = this.subscription;
		this.subscription = undefined;
		subscription?.cancel();
	}
}
