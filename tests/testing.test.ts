/**
 * Tests for the testing utilities
 */

import { describe, expect, test } from "vitest";
import {
	Completion,
	ContractViolationError,
	Demand,
} from "../src/index.js";
import {
	ManualPublisher,
	RecordingSubscription,
	TrackingSubscriber,
} from "../src/testing/index.js";

describe("ManualPublisher", () => {
	test("throws without a subscriber", () => {
		const publisher = new ManualPublisher<number, Error>();

		expect(publisher.hasSubscriber).toBe(false);
		expect(() => publisher.send(1)).toThrow("ManualPublisher has no subscriber");
	});

	test("accepts a single subscriber", () => {
		const publisher = new ManualPublisher<number, Error>();
		publisher.subscribe(new TrackingSubscriber<number, Error>());

		expect(() =>
			publisher.subscribe(new TrackingSubscriber<number, Error>()),
		).toThrow(ContractViolationError);
	});

	test("returns the demand the subscriber grants", () => {
		const publisher = new ManualPublisher<number, Error>(
			new RecordingSubscription(),
		);
		publisher.subscribe(
			new TrackingSubscriber<number, Error>({
				initialDemand: Demand.max(1),
				receiveValueDemand: Demand.max(2),
			}),
		);

		expect(publisher.send(1).count).toBe(2);
	});
});

describe("RecordingSubscription", () => {
	test("records requests and cancellations in order", () => {
		const subscription = new RecordingSubscription();
		const requested: Demand[] = [];
		subscription.onRequest = (demand) => requested.push(demand);

		subscription.request(Demand.max(3));
		subscription.cancel();
		subscription.request(Demand.unlimited);

		expect(subscription.log).toEqual([
			"requested(max(3))",
			"cancelled",
			"requested(unlimited)",
		]);
		expect(requested).toEqual([Demand.max(3), Demand.unlimited]);
	});

	test("calls onCancel for every cancel", () => {
		const subscription = new RecordingSubscription("Upstream");
		let cancels = 0;
		subscription.onCancel = () => {
			cancels++;
		};

		subscription.cancel();
		subscription.cancel();

		expect(cancels).toBe(2);
		expect(subscription.log).toEqual(["cancelled", "cancelled"]);
		expect(String(subscription)).toBe("Upstream");
	});
});

describe("TrackingSubscriber", () => {
	test("throws on a value without outstanding demand", () => {
		const publisher = new ManualPublisher<number, Error>(
			new RecordingSubscription(),
		);
		publisher.subscribe(new TrackingSubscriber<number, Error>());

		expect(() => publisher.send(1)).toThrow(
			"value 1 received without outstanding demand",
		);
	});

	test("describes completions", () => {
		const publisher = new ManualPublisher<number, string>(
			new RecordingSubscription(),
		);
		const tracking = new TrackingSubscriber<number, string>();
		publisher.subscribe(tracking);

		publisher.sendCompletion(Completion.failure("timeout"));

		expect(tracking.log).toEqual([
			"subscription(RecordingSubscription)",
			"completion(failure(timeout))",
		]);
	});
});
