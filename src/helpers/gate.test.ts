import assert from "node:assert/strict";
import { test } from "node:test";
import { setTimeout as delay } from "node:timers/promises";

import { HydrationAbortedError } from "./errors.ts";
import { Gate } from "./gate.ts";

test("Gate: runs up to its capacity at once", async () => {
	const gate = new Gate(2);
	let active = 0;
	let peak = 0;

	const task = async (value: number) => {
		active++;
		peak = Math.max(peak, active);
		await delay(5);
		active--;
		return value;
	};

	const results = await Promise.all([1, 2, 3, 4, 5].map((value) => gate.run(() => task(value))));

	assert.deepStrictEqual(results, [1, 2, 3, 4, 5]);
	assert.strictEqual(peak, 2);
	assert.strictEqual(gate.peak, 2);
	assert.strictEqual(gate.active, 0);
	assert.strictEqual(gate.pending, 0);
});

test("Gate: queues tasks beyond its capacity", async () => {
	const gate = new Gate(1);

	const first = gate.run(() => delay(5));
	const second = gate.run(() => "second");

	assert.strictEqual(gate.active, 1);
	assert.strictEqual(gate.pending, 1);

	await first;
	assert.strictEqual(await second, "second");
	assert.strictEqual(gate.active, 0);
});

test("Gate: grants slots in order", async () => {
	const gate = new Gate(1);
	const order: number[] = [];

	await Promise.all([1, 2, 3].map((value) => gate.run(() => order.push(value))));

	assert.deepStrictEqual(order, [1, 2, 3]);
});

test("Gate: releases the slot when a task fails", async () => {
	const gate = new Gate(1);

	await assert.rejects(
		gate.run(() => {
			throw new Error("failed");
		}),
		{ message: "failed" },
	);
	await assert.rejects(gate.run(() => Promise.reject(new Error("rejected"))), { message: "rejected" });

	assert.strictEqual(gate.active, 0);
	assert.strictEqual(await gate.run(() => "after"), "after");
});

test("Gate: does not start tasks when the signal is already aborted", async () => {
	const gate = new Gate(1);
	const controller = new AbortController();
	const reason = new Error("stop");
	controller.abort(reason);
	let called = false;

	await assert.rejects(
		gate.run(() => {
			called = true;
		}, controller.signal),
		(error: Error) => {
			assert.ok(error instanceof HydrationAbortedError);
			assert.strictEqual(error.cause, reason);
			return true;
		},
	);
	assert.strictEqual(called, false);
	assert.strictEqual(gate.active, 0);
});

test("Gate: drops waiting tasks when their signal aborts", async () => {
	const gate = new Gate(1);
	const controller = new AbortController();
	const started: string[] = [];

	const running = gate.run(async () => {
		started.push("running");
		await delay(5);
	});
	const waiting = gate.run(() => {
		started.push("waiting");
	}, controller.signal);
	const unaffected = gate.run(() => {
		started.push("unaffected");
	});

	assert.strictEqual(gate.pending, 2);
	controller.abort();
	assert.strictEqual(gate.pending, 1);

	await assert.rejects(waiting, HydrationAbortedError);
	await running;
	await unaffected;

	assert.deepStrictEqual(started, ["running", "unaffected"]);
});

test("Gate: aborting does not affect a task that has started", async () => {
	const gate = new Gate(1);
	const controller = new AbortController();

	const result = await gate.run(async () => {
		controller.abort();
		await delay(1);
		return "done";
	}, controller.signal);

	assert.strictEqual(result, "done");
});
