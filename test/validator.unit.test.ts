// SPDX-License-Identifier: MIT
// Circwait Validator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { streamFromEvents, validateEventStream } from "../src/validator.ts";
import { classicInversion, events } from "./fixtures.ts";

describe("validateEventStream", () => {
	it("assigns per-thread event ids and a default location", () => {
		const result = validateEventStream(classicInversion());
		if (!result.valid) assert.fail("expected a valid stream");
		assert.deepEqual(
			result.value.events.slice(0, 4).map((e) => e.id),
			["T1#0", "T2#0", "T1#1", "T2#1"],
		);
		assert.deepEqual(result.value.events[0]?.location, { line: 0 });
		assert.deepEqual(result.value.resources, []);
	});

	it("keeps ids and locations given by the front-end", () => {
		const result = validateEventStream({
			events: [{ id: "e1", threadId: "T1", kind: "acquire", resourceId: "A", location: { file: "a.c", line: 7 } }],
		});
		if (!result.valid) assert.fail("expected a valid stream");
		assert.equal(result.value.events[0]?.id, "e1");
		assert.deepEqual(result.value.events[0]?.location, { file: "a.c", line: 7 });
	});

	it("reports schema errors with their path", () => {
		const result = validateEventStream({ events: [{ threadId: "T1", kind: "grab", resourceId: "A" }] });
		if (result.valid) assert.fail("expected an invalid stream");
		assert.equal(result.errors[0]?.path, "/events[0]/kind");
	});

	it("rejects input that is not an object", () => {
		const result = validateEventStream("events");
		if (result.valid) assert.fail("expected an invalid stream");
		assert.equal(result.errors[0]?.path, "/");
	});

	it("rejects duplicate event ids", () => {
		const result = validateEventStream({
			events: [
				{ id: "x", threadId: "T1", kind: "acquire", resourceId: "A" },
				{ id: "x", threadId: "T2", kind: "acquire", resourceId: "B" },
			],
		});
		if (result.valid) assert.fail("expected an invalid stream");
		assert.deepEqual(result.errors, [{ path: "/events[1]/id", message: "Duplicate event id", value: "x" }]);
	});

	it("rejects duplicate resource declarations", () => {
		const result = validateEventStream({
			resources: [{ id: "A" }, { id: "A", kind: "semaphore" }],
			events: events(["T1", "acquire", "A"]),
		});
		if (result.valid) assert.fail("expected an invalid stream");
		assert.equal(result.errors[0]?.path, "/resources[1]/id");
	});

	it("accepts an empty event list; emptiness is the builder's concern", () => {
		assert.equal(validateEventStream({ events: [] }).valid, true);
	});
});

describe("streamFromEvents", () => {
	it("wraps normalized events without declarations", () => {
		const stream = streamFromEvents([
			{ id: "a", threadId: "T1", kind: "acquire", resourceId: "A", location: { line: 1 } },
		]);
		assert.equal(stream.events.length, 1);
		assert.deepEqual(stream.resources, []);
		assert.equal(stream.facts, undefined);
	});
});
