// SPDX-License-Identifier: MIT
// Circwait Lock-Order Graph Builder - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { silentLogger } from "../src/config.ts";
import { MalformedEventError } from "../src/errors.ts";
import { buildLockOrderGraph } from "../src/graph/lock-order.ts";
import { events, parse, sequentialInversion } from "./fixtures.ts";

const quiet = { logger: silentLogger };

describe("buildLockOrderGraph", () => {
	it("records nested acquisitions of threads that never overlapped in time", () => {
		const result = buildLockOrderGraph(parse(sequentialInversion()), quiet);
		assert.deepEqual(result.rag.edges().map((e) => `${e.from} -[${e.type}]-> ${e.to} @${e.eventId}`), [
			"resource:A -[holds]-> thread:T1 @T1#0",
			"resource:B -[holds]-> thread:T2 @T2#0",
			"thread:T1 -[waits-for]-> resource:B @T1#1",
			"thread:T2 -[waits-for]-> resource:A @T2#1",
		]);
		assert.equal(result.blocked.size, 0);
	});

	it("adds a holds edge from every resource held at the nested acquisition", () => {
		const result = buildLockOrderGraph(parse({
			events: events(
				["T1", "acquire", "A"],
				["T1", "acquire", "B"],
				["T1", "acquire", "C"],
			),
		}), quiet);
		assert.deepEqual(result.rag.holdersOf("A"), ["T1"]);
		assert.deepEqual(result.rag.holdersOf("B"), ["T1"]);
		assert.equal(result.rag.getEdge("holds", "resource:B", "thread:T1")?.eventId, "T1#1");
		assert.deepEqual(result.rag.waitingOn("T1"), ["B", "C"]);
	});

	it("adds no edges for a top-level acquisition", () => {
		const result = buildLockOrderGraph(parse({
			events: events(["T1", "acquire", "A"], ["T1", "release", "A"], ["T1", "acquire", "B"]),
		}), quiet);
		assert.equal(result.rag.edgeCount, 0);
	});

	it("collects a malformed thread's error and keeps its earlier edges", () => {
		const result = buildLockOrderGraph(parse({
			events: events(
				["T1", "acquire", "A"],
				["T1", "acquire", "B"],
				["T1", "release", "C"],
				["T1", "acquire", "D"],
			),
		}), quiet);
		assert.equal(result.errors.length, 1);
		assert.equal(result.errors[0]?.reason, "release-unheld");
		assert.deepEqual(result.rag.waitingOn("T1"), ["B"]);
	});

	it("throws in strict mode", () => {
		assert.throws(
			() => buildLockOrderGraph(parse({ events: events(["T1", "release", "A"]) }), { strict: true, logger: silentLogger }),
			MalformedEventError,
		);
	});
});
