// SPDX-License-Identifier: MIT
// Circwait Pattern Signatures - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { silentLogger } from "../src/config.ts";
import { findCycles } from "../src/cycle-detector.ts";
import { buildGraph } from "../src/graph/builder.ts";
import { canonicalKinds, classifyPattern, computeSignature, type PatternSignature } from "../src/signature.ts";
import type { EventStreamInput } from "../src/zod-schemas.ts";
import { classicInversion, events, parse, threeThreadRing } from "./fixtures.ts";

function signatureOf(input: EventStreamInput): PatternSignature {
	const build = buildGraph(parse(input), { logger: silentLogger });
	const [cycle] = findCycles(build.rag, { logger: silentLogger }).cycles;
	if (!cycle) throw new Error("fixture has no cycle");
	return computeSignature(cycle, build);
}

describe("computeSignature", () => {
	it("fingerprints the classic inversion", () => {
		const signature = signatureOf(classicInversion());
		assert.equal(signature.pattern, "classic-two-thread");
		assert.deepEqual(signature.kinds, ["mutex", "mutex"]);
		assert.deepEqual(signature.features, {
			length: 2,
			distinctKinds: 1,
			maxNesting: 2,
			sharedScope: false,
			waitLinks: 0,
		});
		assert.match(signature.key, /^circwait-sha256:[0-9a-f]{32}$/);
	});

	it("ignores thread and resource names", () => {
		const renamed = signatureOf({
			events: events(
				["worker", "acquire", "P"],
				["reader", "acquire", "Q"],
				["worker", "acquire", "Q"],
				["reader", "acquire", "P"],
				["worker", "release", "Q"],
				["worker", "release", "P"],
				["reader", "release", "P"],
				["reader", "release", "Q"],
			),
		});
		assert.equal(renamed.key, signatureOf(classicInversion()).key);
	});

	it("classifies a homogeneous ring as dining philosophers", () => {
		assert.equal(signatureOf(threeThreadRing()).pattern, "dining-philosophers");
	});

	it("classifies mixed kinds and canonicalizes their order", () => {
		const signature = signatureOf({
			...threeThreadRing(),
			resources: [{ id: "A", kind: "mutex" }, { id: "B", kind: "semaphore" }, { id: "C", kind: "channel" }],
		});
		assert.equal(signature.pattern, "mixed-kind");
		assert.deepEqual(signature.kinds, ["channel", "mutex", "semaphore"]);
		assert.equal(signature.features.distinctKinds, 3);
	});

	it("counts links that block on a wait", () => {
		const signature = signatureOf({
			events: events(
				["T1", "acquire", "A"],
				["T2", "acquire", "B"],
				["T1", "wait", "B"],
				["T2", "acquire", "A"],
			),
		});
		assert.equal(signature.features.waitLinks, 1);
		assert.notEqual(signature.key, signatureOf(classicInversion()).key);
	});

	it("notices resources declared in one scope", () => {
		const signature = signatureOf({
			...classicInversion(),
			resources: [{ id: "A", scope: "transfer" }, { id: "B", scope: "transfer" }],
		});
		assert.equal(signature.features.sharedScope, true);
	});
});

describe("canonicalKinds", () => {
	it("is invariant under rotation and reversal", () => {
		const expected = canonicalKinds(["mutex", "rwlock", "semaphore"]);
		assert.deepEqual(canonicalKinds(["rwlock", "semaphore", "mutex"]), expected);
		assert.deepEqual(canonicalKinds(["semaphore", "rwlock", "mutex"]), expected);
		assert.deepEqual(expected, ["mutex", "rwlock", "semaphore"]);
	});
});

describe("classifyPattern", () => {
	it("prefers nested acquisition over the thread count", () => {
		assert.equal(classifyPattern({ length: 2, distinctKinds: 1, maxNesting: 3, sharedScope: false, waitLinks: 0 }), "nested-acquisition");
	});

	it("falls back to generic for a single participant", () => {
		assert.equal(classifyPattern({ length: 1, distinctKinds: 1, maxNesting: 1, sharedScope: false, waitLinks: 0 }), "generic");
	});
});
