// SPDX-License-Identifier: MIT
// Circwait Resource Allocation Graph - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ResourceAllocationGraph } from "../src/graph/rag.ts";

function twoThreadDeadlock(): ResourceAllocationGraph {
	const rag = new ResourceAllocationGraph();
	rag.addThread("T1");
	rag.addThread("T2");
	rag.addResource("A");
	rag.addResource("B", "semaphore");
	rag.addHolds("A", "T1", "T1#0");
	rag.addHolds("B", "T2", "T2#0");
	rag.addWaitsFor("T1", "B", "T1#1");
	rag.addWaitsFor("T2", "A", "T2#1");
	return rag;
}

describe("ResourceAllocationGraph nodes", () => {
	it("namespaces thread and resource ids", () => {
		const rag = new ResourceAllocationGraph();
		assert.equal(rag.addThread("T1"), "thread:T1");
		assert.equal(rag.addResource("A"), "resource:A");
		assert.deepEqual(rag.getNode("resource:A"), { kind: "resource", id: "resource:A", resourceId: "A", resourceKind: "mutex" });
	});

	it("keeps the first registration of a node", () => {
		const rag = new ResourceAllocationGraph();
		rag.addResource("A", "channel");
		rag.addResource("A", "mutex");
		assert.equal(rag.nodeCount, 1);
		const node = rag.getNode("resource:A");
		assert.equal(node?.kind === "resource" ? node.resourceKind : undefined, "channel");
	});

	it("lists node ids sorted", () => {
		assert.deepEqual(twoThreadDeadlock().nodeIds(), ["resource:A", "resource:B", "thread:T1", "thread:T2"]);
	});
});

describe("ResourceAllocationGraph edges", () => {
	it("directs holds from resource to thread and waits-for from thread to resource", () => {
		const rag = twoThreadDeadlock();
		assert.deepEqual(rag.successors("resource:A"), ["thread:T1"]);
		assert.deepEqual(rag.successors("thread:T1"), ["resource:B"]);
		assert.deepEqual(rag.getEdge("holds", "resource:A", "thread:T1"), {
			type: "holds", from: "resource:A", to: "thread:T1", eventId: "T1#0",
		});
	});

	it("rejects a duplicate edge of the same type", () => {
		const rag = twoThreadDeadlock();
		assert.equal(rag.addHolds("A", "T1", "T1#5"), false);
		assert.equal(rag.edgeCount, 4);
		assert.equal(rag.getEdge("holds", "resource:A", "thread:T1")?.eventId, "T1#0");
	});

	it("removes edges and their adjacency", () => {
		const rag = twoThreadDeadlock();
		assert.equal(rag.removeWaitsFor("T1", "B"), true);
		assert.equal(rag.removeWaitsFor("T1", "B"), false);
		assert.deepEqual(rag.successors("thread:T1"), []);
		assert.equal(rag.edgeCount, 3);
	});

	it("answers holder and waiter queries", () => {
		const rag = twoThreadDeadlock();
		assert.deepEqual(rag.holdersOf("B"), ["T2"]);
		assert.deepEqual(rag.waitingOn("T2"), ["A"]);
		assert.deepEqual(rag.waitingOn("T3"), []);
	});

	it("lists edges sorted by type, source and target", () => {
		assert.deepEqual(
			twoThreadDeadlock().edges().map((e) => `${e.type} ${e.from} ${e.to}`),
			[
				"holds resource:A thread:T1",
				"holds resource:B thread:T2",
				"waits-for thread:T1 resource:B",
				"waits-for thread:T2 resource:A",
			],
		);
	});
});

describe("ResourceAllocationGraph snapshots", () => {
	it("considers graphs built in different orders equal", () => {
		const other = new ResourceAllocationGraph();
		other.addResource("B", "semaphore");
		other.addResource("A");
		other.addThread("T2");
		other.addThread("T1");
		other.addWaitsFor("T2", "A", "T2#1");
		other.addWaitsFor("T1", "B", "T1#1");
		other.addHolds("B", "T2", "T2#0");
		other.addHolds("A", "T1", "T1#0");
		assert.equal(twoThreadDeadlock().equals(other), true);
	});

	it("clones into an independent graph", () => {
		const rag = twoThreadDeadlock();
		const copy = rag.clone();
		copy.removeHolds("A", "T1");
		assert.equal(rag.edgeCount, 4);
		assert.equal(copy.edgeCount, 3);
		assert.equal(rag.equals(copy), false);
	});

	it("renders a text view", () => {
		assert.equal(twoThreadDeadlock().renderAscii(), [
			"RESOURCE ALLOCATION GRAPH",
			"",
			"THREADS:",
			"  T1 -> [B]",
			"  T2 -> [A]",
			"",
			"RESOURCES:",
			"  A (mutex) -> [T1]",
			"  B (semaphore) -> [T2]",
			"",
			"EDGES:",
			"  resource:A -[holds]-> thread:T1",
			"  resource:B -[holds]-> thread:T2",
			"  thread:T1 -[waits-for]-> resource:B",
			"  thread:T2 -[waits-for]-> resource:A",
		].join("\n"));
	});
});
