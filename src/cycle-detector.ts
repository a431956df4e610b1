// SPDX-License-Identifier: MIT
// Circwait Cycle Detector
// Elementary circular-wait enumeration over the Resource Allocation Graph

import type { Logger } from "./config.ts";
import type { ResourceAllocationGraph } from "./graph/rag.ts";
import { compareIds, isNontrivial, stronglyConnectedComponents, type Successors } from "./graph/scc.ts";
import type { Cycle, CycleLink } from "./types.ts";

//==============================================================================
// Options and Results
//==============================================================================

export interface CycleDetectionOptions {
	/** Maximum thread participants per reported cycle (default: 8) */
	maxCycleLength?: number;
	/** Maximum cycles returned (default: 256) */
	maxCycles?: number;
	logger?: Logger;
}

export interface CycleDetectionResult {
	cycles: Cycle[];
	/** Set when a cap stopped the enumeration before it was complete */
	truncated: boolean;
	/** Nontrivial strongly connected components of the graph */
	components: string[][];
}

//==============================================================================
// Search State
//==============================================================================

interface CircuitSearch {
	start: string;
	members: Set<string>;
	successors: Successors;
	blocked: Set<string>;
	blockMap: Map<string, Set<string>>;
	path: string[];
	maxNodes: number;
	maxCycles: number;
	found: string[][];
	truncated: boolean;
	/** Set once the cycle cap is reached; unwinds the search */
	stopped: boolean;
}

//==============================================================================
// Cycle Detection
//==============================================================================

/**
 * Find every elementary cycle of the graph.
 *
 * Runs Johnson's circuit enumeration: for each node `s` in id order, the
 * strongly connected component containing `s` within the subgraph of nodes
 * not smaller than `s` is searched for circuits through `s`. Every circuit is
 * therefore found exactly once, already rotated to start at its smallest id.
 */
export function findCycles(
	rag: ResourceAllocationGraph,
	options: CycleDetectionOptions = {},
): CycleDetectionResult {
	const maxCycleLength = options.maxCycleLength ?? 8;
	const maxCycles = options.maxCycles ?? 256;
	const logger = options.logger ?? console;
	const nodes = rag.nodeIds();
	const all: Successors = (id) => rag.successors(id);

	const components = stronglyConnectedComponents(nodes, all)
		.filter((c) => isNontrivial(c, all));
	const inCycle = new Set(components.flat());

	const found: string[][] = [];
	let truncated = false;

	for (const start of nodes) {
		if (!inCycle.has(start)) continue;
		const members = componentOf(start, nodes, all, inCycle);
		if (!members) continue;

		const search: CircuitSearch = {
			start, members, successors: all,
			blocked: new Set(), blockMap: new Map(), path: [],
			maxNodes: maxCycleLength * 2, maxCycles,
			found, truncated: false, stopped: false,
		};
		circuit(search, start);
		truncated ||= search.truncated;
		if (search.stopped) break;
	}

	if (truncated) {
		logger.warn(`[CycleDetector] Enumeration truncated at ${found.length} cycles (maxCycles=${maxCycles}, maxCycleLength=${maxCycleLength})`);
	}

	return {
		cycles: found.map((path) => toCycle(rag, path)),
		truncated,
		components,
	};
}

/**
 * Members of the strongly connected component containing `start` in the
 * subgraph induced by cycle-carrying nodes not smaller than `start`.
 */
function componentOf(
	start: string,
	nodes: readonly string[],
	all: Successors,
	inCycle: Set<string>,
): Set<string> | null {
	const allowed = nodes.filter((n) => inCycle.has(n) && compareIds(n, start) >= 0);
	const allowedSet = new Set(allowed);
	const restricted: Successors = (id) => all(id).filter((n) => allowedSet.has(n));
	const component = stronglyConnectedComponents(allowed, restricted)
		.find((c) => c.includes(start));
	if (!component || !isNontrivial(component, restricted)) return null;
	return new Set(component);
}

function neighbours(search: CircuitSearch, node: string): string[] {
	return search.successors(node).filter((n) => search.members.has(n));
}

/**
 * Johnson's CIRCUIT procedure. A path cut off by the length cap counts as
 * having found a circuit so its nodes are unblocked and no shorter circuit
 * through them is lost.
 */
function circuit(search: CircuitSearch, node: string): boolean {
	let found = false;
	search.path.push(node);
	search.blocked.add(node);

	for (const next of neighbours(search, node)) {
		if (search.stopped) break;
		if (next === search.start) {
			record(search);
			found = true;
		} else if (search.path.length >= search.maxNodes) {
			if (!search.blocked.has(next) && reachesStart(search, next)) search.truncated = true;
			found = true;
		} else if (!search.blocked.has(next) && circuit(search, next)) {
			found = true;
		}
	}

	if (found) {
		unblock(search, node);
	} else {
		for (const next of neighbours(search, node)) {
			let set = search.blockMap.get(next);
			if (!set) { set = new Set(); search.blockMap.set(next, set); }
			set.add(node);
		}
	}
	search.path.pop();
	return found;
}

function unblock(search: CircuitSearch, node: string): void {
	search.blocked.delete(node);
	const dependents = search.blockMap.get(node);
	if (!dependents) return;
	search.blockMap.delete(node);
	for (const w of dependents) {
		if (search.blocked.has(w)) unblock(search, w);
	}
}

function record(search: CircuitSearch): void {
	// Single-thread loops (a thread waiting on what it holds) are not circular waits
	if (search.path.length < 4) return;
	if (search.found.length >= search.maxCycles) {
		search.truncated = true;
		search.stopped = true;
		return;
	}
	search.found.push([...search.path]);
}

/**
 * Whether `from` reaches the start node without revisiting the current path,
 * i.e. whether a longer elementary circuit was cut off by the length cap.
 */
function reachesStart(search: CircuitSearch, from: string): boolean {
	const onPath = new Set(search.path);
	const seen = new Set<string>([from]);
	const queue = [from];
	while (queue.length > 0) {
		const node = queue.shift();
		if (node === undefined) break;
		for (const next of neighbours(search, node)) {
			if (next === search.start) return true;
			if (onPath.has(next) || seen.has(next)) continue;
			seen.add(next);
			queue.push(next);
		}
	}
	return false;
}

//==============================================================================
// Cycle Construction
//==============================================================================

/** Build a Cycle from a node path already in canonical rotation */
function toCycle(rag: ResourceAllocationGraph, path: string[]): Cycle {
	const threads: string[] = [];
	const resources: string[] = [];
	const links: CycleLink[] = [];
	const n = path.length;

	path.forEach((nodeId, i) => {
		const node = rag.getNode(nodeId);
		if (node?.kind === "resource") {
			resources.push(node.resourceId);
			return;
		}
		if (node?.kind !== "thread") return;
		threads.push(node.threadId);
		const prev = path[(i - 1 + n) % n] ?? "";
		const next = path[(i + 1) % n] ?? "";
		links.push({
			threadId: node.threadId,
			holds: resourceIdOf(rag, prev),
			waitsFor: resourceIdOf(rag, next),
			holdEventId: rag.getEdge("holds", prev, nodeId)?.eventId ?? "",
			waitEventId: rag.getEdge("waits-for", nodeId, next)?.eventId ?? "",
		});
	});

	return {
		id: path.join(">"),
		nodes: [...path],
		threads,
		resources,
		links,
		length: threads.length,
	};
}

function resourceIdOf(rag: ResourceAllocationGraph, nodeId: string): string {
	const node = rag.getNode(nodeId);
	return node?.kind === "resource" ? node.resourceId : nodeId;
}

//==============================================================================
// Descriptions
//==============================================================================

/** Generate a human-readable circular-wait description */
export function describeCycle(cycle: Cycle): string {
	const parts = cycle.links.map((link, i) => {
		const next = cycle.links[(i + 1) % cycle.links.length];
		return `thread "${link.threadId}" holds "${link.holds}" and waits for "${link.waitsFor}" held by thread "${next?.threadId ?? "?"}"`;
	});
	return "Circular wait: " + parts.join(", ") + ".";
}

/** Format a cycle as a compact arrow chain */
export function formatCycle(cycle: Cycle): string {
	return [...cycle.nodes, cycle.nodes[0] ?? ""].join(" -> ");
}
