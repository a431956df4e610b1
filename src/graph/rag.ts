// SPDX-License-Identifier: MIT
// Circwait Resource Allocation Graph
// Arena of thread/resource nodes and typed edges, indexed by node id

import {
	getOrCreateSet,
	resourceNodeId,
	threadNodeId,
	type EdgeType,
	type RagEdge,
	type RagNode,
	type ResourceKind,
} from "../types.ts";

//==============================================================================
// Edge Keys
//==============================================================================

function edgeKey(type: EdgeType, from: string, to: string): string {
	return type + "|" + from + "|" + to;
}

//==============================================================================
// Resource Allocation Graph
//==============================================================================

/**
 * ResourceAllocationGraph stores nodes and edges in id-keyed tables.
 *
 * `holds` edges run resource -> thread and `waits-for` edges run
 * thread -> resource, so a circular wait is a directed cycle alternating
 * between the two node kinds. At most one edge of each type exists per
 * (from, to) pair.
 */
export class ResourceAllocationGraph {
	private readonly nodes = new Map<string, RagNode>();
	private readonly edgeTable = new Map<string, RagEdge>();
	private readonly outgoing = new Map<string, Set<string>>();

	//==========================================================================
	// Nodes
	//==========================================================================

	addThread(threadId: string): string {
		const id = threadNodeId(threadId);
		if (!this.nodes.has(id)) {
			this.nodes.set(id, { kind: "thread", id, threadId });
		}
		return id;
	}

	addResource(resourceId: string, resourceKind: ResourceKind = "mutex"): string {
		const id = resourceNodeId(resourceId);
		if (!this.nodes.has(id)) {
			this.nodes.set(id, { kind: "resource", id, resourceId, resourceKind });
		}
		return id;
	}

	getNode(id: string): RagNode | undefined {
		return this.nodes.get(id);
	}

	hasNode(id: string): boolean {
		return this.nodes.has(id);
	}

	/** Node ids in sorted order */
	nodeIds(): string[] {
		return [...this.nodes.keys()].sort();
	}

	get nodeCount(): number {
		return this.nodes.size;
	}

	//==========================================================================
	// Edges
	//==========================================================================

	/** Record that `threadId` holds `resourceId` */
	addHolds(resourceId: string, threadId: string, eventId: string): boolean {
		return this.addEdge({
			type: "holds",
			from: resourceNodeId(resourceId),
			to: threadNodeId(threadId),
			eventId,
		});
	}

	removeHolds(resourceId: string, threadId: string): boolean {
		return this.removeEdge("holds", resourceNodeId(resourceId), threadNodeId(threadId));
	}

	/** Record that `threadId` is blocked waiting for `resourceId` */
	addWaitsFor(threadId: string, resourceId: string, eventId: string): boolean {
		return this.addEdge({
			type: "waits-for",
			from: threadNodeId(threadId),
			to: resourceNodeId(resourceId),
			eventId,
		});
	}

	removeWaitsFor(threadId: string, resourceId: string): boolean {
		return this.removeEdge("waits-for", threadNodeId(threadId), resourceNodeId(resourceId));
	}

	getEdge(type: EdgeType, from: string, to: string): RagEdge | undefined {
		return this.edgeTable.get(edgeKey(type, from, to));
	}

	/** All edges, sorted by (type, from, to) */
	edges(): RagEdge[] {
		return [...this.edgeTable.entries()]
			.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
			.map(([, edge]) => edge);
	}

	get edgeCount(): number {
		return this.edgeTable.size;
	}

	/** Sorted successor node ids */
	successors(nodeId: string): string[] {
		const out = this.outgoing.get(nodeId);
		return out ? [...out].sort() : [];
	}

	/** Thread ids currently holding a resource */
	holdersOf(resourceId: string): string[] {
		return this.successors(resourceNodeId(resourceId)).flatMap((id) => {
			const node = this.nodes.get(id);
			return node?.kind === "thread" ? [node.threadId] : [];
		});
	}

	/** Resource ids a thread is blocked on */
	waitingOn(threadId: string): string[] {
		return this.successors(threadNodeId(threadId)).flatMap((id) => {
			const node = this.nodes.get(id);
			return node?.kind === "resource" ? [node.resourceId] : [];
		});
	}

	private addEdge(edge: RagEdge): boolean {
		const key = edgeKey(edge.type, edge.from, edge.to);
		if (this.edgeTable.has(key)) return false;
		this.edgeTable.set(key, edge);
		getOrCreateSet(this.outgoing, edge.from).add(edge.to);
		return true;
	}

	private removeEdge(type: EdgeType, from: string, to: string): boolean {
		if (!this.edgeTable.delete(edgeKey(type, from, to))) return false;
		const out = this.outgoing.get(from);
		out?.delete(to);
		if (out?.size === 0) this.outgoing.delete(from);
		return true;
	}

	//==========================================================================
	// Snapshots
	//==========================================================================

	/**
	 * Deterministic textual form of the graph. Two graphs with equal keys
	 * have identical nodes and edges.
	 */
	structuralKey(): string {
		const nodes = this.nodeIds().map((id) => {
			const node = this.nodes.get(id);
			return node?.kind === "resource" ? id + "(" + node.resourceKind + ")" : id;
		});
		const edges = this.edges().map((e) => edgeKey(e.type, e.from, e.to) + "@" + e.eventId);
		return nodes.join(",") + ";" + edges.join(",");
	}

	equals(other: ResourceAllocationGraph): boolean {
		return this.structuralKey() === other.structuralKey();
	}

	/** Independent copy of this graph */
	clone(): ResourceAllocationGraph {
		const copy = new ResourceAllocationGraph();
		for (const node of this.nodes.values()) copy.nodes.set(node.id, { ...node });
		for (const edge of this.edgeTable.values()) copy.addEdge({ ...edge });
		return copy;
	}

	/**
	 * Render the graph as plain text: threads with the resources they wait
	 * for, resources with the threads holding them, then every edge.
	 */
	renderAscii(): string {
		const lines = ["RESOURCE ALLOCATION GRAPH", "", "THREADS:"];
		const threads = this.nodeIds().flatMap((id) => {
			const node = this.nodes.get(id);
			return node?.kind === "thread" ? [node] : [];
		});
		for (const t of threads) {
			const waits = this.waitingOn(t.threadId);
			lines.push(waits.length > 0 ? `  ${t.threadId} -> [${waits.join(", ")}]` : `  ${t.threadId}`);
		}
		lines.push("", "RESOURCES:");
		const resources = this.nodeIds().flatMap((id) => {
			const node = this.nodes.get(id);
			return node?.kind === "resource" ? [node] : [];
		});
		for (const r of resources) {
			const holders = this.holdersOf(r.resourceId);
			const label = `${r.resourceId} (${r.resourceKind})`;
			lines.push(holders.length > 0 ? `  ${label} -> [${holders.join(", ")}]` : `  ${label}`);
		}
		lines.push("", "EDGES:");
		for (const e of this.edges()) {
			lines.push(`  ${e.from} -[${e.type}]-> ${e.to}`);
		}
		return lines.join("\n");
	}
}
