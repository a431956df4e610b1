// SPDX-License-Identifier: MIT
// Circwait Type Definitions
// Resources, threads, lock events, graph entities, cycles and verdicts

//==============================================================================
// Resources and Events
//==============================================================================

export type ResourceKind = "mutex" | "semaphore" | "channel" | "rwlock" | "unknown";

export interface Resource {
	readonly id: string;
	readonly kind: ResourceKind;
	/** Declaring scope, e.g. the function a lock is local to */
	readonly scope?: string | undefined;
}

export interface SourceLocation {
	file?: string | undefined;
	line: number;
	column?: number | undefined;
	function?: string | undefined;
}

export type EventKind = "acquire" | "release" | "wait";

export interface LockEvent {
	readonly id: string;
	readonly threadId: string;
	readonly kind: EventKind;
	readonly resourceId: string;
	readonly location: SourceLocation;
}

export interface ThreadContext {
	readonly id: string;
	readonly events: readonly LockEvent[];
}

//==============================================================================
// Resource Allocation Graph
//==============================================================================

export interface ThreadNode {
	kind: "thread";
	id: string;
	threadId: string;
}

export interface ResourceNode {
	kind: "resource";
	id: string;
	resourceId: string;
	resourceKind: ResourceKind;
}

export type RagNode = ThreadNode | ResourceNode;

export type EdgeType = "holds" | "waits-for";

/**
 * Directed RAG edge. `holds` runs resource -> thread, `waits-for` runs
 * thread -> resource. `eventId` is the acquisition that produced it.
 */
export interface RagEdge {
	type: EdgeType;
	from: string;
	to: string;
	eventId: string;
}

export function threadNodeId(threadId: string): string {
	return "thread:" + threadId;
}

export function resourceNodeId(resourceId: string): string {
	return "resource:" + resourceId;
}

//==============================================================================
// Cycles
//==============================================================================

/** One thread's position in a circular wait */
export interface CycleLink {
	threadId: string;
	/** Resource the thread holds that the previous participant waits for */
	holds: string;
	/** Resource the thread waits for, held by the next participant */
	waitsFor: string;
	holdEventId: string;
	waitEventId: string;
}

export interface Cycle {
	/** Canonical id: node ids joined in canonical rotation */
	id: string;
	/** Alternating node ids, rotated to start at the smallest id */
	nodes: string[];
	threads: string[];
	resources: string[];
	links: CycleLink[];
	/** Number of thread participants */
	length: number;
}

//==============================================================================
// Verdicts
//==============================================================================

export type VerdictStatus = "plausible" | "implausible" | "confirmed" | "refuted" | "inconclusive";

export type AnalysisLevel = "static" | "control-flow" | "contextual" | "probabilistic" | "simulation";

export interface LevelVerdict {
	level: AnalysisLevel;
	status: VerdictStatus;
	confidence: number;
	rationale: string;
}

export type Severity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

//==============================================================================
// Ordering constraints
//==============================================================================

/** Declared lock-ordering rule: `before` must be acquired ahead of `after` */
export interface OrderingRule {
	before: string;
	after: string;
	source: "declared" | "inferred";
}

//==============================================================================
// Helpers
//==============================================================================

/** Get or create a Set in a Map */
export function getOrCreateSet<K, V>(map: Map<K, Set<V>>, key: K): Set<V> {
	let set = map.get(key);
	if (!set) { set = new Set(); map.set(key, set); }
	return set;
}

/** Get or create an array in a Map */
export function getOrCreateList<K, V>(map: Map<K, V[]>, key: K): V[] {
	let list = map.get(key);
	if (!list) { list = []; map.set(key, list); }
	return list;
}

export function clamp01(value: number): number {
	if (Number.isNaN(value)) return 0;
	return Math.min(1, Math.max(0, value));
}
