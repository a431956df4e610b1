// SPDX-License-Identifier: MIT
// Circwait Control-Flow Facts
// Reachability relation supplied by the source-analysis front-end

import type { LockEvent } from "./types.ts";
import type { ControlFlowFactsInput } from "./zod-schemas.ts";

//==============================================================================
// Fact Interface
//==============================================================================

/**
 * Control-flow facts consulted by the analyzer. Implementations must be
 * pure: the same question always gets the same answer.
 */
export interface ControlFlowFacts {
	/** Whether some syntactic path from program entry reaches the event */
	reachableFromEntry(eventId: string): boolean;
	/** Whether `to` can execute after `from` on one control-flow path */
	reachable(from: string, to: string): boolean;
}

//==============================================================================
// Fact Table
//==============================================================================

interface EventPosition {
	threadId: string;
	index: number;
}

function pairKey(a: string, b: string): string {
	return a + "\u0000" + b;
}

/**
 * Fact table backed by the stream's `facts` section.
 *
 * Without explicit facts it is permissive: every event is reachable from
 * entry and a later event of the same thread is reachable from an earlier
 * one. Explicit `exclusive` pairs override program order; explicit
 * `reachable` pairs extend it.
 */
export class FactTable implements ControlFlowFacts {
	private readonly unreachable: Set<string>;
	private readonly extra = new Set<string>();
	private readonly exclusive = new Set<string>();
	private readonly positions = new Map<string, EventPosition>();

	constructor(events: readonly LockEvent[], facts?: ControlFlowFactsInput) {
		const counters = new Map<string, number>();
		for (const event of events) {
			const index = counters.get(event.threadId) ?? 0;
			counters.set(event.threadId, index + 1);
			this.positions.set(event.id, { threadId: event.threadId, index });
		}
		this.unreachable = new Set(facts?.unreachable ?? []);
		for (const [a, b] of facts?.reachable ?? []) this.extra.add(pairKey(a, b));
		for (const [a, b] of facts?.exclusive ?? []) {
			this.exclusive.add(pairKey(a, b));
			this.exclusive.add(pairKey(b, a));
		}
	}

	reachableFromEntry(eventId: string): boolean {
		return !this.unreachable.has(eventId);
	}

	reachable(from: string, to: string): boolean {
		if (!this.reachableFromEntry(from) || !this.reachableFromEntry(to)) return false;
		if (this.exclusive.has(pairKey(from, to))) return false;
		if (this.extra.has(pairKey(from, to))) return true;
		const a = this.positions.get(from);
		const b = this.positions.get(to);
		if (!a || !b) return false;
		return a.threadId === b.threadId && a.index < b.index;
	}
}

/** Fact source that answers `true` to everything */
export const permissiveFacts: ControlFlowFacts = {
	reachableFromEntry: () => true,
	reachable: () => true,
};
