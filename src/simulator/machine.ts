// SPDX-License-Identifier: MIT
// Circwait Simulation Machine
// Closed-model lock semantics over per-thread cursors

import { CircwaitError } from "../errors.ts";
import type { Cycle, LockEvent, ThreadContext } from "../types.ts";

//==============================================================================
// Types
//==============================================================================

export interface ScheduleStep {
	threadId: string;
	eventId: string;
}

/**
 * Simulation state. A thread's holdings depend only on its own executed
 * prefix, so the cursor vector alone identifies a state; `holders` is kept
 * alongside to avoid recomputing it.
 */
export interface MachineState {
	cursors: number[];
	/** resource id -> index of holding thread */
	holders: Map<string, number>;
}

export type ThreadStatus =
	| { kind: "finished" }
	| { kind: "ready"; event: LockEvent }
	| { kind: "blocked"; event: LockEvent; holder: number }
	/** Next event is ill-formed (release of an unheld or re-acquire of a held resource) */
	| { kind: "faulted"; event: LockEvent };

//==============================================================================
// Machine
//==============================================================================

/**
 * Executes lock events against a state. Every resource is exclusive: an
 * acquire proceeds only when nobody holds the resource, a wait proceeds when
 * nobody else holds it.
 */
export class Machine {
	readonly threadIds: readonly string[];
	private readonly programs: readonly (readonly LockEvent[])[];
	private readonly indexOf = new Map<string, number>();

	constructor(threads: ReadonlyMap<string, ThreadContext>) {
		this.threadIds = [...threads.keys()].sort();
		this.programs = this.threadIds.map((id) => threads.get(id)?.events ?? []);
		this.threadIds.forEach((id, i) => this.indexOf.set(id, i));
	}

	get totalEvents(): number {
		return this.programs.reduce((n, p) => n + p.length, 0);
	}

	threadIndex(threadId: string): number {
		const index = this.indexOf.get(threadId);
		if (index === undefined) throw CircwaitError.unknownThread(threadId);
		return index;
	}

	program(index: number): readonly LockEvent[] {
		return this.programs[index] ?? [];
	}

	initial(): MachineState {
		return { cursors: this.threadIds.map(() => 0), holders: new Map() };
	}

	key(state: MachineState): string {
		return state.cursors.join(",");
	}

	status(state: MachineState, index: number): ThreadStatus {
		const event = this.program(index)[state.cursors[index] ?? 0];
		if (!event) return { kind: "finished" };
		const holder = state.holders.get(event.resourceId);
		switch (event.kind) {
		case "acquire":
			if (holder === index) return { kind: "faulted", event };
			return holder === undefined ? { kind: "ready", event } : { kind: "blocked", event, holder };
		case "wait":
			return holder === undefined || holder === index ? { kind: "ready", event } : { kind: "blocked", event, holder };
		case "release":
			return holder === index ? { kind: "ready", event } : { kind: "faulted", event };
		}
	}

	/** Execute the next event of thread `index`; the caller checks readiness */
	step(state: MachineState, index: number): MachineState {
		const event = this.program(index)[state.cursors[index] ?? 0];
		if (!event) return state;
		const cursors = [...state.cursors];
		cursors[index] = (cursors[index] ?? 0) + 1;
		let holders = state.holders;
		if (event.kind === "acquire") {
			holders = new Map(holders);
			holders.set(event.resourceId, index);
		} else if (event.kind === "release") {
			holders = new Map(holders);
			holders.delete(event.resourceId);
		}
		return { cursors, holders };
	}

	/** Indices of threads with a legal transition, in the given priority order */
	enabled(state: MachineState, order: readonly number[]): number[] {
		return order.filter((i) => this.status(state, i).kind === "ready");
	}

	//==========================================================================
	// Circular Wait
	//==========================================================================

	/**
	 * Whether every participant of the cycle is blocked on the resource its
	 * link waits for, held by the next participant. No participant can then
	 * move again whatever the other threads do.
	 */
	isCircularWait(state: MachineState, cycle: Cycle): boolean {
		const n = cycle.links.length;
		return n >= 2 && cycle.links.every((link, i) => {
			const next = cycle.links[(i + 1) % n];
			if (!next) return false;
			const status = this.status(state, this.threadIndex(link.threadId));
			return status.kind === "blocked" &&
				status.event.resourceId === link.waitsFor &&
				status.holder === this.threadIndex(next.threadId);
		});
	}
}

//==============================================================================
// Replay
//==============================================================================

export interface ReplayResult {
	state: MachineState;
	/** thread id -> resource it is blocked on */
	blocked: Map<string, string>;
	/** Threads that still have a legal transition */
	runnable: string[];
	/** resource id -> holding thread id */
	holders: Map<string, string>;
}

/**
 * Re-execute a schedule from the initial state.
 * @throws CircwaitError (InvalidSchedule) when a step is not the thread's
 * next event or is not enabled
 */
export function replaySchedule(
	threads: ReadonlyMap<string, ThreadContext>,
	schedule: readonly ScheduleStep[],
): ReplayResult {
	const machine = new Machine(threads);
	let state = machine.initial();

	schedule.forEach((step, i) => {
		const index = machine.threadIndex(step.threadId);
		const status = machine.status(state, index);
		if (status.kind === "finished") {
			throw CircwaitError.invalidSchedule(i, `thread "${step.threadId}" has no events left`);
		}
		if (status.event.id !== step.eventId) {
			throw CircwaitError.invalidSchedule(i, `expected ${status.event.id}, got ${step.eventId}`);
		}
		if (status.kind !== "ready") {
			throw CircwaitError.invalidSchedule(i, `${step.eventId} is ${status.kind}`);
		}
		state = machine.step(state, index);
	});

	const blocked = new Map<string, string>();
	const runnable: string[] = [];
	machine.threadIds.forEach((id, i) => {
		const status = machine.status(state, i);
		if (status.kind === "blocked") blocked.set(id, status.event.resourceId);
		if (status.kind === "ready") runnable.push(id);
	});
	const holders = new Map<string, string>();
	for (const [resourceId, index] of state.holders) {
		holders.set(resourceId, machine.threadIds[index] ?? "");
	}
	return { state, blocked, runnable, holders };
}
