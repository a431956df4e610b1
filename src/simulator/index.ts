// SPDX-License-Identifier: MIT
// Circwait Simulator
// Bounded interleaving search that confirms or refutes a candidate cycle

import type { Logger } from "../config.ts";
import type { Cycle, ThreadContext } from "../types.ts";
import type { SimulatorBudget } from "../zod-schemas.ts";
import { Machine, type MachineState, type ScheduleStep } from "./machine.ts";

export { Machine, replaySchedule, type MachineState, type ReplayResult, type ScheduleStep } from "./machine.ts";

//==============================================================================
// Types
//==============================================================================

export type SimulationOutcome = "confirmed" | "refuted" | "inconclusive";

export interface SimulationResult {
	outcome: SimulationOutcome;
	/** Schedule reaching the circular wait, when confirmed */
	schedule?: ScheduleStep[] | undefined;
	/** States visited across both phases */
	explored: number;
	phase: "greedy" | "exhaustive";
	reason: string;
}

export interface SimulatorOptions extends Partial<SimulatorBudget> {
	logger?: Logger;
	/** Clock used for the time budget */
	now?: () => number;
}

/** Search node; schedules are rebuilt from parent links on success */
interface SearchNode {
	state: MachineState;
	depth: number;
	step?: ScheduleStep | undefined;
	parent?: SearchNode | undefined;
}

//==============================================================================
// Simulator
//==============================================================================

/**
 * Searches thread interleavings that respect each thread's program order
 * for one that leaves every participant of a cycle blocked on the next.
 *
 * A greedy pass first drives each participant up to its blocking acquisition
 * in cycle order. If that does not close the cycle, a depth-first search over
 * an explicit worklist explores the remaining interleavings, participants
 * first, then other threads in id order. With no time budget the search is
 * deterministic.
 */
export class Simulator {
	private readonly maxStates: number;
	private readonly maxDepth: number | undefined;
	private readonly timeBudgetMs: number | undefined;
	private readonly logger: Logger;
	private readonly now: () => number;

	constructor(options: SimulatorOptions = {}) {
		this.maxStates = options.maxStates ?? 10_000;
		this.maxDepth = options.maxDepth;
		this.timeBudgetMs = options.timeBudgetMs;
		this.logger = options.logger ?? console;
		this.now = options.now ?? Date.now;
	}

	simulate(cycle: Cycle, threads: ReadonlyMap<string, ThreadContext>): SimulationResult {
		const machine = new Machine(threads);
		const participants = cycle.links.map((link) => machine.threadIndex(link.threadId));
		const priority = [
			...participants,
			...machine.threadIds.map((_, i) => i).filter((i) => !participants.includes(i)),
		];

		const greedy = this.greedy(machine, cycle, participants);
		if (greedy.outcome === "confirmed") return greedy;

		const result = this.exhaustive(machine, cycle, priority, greedy.explored);
		if (result.outcome === "inconclusive") {
			this.logger.warn(`[Simulator] ${cycle.id}: ${result.reason}`);
		}
		return result;
	}

	//==========================================================================
	// Greedy Phase
	//==========================================================================

	private greedy(machine: Machine, cycle: Cycle, participants: number[]): SimulationResult {
		const targets = cycle.links.map((link, k) => {
			const program = machine.program(participants[k] ?? 0);
			const at = program.findIndex((e) => e.id === link.waitEventId);
			return at >= 0 ? at : program.length;
		});

		let state = machine.initial();
		const schedule: ScheduleStep[] = [];
		let explored = 1;
		let progressed = true;

		while (progressed) {
			progressed = false;
			participants.forEach((index, k) => {
				const target = targets[k] ?? 0;
				while ((state.cursors[index] ?? 0) < target) {
					const status = machine.status(state, index);
					if (status.kind !== "ready") break;
					schedule.push({ threadId: machine.threadIds[index] ?? "", eventId: status.event.id });
					state = machine.step(state, index);
					explored++;
					progressed = true;
				}
			});
		}

		if (machine.isCircularWait(state, cycle)) {
			return { outcome: "confirmed", schedule, explored, phase: "greedy", reason: "participants reached their blocking acquisitions in cycle order" };
		}
		return { outcome: "refuted", explored, phase: "greedy", reason: "greedy schedule did not close the cycle" };
	}

	//==========================================================================
	// Exhaustive Phase
	//==========================================================================

	private exhaustive(
		machine: Machine,
		cycle: Cycle,
		priority: number[],
		alreadyExplored: number,
	): SimulationResult {
		const started = this.now();
		const visited = new Set<string>();
		const worklist: SearchNode[] = [{ state: machine.initial(), depth: 0 }];
		let explored = alreadyExplored;
		let depthCut = false;

		while (worklist.length > 0) {
			const node = worklist.pop();
			if (!node) break;
			const key = machine.key(node.state);
			if (visited.has(key)) continue;
			// Out of budget only while unvisited states remain
			if (visited.size >= this.maxStates) {
				return inconclusive(explored, `state budget of ${this.maxStates} exhausted`);
			}
			visited.add(key);
			explored++;

			if (machine.isCircularWait(node.state, cycle)) {
				return {
					outcome: "confirmed", schedule: scheduleOf(node), explored, phase: "exhaustive",
					reason: `circular wait reached after ${node.depth} steps`,
				};
			}
			if (this.timeBudgetMs !== undefined && this.now() - started > this.timeBudgetMs) {
				return inconclusive(explored, `time budget of ${this.timeBudgetMs}ms exhausted`);
			}
			if (this.maxDepth !== undefined && node.depth >= this.maxDepth) {
				depthCut = true;
				continue;
			}

			// Reverse so the highest-priority thread is popped first
			const enabled = machine.enabled(node.state, priority);
			for (let i = enabled.length - 1; i >= 0; i--) {
				const index = enabled[i];
				if (index === undefined) continue;
				const next = machine.step(node.state, index);
				if (visited.has(machine.key(next))) continue;
				worklist.push({
					state: next,
					depth: node.depth + 1,
					step: { threadId: machine.threadIds[index] ?? "", eventId: machine.program(index)[node.state.cursors[index] ?? 0]?.id ?? "" },
					parent: node,
				});
			}
		}

		if (depthCut) {
			return inconclusive(explored, `depth bound of ${this.maxDepth ?? 0} cut the search short`);
		}
		return {
			outcome: "refuted", explored, phase: "exhaustive",
			reason: `no interleaving among ${visited.size} reachable states closes the cycle`,
		};
	}
}

function inconclusive(explored: number, reason: string): SimulationResult {
	return { outcome: "inconclusive", explored, phase: "exhaustive", reason };
}

function scheduleOf(node: SearchNode): ScheduleStep[] {
	const steps: ScheduleStep[] = [];
	for (let n: SearchNode | undefined = node; n; n = n.parent) {
		if (n.step) steps.push(n.step);
	}
	return steps.reverse();
}
