// SPDX-License-Identifier: MIT
// Circwait Ordering Constraints
// Declared lock-order rules and hierarchy levels as a partial order

import { getOrCreateSet, type OrderingRule, type ThreadContext } from "../types.ts";
import type { OrderingsInput } from "../zod-schemas.ts";

/**
 * Partial order over resources built from declared rules and hierarchy
 * levels. `before(a, b)` holds when the rules require `a` to be acquired
 * ahead of `b`, directly or transitively.
 */
export class LockOrder {
	private readonly after = new Map<string, Set<string>>();
	private readonly ruleList: OrderingRule[];

	constructor(rules: readonly OrderingRule[]) {
		this.ruleList = [...rules];
		for (const rule of rules) {
			getOrCreateSet(this.after, rule.before).add(rule.after);
		}
	}

	static fromInput(input?: OrderingsInput): LockOrder {
		if (!input) return new LockOrder([]);
		const rules: OrderingRule[] = input.rules.map((r) => ({ before: r.before, after: r.after, source: "declared" }));
		const levels = Object.entries(input.levels).sort(([a], [b]) => a.localeCompare(b));
		for (const [a, levelA] of levels) {
			for (const [b, levelB] of levels) {
				if (levelA < levelB) rules.push({ before: a, after: b, source: "declared" });
			}
		}
		return new LockOrder(rules);
	}

	/**
	 * Infer rules from nesting order. `a` before `b` is inferred when at least
	 * `minThreads` threads acquire `b` while holding `a` and no thread ever
	 * nests them the other way. Pairs that would close a loop in the order
	 * built so far are skipped.
	 */
	static infer(threads: ReadonlyMap<string, ThreadContext>, minThreads = 2): OrderingRule[] {
		const seen = new Map<string, Set<string>>();
		for (const thread of threads.values()) {
			const held: string[] = [];
			for (const event of thread.events) {
				if (event.kind === "acquire") {
					for (const outer of held) {
						getOrCreateSet(seen, pairKey(outer, event.resourceId)).add(thread.id);
					}
					held.push(event.resourceId);
				} else if (event.kind === "release") {
					const at = held.lastIndexOf(event.resourceId);
					if (at >= 0) held.splice(at, 1);
				}
			}
		}

		const inferred: OrderingRule[] = [];
		const order = new LockOrder([]);
		for (const key of [...seen.keys()].sort()) {
			const [a, b] = key.split("\u0000");
			if (a === undefined || b === undefined || a === b) continue;
			if ((seen.get(key)?.size ?? 0) < minThreads) continue;
			if (seen.has(pairKey(b, a)) || order.before(b, a)) continue;
			const rule: OrderingRule = { before: a, after: b, source: "inferred" };
			inferred.push(rule);
			order.add(rule);
		}
		return inferred;
	}

	/** New order holding this order's rules followed by `extra` */
	with(extra: readonly OrderingRule[]): LockOrder {
		return new LockOrder([...this.rules, ...extra]);
	}

	private add(rule: OrderingRule): void {
		this.ruleList.push(rule);
		getOrCreateSet(this.after, rule.before).add(rule.after);
	}

	get rules(): readonly OrderingRule[] {
		return this.ruleList;
	}

	get isEmpty(): boolean {
		return this.rules.length === 0;
	}

	/** Whether any rule mentions the resource */
	covers(resourceId: string): boolean {
		return this.rules.some((r) => r.before === resourceId || r.after === resourceId);
	}

	before(a: string, b: string): boolean {
		if (a === b) return false;
		const seen = new Set<string>([a]);
		const queue = [a];
		while (queue.length > 0) {
			const node = queue.shift();
			if (node === undefined) break;
			for (const next of this.after.get(node) ?? []) {
				if (next === b) return true;
				if (!seen.has(next)) { seen.add(next); queue.push(next); }
			}
		}
		return false;
	}
}

function pairKey(a: string, b: string): string {
	return a + "\u0000" + b;
}
