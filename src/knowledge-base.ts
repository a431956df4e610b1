// SPDX-License-Identifier: MIT
// Circwait Knowledge Base
// Per-signature verdict statistics and fix outcomes, learned across runs

import { CircwaitError } from "./errors.ts";
import type { PatternSignature } from "./signature.ts";
import type { VerdictStatus } from "./types.ts";
import {
	KnowledgeSnapshotSchema,
	type FixStats,
	type KnowledgeSnapshot,
	type PatternStats,
} from "./zod-schemas.ts";

//==============================================================================
// Keyed Lock
//==============================================================================

/**
 * Serializes async critical sections per key. Sections on different keys
 * run independently; sections on one key run in arrival order.
 */
export class KeyedLock {
	private tails = new Map<string, Promise<void>>();

	async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await fn();
		} finally {
			release();
			if (this.tails.get(key) === tail) this.tails.delete(key);
		}
	}

	/** Number of keys with a pending or running section */
	get pendingKeys(): number {
		return this.tails.size;
	}
}

//==============================================================================
// Query Results
//==============================================================================

export interface KnownFix {
	strategyId: string;
	timesUsed: number;
	successRate: number;
	/** Mean user rating, when any were given */
	averageRating?: number | undefined;
}

export interface PatternQuery {
	known: boolean;
	occurrences: number;
	/** confirmed / (confirmed + refuted); undefined before any decided verdict */
	confirmedRate?: number | undefined;
	knownFixes: KnownFix[];
}

export interface KnowledgeStatistics {
	patterns: number;
	occurrences: number;
	confirmed: number;
	refuted: number;
	fixesApplied: number;
	fixesSuccessful: number;
	mostFrequentPattern?: string | undefined;
	bestFix?: string | undefined;
}

type SignatureRef = Pick<PatternSignature, "key" | "pattern" | "kinds">;

//==============================================================================
// Knowledge Base
//==============================================================================

interface FixTotal {
	used: number;
	ok: number;
}

/**
 * In-memory store of pattern statistics keyed by signature fingerprint.
 *
 * Reads never wait. Writes go through a per-signature lock so concurrent
 * read-modify-write updates of one signature cannot interleave; writes to
 * different signatures do not contend. Loading and saving are left to the
 * caller via `snapshot()` and `fromSnapshot()`.
 */
export class KnowledgeBase {
	private readonly patterns = new Map<string, PatternStats>();
	private readonly lock = new KeyedLock();

	/** Record a verdict for a signature, creating its entry if absent */
	async record(signature: SignatureRef, status: VerdictStatus): Promise<PatternStats> {
		return await this.lock.run(signature.key, () => {
			const current = this.patterns.get(signature.key) ?? emptyStats(signature);
			const next: PatternStats = {
				...current,
				occurrences: current.occurrences + 1,
				confirmed: current.confirmed + (status === "confirmed" ? 1 : 0),
				refuted: current.refuted + (status === "refuted" ? 1 : 0),
			};
			this.patterns.set(signature.key, next);
			return copyStats(next);
		});
	}

	/** Record the outcome of applying a fix strategy to a signature */
	async recordFix(
		signature: SignatureRef,
		strategyId: string,
		success: boolean,
		rating?: number,
	): Promise<FixStats> {
		if (rating !== undefined && (rating < 1 || rating > 5)) {
			throw CircwaitError.validation("rating", "must be between 1 and 5", rating);
		}
		return await this.lock.run(signature.key, () => {
			const current = this.patterns.get(signature.key) ?? emptyStats(signature);
			const fixes = current.fixes.map((f) => ({ ...f }));
			let fix = fixes.find((f) => f.strategyId === strategyId);
			if (!fix) {
				fix = { strategyId, timesUsed: 0, timesSuccessful: 0, ratingSum: 0, ratingCount: 0 };
				fixes.push(fix);
			}
			fix.timesUsed++;
			if (success) fix.timesSuccessful++;
			if (rating !== undefined) {
				fix.ratingSum += rating;
				fix.ratingCount++;
			}
			this.patterns.set(signature.key, { ...current, fixes });
			return { ...fix };
		});
	}

	/** Read-only lookup; unknown signatures yield an empty result */
	query(signature: Pick<PatternSignature, "key"> | string): PatternQuery {
		const key = typeof signature === "string" ? signature : signature.key;
		const stats = this.patterns.get(key);
		if (!stats) return { known: false, occurrences: 0, knownFixes: [] };
		return {
			known: true,
			occurrences: stats.occurrences,
			confirmedRate: confirmedRate(stats),
			knownFixes: stats.fixes.map(toKnownFix).sort(
				(a, b) => b.successRate - a.successRate || a.strategyId.localeCompare(b.strategyId),
			),
		};
	}

	/** Success rate of one strategy on a signature, if it was ever applied */
	fixSuccessRate(key: string, strategyId: string): number | undefined {
		const fix = this.patterns.get(key)?.fixes.find((f) => f.strategyId === strategyId);
		return fix && fix.timesUsed > 0 ? fix.timesSuccessful / fix.timesUsed : undefined;
	}

	/** Success rate of one strategy across every signature, if it was ever applied */
	overallFixSuccessRate(strategyId: string): number | undefined {
		const total = this.fixTotals().get(strategyId);
		return total && total.used > 0 ? total.ok / total.used : undefined;
	}

	get size(): number {
		return this.patterns.size;
	}

	statistics(): KnowledgeStatistics {
		let occurrences = 0, confirmed = 0, refuted = 0, fixesApplied = 0, fixesSuccessful = 0;
		let mostFrequent: PatternStats | undefined;

		for (const stats of this.patterns.values()) {
			occurrences += stats.occurrences;
			confirmed += stats.confirmed;
			refuted += stats.refuted;
			if (!mostFrequent || stats.occurrences > mostFrequent.occurrences) mostFrequent = stats;
			for (const fix of stats.fixes) {
				fixesApplied += fix.timesUsed;
				fixesSuccessful += fix.timesSuccessful;
			}
		}

		return {
			patterns: this.patterns.size,
			occurrences, confirmed, refuted, fixesApplied, fixesSuccessful,
			mostFrequentPattern: mostFrequent?.pattern,
			bestFix: bestFix(this.fixTotals()),
		};
	}

	private fixTotals(): Map<string, FixTotal> {
		const totals = new Map<string, FixTotal>();
		for (const stats of this.patterns.values()) {
			for (const fix of stats.fixes) {
				const total = totals.get(fix.strategyId) ?? { used: 0, ok: 0 };
				totals.set(fix.strategyId, { used: total.used + fix.timesUsed, ok: total.ok + fix.timesSuccessful });
			}
		}
		return totals;
	}

	//==========================================================================
	// Snapshots
	//==========================================================================

	snapshot(): KnowledgeSnapshot {
		const patterns = [...this.patterns.values()]
			.map(copyStats)
			.sort((a, b) => a.key.localeCompare(b.key));
		return { version: 1, patterns };
	}

	/**
	 * Rebuild a knowledge base from snapshot data.
	 * @throws CircwaitError (ValidationError) when the data does not match the schema
	 */
	static fromSnapshot(data: unknown): KnowledgeBase {
		const parsed = KnowledgeSnapshotSchema.safeParse(data);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw CircwaitError.validation(
				"snapshot/" + (issue?.path.map(String).join("/") ?? ""),
				issue?.message ?? "invalid snapshot",
			);
		}
		const kb = new KnowledgeBase();
		for (const stats of parsed.data.patterns) {
			kb.patterns.set(stats.key, copyStats(stats));
		}
		return kb;
	}
}

//==============================================================================
// Helpers
//==============================================================================

function emptyStats(signature: SignatureRef): PatternStats {
	return {
		key: signature.key,
		pattern: signature.pattern,
		kinds: [...signature.kinds],
		occurrences: 0,
		confirmed: 0,
		refuted: 0,
		fixes: [],
	};
}

function copyStats(stats: PatternStats): PatternStats {
	return { ...stats, kinds: [...stats.kinds], fixes: stats.fixes.map((f) => ({ ...f })) };
}

function confirmedRate(stats: PatternStats): number | undefined {
	const decided = stats.confirmed + stats.refuted;
	return decided > 0 ? stats.confirmed / decided : undefined;
}

function toKnownFix(fix: FixStats): KnownFix {
	return {
		strategyId: fix.strategyId,
		timesUsed: fix.timesUsed,
		successRate: fix.timesUsed > 0 ? fix.timesSuccessful / fix.timesUsed : 0,
		averageRating: fix.ratingCount > 0 ? fix.ratingSum / fix.ratingCount : undefined,
	};
}

function bestFix(totals: Map<string, FixTotal>): string | undefined {
	let best: string | undefined;
	let bestRate = -1;
	for (const [id, { used, ok }] of [...totals].sort(([a], [b]) => a.localeCompare(b))) {
		const rate = used > 0 ? ok / used : 0;
		if (rate > bestRate) { best = id; bestRate = rate; }
	}
	return best;
}
