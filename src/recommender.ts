// SPDX-License-Identifier: MIT
// Circwait Recommender
// Ranked remediation strategies for confirmed circular waits

import type { KnowledgeBase } from "./knowledge-base.ts";
import type { PatternSignature } from "./signature.ts";
import { clamp01, type Cycle, type CycleLink, type LockEvent, type ThreadContext, type VerdictStatus } from "./types.ts";
import type { RecommenderWeights } from "./zod-schemas.ts";

//==============================================================================
// Types
//==============================================================================

export type StrategyId = "lock-ordering" | "bounded-wait" | "resource-hierarchy";

export type Complexity = "LOW" | "MEDIUM" | "HIGH";

export type PerformanceImpact = "NONE" | "LOW" | "MEDIUM" | "HIGH";

export interface Strategy {
	id: StrategyId;
	name: string;
	description: string;
	tradeOff: string;
	complexity: Complexity;
	performanceImpact: PerformanceImpact;
	/** How directly the strategy breaks this particular cycle, in [0,1] */
	applicability: number;
	/** Knowledge base success rate for this signature, when the fix was ever applied */
	historicalSuccess?: number | undefined;
	score: number;
	/** Concrete changes, one per affected thread or resource */
	actions: string[];
}

export interface RecommendContext {
	status: VerdictStatus;
	signature: PatternSignature;
	threads: ReadonlyMap<string, ThreadContext>;
	knowledge?: KnowledgeBase | undefined;
	weights?: RecommenderWeights | undefined;
}

interface CatalogEntry {
	id: StrategyId;
	name: string;
	description: string;
	tradeOff: string;
	complexity: Complexity;
	performanceImpact: PerformanceImpact;
	assess(cycle: Cycle, ctx: RecommendContext): { applicability: number; actions: string[] };
}

const DEFAULT_WEIGHTS: RecommenderWeights = { applicability: 0.6, history: 0.4, maxStrategies: 3 };

const COMPLEXITY_ADJUSTMENT: Record<Complexity, number> = { LOW: 0, MEDIUM: -0.05, HIGH: -0.15 };

const PERFORMANCE_ADJUSTMENT: Record<PerformanceImpact, number> = { NONE: 0, LOW: -0.05, MEDIUM: -0.1, HIGH: -0.2 };

/** Lock ordering is the cheapest complete fix for a plain two-thread inversion */
const TWO_THREAD_ORDERING_BONUS = 0.1;

//==============================================================================
// Catalog
//==============================================================================

export const STRATEGY_CATALOG: readonly CatalogEntry[] = [
	{
		id: "lock-ordering",
		name: "Global lock ordering",
		description: "Impose one total order on the cycle's resources and acquire them in that order in every thread",
		tradeOff: "eliminates this deadlock outright but constrains every future acquisition site of these resources",
		complexity: "LOW",
		performanceImpact: "NONE",
		assess(cycle, ctx) {
			const order = [...cycle.resources].sort();
			const rank = new Map(order.map((id, i) => [id, i]));
			const actions = [`order: ${order.map((r) => `"${r}"`).join(" < ")}`];
			for (const link of cycle.links) {
				if ((rank.get(link.holds) ?? 0) > (rank.get(link.waitsFor) ?? 0)) {
					actions.push(`thread "${link.threadId}": acquire "${link.waitsFor}" before "${link.holds}"${at(ctx, link, link.holdEventId)}`);
				}
			}
			// Condition waits cannot be hoisted ahead of the lock they wait under
			const applicability = 1 - 0.5 * (ctx.signature.features.waitLinks / Math.max(1, cycle.length));
			return { applicability, actions };
		},
	},
	{
		id: "bounded-wait",
		name: "Bounded-wait acquisition",
		description: "Replace each blocking acquisition in the cycle with a timed try-acquire that backs off and retries",
		tradeOff: "removes the permanent hang but adds retry logic and can livelock or reduce throughput under contention",
		complexity: "MEDIUM",
		performanceImpact: "LOW",
		assess(cycle, ctx) {
			const actions = cycle.links.map((link) =>
				`thread "${link.threadId}": time out waiting for "${link.waitsFor}"${at(ctx, link, link.waitEventId)}, release "${link.holds}" and retry with backoff`);
			return { applicability: 0.7, actions };
		},
	},
	{
		id: "resource-hierarchy",
		name: "Resource hierarchy restructuring",
		description: "Split the most contended resource of the cycle into finer-grained resources so the contending threads stop overlapping",
		tradeOff: "reduces contention overlap at its root but needs a redesign of the shared state the resource guards",
		complexity: "HIGH",
		performanceImpact: "NONE",
		assess(cycle, ctx) {
			const { resourceId, outsiders } = mostContended(cycle, ctx.threads);
			const actions = [`split "${resourceId}" so that the cycle's threads no longer contend for one coarse resource`];
			return { applicability: outsiders > 0 ? 0.7 : 0.3, actions };
		},
	},
];

//==============================================================================
// Recommendation
//==============================================================================

/**
 * Rank remediation strategies for a confirmed cycle. Score is the weighted
 * mean of applicability and knowledge base success rate, adjusted for
 * complexity and performance impact. History on the same signature wins;
 * otherwise the strategy's rate across all signatures is used, and
 * applicability stands in for a fix never tried. Ties keep catalog order.
 * Cycles that are not confirmed get no strategies.
 */
export function recommend(cycle: Cycle, ctx: RecommendContext): Strategy[] {
	if (ctx.status !== "confirmed") return [];
	const weights = ctx.weights ?? DEFAULT_WEIGHTS;

	const ranked = STRATEGY_CATALOG.map((entry, index) => {
		const { applicability, actions } = entry.assess(cycle, ctx);
		const historicalSuccess = ctx.knowledge?.fixSuccessRate(ctx.signature.key, entry.id)
			?? ctx.knowledge?.overallFixSuccessRate(entry.id);
		const strategy: Strategy = {
			id: entry.id,
			name: entry.name,
			description: entry.description,
			tradeOff: entry.tradeOff,
			complexity: entry.complexity,
			performanceImpact: entry.performanceImpact,
			applicability,
			historicalSuccess,
			score: scoreStrategy(entry, cycle, applicability, historicalSuccess, weights),
			actions,
		};
		return { strategy, index };
	});

	return ranked
		.sort((a, b) => b.strategy.score - a.strategy.score || a.index - b.index)
		.slice(0, weights.maxStrategies)
		.map((r) => r.strategy);
}

function scoreStrategy(
	entry: CatalogEntry,
	cycle: Cycle,
	applicability: number,
	historicalSuccess: number | undefined,
	weights: RecommenderWeights,
): number {
	const history = historicalSuccess ?? applicability;
	const total = weights.applicability + weights.history;
	const base = total > 0
		? (weights.applicability * applicability + weights.history * history) / total
		: applicability;
	const bonus = entry.id === "lock-ordering" && cycle.length === 2 ? TWO_THREAD_ORDERING_BONUS : 0;
	return clamp01(base + COMPLEXITY_ADJUSTMENT[entry.complexity] + PERFORMANCE_ADJUSTMENT[entry.performanceImpact] + bonus);
}

//==============================================================================
// Helpers
//==============================================================================

function findEvent(ctx: RecommendContext, link: CycleLink, eventId: string): LockEvent | undefined {
	return ctx.threads.get(link.threadId)?.events.find((e) => e.id === eventId);
}

function at(ctx: RecommendContext, link: CycleLink, eventId: string): string {
	const location = findEvent(ctx, link, eventId)?.location;
	if (!location || location.line === 0) return "";
	return location.file ? ` (${location.file}:${location.line})` : ` (line ${location.line})`;
}

/**
 * Cycle resource acquired by the most threads, ties broken by id, with the
 * number of acquiring threads outside the cycle
 */
function mostContended(
	cycle: Cycle,
	threads: ReadonlyMap<string, ThreadContext>,
): { resourceId: string; outsiders: number } {
	const participants = new Set(cycle.threads);
	let best = { resourceId: cycle.resources[0] ?? "", users: -1, outsiders: 0 };
	for (const resourceId of [...cycle.resources].sort()) {
		const users = [...threads.values()].filter((t) =>
			t.events.some((e) => e.kind === "acquire" && e.resourceId === resourceId));
		if (users.length > best.users) {
			best = { resourceId, users: users.length, outsiders: users.filter((t) => !participants.has(t.id)).length };
		}
	}
	return { resourceId: best.resourceId, outsiders: best.outsiders };
}
