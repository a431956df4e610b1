// SPDX-License-Identifier: MIT
// Circwait Level Checks
// One pure function per analysis level; each returns a signal and a verdict

import type { KnowledgeBase } from "../knowledge-base.ts";
import type { ControlFlowFacts } from "../facts.ts";
import type { PatternSignature } from "../signature.ts";
import { clamp01, type AnalysisLevel, type Cycle, type LevelVerdict, type VerdictStatus } from "../types.ts";
import type { ScoringWeights } from "../zod-schemas.ts";
import type { StageSignal } from "./levels.ts";
import type { LockOrder } from "./orderings.ts";

export interface StageResult {
	signal: StageSignal;
	verdict: LevelVerdict;
}

function result(
	level: AnalysisLevel,
	signal: StageSignal,
	confidence: number,
	rationale: string,
): StageResult {
	const status: VerdictStatus = signal === "prune" ? "implausible" : "plausible";
	return { signal, verdict: { level, status, confidence: clamp01(confidence), rationale } };
}

//==============================================================================
// Level 1 - Static Plausibility
//==============================================================================

/**
 * Every edge of the cycle must come from an event that some syntactic path
 * from program entry reaches.
 */
export function staticPlausibility(cycle: Cycle, facts: ControlFlowFacts, confidence: number): StageResult {
	for (const link of cycle.links) {
		for (const eventId of [link.holdEventId, link.waitEventId]) {
			if (!facts.reachableFromEntry(eventId)) {
				return result("static", "prune", 0,
					`event ${eventId} of thread "${link.threadId}" is unreachable from program entry`);
			}
		}
	}
	return result("static", "advance", confidence,
		`all ${cycle.links.length * 2} edges originate in reachable acquisitions`);
}

//==============================================================================
// Level 2 - Control-Flow Feasibility
//==============================================================================

/**
 * Each participant must be able to reach its blocking acquisition while
 * still holding the resource it took earlier on one control-flow path.
 */
export function controlFlowFeasibility(cycle: Cycle, facts: ControlFlowFacts, confidence: number): StageResult {
	for (const link of cycle.links) {
		if (!facts.reachable(link.holdEventId, link.waitEventId)) {
			return result("control-flow", "prune", 0,
				`thread "${link.threadId}" cannot reach ${link.waitEventId} ("${link.waitsFor}") after ${link.holdEventId} ("${link.holds}") on any path`);
		}
	}
	return result("control-flow", "advance", confidence,
		"hold-then-wait order is feasible for every participant");
}

//==============================================================================
// Level 3 - Contextual Constraints
//==============================================================================

/**
 * Declared and inferred orderings are trusted as enforced. A cycle that
 * needs some participant to acquire against the order cannot close.
 */
export function contextualConstraints(cycle: Cycle, order: LockOrder, confidence: number): StageResult {
	if (order.isEmpty || !cycle.resources.some((r) => order.covers(r))) {
		return result("contextual", "advance", confidence, "no ordering rule covers the cycle's resources");
	}
	for (const link of cycle.links) {
		if (order.before(link.waitsFor, link.holds)) {
			return result("contextual", "prune", 0,
				`lock order puts "${link.waitsFor}" before "${link.holds}", so thread "${link.threadId}" cannot wait for it while holding "${link.holds}"`);
		}
	}
	return result("contextual", "advance", confidence, "cycle respects every ordering rule");
}

//==============================================================================
// Level 4 - Probabilistic Scoring
//==============================================================================

export interface ScoreBreakdown {
	structural: number;
	diversity: number;
	history: number;
	confidence: number;
}

/**
 * Weighted mean of structural, kind-diversity and historical scores.
 * Shorter cycles and homogeneous resource kinds score higher; history is
 * the knowledge base's confirmed-rate for the signature.
 */
export function scoreCycle(
	signature: PatternSignature,
	weights: ScoringWeights,
	knowledge?: KnowledgeBase,
): ScoreBreakdown {
	const structural = 2 / Math.max(2, signature.features.length);
	const diversity = 1 / Math.max(1, signature.features.distinctKinds);
	const history = knowledge?.query(signature).confirmedRate ?? weights.unknownPrior;
	const total = weights.structural + weights.diversity + weights.history;
	const confidence = total > 0
		? (weights.structural * structural + weights.diversity * diversity + weights.history * history) / total
		: weights.unknownPrior;
	return { structural, diversity, history, confidence: clamp01(confidence) };
}

export function probabilisticScoring(
	cycle: Cycle,
	score: ScoreBreakdown,
	threshold: number,
): StageResult {
	const summary = `score ${score.confidence.toFixed(3)} (structural ${score.structural.toFixed(2)}, diversity ${score.diversity.toFixed(2)}, history ${score.history.toFixed(2)})`;
	if (cycle.length === 2) {
		return result("probabilistic", "advance", score.confidence, `${summary}; direct mutual wait goes to simulation`);
	}
	if (score.confidence >= threshold) {
		return result("probabilistic", "advance", score.confidence, `${summary} meets threshold ${threshold}`);
	}
	return result("probabilistic", "hold", score.confidence, `${summary} below threshold ${threshold}: low-confidence`);
}
