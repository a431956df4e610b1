// SPDX-License-Identifier: MIT
// Circwait Analysis Levels
// Verdict state machine: a fixed transition table over escalating stages

import type { AnalysisLevel, Severity, VerdictStatus } from "../types.ts";

//==============================================================================
// Stage Signals
//==============================================================================

/**
 * What a stage concluded about a candidate.
 * - advance: passes to the next stage
 * - prune: ruled out at this stage
 * - hold: kept as a finding but not escalated further
 * - budget: the run's budget ran out during this stage
 */
export type StageSignal = "advance" | "prune" | "hold" | "budget";

export type Step =
	| { kind: "level"; level: AnalysisLevel }
	| { kind: "simulate" }
	| { kind: "report"; status: VerdictStatus };

export const LEVEL_ORDER: readonly AnalysisLevel[] = [
	"static",
	"control-flow",
	"contextual",
	"probabilistic",
	"simulation",
];

//==============================================================================
// Transition Table
//==============================================================================

const report = (status: VerdictStatus): Step => ({ kind: "report", status });

export const TRANSITIONS: Readonly<Record<AnalysisLevel, Readonly<Record<StageSignal, Step>>>> = {
	"static": {
		advance: { kind: "level", level: "control-flow" },
		prune: report("implausible"),
		hold: report("plausible"),
		budget: report("inconclusive"),
	},
	"control-flow": {
		advance: { kind: "level", level: "contextual" },
		prune: report("implausible"),
		hold: report("plausible"),
		budget: report("inconclusive"),
	},
	"contextual": {
		advance: { kind: "level", level: "probabilistic" },
		prune: report("implausible"),
		hold: report("plausible"),
		budget: report("inconclusive"),
	},
	"probabilistic": {
		advance: { kind: "simulate" },
		prune: report("implausible"),
		hold: report("plausible"),
		budget: report("inconclusive"),
	},
	"simulation": {
		advance: report("confirmed"),
		prune: report("refuted"),
		hold: report("inconclusive"),
		budget: report("inconclusive"),
	},
};

export function transition(level: AnalysisLevel, signal: StageSignal): Step {
	return TRANSITIONS[level][signal];
}

//==============================================================================
// Severity
//==============================================================================

/** Map a final verdict to a report severity */
export function severityOf(status: VerdictStatus, confidence: number): Severity {
	switch (status) {
	case "confirmed":
		return "CRITICAL";
	case "plausible":
		if (confidence >= 0.75) return "HIGH";
		return confidence >= 0.5 ? "MEDIUM" : "LOW";
	case "inconclusive":
		return "MEDIUM";
	case "implausible":
	case "refuted":
		return "LOW";
	}
}
