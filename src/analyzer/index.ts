// SPDX-License-Identifier: MIT
// Circwait Multi-Level Analyzer
// Escalates each candidate cycle through static, control-flow, contextual
// and probabilistic stages, driven by the transition table in levels.ts

import { defaultConfig, type Logger } from "../config.ts";
import { permissiveFacts, type ControlFlowFacts } from "../facts.ts";
import type { KnowledgeBase } from "../knowledge-base.ts";
import type { PatternSignature } from "../signature.ts";
import type { AnalysisLevel, Cycle, LevelVerdict, VerdictStatus } from "../types.ts";
import type { AnalysisConfig } from "../zod-schemas.ts";
import {
	contextualConstraints,
	controlFlowFeasibility,
	probabilisticScoring,
	scoreCycle,
	staticPlausibility,
	type StageResult,
} from "./checks.ts";
import { transition } from "./levels.ts";
import { LockOrder } from "./orderings.ts";

export { LockOrder } from "./orderings.ts";
export { severityOf, transition, TRANSITIONS, LEVEL_ORDER, type StageSignal, type Step } from "./levels.ts";
export { scoreCycle, type ScoreBreakdown } from "./checks.ts";

//==============================================================================
// Types
//==============================================================================

/** Confidence a candidate carries before probabilistic scoring */
const BASE_CONFIDENCE = 0.5;

export interface AnalyzerOptions {
	facts?: ControlFlowFacts;
	order?: LockOrder;
	knowledge?: KnowledgeBase;
	config?: AnalysisConfig;
	logger?: Logger;
}

/** Cooperative cancellation check consulted before each stage */
export interface Budget {
	exhausted(): boolean;
}

export interface AnalysisOutcome {
	cycle: Cycle;
	signature: PatternSignature;
	/** One verdict per stage the candidate went through */
	history: LevelVerdict[];
	status: VerdictStatus;
	confidence: number;
	/** Whether the candidate should be handed to the simulator */
	simulate: boolean;
	/** Kept as plausible only because it scored below the threshold */
	lowConfidence: boolean;
}

//==============================================================================
// Multi-Level Analyzer
//==============================================================================

export class MultiLevelAnalyzer {
	private readonly facts: ControlFlowFacts;
	private readonly order: LockOrder;
	private readonly knowledge: KnowledgeBase | undefined;
	private readonly config: AnalysisConfig;
	private readonly logger: Logger;

	constructor(options: AnalyzerOptions = {}) {
		this.facts = options.facts ?? permissiveFacts;
		this.order = options.order ?? new LockOrder([]);
		this.knowledge = options.knowledge;
		this.config = options.config ?? defaultConfig();
		this.logger = options.logger ?? console;
	}

	/**
	 * Run a candidate through the stages until the transition table says to
	 * report it or simulate it. Stages short-circuit on prune.
	 */
	analyze(cycle: Cycle, signature: PatternSignature, budget?: Budget): AnalysisOutcome {
		const history: LevelVerdict[] = [];
		let level: AnalysisLevel = "static";
		let confidence = BASE_CONFIDENCE;

		for (;;) {
			const stage = budget?.exhausted()
				? budgetExhausted(level, confidence)
				: this.runLevel(level, cycle, signature, confidence);
			history.push(stage.verdict);
			confidence = stage.verdict.confidence;
			this.logger.debug(`[Analyzer] ${cycle.id} ${level}: ${stage.signal} (${stage.verdict.rationale})`);

			const step = transition(level, stage.signal);
			switch (step.kind) {
			case "level":
				level = step.level;
				continue;
			case "simulate":
				return { cycle, signature, history, status: "plausible", confidence, simulate: true, lowConfidence: false };
			case "report":
				return {
					cycle, signature, history, status: step.status, confidence,
					simulate: false,
					lowConfidence: level === "probabilistic" && stage.signal === "hold",
				};
			}
		}
	}

	private runLevel(
		level: AnalysisLevel,
		cycle: Cycle,
		signature: PatternSignature,
		confidence: number,
	): StageResult {
		switch (level) {
		case "static":
			return staticPlausibility(cycle, this.facts, confidence);
		case "control-flow":
			return controlFlowFeasibility(cycle, this.facts, confidence);
		case "contextual":
			return contextualConstraints(cycle, this.order, confidence);
		case "probabilistic":
			return probabilisticScoring(
				cycle,
				scoreCycle(signature, this.config.scoring, this.knowledge),
				this.config.confidenceThreshold,
			);
		case "simulation":
			throw new Error("Simulation stage is run by the Simulator, not the analyzer");
		}
	}
}

function budgetExhausted(level: AnalysisLevel, confidence: number): StageResult {
	return {
		signal: "budget",
		verdict: {
			level,
			status: "inconclusive",
			confidence,
			rationale: `analysis budget exhausted before the ${level} stage`,
		},
	};
}
