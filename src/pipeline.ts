// SPDX-License-Identifier: MIT
// Circwait Pipeline
// Validate -> build -> detect -> analyze -> simulate -> learn -> recommend

import { MultiLevelAnalyzer, LockOrder, severityOf, transition, type Budget, type StageSignal } from "./analyzer/index.ts";
import { resolveConfig, type AnalysisConfigInput, type Logger } from "./config.ts";
import { describeCycle, findCycles } from "./cycle-detector.ts";
import { CircwaitError, type MalformedEventError } from "./errors.ts";
import { FactTable } from "./facts.ts";
import { buildGraph, type BuildAnomaly, type BuildResult } from "./graph/builder.ts";
import { buildLockOrderGraph } from "./graph/lock-order.ts";
import type { ResourceAllocationGraph } from "./graph/rag.ts";
import { KnowledgeBase } from "./knowledge-base.ts";
import { recommend, type Strategy } from "./recommender.ts";
import { computeSignature, type PatternSignature } from "./signature.ts";
import { Simulator, type SimulationOutcome, type SimulationResult } from "./simulator/index.ts";
import type { Cycle, LevelVerdict, Severity, VerdictStatus } from "./types.ts";
import { validateEventStream, type EventStream } from "./validator.ts";
import type { AnalysisConfig } from "./zod-schemas.ts";

//==============================================================================
// Types
//==============================================================================

export interface AnalyzeOptions {
	config?: AnalysisConfigInput;
	/** Shared across runs so scoring and ranking learn from earlier verdicts */
	knowledge?: KnowledgeBase;
	logger?: Logger;
	/** Clock for `deadlineMs` and the simulator time budget */
	now?: () => number;
}

export interface Finding {
	cycle: Cycle;
	signature: PatternSignature;
	verdict: VerdictStatus;
	confidence: number;
	severity: Severity;
	/** Stage-by-stage verdicts, simulation last when it ran */
	history: LevelVerdict[];
	simulation?: SimulationResult | undefined;
	strategies: Strategy[];
	description: string;
	/** Plausible only because the score fell below the threshold */
	lowConfidence: boolean;
}

export interface AnalysisReport {
	findings: Finding[];
	/** Cycle enumeration hit a cap */
	truncated: boolean;
	buildErrors: MalformedEventError[];
	anomalies: BuildAnomaly[];
	graph: ResourceAllocationGraph;
	summary: {
		bySeverity: Record<Severity, number>;
		byVerdict: Record<VerdictStatus, number>;
	};
}

const SIMULATION_SIGNAL: Record<SimulationOutcome, StageSignal> = {
	confirmed: "advance",
	refuted: "prune",
	inconclusive: "budget",
};

//==============================================================================
// Pipeline
//==============================================================================

/**
 * Run the full analysis over a raw event stream. Every candidate cycle gets
 * a finding; candidates past `candidateBudget` or `deadlineMs` come back
 * inconclusive.
 *
 * @throws CircwaitError (ValidationError) when the input or config is invalid
 * @throws CircwaitError (EmptyEventStream) when there are no events
 * @throws MalformedEventError when `strict` is set and an event is ill-formed
 */
export async function analyzeEventStream(input: unknown, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
	const config = resolveConfig(options.config);
	const logger = options.logger ?? console;
	const now = options.now ?? Date.now;
	const knowledge = options.knowledge ?? new KnowledgeBase();
	const started = now();

	const validation = validateEventStream(input);
	if (!validation.valid) {
		const [first] = validation.errors;
		throw CircwaitError.validation(
			first?.path ?? "/",
			validation.errors.map((e) => `${e.path}: ${e.message}`).join("; "),
		);
	}
	const stream = validation.value;

	const build = buildFor(stream, config, logger);
	const detection = findCycles(build.rag, {
		maxCycleLength: config.maxCycleLength,
		maxCycles: config.maxCycles,
		logger,
	});
	logger.info(`[Pipeline] ${detection.cycles.length} candidate cycle(s) in ${detection.components.length} component(s)`);

	let order = LockOrder.fromInput(stream.orderings);
	if (config.inferOrderings) {
		const inferred = LockOrder.infer(build.threads);
		logger.debug(`[Pipeline] inferred ${inferred.length} ordering rule(s)`);
		order = order.with(inferred);
	}

	const analyzer = new MultiLevelAnalyzer({
		facts: new FactTable(stream.events, stream.facts),
		order,
		knowledge,
		config,
		logger,
	});
	const simulator = new Simulator({ ...config.simulator, logger, now });
	const deadlinePassed = (): boolean =>
		config.deadlineMs !== undefined && now() - started > config.deadlineMs;

	const findings = await Promise.all(detection.cycles.map(async (cycle, index) => {
		const budget: Budget = {
			exhausted: () =>
				(config.candidateBudget !== undefined && index >= config.candidateBudget) || deadlinePassed(),
		};
		const signature = computeSignature(cycle, { resources: build.resources, threads: build.threads });
		const outcome = analyzer.analyze(cycle, signature, budget);
		const history = [...outcome.history];
		let status = outcome.status;
		let confidence = outcome.confidence;
		let simulation: SimulationResult | undefined;

		if (outcome.simulate) {
			let signal: StageSignal;
			let rationale: string;
			if (budget.exhausted()) {
				signal = "budget";
				rationale = "analysis budget exhausted before simulation";
			} else {
				simulation = simulator.simulate(cycle, build.threads);
				signal = SIMULATION_SIGNAL[simulation.outcome];
				rationale = `${simulation.reason} (${simulation.explored} states, ${simulation.phase})`;
			}
			const step = transition("simulation", signal);
			status = step.kind === "report" ? step.status : "inconclusive";
			confidence = status === "confirmed" ? 1 : status === "refuted" ? 0 : confidence;
			history.push({ level: "simulation", status, confidence, rationale });
		}

		await knowledge.record(signature, status);

		const finding: Finding = {
			cycle,
			signature,
			verdict: status,
			confidence,
			severity: severityOf(status, confidence),
			history,
			simulation,
			strategies: recommend(cycle, {
				status,
				signature,
				threads: build.threads,
				knowledge,
				weights: config.recommender,
			}),
			description: describeCycle(cycle),
			lowConfidence: outcome.lowConfidence,
		};
		return finding;
	}));

	return {
		findings,
		truncated: detection.truncated,
		buildErrors: build.errors,
		anomalies: build.anomalies,
		graph: build.rag,
		summary: summarize(findings),
	};
}

function buildFor(stream: EventStream, config: AnalysisConfig, logger: Logger): BuildResult {
	const options = { strict: config.strict, logger };
	return config.graphMode === "lock-order"
		? buildLockOrderGraph(stream, options)
		: buildGraph(stream, options);
}

function summarize(findings: readonly Finding[]): AnalysisReport["summary"] {
	const bySeverity: Record<Severity, number> = { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
	const byVerdict: Record<VerdictStatus, number> = {
		plausible: 0, implausible: 0, confirmed: 0, refuted: 0, inconclusive: 0,
	};
	for (const finding of findings) {
		bySeverity[finding.severity]++;
		byVerdict[finding.verdict]++;
	}
	return { bySeverity, byVerdict };
}
