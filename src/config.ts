// SPDX-License-Identifier: MIT
// Circwait Configuration
// Analysis options with defaults, validated through AnalysisConfigSchema

import { CircwaitError } from "./errors.ts";
import {
	AnalysisConfigSchema,
	type AnalysisConfig,
	type RecommenderWeights,
	type ScoringWeights,
	type SimulatorBudget,
} from "./zod-schemas.ts";

export type { AnalysisConfig, RecommenderWeights, ScoringWeights, SimulatorBudget };

//==============================================================================
// Logging
//==============================================================================

/** Console subset used for diagnostics; defaults to the global console */
export type Logger = Pick<Console, "debug" | "info" | "warn">;

/** Logger that discards everything, for callers that want quiet runs */
export const silentLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
};

//==============================================================================
// Config Input
//==============================================================================

/**
 * Partial configuration accepted from callers. Every field falls back to the
 * schema default.
 */
export interface AnalysisConfigInput {
	maxCycleLength?: number;
	maxCycles?: number;
	confidenceThreshold?: number;
	inferOrderings?: boolean;
	graphMode?: "snapshot" | "lock-order";
	strict?: boolean;
	candidateBudget?: number;
	deadlineMs?: number;
	scoring?: Partial<ScoringWeights>;
	simulator?: Partial<SimulatorBudget>;
	recommender?: Partial<RecommenderWeights>;
}

/**
 * Resolve a partial config into a complete one.
 * @throws CircwaitError (ValidationError) on out-of-range values
 */
export function resolveConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
	const parsed = AnalysisConfigSchema.safeParse({
		...input,
		scoring: input.scoring ?? {},
		simulator: input.simulator ?? {},
		recommender: input.recommender ?? {},
	});
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const path = issue ? "config." + issue.path.map(String).join(".") : "config";
		throw CircwaitError.validation(path, issue?.message ?? "invalid configuration");
	}
	return parsed.data;
}

/** Default configuration */
export function defaultConfig(): AnalysisConfig {
	return resolveConfig();
}
