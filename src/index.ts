// SPDX-License-Identifier: MIT
// Circwait - Circular-wait analysis over lock event streams
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Cycle, CycleLink, EdgeType, EventKind, LevelVerdict, LockEvent,
	OrderingRule, RagEdge, RagNode, Resource, ResourceKind, ResourceNode,
	Severity, SourceLocation, ThreadContext, ThreadNode, VerdictStatus,
	AnalysisLevel,
} from "./types.ts";

export type {
	AnalysisConfig, EventStreamInput, FixStats, KnowledgeSnapshot, PatternStats,
	RecommenderWeights, ScoringWeights, SimulatorBudget,
} from "./zod-schemas.ts";

export type { ErrorCode, MalformedReason, ValidationError, ValidationResult } from "./errors.ts";

//==============================================================================
// Errors
//==============================================================================

export {
	CircwaitError, ErrorCodes, MalformedEventError,
	combineResults, exhaustive, invalidResult, validResult,
} from "./errors.ts";

//==============================================================================
// Configuration and Validation
//==============================================================================

export { defaultConfig, resolveConfig, silentLogger, type AnalysisConfigInput, type Logger } from "./config.ts";
export { streamFromEvents, validateEventStream, type EventStream } from "./validator.ts";
export { EventStreamSchema, AnalysisConfigSchema, KnowledgeSnapshotSchema } from "./zod-schemas.ts";
export { eventStreamSchema, knowledgeSnapshotSchema } from "./schemas.ts";

//==============================================================================
// Graph
//==============================================================================

export { ResourceAllocationGraph } from "./graph/rag.ts";
export { buildGraph, type BuildAnomaly, type BuildOptions, type BuildResult } from "./graph/builder.ts";
export { buildLockOrderGraph } from "./graph/lock-order.ts";
export { stronglyConnectedComponents } from "./graph/scc.ts";
export {
	describeCycle, findCycles, formatCycle,
	type CycleDetectionOptions, type CycleDetectionResult,
} from "./cycle-detector.ts";

//==============================================================================
// Analysis
//==============================================================================

export { FactTable, permissiveFacts, type ControlFlowFacts } from "./facts.ts";
export {
	LEVEL_ORDER, LockOrder, MultiLevelAnalyzer, TRANSITIONS,
	scoreCycle, severityOf, transition,
	type AnalysisOutcome, type AnalyzerOptions, type Budget, type ScoreBreakdown, type StageSignal, type Step,
} from "./analyzer/index.ts";
export {
	Machine, Simulator, replaySchedule,
	type ReplayResult, type ScheduleStep, type SimulationOutcome, type SimulationResult, type SimulatorOptions,
} from "./simulator/index.ts";

//==============================================================================
// Learning and Remediation
//==============================================================================

export { canonicalKinds, classifyPattern, computeSignature, type PatternName, type PatternSignature } from "./signature.ts";
export { KeyedLock, KnowledgeBase, type KnownFix, type KnowledgeStatistics, type PatternQuery } from "./knowledge-base.ts";
export { STRATEGY_CATALOG, recommend, type RecommendContext, type Strategy, type StrategyId } from "./recommender.ts";

//==============================================================================
// Pipeline
//==============================================================================

export { analyzeEventStream, type AnalysisReport, type AnalyzeOptions, type Finding } from "./pipeline.ts";
