// SPDX-License-Identifier: MIT
// Circwait Zod Schemas
// Single source of truth for the event stream input and the analysis config.
//
// The input schemas describe what a source-analysis front-end emits; the
// normalized shapes the analysis works on (LockEvent, Resource) live in
// types.ts and are produced by validator.ts.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

const Identifier = z.string().min(1);

const UnitInterval = z.number().min(0).max(1);

export const ResourceKindSchema = z
	.enum(["mutex", "semaphore", "channel", "rwlock", "unknown"])
	.meta({ id: "ResourceKind", description: "Kind of acquirable resource" });

export const EventKindSchema = z
	.enum(["acquire", "release", "wait"])
	.meta({ id: "EventKind", description: "Lock event kind" });

//==============================================================================
// Event Stream
//==============================================================================

export const SourceLocationSchema = z.object({
	file: z.string().optional(),
	line: z.number().int().nonnegative(),
	column: z.number().int().nonnegative().optional(),
	function: z.string().optional(),
}).meta({ id: "SourceLocation", description: "Source position of an event" });

export const EventInputSchema = z.object({
	id: Identifier.optional(),
	threadId: Identifier,
	kind: EventKindSchema,
	resourceId: Identifier,
	location: SourceLocationSchema.optional(),
}).meta({ id: "LockEvent", description: "One acquire/release/wait event issued by a thread" });

export const ResourceDeclSchema = z.object({
	id: Identifier,
	kind: ResourceKindSchema.default("mutex"),
	scope: z.string().optional(),
}).meta({ id: "ResourceDecl", description: "Declared acquirable resource" });

const EventPair = z.tuple([Identifier, Identifier]);

export const ControlFlowFactsSchema = z.object({
	/** Events not reachable from program entry by any syntactic path */
	unreachable: z.array(Identifier).default([]),
	/** Extra reachability pairs across the default program order */
	reachable: z.array(EventPair).default([]),
	/** Events on mutually exclusive branches of one conditional */
	exclusive: z.array(EventPair).default([]),
}).meta({ id: "ControlFlowFacts", description: "Control-flow fact table from the front-end" });

export const OrderingRuleSchema = z.object({
	before: Identifier,
	after: Identifier,
}).meta({ id: "OrderingRule", description: "Declared lock-order constraint" });

export const OrderingsSchema = z.object({
	rules: z.array(OrderingRuleSchema).default([]),
	/** Resource hierarchy: lower levels are acquired first */
	levels: z.record(Identifier, z.number().int()).default({}),
}).meta({ id: "Orderings", description: "Declared ordering annotations and hierarchy levels" });

export const EventStreamSchema = z.object({
	resources: z.array(ResourceDeclSchema).optional(),
	events: z.array(EventInputSchema),
	facts: ControlFlowFactsSchema.optional(),
	orderings: OrderingsSchema.optional(),
}).meta({ id: "EventStream", description: "Normalized event stream produced by a source-analysis front-end" });

export type EventInput = z.infer<typeof EventInputSchema>;
export type ResourceDecl = z.infer<typeof ResourceDeclSchema>;
export type ControlFlowFactsInput = z.infer<typeof ControlFlowFactsSchema>;
export type OrderingsInput = z.infer<typeof OrderingsSchema>;
export type EventStreamInput = z.input<typeof EventStreamSchema>;
export type ParsedEventStream = z.infer<typeof EventStreamSchema>;

//==============================================================================
// Analysis Configuration
//==============================================================================

export const ScoringWeightsSchema = z.object({
	structural: UnitInterval.default(0.4),
	diversity: UnitInterval.default(0.2),
	history: UnitInterval.default(0.4),
	/** Confirmed-rate assumed for signatures the knowledge base has never seen */
	unknownPrior: UnitInterval.default(0.5),
}).meta({ id: "ScoringWeights" });

export const SimulatorBudgetSchema = z.object({
	maxStates: z.number().int().positive().default(10_000),
	maxDepth: z.number().int().positive().optional(),
	timeBudgetMs: z.number().int().positive().optional(),
}).meta({ id: "SimulatorBudget" });

export const RecommenderWeightsSchema = z.object({
	applicability: UnitInterval.default(0.6),
	history: UnitInterval.default(0.4),
	maxStrategies: z.number().int().positive().default(3),
}).meta({ id: "RecommenderWeights" });

export const AnalysisConfigSchema = z.object({
	maxCycleLength: z.number().int().min(2).default(8),
	maxCycles: z.number().int().positive().default(256),
	confidenceThreshold: UnitInterval.default(0.6),
	/** Treat nesting order seen consistently in several threads as an ordering rule */
	inferOrderings: z.boolean().default(false),
	/** snapshot: replay the stream as one interleaving; lock-order: per-thread acquisition order */
	graphMode: z.enum(["snapshot", "lock-order"]).default("snapshot"),
	strict: z.boolean().default(false),
	candidateBudget: z.number().int().nonnegative().optional(),
	deadlineMs: z.number().int().positive().optional(),
	scoring: ScoringWeightsSchema,
	simulator: SimulatorBudgetSchema,
	recommender: RecommenderWeightsSchema,
}).meta({ id: "AnalysisConfig", description: "Tunable analysis parameters" });

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;
export type SimulatorBudget = z.infer<typeof SimulatorBudgetSchema>;
export type RecommenderWeights = z.infer<typeof RecommenderWeightsSchema>;
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

//==============================================================================
// Knowledge Base Snapshot
//==============================================================================

export const FixStatsSchema = z.object({
	strategyId: Identifier,
	timesUsed: z.number().int().nonnegative(),
	timesSuccessful: z.number().int().nonnegative(),
	ratingSum: z.number().nonnegative(),
	ratingCount: z.number().int().nonnegative(),
});

export const PatternStatsSchema = z.object({
	key: Identifier,
	pattern: z.string(),
	kinds: z.array(ResourceKindSchema),
	occurrences: z.number().int().nonnegative(),
	confirmed: z.number().int().nonnegative(),
	refuted: z.number().int().nonnegative(),
	fixes: z.array(FixStatsSchema),
});

export const KnowledgeSnapshotSchema = z.object({
	version: z.literal(1),
	patterns: z.array(PatternStatsSchema),
}).meta({ id: "KnowledgeSnapshot", description: "Serializable knowledge base contents" });

export type FixStats = z.infer<typeof FixStatsSchema>;
export type PatternStats = z.infer<typeof PatternStatsSchema>;
export type KnowledgeSnapshot = z.infer<typeof KnowledgeSnapshotSchema>;
