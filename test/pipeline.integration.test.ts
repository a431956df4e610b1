// SPDX-License-Identifier: MIT
// Circwait Pipeline - Integration Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { silentLogger } from "../src/config.ts";
import { CircwaitError, ErrorCodes, MalformedEventError } from "../src/errors.ts";
import { KnowledgeBase } from "../src/knowledge-base.ts";
import { analyzeEventStream, type AnalysisReport, type Finding } from "../src/pipeline.ts";
import type { EventStreamInput } from "../src/zod-schemas.ts";
import {
	classicInversion,
	events,
	gatedInversion,
	recordingLogger,
	sequentialInversion,
	threeThreadRing,
} from "./fixtures.ts";

const quiet = { logger: silentLogger };

function onlyFinding(report: AnalysisReport): Finding {
	assert.equal(report.findings.length, 1);
	const [finding] = report.findings;
	if (!finding) assert.fail("expected one finding");
	return finding;
}

function near(actual: number | undefined, expected: number): void {
	assert.ok(actual !== undefined && Math.abs(actual - expected) < 1e-9, `${String(actual)} is not ${expected}`);
}

/**
 * A before B in two threads, B before C in two more, and C and A nested
 * both ways by the last two
 */
function layeredInversions(): EventStreamInput {
	const nest = (thread: string, outer: string, inner: string) => events(
		[thread, "acquire", outer],
		[thread, "acquire", inner],
		[thread, "release", inner],
		[thread, "release", outer],
	);
	return {
		events: [
			...nest("T1", "A", "B"),
			...nest("T2", "A", "B"),
			...nest("T3", "B", "C"),
			...nest("T4", "B", "C"),
			...nest("T5", "C", "A"),
			...nest("T6", "A", "C"),
		],
	};
}

describe("analyzeEventStream - verdicts", () => {
	it("confirms the classic inversion and recommends fixes", async () => {
		const logger = recordingLogger();
		const report = await analyzeEventStream(classicInversion(), { logger });
		const finding = onlyFinding(report);

		assert.equal(finding.verdict, "confirmed");
		assert.equal(finding.confidence, 1);
		assert.equal(finding.severity, "CRITICAL");
		assert.equal(finding.lowConfidence, false);
		assert.deepEqual(finding.history.map((v) => v.level), ["static", "control-flow", "contextual", "probabilistic", "simulation"]);
		assert.deepEqual(finding.history[4], {
			level: "simulation",
			status: "confirmed",
			confidence: 1,
			rationale: "participants reached their blocking acquisitions in cycle order (3 states, greedy)",
		});
		assert.deepEqual(finding.strategies.map((s) => s.id), ["lock-ordering", "bounded-wait", "resource-hierarchy"]);
		assert.equal(finding.description,
			"Circular wait: thread \"T1\" holds \"A\" and waits for \"B\" held by thread \"T2\", " +
			"thread \"T2\" holds \"B\" and waits for \"A\" held by thread \"T1\".");
		assert.ok(logger.infos.includes("[Pipeline] 1 candidate cycle(s) in 1 component(s)"));
	});

	it("prunes a cycle that acquires against a declared order", async () => {
		const finding = onlyFinding(await analyzeEventStream({
			...classicInversion(),
			orderings: { rules: [{ before: "A", after: "B" }] },
		}, quiet));
		assert.equal(finding.verdict, "implausible");
		assert.equal(finding.severity, "LOW");
		assert.equal(finding.simulation, undefined);
		assert.deepEqual(finding.strategies, []);
		assert.equal(finding.history.length, 3);
	});

	it("prunes a cycle whose acquisition is unreachable", async () => {
		const finding = onlyFinding(await analyzeEventStream({
			...classicInversion(),
			facts: { unreachable: ["T2#1"] },
		}, quiet));
		assert.equal(finding.verdict, "implausible");
		assert.equal(finding.history.length, 1);
	});

	it("prunes a cycle whose hold and wait lie on exclusive paths", async () => {
		const finding = onlyFinding(await analyzeEventStream({
			...classicInversion(),
			facts: { exclusive: [["T1#0", "T1#1"]] },
		}, quiet));
		assert.equal(finding.verdict, "implausible");
		assert.equal(finding.severity, "LOW");
		assert.equal(finding.simulation, undefined);
		assert.deepEqual(finding.history.map((v) => v.level), ["static", "control-flow"]);
		assert.deepEqual(finding.history[1], {
			level: "control-flow",
			status: "implausible",
			confidence: 0,
			rationale: "thread \"T1\" cannot reach T1#1 (\"B\") after T1#0 (\"A\") on any path",
		});
	});

	it("confirms a three-thread ring", async () => {
		const finding = onlyFinding(await analyzeEventStream(threeThreadRing(), quiet));
		assert.equal(finding.cycle.length, 3);
		assert.equal(finding.verdict, "confirmed");
		assert.equal(finding.simulation?.phase, "greedy");
		assert.equal(finding.signature.pattern, "dining-philosophers");
	});

	it("keeps a mixed-kind ring as low-confidence plausible without simulating", async () => {
		const finding = onlyFinding(await analyzeEventStream({
			...threeThreadRing(),
			resources: [{ id: "A", kind: "mutex" }, { id: "B", kind: "semaphore" }, { id: "C", kind: "channel" }],
		}, quiet));
		assert.equal(finding.verdict, "plausible");
		assert.equal(finding.lowConfidence, true);
		assert.equal(finding.severity, "MEDIUM");
		assert.equal(finding.simulation, undefined);
		assert.deepEqual(finding.strategies, []);
	});
});

describe("analyzeEventStream - lock-order mode", () => {
	it("finds nothing in a sequential run of a snapshot", async () => {
		const report = await analyzeEventStream(sequentialInversion(), quiet);
		assert.deepEqual(report.findings, []);
	});

	it("confirms an inversion that only shows up across interleavings", async () => {
		const finding = onlyFinding(await analyzeEventStream(sequentialInversion(), {
			config: { graphMode: "lock-order" },
			...quiet,
		}));
		assert.equal(finding.verdict, "confirmed");
		assert.deepEqual(finding.simulation?.schedule, [
			{ threadId: "T1", eventId: "T1#0" },
			{ threadId: "T2", eventId: "T2#0" },
		]);
	});

	it("refutes an inversion serialized by a gate lock", async () => {
		const finding = onlyFinding(await analyzeEventStream(gatedInversion(), {
			config: { graphMode: "lock-order" },
			...quiet,
		}));
		assert.equal(finding.verdict, "refuted");
		assert.equal(finding.confidence, 0);
		assert.equal(finding.severity, "LOW");
		assert.equal(finding.simulation?.phase, "exhaustive");
		assert.equal(finding.history[4]?.status, "refuted");
		assert.deepEqual(finding.strategies, []);
	});

	it("reports inconclusive when the simulator budget runs out", async () => {
		const finding = onlyFinding(await analyzeEventStream(gatedInversion(), {
			config: { graphMode: "lock-order", simulator: { maxStates: 2 } },
			...quiet,
		}));
		assert.equal(finding.verdict, "inconclusive");
		assert.equal(finding.confidence, 0.8);
		assert.equal(finding.history[4]?.rationale, "state budget of 2 exhausted (5 states, exhaustive)");
	});

	it("prunes every cycle once nesting order is inferred", async () => {
		const plain = await analyzeEventStream(layeredInversions(), {
			config: { graphMode: "lock-order" },
			...quiet,
		});
		assert.equal(plain.findings.length, 5);
		assert.equal(plain.summary.byVerdict.confirmed, 5);

		const inferred = await analyzeEventStream(layeredInversions(), {
			config: { graphMode: "lock-order", inferOrderings: true },
			...quiet,
		});
		assert.equal(inferred.summary.byVerdict.implausible, 5);
	});
});

describe("analyzeEventStream - budgets", () => {
	it("reports candidates beyond the candidate budget as inconclusive", async () => {
		const finding = onlyFinding(await analyzeEventStream(classicInversion(), {
			config: { candidateBudget: 0 },
			...quiet,
		}));
		assert.equal(finding.verdict, "inconclusive");
		assert.equal(finding.severity, "MEDIUM");
		assert.deepEqual(finding.history.map((v) => v.status), ["inconclusive"]);
		assert.equal(finding.simulation, undefined);
	});

	it("reports candidates past the deadline as inconclusive", async () => {
		let clock = 0;
		const now = (): number => {
			clock += 1000;
			return clock;
		};
		const finding = onlyFinding(await analyzeEventStream(classicInversion(), {
			config: { deadlineMs: 1 },
			now,
			...quiet,
		}));
		assert.equal(finding.verdict, "inconclusive");
	});
});

describe("analyzeEventStream - knowledge base", () => {
	it("records every verdict and scores repeat signatures from history", async () => {
		const knowledge = new KnowledgeBase();
		const first = onlyFinding(await analyzeEventStream(classicInversion(), { knowledge, ...quiet }));
		near(first.history[3]?.confidence, 0.8);

		const second = onlyFinding(await analyzeEventStream(classicInversion(), { knowledge, ...quiet }));
		near(second.history[3]?.confidence, 1);
		assert.equal(second.signature.key, first.signature.key);

		const query = knowledge.query(first.signature);
		assert.equal(query.occurrences, 2);
		assert.equal(query.confirmedRate, 1);
	});
});

describe("analyzeEventStream - report", () => {
	it("summarizes findings by verdict and severity", async () => {
		const report = await analyzeEventStream(classicInversion(), quiet);
		assert.deepEqual(report.summary, {
			bySeverity: { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 1 },
			byVerdict: { plausible: 0, implausible: 0, confirmed: 1, refuted: 0, inconclusive: 0 },
		});
		assert.equal(report.truncated, false);
		assert.deepEqual(report.buildErrors, []);
	});

	it("collects malformed events and keeps going", async () => {
		const report = await analyzeEventStream({
			events: [...classicInversion().events, ...events(["T3", "release", "Z"])],
		}, quiet);
		assert.equal(report.findings.length, 1);
		assert.equal(report.buildErrors.length, 1);
		assert.equal(report.buildErrors[0]?.reason, "release-unheld");
	});

	it("throws on a malformed event in strict mode", async () => {
		await assert.rejects(
			analyzeEventStream({ events: events(["T1", "release", "A"]) }, { config: { strict: true }, ...quiet }),
			(err: unknown) => err instanceof MalformedEventError && err.threadId === "T1",
		);
	});
});

describe("analyzeEventStream - invalid input", () => {
	it("rejects input that does not match the schema", async () => {
		await assert.rejects(
			analyzeEventStream({ events: "none" }, quiet),
			(err: unknown) => err instanceof CircwaitError && err.code === ErrorCodes.ValidationError,
		);
	});

	it("rejects duplicate event ids", async () => {
		await assert.rejects(
			analyzeEventStream({
				events: [
					{ id: "e1", threadId: "T1", kind: "acquire", resourceId: "A" },
					{ id: "e1", threadId: "T2", kind: "acquire", resourceId: "B" },
				],
			}, quiet),
			(err: unknown) => err instanceof CircwaitError && err.code === ErrorCodes.ValidationError,
		);
	});

	it("rejects an empty stream", async () => {
		await assert.rejects(
			analyzeEventStream({ events: [] }, quiet),
			(err: unknown) => err instanceof CircwaitError && err.code === ErrorCodes.EmptyEventStream,
		);
	});

	it("rejects an out-of-range configuration", async () => {
		await assert.rejects(
			analyzeEventStream(classicInversion(), { config: { maxCycleLength: 1 }, ...quiet }),
			(err: unknown) => err instanceof CircwaitError && err.code === ErrorCodes.ValidationError,
		);
	});
});
