// SPDX-License-Identifier: MIT
// Circwait Pattern Signatures
// Order-independent fingerprints of circular waits for knowledge base lookup

import { createHash } from "node:crypto";
import type { Cycle, Resource, ResourceKind, ThreadContext } from "./types.ts";

//==============================================================================
// Types
//==============================================================================

export type PatternName =
	| "classic-two-thread"
	| "dining-philosophers"
	| "nested-acquisition"
	| "mixed-kind"
	| "generic";

export interface SignatureFeatures {
	/** Thread participants */
	length: number;
	distinctKinds: number;
	/** Deepest simultaneous hold count among participant threads */
	maxNesting: number;
	/** All resources declared in the same scope */
	sharedScope: boolean;
	/** Links where the blocking event is a wait rather than an acquire */
	waitLinks: number;
}

export interface PatternSignature {
	key: string;
	pattern: PatternName;
	/** Resource kinds in canonical cyclic order */
	kinds: ResourceKind[];
	features: SignatureFeatures;
}

export interface SignatureContext {
	resources: ReadonlyMap<string, Resource>;
	threads: ReadonlyMap<string, ThreadContext>;
}

//==============================================================================
// Signature Computation
//==============================================================================

/**
 * Fingerprint a cycle. Resource identities are dropped; what remains is the
 * kind sequence (canonical under rotation and reversal) plus acquisition
 * context, so structurally equal deadlocks in different code share a key.
 */
export function computeSignature(cycle: Cycle, ctx: SignatureContext): PatternSignature {
	const kinds = canonicalKinds(
		cycle.resources.map((id) => ctx.resources.get(id)?.kind ?? "unknown"),
	);
	const features: SignatureFeatures = {
		length: cycle.length,
		distinctKinds: new Set(kinds).size,
		maxNesting: maxNesting(cycle, ctx.threads),
		sharedScope: sharedScope(cycle, ctx.resources),
		waitLinks: countWaitLinks(cycle, ctx.threads),
	};
	const pattern = classifyPattern(features);
	return { key: signatureKey(pattern, kinds, features), pattern, kinds, features };
}

/** Smallest rotation of the sequence or of its reverse */
export function canonicalKinds(kinds: readonly ResourceKind[]): ResourceKind[] {
	let best: ResourceKind[] = [...kinds];
	let bestKey = best.join(",");
	for (const seq of [[...kinds], [...kinds].reverse()]) {
		for (let i = 0; i < seq.length; i++) {
			const rotated = [...seq.slice(i), ...seq.slice(0, i)];
			const key = rotated.join(",");
			if (key < bestKey) { best = rotated; bestKey = key; }
		}
	}
	return best;
}

export function classifyPattern(features: SignatureFeatures): PatternName {
	if (features.distinctKinds > 1) return "mixed-kind";
	if (features.maxNesting >= 3) return "nested-acquisition";
	if (features.length === 2) return "classic-two-thread";
	if (features.length >= 3) return "dining-philosophers";
	return "generic";
}

function signatureKey(pattern: PatternName, kinds: ResourceKind[], features: SignatureFeatures): string {
	const canonical = JSON.stringify({
		pattern,
		kinds,
		length: features.length,
		maxNesting: Math.min(features.maxNesting, 4),
		sharedScope: features.sharedScope,
		waitLinks: features.waitLinks,
	});
	const hash = createHash("sha256");
	hash.update(canonical, "utf8");
	return `circwait-sha256:${hash.digest("hex").slice(0, 32)}`;
}

//==============================================================================
// Features
//==============================================================================

function maxNesting(cycle: Cycle, threads: ReadonlyMap<string, ThreadContext>): number {
	let deepest = 0;
	for (const threadId of cycle.threads) {
		const events = threads.get(threadId)?.events ?? [];
		let depth = 0;
		for (const event of events) {
			if (event.kind === "acquire") depth++;
			else if (event.kind === "release") depth = Math.max(0, depth - 1);
			deepest = Math.max(deepest, depth);
		}
	}
	return deepest;
}

function sharedScope(cycle: Cycle, resources: ReadonlyMap<string, Resource>): boolean {
	const scopes = new Set(cycle.resources.map((id) => resources.get(id)?.scope));
	const [only] = scopes;
	return scopes.size === 1 && only !== undefined;
}

function countWaitLinks(cycle: Cycle, threads: ReadonlyMap<string, ThreadContext>): number {
	return cycle.links.filter((link) => {
		const events = threads.get(link.threadId)?.events ?? [];
		return events.find((e) => e.id === link.waitEventId)?.kind === "wait";
	}).length;
}
