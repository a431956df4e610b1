// SPDX-License-Identifier: MIT
// Circwait Error Types
// Error domain for event ingestion, schedule replay and input validation

import type { LockEvent } from "./types.ts";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Ingestion errors
	MalformedEvent: "MalformedEvent",
	UnknownResourceReference: "UnknownResourceReference",
	EmptyEventStream: "EmptyEventStream",

	// Lookup errors
	UnknownThread: "UnknownThread",
	InvalidSchedule: "InvalidSchedule",

	// Validation errors
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Circwait Error Class
//==============================================================================

export class CircwaitError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "CircwaitError";
		this.code = code;
	}

	/**
	 * Create an UnknownResourceReference error
	 */
	static unknownResource(resourceId: string, eventId: string): CircwaitError {
		return new CircwaitError(
			ErrorCodes.UnknownResourceReference,
			"Event " + eventId + " references undeclared resource " + JSON.stringify(resourceId),
		);
	}

	/**
	 * Create an EmptyEventStream error
	 */
	static emptyStream(): CircwaitError {
		return new CircwaitError(
			ErrorCodes.EmptyEventStream,
			"Event stream is empty: nothing to analyze",
		);
	}

	/**
	 * Create an UnknownThread error
	 */
	static unknownThread(threadId: string): CircwaitError {
		return new CircwaitError(ErrorCodes.UnknownThread, "Unknown thread: " + threadId);
	}

	/**
	 * Create an InvalidSchedule error
	 */
	static invalidSchedule(step: number, message: string): CircwaitError {
		return new CircwaitError(
			ErrorCodes.InvalidSchedule,
			"Invalid schedule at step " + String(step) + ": " + message,
		);
	}

	/**
	 * Create a ValidationError
	 */
	static validation(
		path: string,
		message: string,
		value?: unknown,
	): CircwaitError {
		return new CircwaitError(
			ErrorCodes.ValidationError,
			"Validation error at " +
				path +
				": " +
				message +
				(value !== undefined ? " (value: " + JSON.stringify(value) + ")" : ""),
		);
	}
}

//==============================================================================
// Malformed Events
//==============================================================================

export type MalformedReason = "release-unheld" | "reacquire-held";

/**
 * Raised when a thread's event sequence is ill-formed. Fatal for that
 * thread's contribution to the graph only.
 */
export class MalformedEventError extends CircwaitError {
	readonly event: LockEvent;
	readonly reason: MalformedReason;

	constructor(event: LockEvent, reason: MalformedReason) {
		super(ErrorCodes.MalformedEvent, describeMalformed(event, reason));
		this.name = "MalformedEventError";
		this.event = event;
		this.reason = reason;
	}

	get threadId(): string {
		return this.event.threadId;
	}
}

function describeMalformed(event: LockEvent, reason: MalformedReason): string {
	const where = "line " + String(event.location.line);
	switch (reason) {
	case "release-unheld":
		return `Malformed event ${event.id} (${where}): thread "${event.threadId}" releases "${event.resourceId}" which it does not hold`;
	case "reacquire-held":
		return `Malformed event ${event.id} (${where}): thread "${event.threadId}" acquires "${event.resourceId}" which it already holds`;
	default:
		return exhaustive(reason);
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export type ValidationResult<T> =
	| { valid: true; errors: []; value: T }
	| { valid: false; errors: ValidationError[] };

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

/**
 * Combine multiple validation results.
 */
export function combineResults<T>(
	results: ValidationResult<T>[],
): ValidationResult<T[]> {
	const values: T[] = [];
	const allErrors: ValidationError[] = [];
	for (const r of results) {
		if (r.valid) values.push(r.value);
		else allErrors.push(...r.errors);
	}
	if (allErrors.length > 0) {
		return invalidResult(allErrors);
	}
	return validResult(values);
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (verdict.status) {
 *   case "plausible": return ...;
 *   case "implausible": return ...;
 *   default:
 *     exhaustive(verdict.status); // Type error if a status is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
