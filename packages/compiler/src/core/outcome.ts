/**
 * Structured results for phases that short-circuit instead of reporting
 * straight into the context (parser, expression engine).
 */

import type { DiagnosticArgs, DiagnosticCode } from './diagnostics.ts'
import { getDiagnostic, interpolateMessage } from './diagnostics.ts'
import type { SourcePos } from './position.ts'

export interface Failure {
	readonly code: DiagnosticCode
	/** Absent when no location is meaningful */
	readonly pos?: SourcePos
	readonly args?: DiagnosticArgs
}

export type Outcome<T> =
	| { readonly succeeded: true; readonly value: T }
	| { readonly succeeded: false; readonly failure: Failure }

export function success<T>(value: T): Outcome<T> {
	return { succeeded: true, value }
}

export function failure(
	code: DiagnosticCode,
	pos?: SourcePos,
	args?: DiagnosticArgs
): Outcome<never> {
	return {
		failure: {
			code,
			...(pos ? { pos } : {}),
			...(args ? { args } : {}),
		},
		succeeded: false,
	}
}

/** Interpolated message for a failure, without location. */
export function failureMessage(f: Failure): string {
	return interpolateMessage(getDiagnostic(f.code).message, f.args)
}
