/**
 * The part of the shared catalog the compiler reports from: lexer, parser,
 * expression engine, checker and entry-point codes. CLI codes stay out so a
 * compile phase cannot emit one.
 */

import { COMPILER_DIAGNOSTICS } from '@sinewave/diagnostics'

export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@sinewave/diagnostics'

export type DiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof COMPILER_DIAGNOSTICS)[typeof code] {
	return COMPILER_DIAGNOSTICS[code]
}
