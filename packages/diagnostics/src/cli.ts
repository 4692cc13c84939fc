/**
 * CLI diagnostic definitions.
 *
 * Error code format: SWCLI<NUMBER>
 * - SWCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (SWCLI001-099)
// =============================================================================

export const SWCLI001: DiagnosticDef = {
	code: 'SWCLI001',
	description: 'There is no patch file at this path.',
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const SWCLI002: DiagnosticDef = {
	code: 'SWCLI002',
	description: "The file exists but it can't be opened.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const SWCLI003: DiagnosticDef = {
	code: 'SWCLI003',
	description: 'Variable bindings are written as a name, an equals sign and a number.',
	message: 'invalid variable binding "{binding}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write the binding as `--var time=0.5`.',
}

export const SWCLI004: DiagnosticDef = {
	code: 'SWCLI004',
	description: 'The patch has errors, so no entry point could be produced.',
	message: 'compilation failed with {count} error(s)',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Fix the errors listed above and run the command again.',
}

export const SWCLI005: DiagnosticDef = {
	code: 'SWCLI005',
	description: 'The expression compiled, but evaluating it with the given bindings failed.',
	message: 'evaluation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Bind every variable the expression uses with `--var name=value`.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	SWCLI001,
	SWCLI002,
	SWCLI003,
	SWCLI004,
	SWCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
