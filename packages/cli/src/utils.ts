import {
	type CompilationContext,
	DEFAULT_ENTRY_POINT,
	type EntryPointSignature,
	type Failure,
	failureMessage,
} from '@sinewave/compiler'
import {
	type DiagnosticArgs,
	type DiagnosticDef,
	interpolateMessage,
	SWCLI001,
	SWCLI002,
	SWCLI003,
	SWCLI004,
	SWCLI005,
} from '@sinewave/diagnostics'

export interface VariableBinding {
	readonly name: string
	readonly value: number
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function formatCliError(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCliError(SWCLI001, { path: filePath })
	}
	return formatCliError(SWCLI002, { reason: getErrorMessage(error) })
}

export function formatInvalidBinding(binding: string): string {
	return formatCliError(SWCLI003, { binding })
}

/** Every diagnostic of a failed compilation followed by the summary line. */
export function formatCompileFailure(context: CompilationContext): string {
	const summary = formatCliError(SWCLI004, { count: context.getErrorCount() })
	const details = context.formatAllDiagnostics()
	return details ? `${details}\n\n${summary}` : summary
}

export function formatEvaluationError(failure: Failure): string {
	return formatCliError(SWCLI005, { reason: failureMessage(failure) })
}

const IDENTIFIER = /^[A-Za-z_~'][A-Za-z0-9_~']*$/

/** Parse `name=value`; null when either side is malformed. */
export function parseBinding(text: string): VariableBinding | null {
	const separator = text.indexOf('=')
	if (separator <= 0) return null
	const name = text.slice(0, separator).trim()
	const raw = text.slice(separator + 1).trim()
	const value = Number(raw)
	if (!IDENTIFIER.test(name) || raw === '' || Number.isNaN(value)) return null
	return { name, value }
}

export function entrySignature(name: string | undefined): EntryPointSignature {
	return name ? { ...DEFAULT_ENTRY_POINT, name } : DEFAULT_ENTRY_POINT
}
