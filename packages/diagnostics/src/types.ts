/**
 * Severity of a catalog entry. Errors stop the phase that follows;
 * warnings are reported and compilation carries on.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Catalog code: `SW`, the phase (`LEX`, `PARSE`, `EXPR`, `TYPE`, `ENTRY`
 * or `CLI`) and a three digit number, e.g. `SWPARSE004`.
 */
export type DiagnosticCodeText = `SW${string}`

/**
 * One catalog entry. `message` and `suggestion` may hold `{name}`
 * placeholders filled from the arguments given at the report site.
 */
export interface DiagnosticDef {
	readonly code: DiagnosticCodeText
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

export type DiagnosticArgs = Record<string, string | number>
