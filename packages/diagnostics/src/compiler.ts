/**
 * Compiler diagnostic definitions.
 *
 * Error code format: SW<PHASE><NUMBER>
 * - SWLEX: Lexer errors (001-099)
 * - SWPARSE: Parser errors (001-019), warnings (020-099)
 * - SWEXPR: Expression engine errors (001-099)
 * - SWTYPE: Type resolution errors (001-099)
 * - SWENTRY: Entry point errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (SWLEX001-099)
// =============================================================================

export const SWLEX001: DiagnosticDef = {
	code: 'SWLEX001',
	description: "This character isn't part of the patch language, so it was skipped.",
	message: 'unrecognized token',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character, or put it inside a `//` comment.',
}

// =============================================================================
// PARSER ERRORS (SWPARSE001-019)
// =============================================================================

export const SWPARSE001: DiagnosticDef = {
	code: 'SWPARSE001',
	description: 'The parser found a token it did not expect at this point.',
	message: 'expected {expected}, got `{found}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for typos or a missing separator.',
}

export const SWPARSE002: DiagnosticDef = {
	code: 'SWPARSE002',
	description: 'The input ended while something was still open.',
	message: 'expected {expected}, got EOF',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close every bracket and end every entry with `;`.',
}

export const SWPARSE003: DiagnosticDef = {
	code: 'SWPARSE003',
	description: 'Each argument of a function needs its own name.',
	message: 'argument `{name}` defined twice',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of the `{name}` arguments.',
}

export const SWPARSE004: DiagnosticDef = {
	code: 'SWPARSE004',
	description: 'Functions have to be defined above the place where they are called.',
	message: 'function `{name}` appears in expression but is not defined in scope',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Define `{name}` before this line, or check its spelling.',
}

export const SWPARSE005: DiagnosticDef = {
	code: 'SWPARSE005',
	description: 'Variables have to be assigned or passed as an argument before they are used.',
	message: 'variable `{name}` appears in expression but is not defined in scope',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Assign `{name}` before this line, or check its spelling.',
}

export const SWPARSE006: DiagnosticDef = {
	code: 'SWPARSE006',
	description: 'A function call opened a `(` that is never closed.',
	message: 'unexpected end of file in function call',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the missing `)`.',
}

export const SWPARSE007: DiagnosticDef = {
	code: 'SWPARSE007',
	description: 'An expression was expected here, but there was nothing.',
	message: 'empty expression in file',
	severity: DiagnosticSeverity.Error,
}

export const SWPARSE008: DiagnosticDef = {
	code: 'SWPARSE008',
	description: 'Only numbers, names, calls, operators and parentheses can appear in an expression.',
	message: 'unexpected token in expression: `{found}`',
	severity: DiagnosticSeverity.Error,
}

export const SWPARSE009: DiagnosticDef = {
	code: 'SWPARSE009',
	description: 'A call passes either every argument by name or every argument by position.',
	message: 'cannot mix named and ordered arguments in call to `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write every argument as `name = value`.',
}

// =============================================================================
// PARSER WARNINGS (SWPARSE020-099)
// =============================================================================

export const SWPARSE020: DiagnosticDef = {
	code: 'SWPARSE020',
	description: 'Inside this block the new `{name}` hides the one defined further out.',
	message: '`{name}` shadows a definition in an outer scope',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Rename it if you meant to use the outer `{name}`.',
}

// =============================================================================
// EXPRESSION ENGINE ERRORS (SWEXPR001-099)
// =============================================================================

export const SWEXPR001: DiagnosticDef = {
	code: 'SWEXPR001',
	description: 'A `)` closes a parenthesis that was never opened.',
	message: 'mismatched parens: skewed right',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the extra `)` or add the missing `(`.',
}

export const SWEXPR002: DiagnosticDef = {
	code: 'SWEXPR002',
	description: 'A `(` is never closed before the expression ends.',
	message: 'mismatched parens: skewed left',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the missing `)`.',
}

export const SWEXPR003: DiagnosticDef = {
	code: 'SWEXPR003',
	description: 'The expression produced no value.',
	message: 'zero values in expression',
	severity: DiagnosticSeverity.Error,
}

export const SWEXPR004: DiagnosticDef = {
	code: 'SWEXPR004',
	description: 'The expression has values that no operator combines.',
	message: 'too many values in expression',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Put an operator between neighbouring values.',
}

export const SWEXPR005: DiagnosticDef = {
	code: 'SWEXPR005',
	description: 'An operator is missing one of its operands.',
	message: 'not enough operands for operator `{op}`',
	severity: DiagnosticSeverity.Error,
}

export const SWEXPR006: DiagnosticDef = {
	code: 'SWEXPR006',
	description: 'The expression reads a variable the runtime scope has no value for.',
	message: 'attempted to access a nonexistent variable `{name}`',
	severity: DiagnosticSeverity.Error,
}

export const SWEXPR007: DiagnosticDef = {
	code: 'SWEXPR007',
	description: 'The expression calls a function the runtime scope does not provide.',
	message: 'function `{name}` is not bound in the runtime scope',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// TYPE ERRORS (SWTYPE001-099)
// =============================================================================

export const SWTYPE001: DiagnosticDef = {
	code: 'SWTYPE001',
	description: 'This value has a different type than the place it is used in.',
	message: 'type mismatch: expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
}

export const SWTYPE002: DiagnosticDef = {
	code: 'SWTYPE002',
	description: 'This operator does not work on values of these types.',
	message: 'operator `{op}` cannot be applied to {left} and {right}',
	severity: DiagnosticSeverity.Error,
}

export const SWTYPE003: DiagnosticDef = {
	code: 'SWTYPE003',
	description: 'This operator does not work on a value of this type.',
	message: 'operator `{op}` cannot be applied to {operand}',
	severity: DiagnosticSeverity.Error,
}

export const SWTYPE004: DiagnosticDef = {
	code: 'SWTYPE004',
	description: 'Every path through this function calls the function again, so it never yields a value.',
	message: 'cannot infer return type of recursive function `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a branch that returns without calling `{name}`.',
}

export const SWTYPE005: DiagnosticDef = {
	code: 'SWTYPE005',
	description: 'The type of this definition depends only on itself.',
	message: 'type of `{name}` could not be determined',
	severity: DiagnosticSeverity.Error,
}

export const SWTYPE006: DiagnosticDef = {
	code: 'SWTYPE006',
	description: 'The call passes more arguments than the function accepts.',
	message: 'function `{name}` takes {expected} argument(s), got {found}',
	severity: DiagnosticSeverity.Error,
}

export const SWTYPE007: DiagnosticDef = {
	code: 'SWTYPE007',
	description: 'Named arguments have to match a parameter of the function.',
	message: 'function `{name}` has no argument named `{arg}`',
	severity: DiagnosticSeverity.Error,
}

export const SWTYPE008: DiagnosticDef = {
	code: 'SWTYPE008',
	description: 'Each parameter can only be given once per call.',
	message: 'argument `{arg}` passed twice in call to `{name}`',
	severity: DiagnosticSeverity.Error,
}

export const SWTYPE009: DiagnosticDef = {
	code: 'SWTYPE009',
	description: 'This parameter has no default value, so every call has to pass it.',
	message: 'missing argument `{arg}` in call to `{name}`',
	severity: DiagnosticSeverity.Error,
}

export const SWTYPE010: DiagnosticDef = {
	code: 'SWTYPE010',
	description: 'A block needs at least one entry to produce a value.',
	message: 'block has no entries',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add an entry such as `+ 1;`.',
}

export const SWTYPE011: DiagnosticDef = {
	code: 'SWTYPE011',
	description: 'Block entries are combined with arithmetic or logical operators only.',
	message: 'operator `{op}` cannot combine block entries',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// ENTRY POINT ERRORS (SWENTRY001-099)
// =============================================================================

export const SWENTRY001: DiagnosticDef = {
	code: 'SWENTRY001',
	description: 'The audio backend starts playback by calling this function.',
	message: 'entry point `{name}` is not defined',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Define it at the top level, for example `[{name} time] sin(time)`.',
}

export const SWENTRY002: DiagnosticDef = {
	code: 'SWENTRY002',
	description: 'The audio backend calls the entry point with a fixed signature.',
	message: 'entry point `{name}` has signature {found}, expected {expected}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Entry point errors
	SWENTRY001,
	SWENTRY002,
	// Expression engine errors
	SWEXPR001,
	SWEXPR002,
	SWEXPR003,
	SWEXPR004,
	SWEXPR005,
	SWEXPR006,
	SWEXPR007,
	// Lexer errors
	SWLEX001,
	// Parser errors
	SWPARSE001,
	SWPARSE002,
	SWPARSE003,
	SWPARSE004,
	SWPARSE005,
	SWPARSE006,
	SWPARSE007,
	SWPARSE008,
	SWPARSE009,
	// Parser warnings
	SWPARSE020,
	// Type errors
	SWTYPE001,
	SWTYPE002,
	SWTYPE003,
	SWTYPE004,
	SWTYPE005,
	SWTYPE006,
	SWTYPE007,
	SWTYPE008,
	SWTYPE009,
	SWTYPE010,
	SWTYPE011,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
