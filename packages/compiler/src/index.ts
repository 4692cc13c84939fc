/**
 * sinewave compiler front end.
 *
 * Phases share one CompilationContext:
 * 1. Tokenization (source → tokens)
 * 2. Parsing (tokens → AST, declaring names in the scope table)
 * 3. Checking (return types, operator and call typing)
 * 4. Entry point resolution
 *
 * Any error stops the pipeline after its phase; diagnostics stay in the
 * returned context either way.
 */

import { check } from './check/checker.ts'
import {
	DEFAULT_ENTRY_POINT,
	type EntryPoint,
	type EntryPointSignature,
	resolveEntryPoint,
} from './check/entry.ts'
import { CompilationContext } from './core/context.ts'
import type { Item } from './core/nodes.ts'
import { tokenize } from './lex/tokenizer.ts'
import { parse } from './parse/parser.ts'
import type { FunctionStore } from './scope/functions.ts'
import { declareIntrinsics, type IntrinsicSpec, STANDARD_INTRINSICS } from './scope/intrinsics.ts'
import type { TypeTable } from './scope/table.ts'

export {
	type CheckResult,
	check,
	DEFAULT_ENTRY_POINT,
	type EntryPoint,
	type EntryPointSignature,
	formatSignature,
	resolveEntryPoint,
} from './check/index.ts'
export * from './core/index.ts'
export {
	Bindings,
	bindIntrinsics,
	type CallValue,
	type CompiledCall,
	CompiledExpression,
	type CompiledToken,
	compileExpression,
	compileExpressionSource,
	evaluatePostfix,
	type ExpressionSourceOptions,
	type ExpressionSourceResult,
	type ExprToken,
	FALSE,
	fromBool,
	isTruthy,
	type NameResolver,
	type PostfixToken,
	type RuntimeFunction,
	type RuntimeScope,
	scopeResolver,
	TRUE,
	toExprTokens,
	toPostfix,
} from './expr/index.ts'
export { type TokenizeResult, tokenize } from './lex/index.ts'
export { type ParseResult, parse, parseExpression } from './parse/index.ts'
export * from './scope/index.ts'

export interface CompileOptions {
	/** Source name used in diagnostics */
	filename?: string
	/** Required entry point; null skips the lookup */
	entryPoint?: EntryPointSignature | null
	/** Functions available without a definition */
	intrinsics?: readonly IntrinsicSpec[]
}

/** What a backend consumes: the checked AST plus its symbol tables. */
export interface CompiledProgram {
	readonly items: readonly Item[]
	readonly types: TypeTable
	readonly functions: FunctionStore
	readonly entryPoint: EntryPoint | null
}

export type CompileResult =
	| {
			readonly succeeded: true
			readonly program: CompiledProgram
			readonly context: CompilationContext
	  }
	| { readonly succeeded: false; readonly context: CompilationContext }

/**
 * Compile source text down to a checked program.
 *
 * @example
 * ```ts
 * const result = compile('[main t] sin(t * 440)', { filename: 'tone.sw' })
 * if (!result.succeeded) console.error(result.context.formatAllDiagnostics())
 * ```
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
	const context = new CompilationContext(source, options.filename)
	declareIntrinsics(context, options.intrinsics ?? STANDARD_INTRINSICS)

	// Phase 1: Tokenization
	if (!tokenize(context).succeeded) return { context, succeeded: false }

	// Phase 2: Parsing
	const parsed = parse(context)
	if (!parsed.succeeded) return { context, succeeded: false }

	// Phase 3: Checking
	if (!check(context, parsed.program).succeeded) return { context, succeeded: false }

	// Phase 4: Entry point
	let entryPoint: EntryPoint | null = null
	if (options.entryPoint !== null) {
		entryPoint = resolveEntryPoint(context, options.entryPoint ?? DEFAULT_ENTRY_POINT)
		if (!entryPoint) return { context, succeeded: false }
	}

	return {
		context,
		program: {
			entryPoint,
			functions: context.functions,
			items: parsed.program.items,
			types: context.types,
		},
		succeeded: true,
	}
}
