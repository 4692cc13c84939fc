/**
 * Compile-once, evaluate-many expressions.
 */

import { CompilationContext } from '../core/context.ts'
import type { Identifier } from '../core/identifiers.ts'
import { type Argument, argumentIdent, type Call } from '../core/nodes.ts'
import { failure, type Outcome, success } from '../core/outcome.ts'
import { node, type SourcePos, startPos } from '../core/position.ts'
import type { TokenStream } from '../core/tokens.ts'
import { tokenize } from '../lex/tokenizer.ts'
import { intrinsicKey } from '../scope/intrinsics.ts'
import { functionType, NumberType } from '../scope/types.ts'
import { parseCall } from './calls.ts'
import { evaluatePostfix } from './evaluate.ts'
import { applyBinary } from './operators.ts'
import { toPostfix } from './postfix.ts'
import { type NameResolver, scopeResolver } from './resolve.ts'
import { type CallValue, invoke, type RuntimeScope } from './runtime.ts'
import { toExprTokens } from './tokenize.ts'
import type { PostfixToken } from './tokens.ts'

export interface CompiledCall extends Call<CompiledExpression> {
	/** Names of the callee and of every named argument */
	readonly names: ReadonlyMap<Identifier, string>
}

export type CompiledToken = PostfixToken<CompiledCall>

function nameOf(call: CompiledCall, ident: Identifier): string {
	return call.names.get(ident) ?? `#${ident}`
}

function foldArgument(
	arg: Argument<CompiledExpression>,
	scope: RuntimeScope
): Argument<CompiledExpression> {
	switch (arg.kind) {
		case 'Ident':
			return arg
		case 'Assign':
		case 'OpAssign':
		case 'Expr':
			return { ...arg, expr: arg.expr.foldScope(scope) }
	}
}

export class CompiledExpression {
	readonly postfix: readonly CompiledToken[]

	constructor(postfix: readonly CompiledToken[]) {
		this.postfix = postfix
	}

	/**
	 * Replace variables the scope already binds with their values,
	 * including inside call arguments. Applying it again changes nothing.
	 */
	foldScope(scope: RuntimeScope): CompiledExpression {
		return new CompiledExpression(
			this.postfix.map((token): CompiledToken => {
				if (token.kind === 'Var') {
					const value = scope.getVar(token.name)
					return value === undefined ? token : { kind: 'Value', pos: token.pos, value }
				}
				if (token.kind === 'Fn') {
					const args = token.call.args.map((arg) => foldArgument(arg, scope))
					return { ...token, call: { ...token.call, args } }
				}
				return token
			})
		)
	}

	evaluate(scope: RuntimeScope): Outcome<number> {
		return evaluatePostfix(this.postfix, scope, (call, pos) => evaluateCall(call, pos, scope))
	}
}

function evaluateCall(call: CompiledCall, pos: SourcePos, scope: RuntimeScope): Outcome<number> {
	const name = nameOf(call, call.callee.item)
	const fn = scope.getFunction(name)
	if (!fn) return failure('SWEXPR007', pos, { name })

	const values: CallValue[] = []
	for (const arg of call.args) {
		if (arg.kind === 'Expr') {
			const value = arg.expr.evaluate(scope)
			if (!value.succeeded) return value
			values.push({ value: value.value })
			continue
		}

		const argName = nameOf(call, arg.ident.item)
		if (arg.kind === 'Assign') {
			const value = arg.expr.evaluate(scope)
			if (!value.succeeded) return value
			values.push({ name: argName, value: value.value })
			continue
		}

		const current = scope.getVar(argName)
		if (current === undefined) return failure('SWEXPR006', arg.ident.pos, { name: argName })
		if (arg.kind === 'Ident') {
			values.push({ name: argName, value: current })
			continue
		}

		const operand = arg.expr.evaluate(scope)
		if (!operand.succeeded) return operand
		values.push({ name: argName, value: applyBinary(arg.op.item, current, operand.value) })
	}

	return invoke(fn, name, values, pos)
}

/**
 * Compile a token span against the scope open in the context.
 * Every name must resolve now; values are looked up at evaluation.
 */
export function compileExpression(
	context: CompilationContext,
	stream: TokenStream,
	resolver: NameResolver = scopeResolver(context)
): Outcome<CompiledExpression> {
	if (stream.isEmpty()) return failure('SWPARSE007')

	const tokens = toExprTokens(context, stream, resolver, (callee, symbol, inner) => {
		const call = parseCall(context, callee, symbol, inner, resolver, (span) =>
			compileExpression(context, span, resolver)
		)
		if (!call.succeeded) return call
		const names = new Map<Identifier, string>([[callee.item, context.name(callee.item)]])
		for (const arg of call.value.args) {
			const ident = argumentIdent(arg)
			if (ident) names.set(ident.item, context.name(ident.item))
		}
		return success({ ...call.value, names })
	})
	if (!tokens.succeeded) return tokens

	const postfix = toPostfix(tokens.value)
	if (!postfix.succeeded) return postfix
	return success(new CompiledExpression(postfix.value))
}

export interface ExpressionSourceOptions {
	/** Names usable as variables */
	readonly variables?: Iterable<string>
	/** Names usable as callees */
	readonly functions?: Iterable<string>
	readonly filename?: string
}

export type ExpressionSourceResult =
	| {
			readonly succeeded: true
			readonly expression: CompiledExpression
			readonly context: CompilationContext
	  }
	| { readonly succeeded: false; readonly context: CompilationContext }

/**
 * Lex and compile one standalone expression.
 * Failures are reported into the returned context.
 */
export function compileExpressionSource(
	text: string,
	options: ExpressionSourceOptions = {}
): ExpressionSourceResult {
	const context = new CompilationContext(text, options.filename)
	const pos = startPos()

	for (const name of options.variables ?? []) {
		context.types.setType(node(context.identifiers.intern(name), pos), NumberType)
	}
	let index = 0
	for (const name of options.functions ?? []) {
		const ident = context.identifiers.intern(name)
		context.types.setType(node(ident, pos), functionType(ident, intrinsicKey(index++)))
	}

	tokenize(context)
	if (context.hasErrors()) return { context, succeeded: false }

	const compiled = compileExpression(context, context.tokens.stream(context.endPos))
	if (!compiled.succeeded) {
		context.report(compiled.failure)
		return { context, succeeded: false }
	}
	return { context, expression: compiled.value, succeeded: true }
}
