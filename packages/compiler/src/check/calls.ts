/**
 * Call typing: argument matching against the callee's parameters.
 */

import type { CompilationContext } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type { Identifier } from '../core/identifiers.ts'
import { type Argument, CallStyle, type FunctionCall } from '../core/nodes.ts'
import { operatorText } from '../core/tokens.ts'
import { type FunctionParam, paramsOf } from '../scope/functions.ts'
import { NumberType, type Type, typeName } from '../scope/types.ts'
import { checkExpression, checkVariable, expectType } from './expressions.ts'
import { functionFor, resolveFunction } from './funcs.ts'
import type { CheckerState } from './state.ts'
import { binaryResultType } from './types.ts'

/** Type of the value a named argument passes. */
function namedArgumentType(
	arg: Exclude<Argument, { kind: 'Expr' }>,
	state: CheckerState,
	context: CompilationContext
): Type | null {
	switch (arg.kind) {
		case 'Ident':
			return checkVariable(arg.ident, arg.symbol, state, context)
		case 'Assign':
			return checkExpression(arg.expr, state, context)
		case 'OpAssign': {
			const current = checkVariable(arg.ident, arg.symbol, state, context)
			if (!current) return null
			const operand = checkExpression(arg.expr, state, context)
			if (!operand) return null
			const result = binaryResultType(arg.op.item, current, operand)
			if (!result) {
				context.emit('SWTYPE002', arg.op.pos, {
					left: typeName(current),
					op: operatorText(arg.op.item),
					right: typeName(operand),
				})
			}
			return result
		}
	}
}

/** Parameters the call supplies, or null after reporting a mismatch. */
function matchArguments(
	call: FunctionCall,
	params: readonly FunctionParam[],
	state: CheckerState,
	context: CompilationContext
): Set<Identifier> | null {
	const name = context.name(call.callee.item)
	const supplied = new Set<Identifier>()

	if (call.style === CallStyle.Ordered) {
		if (call.args.length > params.length) {
			context.emit('SWTYPE006', call.callee.pos, {
				expected: params.length,
				found: call.args.length,
				name,
			})
			return null
		}
		for (const [index, arg] of call.args.entries()) {
			if (arg.kind !== 'Expr') {
				throw new InternalCompilerError(`named argument in ordered call to \`${name}\``)
			}
			const type = checkExpression(arg.expr, state, context)
			if (!type || !expectType(type, NumberType, arg.expr.pos, context)) return null
			const param = params[index]
			if (param) supplied.add(param.ident)
		}
		return supplied
	}

	for (const arg of call.args) {
		if (arg.kind === 'Expr') {
			throw new InternalCompilerError(`ordered argument in named call to \`${name}\``)
		}
		const argName = context.name(arg.ident.item)
		if (!params.some((param) => param.ident === arg.ident.item)) {
			context.emit('SWTYPE007', arg.ident.pos, { arg: argName, name })
			return null
		}
		if (supplied.has(arg.ident.item)) {
			context.emit('SWTYPE008', arg.ident.pos, { arg: argName, name })
			return null
		}
		supplied.add(arg.ident.item)

		const type = namedArgumentType(arg, state, context)
		if (!type || !expectType(type, NumberType, arg.ident.pos, context)) return null
	}
	return supplied
}

export function checkCall(
	call: FunctionCall,
	state: CheckerState,
	context: CompilationContext
): Type | null {
	const name = context.name(call.callee.item)
	const info = functionFor(call.symbol, context)
	if (!info) {
		const actual = call.symbol.type ? typeName(call.symbol.type) : 'unknown'
		context.emit('SWTYPE001', call.callee.pos, { expected: 'Function', found: actual })
		return null
	}

	const params = paramsOf(info)
	const supplied = matchArguments(call, params, state, context)
	if (!supplied) return null

	const missing = params.find((param) => !param.hasDefault && !supplied.has(param.ident))
	if (missing) {
		context.emit('SWTYPE009', call.callee.pos, { arg: context.name(missing.ident), name })
		return null
	}

	return info.kind === 'intrinsic' ? info.returns : resolveFunction(info, state, context)
}
