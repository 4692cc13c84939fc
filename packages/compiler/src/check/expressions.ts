/**
 * Expression, statement and block typing.
 *
 * Every check returns the type, or null after reporting why there is none.
 * A null stops the enclosing item; nothing is reported twice.
 */

import type { CompilationContext } from '../core/context.ts'
import type { Identifier } from '../core/identifiers.ts'
import type { Block, Expression, Statement } from '../core/nodes.ts'
import type { Node, SourcePos } from '../core/position.ts'
import { operatorText } from '../core/tokens.ts'
import type { SymbolEntry } from '../scope/table.ts'
import { BooleanType, functionType, NumberType, type Type, typeName, unify } from '../scope/types.ts'
import { checkCall } from './calls.ts'
import type { CheckerState } from './state.ts'
import { binaryResultType, blockTypeFor, unaryResultType } from './types.ts'

/** `found` narrowed to `expected`, or a mismatch diagnostic at `pos`. */
export function expectType(
	found: Type,
	expected: Type,
	pos: SourcePos,
	context: CompilationContext
): Type | null {
	const shared = unify(found, expected)
	if (shared) return shared
	context.emit('SWTYPE001', pos, { expected: typeName(expected), found: typeName(found) })
	return null
}

/** Type of the declaration a variable reference was bound to by the parser. */
export function checkVariable(
	ident: Node<Identifier>,
	symbol: SymbolEntry,
	state: CheckerState,
	context: CompilationContext
): Type | null {
	if (symbol.type !== undefined) return symbol.type
	if (!state.failed.has(symbol)) {
		context.emit('SWTYPE005', ident.pos, { name: context.name(ident.item) })
	}
	return null
}

export function checkBlock(
	block: Block,
	pos: SourcePos,
	state: CheckerState,
	context: CompilationContext
): Type | null {
	const [first] = block.entries
	if (!first) {
		context.emit('SWTYPE010', pos)
		return null
	}
	const blockType = blockTypeFor(first.op.item)
	if (!blockType) {
		context.emit('SWTYPE011', first.op.pos, { op: operatorText(first.op.item) })
		return null
	}

	context.types.enterBlock(block.key)
	try {
		for (const entry of block.entries) {
			const op = entry.op
			if (blockTypeFor(op.item) === null) {
				context.emit('SWTYPE011', op.pos, { op: operatorText(op.item) })
				return null
			}
			if (!binaryResultType(op.item, blockType, blockType)) {
				const name = typeName(blockType)
				context.emit('SWTYPE002', op.pos, { left: name, op: operatorText(op.item), right: name })
				return null
			}

			const body = checkStatement(entry.body, state, context)
			if (!body || !expectType(body, blockType, entry.body.pos, context)) return null

			if (entry.guard) {
				const guard = checkExpression(entry.guard, state, context)
				if (!guard || !expectType(guard, BooleanType, entry.guard.pos, context)) return null
			}
		}
	} finally {
		context.types.leaveBlock()
	}
	return blockType
}

export function checkStatement(
	statement: Statement,
	state: CheckerState,
	context: CompilationContext
): Type | null {
	return statement.kind === 'Block'
		? checkBlock(statement.block, statement.pos, state, context)
		: checkExpression(statement.expr, state, context)
}

function checkConditional(
	expr: Extract<Expression, { kind: 'Conditional' }>,
	state: CheckerState,
	context: CompilationContext
): Type | null {
	const cond = checkExpression(expr.cond, state, context)
	if (!cond || !expectType(cond, BooleanType, expr.cond.pos, context)) return null

	const then = checkExpression(expr.then, state, context)
	if (!then) return null
	const otherwise = checkExpression(expr.else, state, context)
	if (!otherwise) return null
	return expectType(otherwise, then, expr.else.pos, context)
}

export function checkExpression(
	expr: Expression,
	state: CheckerState,
	context: CompilationContext
): Type | null {
	switch (expr.kind) {
		case 'Constant':
			return NumberType
		case 'Boolean':
			return BooleanType
		case 'Variable':
			return checkVariable({ item: expr.ident, pos: expr.pos }, expr.symbol, state, context)

		case 'Prefix': {
			const operand = checkExpression(expr.operand, state, context)
			if (!operand) return null
			const result = unaryResultType(expr.op.item, operand)
			if (!result) {
				context.emit('SWTYPE003', expr.op.pos, {
					op: operatorText(expr.op.item),
					operand: typeName(operand),
				})
			}
			return result
		}

		case 'Infix': {
			const left = checkExpression(expr.left, state, context)
			if (!left) return null
			const right = checkExpression(expr.right, state, context)
			if (!right) return null
			const result = binaryResultType(expr.op.item, left, right)
			if (!result) {
				context.emit('SWTYPE002', expr.op.pos, {
					left: typeName(left),
					op: operatorText(expr.op.item),
					right: typeName(right),
				})
			}
			return result
		}

		case 'Block':
			return checkBlock(expr.block, expr.pos, state, context)
		case 'FunctionCall':
			return checkCall(expr.call, state, context)
		case 'Conditional':
			return checkConditional(expr, state, context)
		case 'Closure':
			return functionType(expr.def.ident.item, expr.def.key)
	}
}
