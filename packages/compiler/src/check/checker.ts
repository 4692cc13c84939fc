/**
 * Check phase: type resolution over a parsed program.
 *
 * Items are checked in source order. A failure is reported once and stops
 * only the item or function it belongs to. Closures that no item reached
 * are resolved afterwards, then any symbol left Indeterminate is reported.
 */

import type { CompilationContext } from '../core/context.ts'
import type { Item, Program } from '../core/nodes.ts'
import { checkExpression } from './expressions.ts'
import { resolveFunction } from './funcs.ts'
import { type CheckerState, createState } from './state.ts'
import type { CheckResult } from './types.ts'

function checkItem(item: Item, state: CheckerState, context: CompilationContext): void {
	if (item.kind === 'FunctionDef') {
		const info = context.functions.get(item.def.item.key)
		if (info?.kind === 'defined') resolveFunction(info, state, context)
		return
	}

	const { expr, symbol } = item.assignment.item
	const type = checkExpression(expr, state, context)
	if (type) context.types.resolve(symbol, type)
	else state.failed.add(symbol)
}

export function check(context: CompilationContext, program: Program): CheckResult {
	const state = createState()
	const errorsBefore = context.getErrorCount()

	for (const item of program.items) {
		checkItem(item, state, context)
	}

	for (const info of context.functions) {
		if (info.kind === 'defined' && info.resolution.state === 'unresolved') {
			resolveFunction(info, state, context)
		}
	}

	for (const symbol of context.types) {
		if (symbol.type?.kind === 'Indeterminate') {
			context.emit('SWTYPE005', symbol.pos, { name: context.name(symbol.ident) })
		}
	}

	return { succeeded: context.getErrorCount() === errorsBefore }
}
