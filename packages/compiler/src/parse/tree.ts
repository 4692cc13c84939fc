/**
 * Rebuild an expression tree from postfix order.
 */

import type { Expression, FunctionCall } from '../core/nodes.ts'
import { failure, type Outcome, success } from '../core/outcome.ts'
import { node, type SourcePos } from '../core/position.ts'
import { operatorText } from '../core/tokens.ts'
import { arity } from '../expr/operators.ts'
import type { PostfixToken } from '../expr/tokens.ts'

function leaf(token: Exclude<PostfixToken<FunctionCall>, { kind: 'Op' }>): Expression {
	switch (token.kind) {
		case 'Value':
			return typeof token.value === 'boolean'
				? { kind: 'Boolean', pos: token.pos, value: token.value }
				: { kind: 'Constant', pos: token.pos, value: token.value }
		case 'Var':
			return { ident: token.ident, kind: 'Variable', pos: token.pos, symbol: token.symbol }
		case 'Fn':
			return { call: token.call, kind: 'FunctionCall', pos: token.pos }
	}
}

export function buildTree(
	postfix: readonly PostfixToken<FunctionCall>[],
	start: SourcePos
): Outcome<Expression> {
	const stack: Expression[] = []

	for (const token of postfix) {
		if (token.kind !== 'Op') {
			stack.push(leaf(token))
			continue
		}

		const op = node(token.op, token.pos)
		if (arity(token.op) === 1) {
			const operand = stack.pop()
			if (!operand) return failure('SWEXPR005', token.pos, { op: operatorText(token.op) })
			stack.push({ kind: 'Prefix', op, operand, pos: token.pos })
			continue
		}

		const right = stack.pop()
		const left = stack.pop()
		if (!left || !right) return failure('SWEXPR005', token.pos, { op: operatorText(token.op) })
		stack.push({ kind: 'Infix', left, op, pos: left.pos, right })
	}

	const [root, extra] = stack
	if (!root) return failure('SWEXPR003', start)
	if (extra) return failure('SWEXPR004', start)
	return success(root)
}
