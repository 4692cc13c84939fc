/**
 * Shunting-yard: infix expression tokens to postfix order.
 */

import { failure, type Outcome, success } from '../core/outcome.ts'
import type { SourcePos } from '../core/position.ts'
import type { Operator } from '../core/tokens.ts'
import { Associativity, arity, associativity, precedence } from './operators.ts'
import type { ExprToken, PostfixToken } from './tokens.ts'

type StackEntry =
	| { readonly kind: 'Op'; readonly op: Operator; readonly pos: SourcePos }
	| { readonly kind: 'LParen'; readonly pos: SourcePos }

/** Whether `top` must be emitted before `incoming` is pushed. */
function yieldsTo(incoming: Operator, top: Operator): boolean {
	// A prefix operator has no left operand, so nothing before it can complete
	if (arity(incoming) === 1) return false
	const mine = precedence(incoming)
	const theirs = precedence(top)
	return (associativity(incoming) === Associativity.Left && mine <= theirs) || mine < theirs
}

export function toPostfix<C>(tokens: readonly ExprToken<C>[]): Outcome<PostfixToken<C>[]> {
	const output: PostfixToken<C>[] = []
	const stack: StackEntry[] = []

	for (const token of tokens) {
		switch (token.kind) {
			case 'Value':
			case 'Var':
			case 'Fn':
				output.push(token)
				break

			case 'Op': {
				for (let top = stack.at(-1); top?.kind === 'Op'; top = stack.at(-1)) {
					if (!yieldsTo(token.op, top.op)) break
					output.push(top)
					stack.pop()
				}
				stack.push(token)
				break
			}

			case 'LParen':
				stack.push(token)
				break

			case 'RParen': {
				let matched = false
				for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
					if (top.kind === 'LParen') {
						matched = true
						break
					}
					output.push(top)
				}
				if (!matched) return failure('SWEXPR001', token.pos)
				break
			}
		}
	}

	for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
		if (top.kind === 'LParen') return failure('SWEXPR002', top.pos)
		output.push(top)
	}

	return success(output)
}
