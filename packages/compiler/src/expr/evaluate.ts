/**
 * Postfix evaluation over a value stack.
 */

import { failure, type Outcome, success } from '../core/outcome.ts'
import type { SourcePos } from '../core/position.ts'
import { operatorText } from '../core/tokens.ts'
import { applyBinary, applyUnary, arity, fromBool } from './operators.ts'
import type { RuntimeScope } from './runtime.ts'
import type { PostfixToken } from './tokens.ts'

export type CallInvoker<C> = (call: C, pos: SourcePos) => Outcome<number>

export function evaluatePostfix<C>(
	postfix: readonly PostfixToken<C>[],
	scope: RuntimeScope,
	invokeCall: CallInvoker<C>
): Outcome<number> {
	const values: number[] = []

	for (const token of postfix) {
		switch (token.kind) {
			case 'Value':
				values.push(typeof token.value === 'boolean' ? fromBool(token.value) : token.value)
				break

			case 'Var': {
				const value = scope.getVar(token.name)
				if (value === undefined) return failure('SWEXPR006', token.pos, { name: token.name })
				values.push(value)
				break
			}

			case 'Fn': {
				const result = invokeCall(token.call, token.pos)
				if (!result.succeeded) return result
				values.push(result.value)
				break
			}

			case 'Op': {
				if (arity(token.op) === 1) {
					const operand = values.pop()
					if (operand === undefined) {
						return failure('SWEXPR005', token.pos, { op: operatorText(token.op) })
					}
					values.push(applyUnary(token.op, operand))
					break
				}
				const right = values.pop()
				const left = values.pop()
				if (left === undefined || right === undefined) {
					return failure('SWEXPR005', token.pos, { op: operatorText(token.op) })
				}
				values.push(applyBinary(token.op, left, right))
				break
			}
		}
	}

	const [result, extra] = values
	if (result === undefined) return failure('SWEXPR003')
	if (extra !== undefined) return failure('SWEXPR004', postfix[0]?.pos)
	return success(result)
}
