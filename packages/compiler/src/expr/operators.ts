/**
 * Operator properties and numeric semantics for the expression engine.
 */

import { Operator } from '../core/tokens.ts'

export const Associativity = {
	Left: 0,
	Right: 1,
} as const

export type Associativity = (typeof Associativity)[keyof typeof Associativity]

/** Sentinel values standing in for booleans in numeric results. */
export const TRUE = 1
export const FALSE = -1

/** Tolerance of the `~=` operator. */
export const APPROX_EPSILON = 0.0001

export function isTruthy(value: number): boolean {
	return value > 0
}

export function fromBool(value: boolean): number {
	return value ? TRUE : FALSE
}

/** Binding strength; higher binds tighter. */
export function precedence(op: Operator): number {
	switch (op) {
		case Operator.And:
		case Operator.Or:
		case Operator.Xor:
			return 10
		case Operator.Equ:
		case Operator.NotEqu:
		case Operator.ApproxEqu:
			return 20
		case Operator.Less:
		case Operator.Greater:
		case Operator.LessEqual:
		case Operator.GreaterEqual:
			return 30
		case Operator.Add:
		case Operator.Sub:
			return 40
		case Operator.Mul:
		case Operator.Div:
		case Operator.Mod:
			return 50
		case Operator.Neg:
		case Operator.Not:
		case Operator.Exp:
			return 60
	}
}

export function associativity(op: Operator): Associativity {
	return op === Operator.Exp ? Associativity.Right : Associativity.Left
}

/** Number of operands the operator consumes. */
export function arity(op: Operator): 1 | 2 {
	return op === Operator.Neg || op === Operator.Not ? 1 : 2
}

export type OperatorCategory = 'arithmetic' | 'comparison' | 'equality' | 'logical'

export function category(op: Operator): OperatorCategory {
	switch (op) {
		case Operator.Add:
		case Operator.Sub:
		case Operator.Mul:
		case Operator.Div:
		case Operator.Mod:
		case Operator.Exp:
		case Operator.Neg:
			return 'arithmetic'
		case Operator.Less:
		case Operator.Greater:
		case Operator.LessEqual:
		case Operator.GreaterEqual:
			return 'comparison'
		case Operator.Equ:
		case Operator.NotEqu:
		case Operator.ApproxEqu:
			return 'equality'
		case Operator.Not:
		case Operator.And:
		case Operator.Or:
		case Operator.Xor:
			return 'logical'
	}
}

/** Remainder with the sign of the dividend. */
export function signedMod(left: number, right: number): number {
	const magnitude = (Math.abs(left / right) % 1) * Math.abs(right)
	return left < 0 ? -magnitude : magnitude
}

export function applyUnary(op: Operator, operand: number): number {
	switch (op) {
		case Operator.Neg:
			return -operand
		case Operator.Not:
			return fromBool(!isTruthy(operand))
		default:
			throw new RangeError(`operator ${op} is not unary`)
	}
}

/** `left op right`, operands in source order. */
export function applyBinary(op: Operator, left: number, right: number): number {
	switch (op) {
		case Operator.Add:
			return left + right
		case Operator.Sub:
			return left - right
		case Operator.Mul:
			return left * right
		case Operator.Div:
			return left / right
		case Operator.Exp:
			return left ** right
		case Operator.Mod:
			return signedMod(left, right)
		case Operator.Less:
			return fromBool(left < right)
		case Operator.Greater:
			return fromBool(left > right)
		case Operator.LessEqual:
			return fromBool(left <= right)
		case Operator.GreaterEqual:
			return fromBool(left >= right)
		case Operator.Equ:
			return fromBool(left === right)
		case Operator.NotEqu:
			return fromBool(left !== right)
		case Operator.ApproxEqu:
			return fromBool(Math.abs(left - right) < APPROX_EPSILON)
		case Operator.And:
			return fromBool(isTruthy(left) && isTruthy(right))
		case Operator.Or:
			return fromBool(isTruthy(left) || isTruthy(right))
		case Operator.Xor:
			return fromBool(isTruthy(left) !== isTruthy(right))
		default:
			throw new RangeError(`operator ${op} is not binary`)
	}
}
