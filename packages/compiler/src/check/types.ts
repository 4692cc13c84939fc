/**
 * Typing rules for operators.
 */

import { Operator } from '../core/tokens.ts'
import { arity, category } from '../expr/operators.ts'
import { BooleanType, NumberType, type Type, type TypeKind, unify } from '../scope/types.ts'

export interface CheckResult {
	readonly succeeded: boolean
}

/** Indeterminate stands in for any type until it resolves. */
function fits(type: Type, kind: TypeKind): boolean {
	return type.kind === kind || type.kind === 'Indeterminate'
}

export function unaryResultType(op: Operator, operand: Type): Type | null {
	switch (op) {
		case Operator.Neg:
			return fits(operand, 'Number') ? NumberType : null
		case Operator.Not:
			return fits(operand, 'Boolean') ? BooleanType : null
		default:
			return null
	}
}

export function binaryResultType(op: Operator, left: Type, right: Type): Type | null {
	if (arity(op) !== 2) return null
	switch (category(op)) {
		case 'arithmetic':
			return fits(left, 'Number') && fits(right, 'Number') ? NumberType : null
		case 'comparison':
			return fits(left, 'Number') && fits(right, 'Number') ? BooleanType : null
		case 'equality': {
			const shared = unify(left, right)
			return shared && shared.kind !== 'Function' ? BooleanType : null
		}
		case 'logical':
			return fits(left, 'Boolean') && fits(right, 'Boolean') ? BooleanType : null
	}
}

/** Type of a block whose first entry uses `op`, or null if `op` cannot start one. */
export function blockTypeFor(op: Operator): Type | null {
	if (arity(op) !== 2) return null
	switch (category(op)) {
		case 'arithmetic':
			return NumberType
		case 'logical':
			return BooleanType
		default:
			return null
	}
}
