/**
 * Runtime bindings a compiled expression is evaluated against.
 */

import { failure, type Outcome, success } from '../core/outcome.ts'
import type { SourcePos } from '../core/position.ts'
import { type IntrinsicSpec, STANDARD_INTRINSICS } from '../scope/intrinsics.ts'

/** One evaluated call argument; named arguments carry their parameter name. */
export interface CallValue {
	readonly name?: string
	readonly value: number
}

export interface RuntimeFunction {
	readonly params: readonly string[]
	/** Arguments arrive in parameter order */
	readonly apply: (args: readonly number[]) => number
}

export interface RuntimeScope {
	getVar(name: string): number | undefined
	getFunction(name: string): RuntimeFunction | undefined
}

/** Map-backed runtime scope. */
export class Bindings implements RuntimeScope {
	private readonly variables: Map<string, number> = new Map()
	private readonly functions: Map<string, RuntimeFunction> = new Map()

	constructor(variables: Iterable<readonly [string, number]> = []) {
		for (const [name, value] of variables) this.variables.set(name, value)
	}

	setVar(name: string, value: number): this {
		this.variables.set(name, value)
		return this
	}

	setFunction(name: string, fn: RuntimeFunction): this {
		this.functions.set(name, fn)
		return this
	}

	getVar(name: string): number | undefined {
		return this.variables.get(name)
	}

	getFunction(name: string): RuntimeFunction | undefined {
		return this.functions.get(name)
	}

	variableNames(): string[] {
		return [...this.variables.keys()]
	}
}

export function bindIntrinsics(
	bindings: Bindings,
	intrinsics: readonly IntrinsicSpec[] = STANDARD_INTRINSICS
): Bindings {
	for (const { apply, name, params } of intrinsics) {
		bindings.setFunction(name, { apply, params })
	}
	return bindings
}

/**
 * Match call values to parameters and apply the function.
 * Unnamed values fill parameters in order; named ones go to their parameter.
 */
export function invoke(
	fn: RuntimeFunction,
	name: string,
	args: readonly CallValue[],
	pos: SourcePos
): Outcome<number> {
	const slots: (number | undefined)[] = fn.params.map(() => undefined)
	let nextPositional = 0

	for (const arg of args) {
		if (arg.name === undefined) {
			if (nextPositional >= fn.params.length) {
				return failure('SWTYPE006', pos, {
					expected: fn.params.length,
					found: args.length,
					name,
				})
			}
			slots[nextPositional++] = arg.value
			continue
		}
		const index = fn.params.indexOf(arg.name)
		if (index < 0) return failure('SWTYPE007', pos, { arg: arg.name, name })
		if (slots[index] !== undefined) return failure('SWTYPE008', pos, { arg: arg.name, name })
		slots[index] = arg.value
	}

	const values: number[] = []
	for (const [index, value] of slots.entries()) {
		if (value === undefined) {
			return failure('SWTYPE009', pos, { arg: fn.params[index] ?? String(index), name })
		}
		values.push(value)
	}
	return success(fn.apply(values))
}
