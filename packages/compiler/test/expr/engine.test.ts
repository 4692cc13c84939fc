import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { Failure } from '../../src/core/outcome.ts'
import { startPos } from '../../src/core/position.ts'
import { Operator } from '../../src/core/tokens.ts'
import {
	Bindings,
	bindIntrinsics,
	CompiledExpression,
	type CompiledToken,
	compileExpressionSource,
	FALSE,
	invoke,
	TRUE,
} from '../../src/expr/index.ts'
import { STANDARD_INTRINSICS } from '../../src/scope/intrinsics.ts'

const FUNCTIONS = STANDARD_INTRINSICS.map((intrinsic) => intrinsic.name)

function compiled(text: string, variables: readonly string[] = []): CompiledExpression {
	const result = compileExpressionSource(text, { functions: FUNCTIONS, variables })
	if (!result.succeeded) assert.fail(result.context.formatAllDiagnostics())
	return result.expression
}

function scope(variables: Record<string, number> = {}): Bindings {
	return bindIntrinsics(new Bindings(Object.entries(variables)))
}

function evaluate(text: string, variables: Record<string, number> = {}): number {
	const result = compiled(text, Object.keys(variables)).evaluate(scope(variables))
	if (!result.succeeded) assert.fail(`evaluation failed with ${result.failure.code}`)
	return result.value
}

function compileError(text: string, variables: readonly string[] = []) {
	const result = compileExpressionSource(text, { functions: FUNCTIONS, variables })
	assert.strictEqual(result.succeeded, false)
	const error = result.context.getErrors()[0]
	assert.ok(error)
	return error
}

function evaluationFailure(expression: CompiledExpression, bindings: Bindings): Failure {
	const result = expression.evaluate(bindings)
	if (result.succeeded) assert.fail(`expected a failure, got ${result.value}`)
	return result.failure
}

describe('expr/engine', () => {
	describe('precedence and associativity', () => {
		it('should bind multiplication tighter than addition', () => {
			assert.strictEqual(evaluate('2 + 3 * 4'), 14)
		})

		it('should honour parentheses', () => {
			assert.strictEqual(evaluate('(2 + 3) * 4'), 20)
		})

		it('should make exponentiation right-associative', () => {
			assert.strictEqual(evaluate('2 ^ 3 ^ 2'), 512)
		})

		it('should keep subtraction left-associative', () => {
			assert.strictEqual(evaluate('10 - 4 - 3'), 3)
		})

		it('should compare after arithmetic and combine after comparing', () => {
			assert.strictEqual(evaluate('1 + 1 == 2 && 3 > 2'), TRUE)
		})
	})

	describe('negation', () => {
		it('should negate a leading operand', () => {
			assert.strictEqual(evaluate('-3 + 4'), 1)
		})

		it('should negate after an operator', () => {
			assert.strictEqual(evaluate('2 * -3'), -6)
		})

		it('should negate a parenthesised group', () => {
			assert.strictEqual(evaluate('-(2 + 3)'), -5)
		})

		it('should allow repeated negation', () => {
			assert.strictEqual(evaluate('- -3'), 3)
		})

		it('should bind exponentiation tighter than a leading minus', () => {
			assert.strictEqual(evaluate('-2 ^ 2'), -4)
		})

		it('should accept a negative exponent', () => {
			assert.strictEqual(evaluate('2 ^ -1'), 0.5)
		})
	})

	describe('operators', () => {
		it('should keep the sign of the dividend in modulo', () => {
			assert.strictEqual(evaluate('7.5 % 2'), 1.5)
			assert.strictEqual(evaluate('-7.5 % 2'), -1.5)
			assert.strictEqual(evaluate('7.5 % -2'), 1.5)
		})

		it('should compare approximately within the tolerance', () => {
			assert.strictEqual(evaluate('1 ~= 1.00001'), TRUE)
			assert.strictEqual(evaluate('1 ~= 1.001'), FALSE)
		})

		it('should evaluate boolean literals to the sentinels', () => {
			assert.strictEqual(evaluate('true'), TRUE)
			assert.strictEqual(evaluate('true && false'), FALSE)
			assert.strictEqual(evaluate('!false'), TRUE)
		})

		it('should evaluate comparisons to the sentinels', () => {
			assert.strictEqual(evaluate('3 > 2'), TRUE)
			assert.strictEqual(evaluate('2 >= 3'), FALSE)
			assert.strictEqual(evaluate('2 != 3'), TRUE)
		})
	})

	describe('variables', () => {
		it('should read variables from the scope', () => {
			assert.strictEqual(evaluate('x * 2', { x: 21 }), 42)
		})

		it('should evaluate one compilation against many scopes', () => {
			const expression = compiled('t * 2', ['t'])
			assert.deepStrictEqual(expression.evaluate(scope({ t: 1 })), { succeeded: true, value: 2 })
			assert.deepStrictEqual(expression.evaluate(scope({ t: 3 })), { succeeded: true, value: 6 })
		})

		it('should reject names missing from the compile scope', () => {
			const error = compileError('y + 1')
			assert.strictEqual(error.def.code, 'SWPARSE005')
			assert.strictEqual(error.message, 'variable `y` appears in expression but is not defined in scope')
		})

		it('should fail when the runtime scope lacks a variable', () => {
			const failure = evaluationFailure(compiled('x + 1', ['x']), scope())
			assert.strictEqual(failure.code, 'SWEXPR006')
			assert.deepStrictEqual(failure.args, { name: 'x' })
		})
	})

	describe('calls', () => {
		it('should call intrinsics with ordered arguments', () => {
			assert.strictEqual(evaluate('max(2, 7)'), 7)
			assert.strictEqual(evaluate('abs(-4) + floor(2.5)'), 6)
		})

		it('should pass named arguments by name', () => {
			assert.strictEqual(evaluate('min(b = 4, a = 9)'), 4)
		})

		it('should update a variable with a compound argument', () => {
			assert.strictEqual(evaluate('max(a = 0, b += 2)', { b: 3 }), 5)
		})

		it('should pass a lone identifier as the variable of that name', () => {
			assert.strictEqual(evaluate('max(a, b = 1)', { a: 7 }), 7)
		})

		it('should evaluate nested calls', () => {
			assert.strictEqual(evaluate('max(min(1, 2), 3 - 1)'), 2)
		})

		it('should reject mixed named and ordered arguments', () => {
			const error = compileError('max(1, b = 2)')
			assert.strictEqual(error.def.code, 'SWPARSE009')
			assert.strictEqual(error.pos?.column, 5)
		})

		it('should reject unknown functions', () => {
			const error = compileError('foo(1)')
			assert.strictEqual(error.def.code, 'SWPARSE004')
			assert.strictEqual(error.message, 'function `foo` appears in expression but is not defined in scope')
		})

		it('should reject calling a variable', () => {
			assert.strictEqual(compileError('x(1)', ['x']).def.code, 'SWPARSE004')
		})

		it('should report an unterminated call at the end of input', () => {
			const error = compileError('sin(1')
			assert.strictEqual(error.def.code, 'SWPARSE006')
			assert.strictEqual(error.pos?.index, 5)
		})

		it('should fail when the runtime scope lacks a function', () => {
			const failure = evaluationFailure(compiled('sin(1)'), new Bindings())
			assert.strictEqual(failure.code, 'SWEXPR007')
			assert.deepStrictEqual(failure.args, { name: 'sin' })
		})

		it('should report arity mismatches at run time', () => {
			const failure = evaluationFailure(compiled('sin(1, 2)'), scope())
			assert.strictEqual(failure.code, 'SWTYPE006')
			assert.deepStrictEqual(failure.args, { expected: 1, found: 2, name: 'sin' })
		})
	})

	describe('invoke', () => {
		const fn = { apply: ([a = 0, b = 0]: readonly number[]) => a - b, params: ['a', 'b'] }

		it('should fill named values into their parameter', () => {
			const result = invoke(fn, 'f', [{ name: 'b', value: 1 }, { value: 5 }], startPos())
			assert.deepStrictEqual(result, { succeeded: true, value: 4 })
		})

		it('should reject unknown, repeated and missing parameters', () => {
			const pos = startPos()
			const unknown = invoke(fn, 'f', [{ name: 'c', value: 1 }], pos)
			const repeated = invoke(fn, 'f', [{ name: 'a', value: 1 }, { name: 'a', value: 2 }], pos)
			const missing = invoke(fn, 'f', [{ value: 1 }], pos)
			assert.strictEqual(unknown.succeeded ? undefined : unknown.failure.code, 'SWTYPE007')
			assert.strictEqual(repeated.succeeded ? undefined : repeated.failure.code, 'SWTYPE008')
			assert.deepStrictEqual(missing.succeeded ? undefined : missing.failure.args, { arg: 'b', name: 'f' })
		})
	})

	describe('parentheses', () => {
		it('should reject an unclosed parenthesis at its position', () => {
			const error = compileError('(1 + 2')
			assert.strictEqual(error.def.code, 'SWEXPR002')
			assert.strictEqual(error.message, 'mismatched parens: skewed left')
			assert.strictEqual(error.pos?.column, 1)
		})

		it('should reject an unopened parenthesis at its position', () => {
			const error = compileError('1 + 2)')
			assert.strictEqual(error.def.code, 'SWEXPR001')
			assert.strictEqual(error.message, 'mismatched parens: skewed right')
			assert.strictEqual(error.pos?.column, 6)
		})

		it('should reject symbols that cannot appear in an expression', () => {
			const error = compileError('1 ; 2')
			assert.strictEqual(error.def.code, 'SWPARSE008')
			assert.strictEqual(error.message, 'unexpected token in expression: `;`')
		})

		it('should reject an empty expression', () => {
			const error = compileError('')
			assert.strictEqual(error.def.code, 'SWPARSE007')
			assert.strictEqual(error.pos, undefined)
		})
	})

	describe('postfix balance', () => {
		const pos = startPos()
		const one: CompiledToken = { kind: 'Value', pos, value: 1 }
		const two: CompiledToken = { kind: 'Value', pos, value: 2 }
		const add: CompiledToken = { kind: 'Op', op: Operator.Add, pos }

		it('should fail on zero values', () => {
			assert.strictEqual(evaluationFailure(new CompiledExpression([]), scope()).code, 'SWEXPR003')
		})

		it('should fail on leftover values', () => {
			assert.strictEqual(evaluationFailure(new CompiledExpression([one, two]), scope()).code, 'SWEXPR004')
			assert.strictEqual(evaluationFailure(compiled('1 2'), scope()).code, 'SWEXPR004')
		})

		it('should fail on missing operands', () => {
			const failure = evaluationFailure(new CompiledExpression([one, add]), scope())
			assert.strictEqual(failure.code, 'SWEXPR005')
			assert.deepStrictEqual(failure.args, { op: '+' })
		})
	})

	describe('foldScope', () => {
		it('should replace bound variables with their values', () => {
			const folded = compiled('x * y + 1', ['x', 'y']).foldScope(new Bindings([['x', 2]]))
			assert.deepStrictEqual(
				folded.postfix.map((token) => token.kind),
				['Value', 'Var', 'Op', 'Value', 'Op']
			)
			assert.deepStrictEqual(folded.evaluate(new Bindings([['y', 5]])), { succeeded: true, value: 11 })
		})

		it('should be idempotent', () => {
			const bindings = new Bindings([['x', 2]])
			const once = compiled('x * y + max(x, y)', ['x', 'y']).foldScope(bindings)
			const twice = once.foldScope(bindings)
			assert.deepStrictEqual(twice.postfix, once.postfix)
		})

		it('should fold inside call arguments', () => {
			const folded = compiled('max(x, 1)', ['x']).foldScope(new Bindings([['x', 3]]))
			const call = folded.postfix[0]
			assert.strictEqual(call?.kind, 'Fn')
			const arg = call?.kind === 'Fn' ? call.call.args[0] : undefined
			const first = arg?.kind === 'Expr' ? arg.expr.postfix[0] : undefined
			assert.deepStrictEqual(first?.kind === 'Value' ? first.value : undefined, 3)
		})

		it('should leave the original expression untouched', () => {
			const original = compiled('x + 1', ['x'])
			original.foldScope(new Bindings([['x', 2]]))
			assert.strictEqual(original.postfix[0]?.kind, 'Var')
		})
	})
})
