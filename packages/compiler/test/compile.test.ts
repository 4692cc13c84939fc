import assert from 'node:assert'
import { describe, it } from 'node:test'
import { compile, type CompileResult } from '../src/index.ts'

function codes(result: CompileResult): string[] {
	return result.context.getErrors().map((error) => error.def.code)
}

describe('compile (unified API)', () => {
	describe('successful compilation', () => {
		it('should produce a program with its entry point', () => {
			const result = compile('[main t] sin(t * 440)')
			if (!result.succeeded) assert.fail(result.context.formatAllDiagnostics())

			const { entryPoint, items } = result.program
			assert.strictEqual(items.length, 1)
			assert.strictEqual(entryPoint?.signature.name, 'main')
			assert.deepStrictEqual(entryPoint?.function.resolution, {
				returns: { kind: 'Number' },
				state: 'resolved',
			})
		})

		it('should compile several items in order', () => {
			const source = [
				'// two partials',
				'gain = 0.25;',
				'[partial t, n = 1] sin(t * 440 * n) / n;',
				'[main t] { + partial(t); + partial(t, 2); * gain; }',
			].join('\n')
			const result = compile(source, { filename: 'organ.sw' })
			assert.strictEqual(result.succeeded, true, result.context.formatAllDiagnostics())
			assert.strictEqual(result.succeeded && result.program.items.length, 3)
		})

		it('should accept a custom entry point', () => {
			const result = compile('[tone time] cos(time)', {
				entryPoint: { name: 'tone', params: ['Number'], returns: 'Number' },
			})
			assert.strictEqual(result.succeeded, true)
		})

		it('should skip the entry point when asked', () => {
			const result = compile('[f a, b] a', { entryPoint: null })
			assert.strictEqual(result.succeeded && result.program.entryPoint, null)
		})

		it('should let a definition replace an intrinsic', () => {
			const result = compile('[sin x] x * 2; [main t] sin(t)')
			assert.strictEqual(result.succeeded, true, result.context.formatAllDiagnostics())
		})

		it('should keep warnings on success', () => {
			const result = compile('t = 1; [main t] t')
			assert.strictEqual(result.succeeded, true)
			assert.strictEqual(result.context.getWarnings().length, 1)
		})
	})

	describe('intrinsics', () => {
		it('should use the intrinsics it is given', () => {
			const result = compile('[main t] twice(t)', {
				intrinsics: [{ apply: ([x = 0]) => x * 2, name: 'twice', params: ['x'] }],
			})
			assert.strictEqual(result.succeeded, true)
		})

		it('should not declare the standard set when replaced', () => {
			const result = compile('[main t] sin(t)', { intrinsics: [] })
			assert.deepStrictEqual(codes(result), ['SWPARSE004'])
		})
	})

	describe('phase gating', () => {
		it('should stop after lexing errors', () => {
			const result = compile('[main t] t $ u')
			assert.strictEqual(result.succeeded, false)
			assert.deepStrictEqual(codes(result), ['SWLEX001'])
		})

		it('should not check a program that failed to parse', () => {
			const result = compile('[main t] t + (t > 1); [f x] y')
			assert.deepStrictEqual(codes(result), ['SWPARSE005'])
		})

		it('should not look for an entry point after type errors', () => {
			const result = compile('[f x] x && 1')
			assert.deepStrictEqual(codes(result), ['SWTYPE002'])
		})
	})

	describe('entry point', () => {
		it('should report a missing entry point', () => {
			const result = compile('[tone t] t')
			assert.deepStrictEqual(codes(result), ['SWENTRY001'])
			assert.strictEqual(result.context.getErrors()[0]!.message, 'entry point `main` is not defined')
		})

		it('should report an empty program as missing its entry point', () => {
			assert.deepStrictEqual(codes(compile('')), ['SWENTRY001'])
		})

		it('should report a wrong parameter count', () => {
			const result = compile('[main a, b] a + b')
			assert.strictEqual(
				result.context.getErrors()[0]!.message,
				'entry point `main` has signature fn(Number, Number) -> Number, expected fn(Number) -> Number'
			)
		})

		it('should report a wrong return type', () => {
			const result = compile('[main t] t > 1')
			assert.strictEqual(
				result.context.getErrors()[0]!.message,
				'entry point `main` has signature fn(Number) -> Boolean, expected fn(Number) -> Number'
			)
		})

		it('should report an entry point that is not a function', () => {
			const result = compile('main = 1')
			assert.strictEqual(
				result.context.getErrors()[0]!.message,
				'entry point `main` has signature Number, expected fn(Number) -> Number'
			)
		})
	})

	describe('diagnostic output', () => {
		it('should name the file and position', () => {
			const result = compile('[main t] u', { filename: 'tone.sw' })
			const [header, location] = result.context.formatAllDiagnostics().split('\n')
			assert.strictEqual(header, 'error[SWPARSE005]: variable `u` appears in expression but is not defined in scope')
			assert.strictEqual(location, '  --> tone.sw:1:10')
		})
	})
})
