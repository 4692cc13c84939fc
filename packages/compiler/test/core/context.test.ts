import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext, DiagnosticSeverity } from '../../src/core/context.ts'
import type { SourcePos } from '../../src/core/position.ts'

function at(column: number, line = 1, lineIndex = 0): SourcePos {
	return { column, index: lineIndex + column - 1, line, lineIndex }
}

describe('core/context', () => {
	describe('CompilationContext', () => {
		it('should store source and filename', () => {
			const ctx = new CompilationContext('[main t] t', 'tone.sw')
			assert.strictEqual(ctx.source, '[main t] t')
			assert.strictEqual(ctx.filename, 'tone.sw')
		})

		it('should use default filename if not provided', () => {
			const ctx = new CompilationContext('x = 1')
			assert.strictEqual(ctx.filename, '<input>')
		})

		it('should start with empty stores and no diagnostics', () => {
			const ctx = new CompilationContext('x = 1')
			assert.strictEqual(ctx.tokens.count(), 0)
			assert.strictEqual(ctx.functions.count(), 0)
			assert.strictEqual(ctx.hasErrors(), false)
			assert.deepStrictEqual(ctx.getDiagnostics(), [])
		})
	})

	describe('emit', () => {
		it('should interpolate the catalog message', () => {
			const ctx = new CompilationContext('x = y + 1')
			ctx.emit('SWPARSE005', at(5), { name: 'y' })

			const diags = ctx.getDiagnostics()
			assert.strictEqual(diags.length, 1)
			assert.strictEqual(diags[0]!.message, 'variable `y` appears in expression but is not defined in scope')
			assert.strictEqual(diags[0]!.def.severity, DiagnosticSeverity.Error)
			assert.deepStrictEqual(diags[0]!.pos, at(5))
		})

		it('should count errors but not warnings', () => {
			const ctx = new CompilationContext('x = 1')
			ctx.emit('SWPARSE020', at(1), { name: 'x' })
			assert.strictEqual(ctx.hasErrors(), false)
			assert.strictEqual(ctx.getWarnings().length, 1)

			ctx.emit('SWEXPR003')
			assert.strictEqual(ctx.hasErrors(), true)
			assert.strictEqual(ctx.getErrorCount(), 1)
			assert.strictEqual(ctx.getErrors().length, 1)
		})

		it('should omit pos and args when not given', () => {
			const ctx = new CompilationContext('')
			ctx.emit('SWEXPR003')
			const diag = ctx.getDiagnostics()[0]!
			assert.strictEqual('pos' in diag, false)
			assert.strictEqual('args' in diag, false)
		})
	})

	describe('report', () => {
		it('should record a failure outcome', () => {
			const ctx = new CompilationContext('')
			ctx.report({ code: 'SWPARSE007' })
			assert.strictEqual(ctx.getErrors()[0]!.message, 'empty expression in file')
			assert.strictEqual(ctx.getErrors()[0]!.pos, undefined)
		})
	})

	describe('getSourceLine', () => {
		it('should split on every line break style', () => {
			const ctx = new CompilationContext('a\r\nb\nc')
			assert.strictEqual(ctx.getSourceLine(2), 'b')
			assert.strictEqual(ctx.getSourceLine(3), 'c')
			assert.strictEqual(ctx.getSourceLine(4), undefined)
		})
	})

	describe('formatDiagnostic', () => {
		it('should render the source line, a pointer and the help text', () => {
			const ctx = new CompilationContext('x = y + 1')
			ctx.emit('SWPARSE005', at(5), { name: 'y' })

			assert.strictEqual(
				ctx.formatDiagnostic(ctx.getDiagnostics()[0]!),
				[
					'error[SWPARSE005]: variable `y` appears in expression but is not defined in scope',
					'  --> <input>:1:5',
					'   | ',
					' 1 | x = y + 1',
					'   |     ^',
					'   | ',
					'   = help: Assign `y` before this line, or check its spelling.',
				].join('\n')
			)
		})

		it('should omit help when the code has no suggestion', () => {
			const ctx = new CompilationContext('x = 1\ny = x')
			ctx.emit('SWTYPE005', at(1, 2, 6), { name: 'y' })

			assert.strictEqual(
				ctx.formatDiagnostic(ctx.getDiagnostics()[0]!),
				[
					'error[SWTYPE005]: type of `y` could not be determined',
					'  --> <input>:2:1',
					'   | ',
					' 2 | y = x',
					'   | ^',
				].join('\n')
			)
		})

		it('should label warnings', () => {
			const ctx = new CompilationContext('x = 1', 'patch.sw')
			ctx.emit('SWPARSE020', at(1), { name: 'x' })
			const text = ctx.formatDiagnostic(ctx.getDiagnostics()[0]!)
			assert.strictEqual(text.split('\n')[0], 'warning[SWPARSE020]: `x` shadows a definition in an outer scope')
		})

		it('should print only the file when there is no position', () => {
			const ctx = new CompilationContext('[tone t] t', 'patch.sw')
			ctx.emit('SWENTRY001', undefined, { name: 'main' })
			assert.strictEqual(
				ctx.formatDiagnostic(ctx.getDiagnostics()[0]!),
				'error[SWENTRY001]: entry point `main` is not defined\n  --> patch.sw'
			)
		})

		it('should join all diagnostics with a blank line', () => {
			const ctx = new CompilationContext('', 'a.sw')
			ctx.emit('SWEXPR003')
			ctx.emit('SWPARSE007')
			assert.strictEqual(
				ctx.formatAllDiagnostics(),
				'error[SWEXPR003]: zero values in expression\n  --> a.sw\n\nerror[SWPARSE007]: empty expression in file\n  --> a.sw'
			)
		})
	})
})
