import assert from 'node:assert'
import { describe, it } from 'node:test'
import { compile, DEFAULT_ENTRY_POINT } from '@sinewave/compiler'
import {
	entrySignature,
	formatCompileFailure,
	formatEvaluationError,
	formatInvalidBinding,
	formatReadError,
	getErrorMessage,
	isNodeError,
	parseBinding,
} from '../src/utils.ts'

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		const error = Object.assign(new Error('test'), { code: 'ENOENT' })
		assert.strictEqual(isNodeError(error), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
	})
})

describe('formatReadError', () => {
	it('should report a missing file', () => {
		const error = Object.assign(new Error('no such file'), { code: 'ENOENT' })
		assert.strictEqual(formatReadError('/tmp/tone.sw', error), '[SWCLI001] file not found: /tmp/tone.sw')
	})

	it('should report other read failures with their reason', () => {
		const error = Object.assign(new Error('permission denied'), { code: 'EACCES' })
		assert.strictEqual(formatReadError('/tmp/tone.sw', error), '[SWCLI002] cannot read file: permission denied')
	})

	it('should report non-Error failures', () => {
		assert.strictEqual(formatReadError('/tmp/tone.sw', 'disk on fire'), '[SWCLI002] cannot read file: disk on fire')
	})
})

describe('parseBinding', () => {
	it('should parse name=value', () => {
		assert.deepStrictEqual(parseBinding('t=0.5'), { name: 't', value: 0.5 })
	})

	it('should trim around the separator', () => {
		assert.deepStrictEqual(parseBinding(' freq = 440 '), { name: 'freq', value: 440 })
	})

	it('should accept negative and exponent values', () => {
		assert.deepStrictEqual(parseBinding('x=-2e3'), { name: 'x', value: -2000 })
	})

	it('should reject malformed bindings', () => {
		assert.strictEqual(parseBinding('novalue'), null)
		assert.strictEqual(parseBinding('=3'), null)
		assert.strictEqual(parseBinding('t='), null)
		assert.strictEqual(parseBinding('t=abc'), null)
		assert.strictEqual(parseBinding('1x=2'), null)
	})

	it('should format a rejected binding', () => {
		assert.strictEqual(formatInvalidBinding('oops'), '[SWCLI003] invalid variable binding "oops"')
	})
})

describe('formatCompileFailure', () => {
	it('should append the error count to the diagnostics', () => {
		const result = compile('[main t] u', { filename: 'tone.sw' })
		const text = formatCompileFailure(result.context)
		assert.strictEqual(text.startsWith('error[SWPARSE005]: '), true)
		assert.strictEqual(text.endsWith('\n\n[SWCLI004] compilation failed with 1 error(s)'), true)
	})
})

describe('formatEvaluationError', () => {
	it('should render the failure message', () => {
		assert.strictEqual(
			formatEvaluationError({ args: { name: 't' }, code: 'SWEXPR006' }),
			'[SWCLI005] evaluation failed: attempted to access a nonexistent variable `t`'
		)
	})
})

describe('entrySignature', () => {
	it('should default to main', () => {
		assert.strictEqual(entrySignature(undefined), DEFAULT_ENTRY_POINT)
	})

	it('should keep the default signature under another name', () => {
		assert.deepStrictEqual(entrySignature('tone'), { name: 'tone', params: ['Number'], returns: 'Number' })
	})
})
