import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	Bindings,
	bindIntrinsics,
	compileExpressionSource,
	STANDARD_INTRINSICS,
} from '@sinewave/compiler'
import {
	formatCompileFailure,
	formatEvaluationError,
	formatInvalidBinding,
	parseBinding,
} from '../utils.ts'

export default class EvalCommand extends BaseCommand {
	static override commandName = 'eval'
	static override description = 'Evaluate a single expression'

	@args.string({ description: 'Expression to evaluate, e.g. "sin(t) * 0.5"' })
	declare expression: string

	@flags.array({ alias: 'V', description: 'Variable binding name=value (repeatable)' })
	declare var?: string[]

	private collectBindings(): Bindings | null {
		const bindings = bindIntrinsics(new Bindings())
		for (const text of this.var ?? []) {
			const binding = parseBinding(text)
			if (!binding) {
				this.logger.error(formatInvalidBinding(text))
				this.exitCode = 1
				return null
			}
			bindings.setVar(binding.name, binding.value)
		}
		return bindings
	}

	override async run(): Promise<void> {
		const bindings = this.collectBindings()
		if (!bindings) return

		const compiled = compileExpressionSource(this.expression, {
			filename: '<expression>',
			functions: STANDARD_INTRINSICS.map((intrinsic) => intrinsic.name),
			variables: bindings.variableNames(),
		})
		if (!compiled.succeeded) {
			this.logger.error(formatCompileFailure(compiled.context))
			this.exitCode = 1
			return
		}

		const value = compiled.expression.evaluate(bindings)
		if (!value.succeeded) {
			this.logger.error(formatEvaluationError(value.failure))
			this.exitCode = 1
			return
		}
		this.logger.log(String(value.value))
	}
}
