import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type CompileResult, compile, formatSignature } from '@sinewave/compiler'
import { entrySignature, formatCompileFailure, formatReadError } from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Type-check a patch file and resolve its entry point'

	@args.string({ description: 'Input patch file to check' })
	declare input: string

	@flags.string({ alias: 'e', description: 'Entry point name (default: main)' })
	declare entry?: string

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private reportWarnings(result: CompileResult): void {
		for (const warning of result.context.getWarnings()) {
			this.logger.warning(result.context.formatDiagnostic(warning))
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const signature = entrySignature(this.entry)
		const result = compile(source, { entryPoint: signature, filename: this.input })
		if (!result.succeeded) {
			this.logger.error(formatCompileFailure(result.context))
			this.exitCode = 1
			return
		}

		this.reportWarnings(result)
		const shape = formatSignature(signature.params, signature.returns)
		this.logger.success(`${this.input}: entry point \`${signature.name}\` is ${shape}`)
	}
}
