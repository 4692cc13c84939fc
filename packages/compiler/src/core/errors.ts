/**
 * Raised when the compiler breaks one of its own invariants.
 * Never converted into a user diagnostic.
 */
export class InternalCompilerError extends Error {
	constructor(message: string) {
		super(`internal compiler error: ${message}`)
		this.name = 'InternalCompilerError'
	}
}
