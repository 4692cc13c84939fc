/**
 * Core data structures shared by every phase: positions, identifiers,
 * tokens, the AST and the compilation context.
 */

export {
	CompilationContext,
	type Diagnostic,
} from './context.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
export { InternalCompilerError } from './errors.ts'
export { expectedIn, unexpected } from './expect.ts'
export { type Identifier, IdentifierTable, identifier } from './identifiers.ts'
export {
	type Argument,
	argumentIdent,
	type Assignment,
	type Block,
	type BlockEntry,
	type Call,
	CallStyle,
	type Expression,
	type ExpressionKind,
	type FunctionCall,
	type FunctionDef,
	type Item,
	type Parameter,
	type Program,
	type Statement,
} from './nodes.ts'
export { type Failure, failure, failureMessage, type Outcome, success } from './outcome.ts'
export {
	addChars,
	addLine,
	type Node,
	node,
	type SourcePos,
	startPos,
} from './position.ts'
export {
	Bracket,
	bracketOf,
	depthDelta,
	identifierToken,
	isSymbol,
	OPERATOR_LEXEMES,
	Operator,
	operatorText,
	operatorToken,
	SYMBOL_LEXEMES,
	SymbolKind,
	symbolText,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	TokenStream,
	tokenId,
	tokenText,
} from './tokens.ts'
