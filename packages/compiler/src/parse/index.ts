export { parseExpression } from './expression.ts'
export { parseFunctionDef } from './function-def.ts'
export { type ParseResult, parse } from './parser.ts'
export { parseBlock, parseStatement } from './statement.ts'
