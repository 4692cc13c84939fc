/**
 * Lexical analysis module.
 * Tokenizes source code into a flat array of positioned tokens.
 */

export { type TokenizeResult, tokenize } from './tokenizer.ts'
