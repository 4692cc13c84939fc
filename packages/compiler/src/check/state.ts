/**
 * Checker state shared across one check run.
 */

import type { SymbolEntry } from '../scope/table.ts'

export interface CheckerState {
	/**
	 * Symbols whose defining item already failed. Uses of them are skipped
	 * silently so a broken assignment is reported only once.
	 */
	readonly failed: Set<SymbolEntry>
}

export function createState(): CheckerState {
	return { failed: new Set() }
}
