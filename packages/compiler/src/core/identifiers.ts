/**
 * Branded type for identifier handles.
 * Dense integers; the same string always maps to the same handle within one compilation.
 */
export type Identifier = number & { readonly __brand: 'Identifier' }

export function identifier(n: number): Identifier {
	return n as Identifier
}

/**
 * Dense array storage for interned identifier names.
 * Owned by one compilation and discarded with it.
 */
export class IdentifierTable {
	private readonly names: string[] = []
	private readonly nameToId: Map<string, Identifier> = new Map()

	/** Intern a name, returning its handle. Same name always returns same handle. */
	intern(name: string): Identifier {
		const existing = this.nameToId.get(name)
		if (existing !== undefined) return existing

		const id = identifier(this.names.length)
		this.names.push(name)
		this.nameToId.set(name, id)
		return id
	}

	/** Handle of an already interned name, without interning it. */
	lookup(name: string): Identifier | undefined {
		return this.nameToId.get(name)
	}

	get(id: Identifier): string {
		const name = this.names[id]
		if (name === undefined) throw new Error(`Invalid Identifier: ${id}`)
		return name
	}
}
