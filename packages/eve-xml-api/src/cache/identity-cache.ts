import type { EntityKind } from '../types'

export interface IdentityEntryMeta {
	/** `cachedUntil` of the document the fields came from */
	cachedUntil?: Date
	/** Whether the fields came from calls made with the credential attached */
	authenticated?: boolean
}

export interface IdentityEntry<F extends object> {
	readonly fields: Readonly<Partial<F>>
	readonly cachedUntil?: Date
	readonly authenticated: boolean
}

/**
 * Copy into `target` every field of `source` that `target` does not have yet.
 * Fields already present are never erased or replaced.
 */
export function mergeAbsent<F extends object>(
	target: Partial<F>,
	source: Partial<F>
): Partial<F> {
	const merged: Partial<F> = { ...target }
	for (const key in source) {
		const value = source[key]
		if (value !== undefined && merged[key] === undefined) {
			merged[key] = value
		}
	}
	return merged
}

/**
 * Last-resolved field sets of one entity kind, keyed by numeric id.
 *
 * Entries are never evicted; `cachedUntil` is recorded so callers can ask
 * whether an entry is still fresh.
 */
export class IdentityTable<F extends object> {
	private readonly entries = new Map<number, IdentityEntry<F>>()

	constructor(readonly kind: EntityKind) {}

	get(id: number): Readonly<Partial<F>> | undefined {
		return this.entries.get(id)?.fields
	}

	entry(id: number): IdentityEntry<F> | undefined {
		return this.entries.get(id)
	}

	has(id: number): boolean {
		return this.entries.has(id)
	}

	/**
	 * Merge `fields` into the entry for `id`
	 *
	 * @returns the merged field set
	 */
	put(id: number, fields: Readonly<Partial<F>>, meta: IdentityEntryMeta = {}): Readonly<Partial<F>> {
		const existing = this.entries.get(id)
		const merged = mergeAbsent<F>(existing?.fields ?? {}, fields)

		this.entries.set(id, {
			fields: merged,
			cachedUntil: meta.cachedUntil ?? existing?.cachedUntil,
			authenticated: (existing?.authenticated ?? false) || (meta.authenticated ?? false),
		})

		return merged
	}

	cachedUntil(id: number): Date | undefined {
		return this.entries.get(id)?.cachedUntil
	}

	/**
	 * True while the entry's `cachedUntil` has not passed
	 */
	isFresh(id: number, now: Date = new Date()): boolean {
		const cachedUntil = this.cachedUntil(id)
		return cachedUntil !== undefined && cachedUntil.getTime() >= now.getTime()
	}

	delete(id: number): boolean {
		return this.entries.delete(id)
	}

	clear(): void {
		this.entries.clear()
	}

	get size(): number {
		return this.entries.size
	}
}
