import { OnceCache } from './once-cache'

import type { EntityKind } from '../types'

export interface CollectionSnapshot<R> {
	records: ReadonlyMap<number, R>
	cachedUntil?: Date
}

const SNAPSHOT_KEY = 'all'

/**
 * Holds a whole lookup-table collection (skill tree, certificate tree,
 * alliance list), fetched as one unit at most once.
 */
export class CollectionCache<R> {
	private readonly snapshots = new OnceCache<CollectionSnapshot<R>>()

	constructor(readonly kind: EntityKind) {}

	/**
	 * Load the collection unless it is already loaded
	 */
	async load(loader: () => Promise<CollectionSnapshot<R>>): Promise<ReadonlyMap<number, R>> {
		const snapshot = await this.snapshots.getOrLoad(SNAPSHOT_KEY, loader)
		return snapshot.records
	}

	get isLoaded(): boolean {
		return this.snapshots.has(SNAPSHOT_KEY)
	}

	get records(): ReadonlyMap<number, R> | undefined {
		return this.snapshots.peek(SNAPSHOT_KEY)?.records
	}

	get cachedUntil(): Date | undefined {
		return this.snapshots.peek(SNAPSHOT_KEY)?.cachedUntil
	}

	isFresh(now: Date = new Date()): boolean {
		const cachedUntil = this.cachedUntil
		return cachedUntil !== undefined && cachedUntil.getTime() >= now.getTime()
	}

	findById(id: number): R | undefined {
		return this.records?.get(id)
	}

	/**
	 * Case-insensitive lookup. When several records share a name, the one with
	 * the lowest id wins.
	 */
	findByName(name: string, nameOf: (record: R) => string | undefined): R | undefined {
		const records = this.records
		if (!records) {
			return undefined
		}

		const wanted = name.toLowerCase()
		const ids = [...records.keys()].sort((a, b) => a - b)
		for (const id of ids) {
			const record = records.get(id)
			if (record !== undefined && nameOf(record)?.toLowerCase() === wanted) {
				return record
			}
		}
		return undefined
	}

	clear(): void {
		this.snapshots.clear()
	}
}
