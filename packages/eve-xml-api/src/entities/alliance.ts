import { createEveAllianceId, createEveCorporationId, parseEveId } from '@eve-xml/eve-types'

import { parseApiDate } from '../dates'
import { toInteger } from '../fields'
import { Resolvable } from '../resolvable'
import { Corporation } from './corporation'

import type { CollectionSnapshot } from '../cache/collection-cache'
import type { ResolutionState } from '../resolvable'
import type { AllianceFields, AllianceMemberRecord, AllianceRecord, ApiContext, LookupKey } from '../types'

/** An alliance id, a full name or a ticker; names compare case-insensitively */
export type AllianceLookup = LookupKey | { readonly shortName: string }

/**
 * Fetch `eve/AllianceList` unless this context's cache already holds it
 */
export function loadAllianceList(context: ApiContext): Promise<ReadonlyMap<number, AllianceRecord>> {
	return context.cache.allianceList.load(async (): Promise<CollectionSnapshot<AllianceRecord>> => {
		const document = await context.dispatcher.call('eve/AllianceList', {}, context.credential)
		const records = new Map<number, AllianceRecord>()

		for (const row of document.allNodes('result/rowset[@name=alliances]/row')) {
			const allianceId = parseEveId(row.attribute('allianceID'), createEveAllianceId)
			if (allianceId === undefined) {
				continue
			}

			const memberCorporations: AllianceMemberRecord[] = []
			for (const member of row.allNodes('rowset[@name=memberCorporations]/row')) {
				const corporationId = parseEveId(member.attribute('corporationID'), createEveCorporationId)
				if (corporationId !== undefined) {
					memberCorporations.push({
						corporationId,
						startDate: parseApiDate(member.attribute('startDate')),
					})
				}
			}

			records.set(allianceId, {
				allianceId,
				name: row.attribute('name'),
				shortName: row.attribute('shortName'),
				executorCorporationId: parseEveId(row.attribute('executorCorpID'), createEveCorporationId),
				founded: parseApiDate(row.attribute('startDate')),
				memberCount: toInteger(row.attribute('memberCount')),
				memberCorporations,
			})
		}

		return { records, cachedUntil: document.cachedUntil }
	})
}

/**
 * An alliance from the alliance list.
 *
 * The list is public and fetched once per cache, so every alliance field
 * resolves from that single call.
 *
 * @example
 * ```ts
 * const alliance = new Alliance(context, { shortName: 'TEST' })
 * const executor = await alliance.executor() // unresolved Corporation
 * ```
 */
export class Alliance {
	private readonly record: Resolvable<AllianceFields>

	constructor(
		private readonly context: ApiContext,
		readonly lookup: AllianceLookup,
		preset: Partial<AllianceFields> = {}
	) {
		this.record = new Resolvable<AllianceFields>(
			() => this.resolveFields(),
			'id' in lookup ? { ...preset, allianceId: createEveAllianceId(lookup.id) } : preset
		)
	}

	/**
	 * Every alliance in the list, with its list fields already set
	 */
	static async all(context: ApiContext): Promise<Alliance[]> {
		const records = await loadAllianceList(context)
		return [...records.values()].map(
			(record) => new Alliance(context, { id: record.allianceId }, record)
		)
	}

	get status(): ResolutionState {
		return this.record.status
	}

	get<K extends keyof AllianceFields>(key: K): Promise<AllianceFields[K] | undefined> {
		return this.record.get(key)
	}

	peek<K extends keyof AllianceFields>(key: K): AllianceFields[K] | undefined {
		return this.record.peek(key)
	}

	set<K extends keyof AllianceFields>(key: K, value: AllianceFields[K]): void {
		this.record.set(key, value)
	}

	resolve(): Promise<void> {
		return this.record.resolve()
	}

	snapshot(): Readonly<Partial<AllianceFields>> {
		return this.record.snapshot()
	}

	/**
	 * The executor corporation, not yet resolved
	 */
	async executor(): Promise<Corporation | undefined> {
		const corporationId = await this.get('executorCorporationId')
		return corporationId !== undefined ? new Corporation(this.context, corporationId) : undefined
	}

	/**
	 * Member corporations with the date each joined set as `startDate`
	 */
	async memberCorporations(): Promise<Corporation[]> {
		const members = (await this.get('memberCorporations')) ?? []
		return members.map(
			(member) =>
				new Corporation(
					this.context,
					member.corporationId,
					{ allianceId: this.peek('allianceId'), allianceName: this.peek('name') },
					{ startDate: member.startDate }
				)
		)
	}

	/**
	 * Whether the alliance list this record comes from is still fresh
	 */
	isCached(now: Date = new Date()): boolean {
		return this.context.cache.allianceList.isFresh(now)
	}

	private async resolveFields(): Promise<Partial<AllianceFields>> {
		const { cache } = this.context
		const { lookup } = this

		if ('id' in lookup) {
			const cached = cache.alliances.get(lookup.id)
			if (cached) {
				return cached
			}
		}

		await loadAllianceList(this.context)

		let found: AllianceRecord | undefined
		if ('id' in lookup) {
			found = cache.allianceList.findById(lookup.id)
		} else if ('name' in lookup) {
			found = cache.allianceList.findByName(lookup.name, (alliance) => alliance.name)
		} else {
			found = cache.allianceList.findByName(lookup.shortName, (alliance) => alliance.shortName)
		}
		if (!found) {
			return {}
		}

		return cache.alliances.put(found.allianceId, found, {
			cachedUntil: cache.allianceList.cachedUntil,
		})
	}
}
