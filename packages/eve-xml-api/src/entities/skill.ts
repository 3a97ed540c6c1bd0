import { createEveSkillId, parseEveId } from '@eve-xml/eve-types'

import { toBoolean, toInteger } from '../fields'
import { Resolvable } from '../resolvable'

import type { CollectionSnapshot } from '../cache/collection-cache'
import type { ResolutionState } from '../resolvable'
import type { ApiContext, LookupKey, SkillFields, SkillTreeRecord } from '../types'

/**
 * Fetch `eve/SkillTree` unless this context's cache already holds it
 */
export function loadSkillTree(context: ApiContext): Promise<ReadonlyMap<number, SkillTreeRecord>> {
	return context.cache.skillTree.load(async (): Promise<CollectionSnapshot<SkillTreeRecord>> => {
		const document = await context.dispatcher.call('eve/SkillTree', {}, context.credential)
		const records = new Map<number, SkillTreeRecord>()

		for (const group of document.allNodes('result/rowset[@name=skillGroups]/row')) {
			const groupId = toInteger(group.attribute('groupID'))
			const groupName = group.attribute('groupName')

			for (const row of group.allNodes('rowset[@name=skills]/row')) {
				const skillId = parseEveId(row.attribute('typeID'), createEveSkillId)
				if (skillId === undefined) {
					continue
				}
				records.set(skillId, {
					skillId,
					name: row.attribute('typeName'),
					description: row.firstValue('description'),
					groupId: toInteger(row.attribute('groupID')) ?? groupId,
					groupName,
					rank: toInteger(row.firstValue('rank')),
					published: toBoolean(row.attribute('published')),
				})
			}
		}

		return { records, cachedUntil: document.cachedUntil }
	})
}

/**
 * A skill from the skill tree, looked up by type id or by name.
 *
 * The tree is fetched as a whole, once per cache; name lookups are
 * case-insensitive. `level` and `skillPoints` are only known when the skill
 * was listed from a character.
 *
 * @example
 * ```ts
 * const gunnery = new Skill(context, { name: 'gunnery' })
 * await gunnery.get('name') // 'Gunnery'
 * ```
 */
export class Skill {
	private readonly record: Resolvable<SkillFields>

	constructor(
		private readonly context: ApiContext,
		readonly lookup: LookupKey,
		preset: Partial<SkillFields> = {}
	) {
		this.record = new Resolvable<SkillFields>(
			() => this.resolveFields(),
			'id' in lookup ? { ...preset, skillId: createEveSkillId(lookup.id) } : preset
		)
	}

	get status(): ResolutionState {
		return this.record.status
	}

	get<K extends keyof SkillFields>(key: K): Promise<SkillFields[K] | undefined> {
		return this.record.get(key)
	}

	peek<K extends keyof SkillFields>(key: K): SkillFields[K] | undefined {
		return this.record.peek(key)
	}

	set<K extends keyof SkillFields>(key: K, value: SkillFields[K]): void {
		this.record.set(key, value)
	}

	resolve(): Promise<void> {
		return this.record.resolve()
	}

	snapshot(): Readonly<Partial<SkillFields>> {
		return this.record.snapshot()
	}

	private async resolveFields(): Promise<Partial<SkillFields>> {
		const { cache } = this.context

		if ('id' in this.lookup) {
			const cached = cache.skills.get(this.lookup.id)
			if (cached) {
				return cached
			}
		}

		await loadSkillTree(this.context)

		const found =
			'id' in this.lookup
				? cache.skillTree.findById(this.lookup.id)
				: cache.skillTree.findByName(this.lookup.name, (skill) => skill.name)
		if (!found) {
			return {}
		}

		return cache.skills.put(found.skillId, found, { cachedUntil: cache.skillTree.cachedUntil })
	}
}
