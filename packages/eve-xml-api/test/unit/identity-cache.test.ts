import { describe, expect, it } from 'vitest'

import { EntityCache, sharedEntityCache } from '../../src/cache/entity-cache'
import { IdentityTable, mergeAbsent } from '../../src/cache/identity-cache'

interface TestFields {
	name: string
	rank: number
	description: string
}

describe('mergeAbsent', () => {
	it('should only add fields the target lacks', () => {
		expect(mergeAbsent<TestFields>({ name: 'X', rank: 3 }, { name: 'Y', description: 'Z' })).toEqual({
			name: 'X',
			rank: 3,
			description: 'Z',
		})
	})

	it('should ignore undefined values', () => {
		expect(mergeAbsent<TestFields>({ rank: 3 }, { rank: undefined, name: 'X' })).toEqual({
			rank: 3,
			name: 'X',
		})
	})
})

describe('IdentityTable', () => {
	it('should keep fields already present when merging', () => {
		const table = new IdentityTable<TestFields>('skill')
		table.put(3300, { name: 'X', rank: 3 })

		const merged = table.put(3300, { name: 'X' })

		expect(merged).toEqual({ name: 'X', rank: 3 })
		expect(table.get(3300)).toEqual({ name: 'X', rank: 3 })
	})

	it('should never overwrite a present field', () => {
		const table = new IdentityTable<TestFields>('skill')
		table.put(3300, { name: 'Gunnery' })
		table.put(3300, { name: 'Renamed', rank: 1 })

		expect(table.get(3300)).toEqual({ name: 'Gunnery', rank: 1 })
	})

	it('should report presence by id', () => {
		const table = new IdentityTable<TestFields>('skill')
		table.put(3300, { name: 'Gunnery' })

		expect(table.has(3300)).toBe(true)
		expect(table.has(3301)).toBe(false)
		expect(table.get(3301)).toBeUndefined()
		expect(table.size).toBe(1)
	})

	it('should remember whether an entry was ever authenticated', () => {
		const table = new IdentityTable<TestFields>('character')
		table.put(1, { name: 'A' }, { authenticated: true })
		table.put(1, { rank: 1 }, { authenticated: false })

		expect(table.entry(1)?.authenticated).toBe(true)
		expect(table.entry(1)?.fields).toEqual({ name: 'A', rank: 1 })
	})

	it('should track freshness from cachedUntil', () => {
		const table = new IdentityTable<TestFields>('corporation')
		table.put(1, { name: 'A' }, { cachedUntil: new Date('2030-01-01T00:00:00Z') })
		table.put(2, { name: 'B' })

		expect(table.isFresh(1, new Date('2029-12-31T00:00:00Z'))).toBe(true)
		expect(table.isFresh(1, new Date('2030-01-02T00:00:00Z'))).toBe(false)
		expect(table.isFresh(2)).toBe(false)
		expect(table.cachedUntil(1)?.toISOString()).toBe('2030-01-01T00:00:00.000Z')
	})

	it('should keep the previous cachedUntil when a merge has none', () => {
		const table = new IdentityTable<TestFields>('corporation')
		table.put(1, { name: 'A' }, { cachedUntil: new Date('2030-01-01T00:00:00Z') })
		table.put(1, { rank: 2 })

		expect(table.cachedUntil(1)?.toISOString()).toBe('2030-01-01T00:00:00.000Z')
	})

	it('should delete and clear entries', () => {
		const table = new IdentityTable<TestFields>('skill')
		table.put(1, { name: 'A' })
		table.put(2, { name: 'B' })

		expect(table.delete(1)).toBe(true)
		expect(table.has(1)).toBe(false)
		table.clear()
		expect(table.size).toBe(0)
	})
})

describe('EntityCache', () => {
	it('should build one table per kind on first use', () => {
		const cache = new EntityCache()

		expect(cache.skills).toBe(cache.skills)
		expect(cache.skills.kind).toBe('skill')
		expect(cache.characters.kind).toBe('character')
		expect(cache.allianceList.kind).toBe('alliance')
	})

	it('should drop everything on clear', () => {
		const cache = new EntityCache()
		const skills = cache.skills
		skills.put(3300, { name: 'Gunnery' })

		cache.clear()

		expect(cache.skills).not.toBe(skills)
		expect(cache.skills.size).toBe(0)
	})

	it('should share one process-wide instance', () => {
		expect(sharedEntityCache()).toBe(sharedEntityCache())
	})
})
