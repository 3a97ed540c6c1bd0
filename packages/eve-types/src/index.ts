/**
 * @fileoverview EVE Online Type Definitions
 *
 * Branded numeric identifiers for the entities exposed by the XML API, so a
 * skill type id can never be passed where a character id is expected.
 *
 * @packageDocumentation
 */

import { brand, unbrand } from './types'

import type { EveBrandedType } from './types'

export { brand, unbrand }
export type { EveBrandedType }

/**
 * Branded type for EVE Online Character IDs.
 *
 * @example
 * ```typescript
 * const charId = createEveCharacterId(90000001);
 * ```
 */
export type EveCharacterId = EveBrandedType<number, 'EveCharacterId'>

/**
 * Branded type for EVE Online Corporation IDs.
 */
export type EveCorporationId = EveBrandedType<number, 'EveCorporationId'>

/**
 * Branded type for EVE Online Alliance IDs.
 */
export type EveAllianceId = EveBrandedType<number, 'EveAllianceId'>

/**
 * Branded type for skill type IDs (the `typeID` of a skill in the skill tree).
 */
export type EveSkillId = EveBrandedType<number, 'EveSkillId'>

/**
 * Branded type for certificate IDs from the certificate tree.
 */
export type EveCertificateId = EveBrandedType<number, 'EveCertificateId'>

/**
 * Helper functions for creating specific EVE branded types.
 *
 * @example
 * ```typescript
 * const corpId = createEveCorporationId(98000001);
 * const charId = createEveCharacterId(90000001);
 *
 * function processCorporation(id: EveCorporationId) {
 *   console.log('Processing corporation:', id);
 * }
 *
 * processCorporation(corpId); // Works correctly
 * // processCorporation(charId); // TypeScript error: incompatible types
 * ```
 */
export const createEveCharacterId = (id: number): EveCharacterId => brand(id, 'EveCharacterId')

export const createEveCorporationId = (id: number): EveCorporationId =>
	brand(id, 'EveCorporationId')

export const createEveAllianceId = (id: number): EveAllianceId => brand(id, 'EveAllianceId')

export const createEveSkillId = (id: number): EveSkillId => brand(id, 'EveSkillId')

export const createEveCertificateId = (id: number): EveCertificateId =>
	brand(id, 'EveCertificateId')

/**
 * Parse an id as it appears in an API document (always a decimal string).
 *
 * Returns undefined for absent, non-numeric, non-integer or non-positive
 * values; the API uses `0` for "no alliance" and similar.
 *
 * @example
 * ```typescript
 * parseEveId('98000001', createEveCorporationId) // 98000001
 * parseEveId('0', createEveAllianceId) // undefined
 * ```
 */
export function parseEveId<Id extends number>(
	value: string | number | undefined,
	create: (id: number) => Id
): Id | undefined {
	if (value === undefined) {
		return undefined
	}
	const numeric = typeof value === 'number' ? value : Number(value.trim())
	if (!Number.isSafeInteger(numeric) || numeric <= 0) {
		return undefined
	}
	return create(numeric)
}
