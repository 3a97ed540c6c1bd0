import type {
	EveAllianceId,
	EveCertificateId,
	EveCharacterId,
	EveCorporationId,
	EveSkillId,
} from '@eve-xml/eve-types'
import type { EntityCache } from './cache/entity-cache'
import type { Credential } from './credential'
import type { EndpointDispatcher } from './dispatcher'

export type EntityKind = 'character' | 'corporation' | 'alliance' | 'skill' | 'certificate'

/**
 * Everything an entity needs to resolve itself. Passed explicitly from parent
 * to child entity; nothing is ambient.
 */
export interface ApiContext {
	readonly dispatcher: EndpointDispatcher
	readonly cache: EntityCache
	readonly credential?: Credential
}

/** Exactly one of a numeric id or a (case-insensitive) name */
export type LookupKey = { readonly id: number } | { readonly name: string }

// ========== Character ==========

/** One row of a character's employment history, as the API reports it */
export interface EmploymentRecord {
	recordId?: number
	corporationId: EveCorporationId
	corporationName?: string
	startDate?: Date
}

/** One trained skill from the character sheet */
export interface CharacterSkillRow {
	skillId: EveSkillId
	skillPoints?: number
	level?: number
	published?: boolean
}

export interface CharacterFields {
	characterId: EveCharacterId
	name: string
	race: string
	bloodline: string
	ancestry: string
	gender: string
	dateOfBirth: Date
	corporationId: EveCorporationId
	corporationName: string
	corporationDate: Date
	allianceId: EveAllianceId
	allianceName: string
	securityStatus: number
	balance: number
	skillPoints: number
	cloneName: string
	employmentHistory: ReadonlyArray<EmploymentRecord>
	skillRows: ReadonlyArray<CharacterSkillRow>
	certificateIds: ReadonlyArray<EveCertificateId>
}

/** One entry of `char/SkillQueue` */
export interface SkillQueueRow {
	position: number
	skillId: EveSkillId
	level?: number
	startSkillPoints?: number
	endSkillPoints?: number
	startTime?: Date
	endTime?: Date
}

// ========== Corporation ==========

export interface CorporationFields {
	corporationId: EveCorporationId
	name: string
	ticker: string
	ceoId: EveCharacterId
	ceoName: string
	description: string
	url: string
	allianceId: EveAllianceId
	allianceName: string
	taxRate: number
	memberCount: number
	memberLimit: number
	shares: number
}

/**
 * When a character or alliance belonged to a corporation. Known from the
 * parent's document; never resolved or cached.
 */
export interface MembershipInterval {
	startDate?: Date
	/** Absent for the current employer */
	endDate?: Date
}

// ========== Alliance ==========

export interface AllianceMemberRecord {
	corporationId: EveCorporationId
	startDate?: Date
}

export interface AllianceFields {
	allianceId: EveAllianceId
	name: string
	shortName: string
	executorCorporationId: EveCorporationId
	founded: Date
	memberCount: number
	memberCorporations: ReadonlyArray<AllianceMemberRecord>
}

export type AllianceRecord = Pick<AllianceFields, 'allianceId'> & Partial<AllianceFields>

// ========== Skill ==========

export interface SkillFields {
	skillId: EveSkillId
	name: string
	description: string
	groupId: number
	groupName: string
	rank: number
	published: boolean
	/** Trained level; only known for skills listed from a character */
	level: number
	/** Skill points trained; only known for skills listed from a character */
	skillPoints: number
}

export type SkillTreeRecord = Pick<SkillFields, 'skillId'> &
	Partial<Omit<SkillFields, 'level' | 'skillPoints'>>

// ========== Certificate ==========

export interface CertificateFields {
	certificateId: EveCertificateId
	description: string
	grade: number
	categoryId: number
	categoryName: string
	classId: number
	className: string
}

export type CertificateRecord = Pick<CertificateFields, 'certificateId'> &
	Partial<CertificateFields>
