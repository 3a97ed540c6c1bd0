/**
 * @fileoverview Object model over the EVE Online XML API
 *
 * Entities (characters, corporations, alliances, skills, certificates) fetch
 * their fields on first read, once, and share them through an identity cache.
 *
 * @packageDocumentation
 */

export * from './authorization'
export * from './cache/collection-cache'
export * from './cache/entity-cache'
export * from './cache/identity-cache'
export * from './cache/once-cache'
export * from './config'
export * from './credential'
export * from './dates'
export * from './dispatcher'
export * from './entities/alliance'
export * from './entities/certificate'
export * from './entities/character'
export * from './entities/corporation'
export * from './entities/skill'
export * from './entities/skill-queue'
export * from './errors'
export * from './relationships/employment'
export * from './resolvable'
export * from './session'
export * from './transport'
export * from './types'
export * from './xml'
