import { createEveSkillId, parseEveId } from '@eve-xml/eve-types'

import { parseApiDate } from '../dates'
import { toInteger } from '../fields'
import { Skill } from './skill'

import type { ApiContext, SkillQueueRow } from '../types'
import type { ApiDocument } from '../xml'

/**
 * One queued skill. `startTime` and `endTime` are absent while the queue is
 * paused.
 */
export interface SkillQueueEntry extends Omit<SkillQueueRow, 'skillId'> {
	skill: Skill
}

export function parseSkillQueue(document: ApiDocument): SkillQueueRow[] {
	const rows: SkillQueueRow[] = []

	for (const row of document.allNodes('result/rowset[@name=skillqueue]/row')) {
		const skillId = parseEveId(row.attribute('typeID'), createEveSkillId)
		const position = toInteger(row.attribute('queuePosition'))
		if (skillId === undefined || position === undefined) {
			continue
		}
		rows.push({
			position,
			skillId,
			level: toInteger(row.attribute('level')),
			startSkillPoints: toInteger(row.attribute('startSP')),
			endSkillPoints: toInteger(row.attribute('endSP')),
			startTime: parseApiDate(row.attribute('startTime')),
			endTime: parseApiDate(row.attribute('endTime')),
		})
	}

	return rows.sort((a, b) => a.position - b.position)
}

/**
 * Fetch a character's training queue, ordered by queue position
 *
 * @throws MissingCredentialError when the context has no credential
 */
export async function loadSkillQueue(
	context: ApiContext,
	characterId: number
): Promise<SkillQueueEntry[]> {
	const document = await context.dispatcher.call(
		'char/SkillQueue',
		{ character_id: characterId },
		context.credential
	)

	return parseSkillQueue(document).map(({ skillId, ...row }) => ({
		...row,
		skill: new Skill(context, { id: skillId }),
	}))
}
