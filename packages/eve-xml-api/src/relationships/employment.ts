import { oneSecondBefore } from '../dates'
import { Corporation } from '../entities/corporation'

import type { ApiContext, EmploymentRecord } from '../types'

export interface InferredEmployment extends EmploymentRecord {
	/** One second before the next (more recent) record started */
	endDate?: Date
	/**
	 * True only for the most recent record. Distinguishes the current employer
	 * from an older record whose successor has no usable start date.
	 */
	current: boolean
}

export interface EmploymentInterval extends InferredEmployment {
	/** The employer, with `name` preset and carrying this interval */
	corporation: Corporation
}

function compareByStartDescending(
	a: { record: EmploymentRecord; index: number },
	b: { record: EmploymentRecord; index: number }
): number {
	const aStart = a.record.startDate?.getTime()
	const bStart = b.record.startDate?.getTime()

	if (aStart === undefined || bStart === undefined) {
		if (aStart !== undefined) return -1
		if (bStart !== undefined) return 1
		return a.index - b.index
	}
	return bStart - aStart || a.index - b.index
}

/**
 * Order employment records newest first and derive when each one ended.
 *
 * Records without a start date sort last, in their original order. Repeated
 * stints at the same corporation are kept as separate records.
 *
 * @example
 * ```ts
 * inferEmploymentIntervals([
 * 	{ corporationId: corpA, startDate: new Date('2020-01-10T00:00:00Z') },
 * 	{ corporationId: corpB, startDate: new Date('2021-06-01T00:00:00Z') },
 * ])
 * // [
 * // 	{ corporationId: corpB, startDate: 2021-06-01, current: true },
 * // 	{ corporationId: corpA, startDate: 2020-01-10, endDate: 2021-05-31 23:59:59, current: false },
 * // ]
 * ```
 */
export function inferEmploymentIntervals(
	records: ReadonlyArray<EmploymentRecord>
): InferredEmployment[] {
	const ordered = records
		.map((record, index) => ({ record, index }))
		.sort(compareByStartDescending)
		.map(({ record }) => record)

	return ordered.map((record, position) => {
		const successorStart = position > 0 ? ordered[position - 1]?.startDate : undefined
		return {
			...record,
			endDate: successorStart ? oneSecondBefore(successorStart) : undefined,
			current: position === 0,
		}
	})
}

/**
 * Turn employment records into Corporation entities carrying their interval.
 * The corporations are not resolved.
 */
export function resolveEmploymentHistory(
	context: ApiContext,
	records: ReadonlyArray<EmploymentRecord>
): EmploymentInterval[] {
	return inferEmploymentIntervals(records).map((interval) => ({
		...interval,
		corporation: new Corporation(
			context,
			interval.corporationId,
			{ name: interval.corporationName },
			{ startDate: interval.startDate, endDate: interval.endDate }
		),
	}))
}
