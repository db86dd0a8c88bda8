import { v4 as uuidv4 } from 'uuid'
import type { RecordsDB } from '../db'
import { requireCapability } from '../capability'
import type { Actor } from '../capability'
import { InvalidScoreError, RecordNotFoundError } from '../errors'
import type { GradeEntity, LetterGrade } from '../types'

// Lower bounds are inclusive; anything below the last band is an F.
const LETTER_BANDS: readonly { min: number; letter: LetterGrade }[] = [
	{ min: 90, letter: 'A' },
	{ min: 80, letter: 'B' },
	{ min: 70, letter: 'C' },
	{ min: 60, letter: 'D' },
]

const GRADE_POINTS: Record<LetterGrade, number> = { A: 4, B: 3, C: 2, D: 1, F: 0 }

export function roundTo2(value: number): number {
	return Math.round((value + Number.EPSILON) * 100) / 100
}

/**
 * Marks are kept at two decimals. Finer values are refused rather than
 * rounded, since rounding can lift a score into the next band.
 */
export function assertValidMarks(marks: number): number {
	if (!Number.isFinite(marks) || marks < 0 || marks > 100) throw new InvalidScoreError(marks)
	if (Math.abs(marks * 100 - Math.round(marks * 100)) > 1e-6) throw new InvalidScoreError(marks)
	return roundTo2(marks)
}

export function letterGrade(marks: number): LetterGrade {
	assertValidMarks(marks)
	return LETTER_BANDS.find((band) => marks >= band.min)?.letter ?? 'F'
}

export function gradePoint(letter: LetterGrade): number {
	return GRADE_POINTS[letter]
}

/**
 * Records the grade for an enrollment. An enrollment holds at most one
 * grade, so a second call replaces the first under the same grade id.
 */
export async function recordGrade(
	db: RecordsDB,
	actor: Actor,
	enrollmentId: string,
	marks: number,
	remark?: string,
	now: Date = new Date(),
): Promise<GradeEntity> {
	requireCapability(actor, 'record-grade')
	const stored = assertValidMarks(marks)
	return db.transaction('rw', db.enrollments, db.grades, async () => {
		if (!(await db.enrollments.get(enrollmentId))) throw new RecordNotFoundError('Enrollment', { enrollmentId })
		const existing = await db.grades.where('enrollmentId').equals(enrollmentId).first()
		const grade: GradeEntity = {
			id: existing?.id ?? uuidv4(),
			enrollmentId,
			marks: stored,
			letter: letterGrade(stored),
			remark: remark?.trim() || undefined,
			recordedAt: now.toISOString(),
		}
		await db.grades.put(grade)
		return grade
	})
}

export async function getGrade(db: RecordsDB, enrollmentId: string): Promise<GradeEntity | undefined> {
	return db.grades.where('enrollmentId').equals(enrollmentId).first()
}
