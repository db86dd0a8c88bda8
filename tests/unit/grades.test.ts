import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createActor } from '../../src/capability'
import type { RecordsDB } from '../../src/db'
import { InvalidScoreError, RecordNotFoundError } from '../../src/errors'
import { enroll } from '../../src/records/enrollments'
import { getGrade, gradePoint, letterGrade, recordGrade } from '../../src/records/grades'
import type { EnrollmentEntity } from '../../src/types'
import { admin, openTestDB, seedCourse, seedStudent } from './helpers'

describe('letterGrade', () => {
	it.each([
		[100, 'A'],
		[93, 'A'],
		[90, 'A'],
		[89.99, 'B'],
		[80, 'B'],
		[79.99, 'C'],
		[70, 'C'],
		[60, 'D'],
		[59.99, 'F'],
		[0, 'F'],
	])('maps %s to %s', (marks, letter) => {
		expect(letterGrade(marks)).toBe(letter)
	})

	it('rejects marks outside 0 to 100', () => {
		expect(() => letterGrade(100.01)).toThrow(InvalidScoreError)
		expect(() => letterGrade(-1)).toThrow(InvalidScoreError)
		expect(() => letterGrade(Number.NaN)).toThrow(InvalidScoreError)
		expect(() => letterGrade(89.995)).toThrow(InvalidScoreError)
	})
})

describe('gradePoint', () => {
	it('uses the fixed four-point table', () => {
		expect((['A', 'B', 'C', 'D', 'F'] as const).map(gradePoint)).toEqual([4, 3, 2, 1, 0])
	})
})

describe('recordGrade', () => {
	let db: RecordsDB
	let enrollment: EnrollmentEntity

	beforeEach(async () => {
		db = openTestDB()
		const student = await seedStudent(db)
		const course = await seedCourse(db)
		enrollment = await enroll(db, admin, {
			studentId: student.id,
			courseId: course.id,
			semester: 'Fall',
			academicYear: '2024-2025',
		})
	})

	afterEach(async () => {
		await db.delete()
	})

	it('derives the letter from the marks', async () => {
		const grade = await recordGrade(db, admin, enrollment.id, 93, '')
		expect(grade).toMatchObject({ enrollmentId: enrollment.id, marks: 93, letter: 'A', remark: undefined })
		expect(await getGrade(db, enrollment.id)).toEqual(grade)
	})

	it('keeps two-decimal marks as given', async () => {
		const grade = await recordGrade(db, admin, enrollment.id, 89.99)
		expect(grade.marks).toBe(89.99)
		expect(grade.letter).toBe('B')
	})

	it('refuses marks finer than two decimals instead of rounding them across a band', async () => {
		await expect(recordGrade(db, admin, enrollment.id, 89.995)).rejects.toMatchObject({
			code: 'INVALID_SCORE',
			key: { marks: 89.995 },
		})
		await expect(recordGrade(db, admin, enrollment.id, 84.456)).rejects.toMatchObject({ code: 'INVALID_SCORE' })
		expect(await db.grades.count()).toBe(0)
	})

	it('replaces an earlier grade for the same enrollment', async () => {
		const first = await recordGrade(db, admin, enrollment.id, 55, 'missed final')
		const second = await recordGrade(db, admin, enrollment.id, 85, 'resit')
		expect(second.id).toBe(first.id)
		expect(second).toMatchObject({ marks: 85, letter: 'B', remark: 'resit' })
		expect(await db.grades.count()).toBe(1)
	})

	it('rejects marks outside the range without writing', async () => {
		await expect(recordGrade(db, admin, enrollment.id, 101)).rejects.toMatchObject({
			code: 'INVALID_SCORE',
			key: { marks: 101 },
		})
		await expect(recordGrade(db, admin, enrollment.id, -0.5)).rejects.toMatchObject({ code: 'INVALID_SCORE' })
		expect(await db.grades.count()).toBe(0)
	})

	it('reports a missing enrollment', async () => {
		await expect(recordGrade(db, admin, 'missing', 75)).rejects.toBeInstanceOf(RecordNotFoundError)
		await expect(recordGrade(db, admin, 'missing', 75)).rejects.toMatchObject({
			code: 'NOT_FOUND',
			key: { entity: 'Enrollment', enrollmentId: 'missing' },
		})
	})

	it('needs the record-grade capability', async () => {
		const clerk = createActor('clerk-1', ['enroll'])
		await expect(recordGrade(db, clerk, enrollment.id, 75)).rejects.toMatchObject({
			code: 'CAPABILITY_REQUIRED',
			key: { capability: 'record-grade' },
		})
	})
})
