import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { loadConfig } from '../../src/config'
import type { RecordsDB } from '../../src/db'
import { enroll } from '../../src/records/enrollments'
import { listUnread } from '../../src/records/notifications'
import { listStudents } from '../../src/records/students'
import { createConsoleStore } from '../../src/store'
import { admin, openTestDB, seedCourse, seedStudent } from './helpers'

let db: RecordsDB

beforeEach(() => {
	db = openTestDB()
	vi.spyOn(console, 'log').mockImplementation(() => {})
	vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(async () => {
	vi.restoreAllMocks()
	await db.delete()
})

function consoleStore() {
	return createConsoleStore(db, admin, loadConfig({}))
}

describe('console store', () => {
	it('imports a roster with freshly allocated ids', async () => {
		const store = consoleStore()
		const year = new Date().getUTCFullYear()
		const created = await store
			.getState()
			.importRoster('firstName,lastName,dateOfBirth,gender\nAda,Lovelace,2008-12-10,female\nAlan,Turing,2009-06-23,male\n')
		expect(created.map((s) => s.id)).toEqual([`STU${year}0001`, `STU${year}0002`])
		expect(store.getState().isLoading).toBe(false)
	})

	it('writes nothing when any roster row is invalid', async () => {
		const store = consoleStore()
		const year = new Date().getUTCFullYear()
		const header = 'firstName,lastName,dateOfBirth,gender\n'
		await expect(
			store.getState().importRoster(`${header}Ada,Lovelace,2008-12-10,female\nAlan,Turing,bad,male\n`),
		).rejects.toMatchObject({ code: 'VALIDATION_ERROR', key: { field: 'dateOfBirth' } })
		expect(await listStudents(db)).toEqual([])

		await store.getState().importRoster(`${header}Ada,Lovelace,2008-12-10,female\nAlan,Turing,2009-06-23,male\n`)

		const students = await listStudents(db)
		expect(students.map((s) => `${s.id} ${s.firstName}`)).toEqual([`STU${year}0001 Ada`, `STU${year}0002 Alan`])
	})

	it('loads the report card for the selected student and term', async () => {
		const student = await seedStudent(db)
		const course = await seedCourse(db)
		const enrollment = await enroll(db, admin, {
			studentId: student.id,
			courseId: course.id,
			semester: 'Fall',
			academicYear: '2024-2025',
		})
		const store = consoleStore()
		expect(await store.getState().loadReportCard()).toBeUndefined()

		await store.getState().submitGrade(enrollment.id, 88)
		store.getState().selectStudent(student.id)
		store.getState().selectTerm({ semester: 'Fall', academicYear: '2024-2025' })
		const card = await store.getState().loadReportCard()

		expect(card?.gpa).toBe(3)
		expect(store.getState().reportCard).toEqual(card)
		expect((await listUnread(db, student.id)).map((n) => n.message)).toEqual(['Grade recorded for CS101: B'])
	})

	it('keeps the last mark result and the attendance summary', async () => {
		const student = await seedStudent(db)
		const course = await seedCourse(db)
		const store = consoleStore()
		store.getState().selectStudent(student.id)

		await store.getState().submitAttendance(course.id, '2024-09-02', [{ studentId: student.id, status: 'present' }])
		const summary = await store.getState().loadAttendanceSummary(course.id)

		expect(store.getState().lastMarkResult?.entries).toEqual([{ studentId: student.id, outcome: 'inserted' }])
		expect(summary?.percentage).toBe(100)
	})

	it('records the failure code and rethrows', async () => {
		const store = consoleStore()
		await expect(store.getState().submitGrade('missing', 80)).rejects.toMatchObject({ code: 'NOT_FOUND' })
		expect(store.getState().error).toBe('NOT_FOUND: Enrollment not found')
		expect(store.getState().isLoading).toBe(false)
	})
})
