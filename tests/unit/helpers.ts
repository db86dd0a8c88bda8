import { v4 as uuidv4 } from 'uuid'
import { createActor } from '../../src/capability'
import { loadConfig } from '../../src/config'
import { createRecordsDB } from '../../src/db'
import type { RecordsDB } from '../../src/db'
import { createCourse } from '../../src/records/courses'
import { createStudent } from '../../src/records/students'
import type { CourseEntity, CourseInput, StudentEntity, StudentInput } from '../../src/types'

export const admin = createActor('admin-1', ['manage-records', 'enroll', 'mark-attendance', 'record-grade'])

export const SEPT_2024 = new Date('2024-09-01T10:00:00Z')

export function openTestDB(): RecordsDB {
	return createRecordsDB(loadConfig({ RECORDS_DB_NAME: `records-test-${uuidv4()}` }))
}

export async function seedStudent(db: RecordsDB, overrides: Partial<StudentInput> = {}): Promise<StudentEntity> {
	return createStudent(
		db,
		admin,
		{ firstName: 'Ada', lastName: 'Lovelace', dateOfBirth: '2008-12-10', gender: 'female', ...overrides },
		{ now: SEPT_2024 },
	)
}

export async function seedCourse(db: RecordsDB, overrides: Partial<CourseInput> = {}): Promise<CourseEntity> {
	return createCourse(db, admin, {
		code: 'CS101',
		name: 'Intro to Computing',
		creditHours: 3,
		department: 'Computer Science',
		...overrides,
	})
}
