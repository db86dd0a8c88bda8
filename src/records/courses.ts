import { v4 as uuidv4 } from 'uuid'
import type { RecordsDB } from '../db'
import { isConstraintError } from '../db'
import { requireCapability } from '../capability'
import type { Actor } from '../capability'
import { RecordNotFoundError, ValidationError } from '../errors'
import type { CourseEntity, CourseInput } from '../types'
import { requireText } from '../utils/validate'

export async function createCourse(db: RecordsDB, actor: Actor, input: CourseInput): Promise<CourseEntity> {
	requireCapability(actor, 'manage-records')
	if (!Number.isInteger(input.creditHours) || input.creditHours <= 0) {
		throw new ValidationError('creditHours', `Credit hours must be a positive integer, got ${input.creditHours}`)
	}
	const course: CourseEntity = {
		id: uuidv4(),
		code: requireText('code', input.code),
		name: requireText('name', input.name),
		creditHours: input.creditHours,
		department: requireText('department', input.department),
	}
	try {
		await db.courses.add(course)
	} catch (e) {
		if (isConstraintError(e)) throw new ValidationError('code', `Course code ${course.code} already exists`)
		throw e
	}
	return course
}

export async function getCourse(db: RecordsDB, courseId: string): Promise<CourseEntity> {
	const course = await db.courses.get(courseId)
	if (!course) throw new RecordNotFoundError('Course', { courseId })
	return course
}

export async function getCourseByCode(db: RecordsDB, code: string): Promise<CourseEntity> {
	const course = await db.courses.where('code').equals(code).first()
	if (!course) throw new RecordNotFoundError('Course', { code })
	return course
}

export async function listCourses(db: RecordsDB, department?: string): Promise<CourseEntity[]> {
	const courses = department
		? await db.courses.where('department').equals(department).toArray()
		: await db.courses.toArray()
	return courses.sort((a, b) => a.code.localeCompare(b.code))
}
