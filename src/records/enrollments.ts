import Dexie from 'dexie'
import { v4 as uuidv4 } from 'uuid'
import type { RecordsDB } from '../db'
import { isConstraintError } from '../db'
import { requireCapability } from '../capability'
import type { Actor } from '../capability'
import { DuplicateEnrollmentError, RecordNotFoundError } from '../errors'
import type { EnrollmentEntity } from '../types'
import { requireText } from '../utils/validate'

export interface EnrollInput {
	studentId: string
	courseId: string
	semester: string
	academicYear: string
}

/**
 * Binds a student to a course for one semester/academic year. No capacity,
 * prerequisite or waitlist rules apply: the only rejection besides missing
 * references is a repeat of the same four-part key.
 */
export async function enroll(
	db: RecordsDB,
	actor: Actor,
	input: EnrollInput,
	now: Date = new Date(),
): Promise<EnrollmentEntity> {
	requireCapability(actor, 'enroll')
	const key = {
		studentId: input.studentId,
		courseId: input.courseId,
		semester: requireText('semester', input.semester),
		academicYear: requireText('academicYear', input.academicYear),
	}
	try {
		return await db.transaction('rw', db.students, db.courses, db.enrollments, async () => {
			if (!(await db.students.get(key.studentId))) throw new RecordNotFoundError('Student', { studentId: key.studentId })
			if (!(await db.courses.get(key.courseId))) throw new RecordNotFoundError('Course', { courseId: key.courseId })
			const existing = await db.enrollments
				.where('[studentId+courseId+semester+academicYear]')
				.equals([key.studentId, key.courseId, key.semester, key.academicYear])
				.first()
			if (existing) throw new DuplicateEnrollmentError(key)
			const enrollment: EnrollmentEntity = { id: uuidv4(), ...key, createdAt: now.toISOString() }
			await db.enrollments.add(enrollment)
			return enrollment
		})
	} catch (e) {
		// The unique index is the backstop if another writer got in first
		if (isConstraintError(e)) throw new DuplicateEnrollmentError(key)
		throw e
	}
}

export async function getEnrollment(db: RecordsDB, enrollmentId: string): Promise<EnrollmentEntity> {
	const enrollment = await db.enrollments.get(enrollmentId)
	if (!enrollment) throw new RecordNotFoundError('Enrollment', { enrollmentId })
	return enrollment
}

export async function listEnrollments(db: RecordsDB, studentId: string): Promise<EnrollmentEntity[]> {
	const rows = await db.enrollments.where('studentId').equals(studentId).toArray()
	return rows.sort((a, b) => a.createdAt.localeCompare(b.createdAt))
}

export async function listTermEnrollments(
	db: RecordsDB,
	studentId: string,
	semester: string,
	academicYear: string,
): Promise<EnrollmentEntity[]> {
	return db.enrollments
		.where('[studentId+semester+academicYear]')
		.equals([studentId, semester, academicYear])
		.toArray()
}

// Cascade steps. Each one is a plain removal, so running them twice or in
// any order leaves the same store.

async function removeEnrollments(db: RecordsDB, enrollments: EnrollmentEntity[]): Promise<void> {
	if (!enrollments.length) return
	const ids = enrollments.map((e) => e.id)
	await db.grades.where('enrollmentId').anyOf(ids).delete()
	await db.enrollments.bulkDelete(ids)
}

/**
 * Attendance is not keyed on the term, so rows for a student/course pair are
 * removed only once no enrollment for that pair remains.
 */
async function removeOrphanedAttendance(db: RecordsDB, studentId: string, courseId: string): Promise<void> {
	const remaining = await db.enrollments.where('[studentId+courseId]').equals([studentId, courseId]).count()
	if (remaining > 0) return
	await db.attendance
		.where('[studentId+courseId+date]')
		.between([studentId, courseId, Dexie.minKey], [studentId, courseId, Dexie.maxKey])
		.delete()
}

export async function deleteEnrollment(db: RecordsDB, actor: Actor, enrollmentId: string): Promise<void> {
	requireCapability(actor, 'manage-records')
	await db.transaction('rw', db.enrollments, db.grades, db.attendance, async () => {
		const enrollment = await db.enrollments.get(enrollmentId)
		if (!enrollment) return
		await removeEnrollments(db, [enrollment])
		await removeOrphanedAttendance(db, enrollment.studentId, enrollment.courseId)
	})
}

export async function deleteStudent(db: RecordsDB, actor: Actor, studentId: string): Promise<void> {
	requireCapability(actor, 'manage-records')
	await db.transaction('rw', [db.students, db.enrollments, db.grades, db.attendance, db.notifications], async () => {
		const enrollments = await db.enrollments.where('studentId').equals(studentId).toArray()
		await removeEnrollments(db, enrollments)
		await db.attendance.where('studentId').equals(studentId).delete()
		await db.notifications.where('userId').equals(studentId).delete()
		await db.students.delete(studentId)
	})
}

export async function deleteCourse(db: RecordsDB, actor: Actor, courseId: string): Promise<void> {
	requireCapability(actor, 'manage-records')
	await db.transaction('rw', [db.courses, db.enrollments, db.grades, db.attendance], async () => {
		const enrollments = await db.enrollments.where('courseId').equals(courseId).toArray()
		await removeEnrollments(db, enrollments)
		await db.attendance.where('courseId').equals(courseId).delete()
		await db.courses.delete(courseId)
	})
}
