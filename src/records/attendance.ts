import Dexie from 'dexie'
import { v4 as uuidv4 } from 'uuid'
import type { RecordsDB } from '../db'
import { requireCapability } from '../capability'
import type { Actor } from '../capability'
import { RecordNotFoundError } from '../errors'
import { ATTENDANCE_STATUSES } from '../types'
import type { AttendanceEntity, DateRange, MarkEntry, MarkOutcome, MarkResult } from '../types'
import { requireIsoDate, requireOneOf } from '../utils/validate'

async function upsertEntry(db: RecordsDB, courseId: string, date: string, entry: MarkEntry): Promise<MarkOutcome> {
	// Lookup and write for one (student, course, date) key share a transaction
	return db.transaction('rw', db.students, db.attendance, async () => {
		if (!(await db.students.get(entry.studentId))) {
			throw new RecordNotFoundError('Student', { studentId: entry.studentId, courseId, date })
		}
		const existing = await db.attendance
			.where('[studentId+courseId+date]')
			.equals([entry.studentId, courseId, date])
			.first()
		if (existing) {
			await db.attendance.put({ ...existing, status: entry.status, remark: entry.remark })
			return 'updated'
		}
		const row: AttendanceEntity = {
			id: uuidv4(),
			studentId: entry.studentId,
			courseId,
			date,
			status: entry.status,
			remark: entry.remark,
		}
		await db.attendance.add(row)
		return 'inserted'
	})
}

/**
 * Applies an attendance sheet for one course and day. Entries are upserted
 * one by one; the first unknown student stops the batch, and the entries
 * before it stay applied.
 */
export async function markAttendance(
	db: RecordsDB,
	actor: Actor,
	courseId: string,
	date: string,
	entries: MarkEntry[],
): Promise<MarkResult> {
	requireCapability(actor, 'mark-attendance')
	requireIsoDate('date', date)
	const clean = entries.map((e) => ({
		studentId: e.studentId,
		status: requireOneOf('status', e.status, ATTENDANCE_STATUSES),
		remark: e.remark?.trim() || undefined,
	}))
	if (!(await db.courses.get(courseId))) throw new RecordNotFoundError('Course', { courseId })

	const result: MarkResult = { courseId, date, entries: [] }
	for (const entry of clean) {
		const outcome = await upsertEntry(db, courseId, date, entry)
		result.entries.push({ studentId: entry.studentId, outcome })
	}
	return result
}

export async function getAttendance(
	db: RecordsDB,
	studentId: string,
	courseId: string,
	range: DateRange = {},
): Promise<AttendanceEntity[]> {
	const from = range.from ? requireIsoDate('from', range.from) : Dexie.minKey
	const to = range.to ? requireIsoDate('to', range.to) : Dexie.maxKey
	// Compound index order puts rows for the pair in date order already
	return db.attendance
		.where('[studentId+courseId+date]')
		.between([studentId, courseId, from], [studentId, courseId, to], true, true)
		.toArray()
}

export async function listCourseAttendance(db: RecordsDB, courseId: string, date: string): Promise<AttendanceEntity[]> {
	requireIsoDate('date', date)
	const rows = await db.attendance.where('courseId').equals(courseId).toArray()
	return rows.filter((r) => r.date === date).sort((a, b) => a.studentId.localeCompare(b.studentId))
}
