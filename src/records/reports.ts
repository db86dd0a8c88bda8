import type { RecordsDB } from '../db'
import type { AttendanceStatus, AttendanceSummary, DateRange, ReportCard, ReportCardRow } from '../types'
import { getAttendance } from './attendance'
import { listTermEnrollments } from './enrollments'
import { gradePoint, roundTo2 } from './grades'
import { studentDisplayName } from './students'

export function computeGpa(rows: Pick<ReportCardRow, 'creditHours' | 'letter'>[]): { totalCredits: number; gpa: number } {
	const totalCredits = rows.reduce((acc, r) => acc + r.creditHours, 0)
	if (totalCredits === 0) return { totalCredits, gpa: 0 }
	const weighted = rows.reduce((acc, r) => acc + gradePoint(r.letter) * r.creditHours, 0)
	return { totalCredits, gpa: roundTo2(weighted / totalCredits) }
}

/**
 * Read-only aggregate for one student and term. Enrollments without a
 * grade are left out of the body; an unknown student yields an empty card.
 */
export async function buildReportCard(
	db: RecordsDB,
	studentId: string,
	semester: string,
	academicYear: string,
): Promise<ReportCard> {
	const student = await db.students.get(studentId)
	const enrollments = await listTermEnrollments(db, studentId, semester, academicYear)

	const rows: ReportCardRow[] = []
	for (const enrollment of enrollments) {
		const grade = await db.grades.where('enrollmentId').equals(enrollment.id).first()
		if (!grade) continue
		const course = await db.courses.get(enrollment.courseId)
		if (!course) continue
		rows.push({
			courseCode: course.code,
			courseName: course.name,
			creditHours: course.creditHours,
			marks: grade.marks,
			letter: grade.letter,
			remark: grade.remark,
		})
	}
	rows.sort((a, b) => a.courseCode.localeCompare(b.courseCode))

	return {
		studentId,
		studentName: student ? studentDisplayName(student) : undefined,
		semester,
		academicYear,
		rows,
		...computeGpa(rows),
	}
}

export async function buildAttendanceSummary(
	db: RecordsDB,
	studentId: string,
	courseId: string,
	range: DateRange = {},
): Promise<AttendanceSummary> {
	const rows = await getAttendance(db, studentId, courseId, range)
	const statusBreakdown: Record<AttendanceStatus, number> = { present: 0, absent: 0, late: 0, excused: 0 }
	for (const row of rows) statusBreakdown[row.status]++
	const totalClasses = rows.length
	const presentCount = statusBreakdown.present
	return {
		studentId,
		courseId,
		range,
		totalClasses,
		presentCount,
		percentage: totalClasses === 0 ? 0 : roundTo2((presentCount / totalClasses) * 100),
		statusBreakdown,
	}
}
