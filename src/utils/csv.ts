import Papa from 'papaparse'
import { ValidationError } from '../errors'
import { GENDERS } from '../types'
import type { AttendanceEntity, ReportCard, StudentInput } from '../types'
import { requireOneOf } from './validate'

export interface RosterRow {
	firstName?: string
	lastName?: string
	dateOfBirth?: string
	gender?: string
	email?: string
	phone?: string
}

export function parseRosterCsv(text: string): RosterRow[] {
	const res = Papa.parse<RosterRow>(text, {
		header: true,
		skipEmptyLines: true,
		transformHeader: (h) => h.trim(),
		transform: (v) => v.trim(),
	})
	if (res.errors.length) {
		const [first] = res.errors
		throw new ValidationError('roster', `Roster CSV row ${first.row ?? '?'}: ${first.message}`)
	}
	return res.data
}

/**
 * Maps roster rows onto student input. Rows without any name are skipped;
 * an unknown gender fails the whole import.
 */
export function toStudentInputs(rows: RosterRow[]): StudentInput[] {
	return rows
		.filter((r) => r.firstName || r.lastName)
		.map((r) => ({
			firstName: r.firstName ?? '',
			lastName: r.lastName ?? '',
			dateOfBirth: r.dateOfBirth ?? '',
			gender: requireOneOf('gender', (r.gender ?? '').toLowerCase(), GENDERS),
			email: r.email,
			phone: r.phone,
		}))
}

export function attendanceToCsv(rows: AttendanceEntity[], studentNameById?: Map<string, string>): string {
	return Papa.unparse(
		rows.map((a) => ({
			date: a.date,
			studentId: a.studentId,
			displayName: studentNameById?.get(a.studentId) ?? '',
			courseId: a.courseId,
			status: a.status,
			remark: a.remark ?? '',
		})),
		{ header: true, newline: '\n' },
	)
}

export function reportCardToCsv(card: ReportCard): string {
	return Papa.unparse(
		{
			fields: ['courseCode', 'courseName', 'creditHours', 'marks', 'letter', 'remark'],
			data: card.rows.map((r) => [r.courseCode, r.courseName, r.creditHours, r.marks.toFixed(2), r.letter, r.remark ?? '']),
		},
		{ newline: '\n' },
	)
}
