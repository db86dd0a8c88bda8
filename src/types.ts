export type Gender = 'male' | 'female' | 'other'

export const GENDERS: readonly Gender[] = ['male', 'female', 'other']

export interface StudentEntity {
	id: string
	firstName: string
	lastName: string
	dateOfBirth: string // YYYY-MM-DD
	gender: Gender
	email?: string
	phone?: string
	address?: string
	/**
	 * Handle into the file storage layer; never the photo bytes
	 */
	photoRef?: string
	enrollmentYear: number
	enrollmentDate: string // YYYY-MM-DD, set once at creation
}

export interface StudentInput {
	firstName: string
	lastName: string
	dateOfBirth: string
	gender: Gender
	email?: string
	phone?: string
	address?: string
	photoRef?: string
}

export interface SequenceEntity {
	prefix: string
	lastSeq: number
}

export interface CourseEntity {
	id: string
	code: string
	name: string
	creditHours: number
	department: string
}

export type CourseInput = Omit<CourseEntity, 'id'>

export interface EnrollmentEntity {
	id: string
	studentId: string
	courseId: string
	semester: string
	academicYear: string
	createdAt: string // ISO string
}

export type AttendanceStatus = 'present' | 'absent' | 'late' | 'excused'

export const ATTENDANCE_STATUSES: readonly AttendanceStatus[] = ['present', 'absent', 'late', 'excused']

export interface AttendanceEntity {
	id: string
	studentId: string
	courseId: string
	date: string // YYYY-MM-DD
	status: AttendanceStatus
	remark?: string
}

export interface MarkEntry {
	studentId: string
	status: AttendanceStatus
	remark?: string
}

export type MarkOutcome = 'inserted' | 'updated'

export interface MarkResult {
	courseId: string
	date: string
	entries: { studentId: string; outcome: MarkOutcome }[]
}

/**
 * Inclusive on both ends; a missing bound is open.
 */
export interface DateRange {
	from?: string
	to?: string
}

export type LetterGrade = 'A' | 'B' | 'C' | 'D' | 'F'

export interface GradeEntity {
	id: string
	enrollmentId: string
	marks: number
	letter: LetterGrade
	remark?: string
	recordedAt: string // ISO string
}

export interface ReportCardRow {
	courseCode: string
	courseName: string
	creditHours: number
	marks: number
	letter: LetterGrade
	remark?: string
}

export interface ReportCard {
	studentId: string
	studentName?: string
	semester: string
	academicYear: string
	rows: ReportCardRow[]
	totalCredits: number
	gpa: number
}

export interface AttendanceSummary {
	studentId: string
	courseId: string
	range: DateRange
	totalClasses: number
	presentCount: number
	percentage: number
	statusBreakdown: Record<AttendanceStatus, number>
}

export interface NotificationEntity {
	id: string
	userId: string
	message: string
	isRead: 0 | 1 // IndexedDB cannot index booleans
	createdAt: string // ISO string
}
