import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { Actor } from './capability'
import type { RecordsConfig } from './config'
import type { RecordsDB } from './db'
import { isRecordsError } from './errors'
import { markAttendance } from './records/attendance'
import { getCourse } from './records/courses'
import { getEnrollment } from './records/enrollments'
import { recordGrade } from './records/grades'
import { createNotification } from './records/notifications'
import { buildAttendanceSummary, buildReportCard } from './records/reports'
import { createStudent, validateStudentInput } from './records/students'
import type {
	AttendanceSummary,
	DateRange,
	GradeEntity,
	MarkEntry,
	MarkResult,
	ReportCard,
	StudentEntity,
} from './types'
import { parseRosterCsv, toStudentInputs } from './utils/csv'

const LOG_PREFIX = '[Console]'

export interface Term {
	semester: string
	academicYear: string
}

interface ConsoleState {
	selectedStudentId?: string
	term?: Term
	reportCard?: ReportCard
	attendanceSummary?: AttendanceSummary
	lastMarkResult?: MarkResult
	isLoading: boolean
	error?: string
}

interface Actions {
	selectStudent: (studentId: string) => void
	selectTerm: (term: Term) => void
	loadReportCard: () => Promise<ReportCard | undefined>
	loadAttendanceSummary: (courseId: string, range?: DateRange) => Promise<AttendanceSummary | undefined>
	submitAttendance: (courseId: string, date: string, entries: MarkEntry[]) => Promise<MarkResult>
	submitGrade: (enrollmentId: string, marks: number, remark?: string) => Promise<GradeEntity>
	importRoster: (csvText: string) => Promise<StudentEntity[]>
}

export type ConsoleStore = ConsoleState & Actions

function describeError(e: unknown): string {
	if (isRecordsError(e)) return `${e.code}: ${e.message}`
	return e instanceof Error ? e.message : String(e)
}

/**
 * View state behind the admin console. Every action runs against the
 * records modules with the console's actor; failures land in `error` and
 * are rethrown to the caller.
 */
export function createConsoleStore(db: RecordsDB, actor: Actor, config: RecordsConfig): StoreApi<ConsoleStore> {
	return createStore<ConsoleStore>((set, get) => {
		async function run<T>(action: string, context: object, fn: () => Promise<T>): Promise<T> {
			set({ isLoading: true, error: undefined })
			console.log(LOG_PREFIX, action, context)
			try {
				return await fn()
			} catch (e) {
				const error = describeError(e)
				console.error(LOG_PREFIX, `${action} failed`, { ...context, error })
				set({ error })
				throw e
			} finally {
				set({ isLoading: false })
			}
		}

		return {
			isLoading: false,
			selectStudent(studentId) {
				set({ selectedStudentId: studentId, reportCard: undefined, attendanceSummary: undefined })
			},
			selectTerm(term) {
				set({ term, reportCard: undefined })
			},
			async loadReportCard() {
				const { selectedStudentId, term } = get()
				if (!selectedStudentId || !term) return undefined
				const card = await run('Building report card', { studentId: selectedStudentId, ...term }, () =>
					buildReportCard(db, selectedStudentId, term.semester, term.academicYear),
				)
				set({ reportCard: card })
				return card
			},
			async loadAttendanceSummary(courseId, range = {}) {
				const studentId = get().selectedStudentId
				if (!studentId) return undefined
				const summary = await run('Building attendance summary', { studentId, courseId, ...range }, () =>
					buildAttendanceSummary(db, studentId, courseId, range),
				)
				set({ attendanceSummary: summary })
				return summary
			},
			async submitAttendance(courseId, date, entries) {
				const result = await run('Marking attendance', { courseId, date, entries: entries.length }, () =>
					markAttendance(db, actor, courseId, date, entries),
				)
				set({ lastMarkResult: result })
				return result
			},
			async submitGrade(enrollmentId, marks, remark) {
				return run('Recording grade', { enrollmentId, marks }, async () => {
					const grade = await recordGrade(db, actor, enrollmentId, marks, remark)
					const enrollment = await getEnrollment(db, enrollmentId)
					const course = await getCourse(db, enrollment.courseId)
					await createNotification(db, enrollment.studentId, `Grade recorded for ${course.code}: ${grade.letter}`)
					return grade
				})
			},
			async importRoster(csvText) {
				return run('Importing roster', {}, async () => {
					// Every row is checked before the first ID is allocated
					const inputs = toStudentInputs(parseRosterCsv(csvText)).map(validateStudentInput)
					const created: StudentEntity[] = []
					for (const input of inputs) {
						created.push(await createStudent(db, actor, input, { retries: config.allocationRetries }))
					}
					console.log(LOG_PREFIX, 'Roster imported', { count: created.length })
					return created
				})
			},
		}
	})
}
