export * from './types'
export * from './errors'
export { DEFAULT_ALLOCATION_RETRIES, loadConfig } from './config'
export type { RecordsConfig } from './config'
export { createActor, requireCapability } from './capability'
export type { Actor, Capability } from './capability'
export { RecordsDB, createRecordsDB } from './db'
export {
	allocateStudentId,
	createStudent,
	formatStudentId,
	getStudent,
	listStudents,
	parseStudentSeq,
	studentDisplayName,
	validateStudentInput,
} from './records/students'
export type { AllocateOptions, CreateStudentOptions } from './records/students'
export { createCourse, getCourse, getCourseByCode, listCourses } from './records/courses'
export {
	deleteCourse,
	deleteEnrollment,
	deleteStudent,
	enroll,
	getEnrollment,
	listEnrollments,
	listTermEnrollments,
} from './records/enrollments'
export type { EnrollInput } from './records/enrollments'
export { getAttendance, listCourseAttendance, markAttendance } from './records/attendance'
export { getGrade, gradePoint, letterGrade, recordGrade } from './records/grades'
export { buildAttendanceSummary, buildReportCard, computeGpa } from './records/reports'
export { clearAll, createNotification, listUnread, markAllRead, unreadCount } from './records/notifications'
export { attendanceToCsv, parseRosterCsv, reportCardToCsv, toStudentInputs } from './utils/csv'
export type { RosterRow } from './utils/csv'
export { createConsoleStore } from './store'
export type { ConsoleStore, Term } from './store'
