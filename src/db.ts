import Dexie from 'dexie'
import type { DexieOptions, Table } from 'dexie'
import type { RecordsConfig } from './config'
import type {
	AttendanceEntity,
	CourseEntity,
	EnrollmentEntity,
	GradeEntity,
	NotificationEntity,
	SequenceEntity,
	StudentEntity,
} from './types'

export class RecordsDB extends Dexie {
	students!: Table<StudentEntity, string>
	sequences!: Table<SequenceEntity, string>
	courses!: Table<CourseEntity, string>
	enrollments!: Table<EnrollmentEntity, string>
	attendance!: Table<AttendanceEntity, string>
	grades!: Table<GradeEntity, string>
	notifications!: Table<NotificationEntity, string>

	constructor(name = 'RecordsDB', options?: DexieOptions) {
		super(name, options)
		this.version(1).stores({
			students: 'id, enrollmentYear',
			sequences: 'prefix',
			courses: 'id, &code, department',
			enrollments:
				'id, studentId, courseId, [studentId+courseId], [studentId+semester+academicYear], &[studentId+courseId+semester+academicYear]',
			attendance: 'id, studentId, courseId, &[studentId+courseId+date]',
			grades: 'id, &enrollmentId',
		})
		this.version(2).stores({
			notifications: 'id, userId, [userId+isRead]',
		})
	}
}

export function createRecordsDB(config: RecordsConfig, options?: DexieOptions): RecordsDB {
	return new RecordsDB(config.dbName, options)
}

export function isConstraintError(e: unknown): boolean {
	return e instanceof Error && e.name === 'ConstraintError'
}
