import type { RecordsDB } from '../db'
import { isConstraintError } from '../db'
import { DEFAULT_ALLOCATION_RETRIES } from '../config'
import { requireCapability } from '../capability'
import type { Actor } from '../capability'
import { AllocationConflictError, RecordNotFoundError, ValidationError } from '../errors'
import { GENDERS } from '../types'
import type { StudentEntity, StudentInput } from '../types'
import { requireIsoDate, requireOneOf, requireText, todayIso } from '../utils/validate'

const LOG_PREFIX = '[Identity]'
const ID_PREFIX = 'STU'
const SEQ_WIDTH = 4

export interface AllocateOptions {
	retries?: number
}

export function studentIdPrefix(year: number): string {
	if (!Number.isInteger(year) || year < 1000 || year > 9999) {
		throw new ValidationError('year', `Enrollment year must be a four-digit year, got ${year}`)
	}
	return `${ID_PREFIX}${year}`
}

export function formatStudentId(year: number, seq: number): string {
	// No upper bound: past 9999 the sequence just prints wider
	return `${studentIdPrefix(year)}${String(seq).padStart(SEQ_WIDTH, '0')}`
}

/**
 * Sequence part of an ID under the given prefix, or undefined when the ID
 * belongs to another year or is malformed.
 */
export function parseStudentSeq(prefix: string, id: string): number | undefined {
	if (!id.startsWith(prefix)) return undefined
	const rest = id.slice(prefix.length)
	if (!/^\d+$/.test(rest)) return undefined
	return Number(rest)
}

async function nextSeq(db: RecordsDB, prefix: string): Promise<number> {
	return db.transaction('rw', db.students, db.sequences, async () => {
		const counter = await db.sequences.get(prefix)
		const existingIds = await db.students.where('id').startsWith(prefix).primaryKeys()
		// Lexicographic key order breaks once sequences widen, so scan them all
		let max = counter?.lastSeq ?? 0
		for (const id of existingIds) {
			const seq = parseStudentSeq(prefix, id)
			if (seq !== undefined && seq > max) max = seq
		}
		const seq = max + 1
		await db.sequences.put({ prefix, lastSeq: seq })
		return seq
	})
}

async function withAllocationRetry<T>(prefix: string, retries: number, attempt: () => Promise<T>): Promise<T> {
	for (let i = 1; i <= retries; i++) {
		try {
			return await attempt()
		} catch (e) {
			if (!isConstraintError(e)) throw e
			console.warn(LOG_PREFIX, 'Allocation conflict, retrying', { prefix, attempt: i, retries })
		}
	}
	throw new AllocationConflictError(prefix, retries)
}

/**
 * Reserves the next `STU<year><seq>` identifier. The read of the highest
 * issued sequence and the write of the new one share one read-write
 * transaction, so concurrent callers are queued rather than racing.
 */
export async function allocateStudentId(db: RecordsDB, year: number, options: AllocateOptions = {}): Promise<string> {
	const prefix = studentIdPrefix(year)
	const seq = await withAllocationRetry(prefix, options.retries ?? DEFAULT_ALLOCATION_RETRIES, () => nextSeq(db, prefix))
	return formatStudentId(year, seq)
}

export function validateStudentInput(input: StudentInput): StudentInput {
	return {
		firstName: requireText('firstName', input.firstName),
		lastName: requireText('lastName', input.lastName),
		dateOfBirth: requireIsoDate('dateOfBirth', input.dateOfBirth),
		gender: requireOneOf('gender', input.gender, GENDERS),
		email: input.email?.trim() || undefined,
		phone: input.phone?.trim() || undefined,
		address: input.address?.trim() || undefined,
		photoRef: input.photoRef || undefined,
	}
}

export interface CreateStudentOptions extends AllocateOptions {
	/**
	 * Creation time; its UTC year picks the ID prefix and it stamps
	 * `enrollmentDate`.
	 */
	now?: Date
}

export async function createStudent(
	db: RecordsDB,
	actor: Actor,
	input: StudentInput,
	options: CreateStudentOptions = {},
): Promise<StudentEntity> {
	requireCapability(actor, 'manage-records')
	const clean = validateStudentInput(input)
	const now = options.now ?? new Date()
	const year = now.getUTCFullYear()
	const prefix = studentIdPrefix(year)
	return withAllocationRetry(prefix, options.retries ?? DEFAULT_ALLOCATION_RETRIES, () =>
		db.transaction('rw', db.students, db.sequences, async () => {
			const seq = await nextSeq(db, prefix)
			const student: StudentEntity = {
				...clean,
				id: formatStudentId(year, seq),
				enrollmentYear: year,
				enrollmentDate: todayIso(now),
			}
			await db.students.add(student)
			return student
		}),
	)
}

export async function getStudent(db: RecordsDB, studentId: string): Promise<StudentEntity> {
	const student = await db.students.get(studentId)
	if (!student) throw new RecordNotFoundError('Student', { studentId })
	return student
}

export async function listStudents(db: RecordsDB, year?: number): Promise<StudentEntity[]> {
	if (year === undefined) return db.students.toArray()
	return db.students.where('enrollmentYear').equals(year).toArray()
}

export function studentDisplayName(student: Pick<StudentEntity, 'firstName' | 'lastName'>): string {
	return [student.firstName, student.lastName].filter(Boolean).join(' ').trim()
}
