import { ValidationError } from './errors'

export interface RecordsConfig {
	dbName: string
	allocationRetries: number
}

const DEFAULT_DB_NAME = 'RecordsDB'
export const DEFAULT_ALLOCATION_RETRIES = 3

export function loadConfig(env: Record<string, string | undefined> = process.env): RecordsConfig {
	const dbName = env.RECORDS_DB_NAME?.trim() || DEFAULT_DB_NAME
	const retriesRaw = env.RECORDS_ALLOCATION_RETRIES?.trim()
	let allocationRetries = DEFAULT_ALLOCATION_RETRIES
	if (retriesRaw) {
		allocationRetries = Number(retriesRaw)
		if (!Number.isInteger(allocationRetries) || allocationRetries < 1) {
			throw new ValidationError(
				'RECORDS_ALLOCATION_RETRIES',
				`RECORDS_ALLOCATION_RETRIES must be a positive integer, got "${retriesRaw}"`,
			)
		}
	}
	return { dbName, allocationRetries }
}
