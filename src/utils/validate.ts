import { ValidationError } from '../errors'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

export function requireText(field: string, value: string | undefined): string {
	const trimmed = value?.trim() ?? ''
	if (!trimmed) throw new ValidationError(field, `${field} is required`)
	return trimmed
}

export function requireIsoDate(field: string, value: string): string {
	if (!ISO_DATE.test(value)) throw new ValidationError(field, `${field} must be a YYYY-MM-DD date, got "${value}"`)
	// Date.parse accepts 2024-02-30 by rolling over; compare the round-trip instead
	const parsed = new Date(`${value}T00:00:00Z`)
	if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
		throw new ValidationError(field, `${field} is not a calendar date: "${value}"`)
	}
	return value
}

export function requireOneOf<T extends string>(field: string, value: string, allowed: readonly T[]): T {
	const match = allowed.find((a) => a === value)
	if (match === undefined) {
		throw new ValidationError(field, `${field} must be one of ${allowed.join(', ')}, got "${value}"`)
	}
	return match
}

export function todayIso(now: Date = new Date()): string {
	return now.toISOString().slice(0, 10)
}
