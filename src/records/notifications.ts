import { v4 as uuidv4 } from 'uuid'
import type { RecordsDB } from '../db'
import type { NotificationEntity } from '../types'
import { requireText } from '../utils/validate'

export async function createNotification(
	db: RecordsDB,
	userId: string,
	message: string,
	now: Date = new Date(),
): Promise<NotificationEntity> {
	const notification: NotificationEntity = {
		id: uuidv4(),
		userId: requireText('userId', userId),
		message: requireText('message', message),
		isRead: 0,
		createdAt: now.toISOString(),
	}
	await db.notifications.add(notification)
	return notification
}

export async function listUnread(db: RecordsDB, userId: string): Promise<NotificationEntity[]> {
	const rows = await db.notifications.where('[userId+isRead]').equals([userId, 0]).toArray()
	return rows.sort((a, b) => b.createdAt.localeCompare(a.createdAt))
}

export async function unreadCount(db: RecordsDB, userId: string): Promise<number> {
	return db.notifications.where('[userId+isRead]').equals([userId, 0]).count()
}

export async function markAllRead(db: RecordsDB, userId: string): Promise<number> {
	return db.notifications.where('[userId+isRead]').equals([userId, 0]).modify({ isRead: 1 })
}

export async function clearAll(db: RecordsDB, userId: string): Promise<number> {
	return db.notifications.where('userId').equals(userId).delete()
}
