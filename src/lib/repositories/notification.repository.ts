/**
 * Notification Repository
 * In-app notification inbox
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import type { Notification } from '../../types';
import type { NotificationRow } from '../../types/api';

function mapRowToNotification(row: NotificationRow): Notification {
  return {
    id: row.id,
    employeeId: row.employee_id,
    message: row.message,
    notificationType: row.notification_type,
    status: row.status === 'read' ? 'read' : 'unread',
    createdAt: row.created_at,
  };
}

export async function createNotification(
  employeeId: string,
  message: string,
  notificationType: string
): Promise<void> {
  await execute(
    `INSERT INTO notifications (id, employee_id, message, notification_type, status, created_at)
     VALUES (?, ?, ?, ?, 'unread', ?)`,
    [randomUUID(), employeeId, message, notificationType, new Date().toISOString()]
  );
}

export async function listNotifications(employeeId: string): Promise<Notification[]> {
  const rows = await select<NotificationRow>(
    'SELECT * FROM notifications WHERE employee_id = ? ORDER BY created_at DESC, rowid DESC',
    [employeeId]
  );
  return rows.map(mapRowToNotification);
}

export async function markAsRead(id: string): Promise<void> {
  await execute(`UPDATE notifications SET status = 'read' WHERE id = ?`, [id]);
}

export const notificationRepository = {
  createNotification,
  listNotifications,
  markAsRead,
};
