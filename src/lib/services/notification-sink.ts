/**
 * Default notification sink: one inbox notification per administrator
 */

import { createNotification } from '../repositories/notification.repository';
import type { NotificationSink } from '../../types';

export const SYNC_FAILURE_NOTIFICATION = 'sync_failure';

export class DatabaseNotificationSink implements NotificationSink {
  async notify(adminIds: string[], message: string): Promise<void> {
    for (const adminId of adminIds) {
      await createNotification(adminId, message, SYNC_FAILURE_NOTIFICATION);
    }
  }
}
