import { logger } from '../observability/logger';
import { Notification, NotificationSink } from './types';

/** Structured log line per notification; always installed */
export class LogSink implements NotificationSink {
  readonly name = 'log';
  private readonly log = logger.child({ component: 'notifications' });

  async deliver(notification: Notification): Promise<void> {
    const level = notification.kind === 'lead' ? 'info' : 'warn';
    this.log[level](
      {
        kind: notification.kind,
        tenantId: notification.tenantId,
        sessionId: notification.sessionId,
        priority: notification.priority,
        category: notification.category,
        notifyTargets: notification.notifyTargets,
        requestId: notification.requestId,
      },
      notification.summary,
    );
  }
}
