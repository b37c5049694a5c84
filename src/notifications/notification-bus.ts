import { logger } from '../observability/logger';
import { notificationsDelivered } from '../observability/metrics';
import { Notification, NotificationSink } from './types';

type Listener = (notification: Notification) => void;

/**
 * Fans notifications out to sinks. `publish` never blocks the caller and
 * never throws: a failing sink or listener is logged and counted.
 */
export class NotificationBus {
  private readonly log = logger.child({ component: 'notification-bus' });
  private readonly listeners: Listener[] = [];
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly sinks: readonly NotificationSink[] = []) {}

  /** Register an in-process listener */
  onNotification(listener: Listener): void {
    this.listeners.push(listener);
  }

  publish(notification: Notification): void {
    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (err) {
        this.log.error({ err, kind: notification.kind }, 'Notification listener error');
      }
    }

    for (const sink of this.sinks) {
      const delivery = this.deliver(sink, notification);
      this.pending.add(delivery);
      void delivery.finally(() => this.pending.delete(delivery));
    }
  }

  /** Wait for deliveries already started */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  get inFlight(): number {
    return this.pending.size;
  }

  private async deliver(sink: NotificationSink, notification: Notification): Promise<void> {
    try {
      await sink.deliver(notification);
      notificationsDelivered.inc({ kind: notification.kind, sink: sink.name, status: 'ok' });
    } catch (err) {
      notificationsDelivered.inc({ kind: notification.kind, sink: sink.name, status: 'error' });
      this.log.error(
        { err, sink: sink.name, kind: notification.kind, sessionId: notification.sessionId },
        'Notification delivery failed',
      );
    }
  }
}
