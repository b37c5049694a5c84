import { HandoffContext, Notification, NotificationSink } from './types';

export interface WebhookSinkOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

function toWireContext(context: HandoffContext) {
  return {
    customer: context.customer,
    issue_category: context.issueCategory,
    issue: context.issue,
    intent: context.intent,
    sentiment: context.sentiment,
    lead_score: context.leadScore,
    turn_count: context.turnCount,
    recent_messages: context.recentMessages,
    suggested_actions: context.suggestedActions,
  };
}

/** Posts each notification as JSON to a chat webhook */
export class WebhookSink implements NotificationSink {
  readonly name = 'webhook';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: WebhookSinkOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async deliver(notification: Notification): Promise<void> {
    const res = await this.fetchImpl(this.options.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        text: `[${notification.priority.toUpperCase()}] ${notification.summary}`,
        kind: notification.kind,
        tenant_id: notification.tenantId,
        session_id: notification.sessionId,
        priority: notification.priority,
        category: notification.category,
        notify_targets: notification.notifyTargets,
        timestamp: new Date(notification.timestamp).toISOString(),
        context: notification.context && toWireContext(notification.context),
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!res.ok) {
      throw new Error(`Webhook responded ${res.status}`);
    }
  }
}
