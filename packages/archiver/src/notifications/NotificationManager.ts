import { NotificationTarget, formatError } from '@streamvault/shared';

export interface Notification {
  title?: string;
  body: string;
  tag: string;
}

export interface Notifier {
  // fire-and-forget; delivery problems are logged, never thrown
  notify(notification: Notification): void;
}

/**
 * Posts notifications as JSON to every configured target subscribed to the
 * notification's tag.
 */
export class NotificationManager implements Notifier {
  private targets: NotificationTarget[] = [];

  constructor(targets: NotificationTarget[] = [], private fetchImpl: typeof fetch = fetch) {
    this.setTargets(targets);
  }

  setTargets(targets: NotificationTarget[]): void {
    this.targets = targets.map((target) => ({ url: target.url, tags: [...target.tags] }));
  }

  notify(notification: Notification): void {
    this.deliver(notification).catch((error: unknown) => {
      console.error(`Failed to deliver notification '${notification.tag}':`, formatError(error));
    });
  }

  async deliver(notification: Notification): Promise<number> {
    const targets = this.targets.filter((target) => target.tags.includes(notification.tag));
    const results = await Promise.allSettled(
      targets.map(async (target) => {
        const res = await this.fetchImpl(target.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(notification)
        });
        if (!res.ok) {
          throw new Error(`${target.url} responded with ${res.status}`);
        }
      })
    );

    let delivered = 0;
    for (const result of results) {
      if (result.status === 'fulfilled') {
        delivered++;
      } else {
        console.warn('Notification delivery failed:', formatError(result.reason));
      }
    }
    return delivered;
  }
}
