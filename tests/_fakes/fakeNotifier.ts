import type { ChatNotifier, NotificationPayload } from '../../src/services/notifications/chatNotifier';

export interface SentMessage {
  buyerId: string;
  message: string;
  payload: NotificationPayload;
}

export class RecordingNotifier implements ChatNotifier {
  readonly sent: SentMessage[] = [];
  failures = 0;
  /** Chats that refuse every message, like a buyer who blocked the bot. */
  readonly blocked = new Set<string>();

  async notify(buyerId: string, message: string, payload: NotificationPayload): Promise<void> {
    if (this.blocked.has(buyerId)) {
      throw new Error('Forbidden: bot was blocked by the user');
    }
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('chat unavailable');
    }
    this.sent.push({ buyerId, message, payload });
  }

  kinds(): string[] {
    return this.sent.map(entry => entry.payload.kind);
  }
}
