import type { NotificationKind } from '../../config/constants';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import type { FetchLike } from '../provisioning/types';

export interface NotificationPayload {
  kind: NotificationKind | 'referral_credited';
  orderId?: string;
  [key: string]: unknown;
}

/** Boundary to the chat-bot collaborator. Rejects when the message was not delivered. */
export interface ChatNotifier {
  notify(buyerId: string, message: string, payload: NotificationPayload): Promise<void>;
}

export interface TelegramSettings {
  botToken: string;
  apiBaseUrl: string;
  timeoutMs?: number;
}

/** Delivers through the Bot API `sendMessage` method; the buyer id is the chat id. */
export class TelegramNotifier implements ChatNotifier {
  constructor(
    private readonly settings: TelegramSettings,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async notify(buyerId: string, message: string, payload: NotificationPayload): Promise<void> {
    if (!this.settings.botToken) {
      throw new Error('TELEGRAM_BOT_TOKEN is not configured');
    }

    const url = `${this.settings.apiBaseUrl.replace(/\/+$/, '')}/bot${this.settings.botToken}/sendMessage`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: buyerId,
          text: message,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
        signal: AbortSignal.timeout(this.settings.timeoutMs ?? 10000),
      });
    } catch (error) {
      throw new Error(`Telegram sendMessage failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new Error(`Telegram sendMessage returned ${response.status}: ${detail.slice(0, 200)}`);
    }

    logger.debug('Chat notification sent', { buyerId, kind: payload.kind, orderId: payload.orderId });
  }
}
