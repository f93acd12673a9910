import { EventSource } from '../domain/types/event.types';
import { Env } from './config.loader';

export type WebhookRoute = EventSource | 'ALL';

export interface AppSettings {
  readonly port: number;
  readonly databasePath: string;
  readonly runOnStart: boolean;
  readonly telegramBotToken: string | null;
  readonly telegramChatId: number | null;
  readonly webhooks: Readonly<Record<WebhookRoute, readonly string[]>>;
}

// Format: WEBHOOKS_CASCADE=https://a.example/hook,https://b.example/hook
const WEBHOOK_ENV_VARS: ReadonlyArray<[string, WebhookRoute]> = [
  ['WEBHOOKS_CASCADE', 'CASCADE'],
  ['WEBHOOKS_FUNDING', 'FUNDING'],
  ['WEBHOOKS_VOLATILITY', 'VOLATILITY'],
  ['WEBHOOKS_CORRELATION', 'CORRELATION'],
  ['WEBHOOKS_REGIME', 'REGIME'],
  ['WEBHOOKS_ALL', 'ALL'],
];

export function loadAppSettings(env: Env = process.env): AppSettings {
  const webhooks: Record<WebhookRoute, string[]> = {
    CASCADE: [],
    FUNDING: [],
    VOLATILITY: [],
    CORRELATION: [],
    REGIME: [],
    ALL: [],
  };
  for (const [name, route] of WEBHOOK_ENV_VARS) {
    webhooks[route] = (env[name] ?? '')
      .split(',')
      .map((url) => url.trim())
      .filter(Boolean);
  }

  const chatId = Number(env.TELEGRAM_CHAT_ID);

  return {
    port: Number(env.PORT) || 8000,
    databasePath: env.DATABASE_PATH || 'regime-watch.sqlite',
    runOnStart: (env.RUN_ON_START ?? 'true').toLowerCase() !== 'false',
    telegramBotToken: env.TELEGRAM_BOT_TOKEN || null,
    telegramChatId: env.TELEGRAM_CHAT_ID && Number.isFinite(chatId) ? chatId : null,
    webhooks,
  };
}
