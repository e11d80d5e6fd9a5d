/**
 * Telegram transport. Long-polls getUpdates and answers every inbound text
 * message with one reply from the agent.
 *
 * Commands registered with Telegram:
 *   /start  → greeting + examples
 *   /help   → examples
 * Any other text is a market question.
 */
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { TelegramConfig } from '../config';
import { errorMessage } from '../errors';
import { Agent } from '../agent';
import { truncate } from '../format';
import { isRecord } from '../tools/normalize';

const MAX_MESSAGE_LENGTH = 4_000;   // Telegram hard limit is 4096
const LONG_POLL_SECONDS  = 25;

export interface InboundMessage {
  updateId: number;
  chatId:   string;
  text:     string;
}

// ── Extract text messages from a getUpdates response ─────────
export function parseUpdates(data: unknown): { lastUpdateId: number; messages: InboundMessage[] } {
  const messages: InboundMessage[] = [];
  let lastUpdateId = 0;
  const result = isRecord(data) && Array.isArray(data.result) ? data.result : [];

  for (const update of result) {
    if (!isRecord(update)) continue;
    const updateId = update.update_id;
    if (typeof updateId !== 'number') continue;
    lastUpdateId = Math.max(lastUpdateId, updateId);

    const message = update.message;
    if (!isRecord(message)) continue;
    const text = message.text;
    const chat: Record<string, unknown> = isRecord(message.chat) ? message.chat : {};
    const id   = chat.id;
    const chatId = typeof id === 'number' || typeof id === 'string' ? String(id) : '';
    if (typeof text !== 'string' || !chatId || !text.trim()) continue;

    messages.push({ updateId, chatId, text });
  }
  return { lastUpdateId, messages };
}

export class TelegramPoller {
  private readonly http: AxiosInstance;
  private lastUpdateId = 0;
  private polling      = false;
  private timer: NodeJS.Timeout | null = null;
  private inflight: AbortController | null = null;

  constructor(
    private readonly config: TelegramConfig,
    private readonly agent:  Agent,
    adapter?: AxiosAdapter,
  ) {
    this.http = axios.create({
      baseURL: `https://api.telegram.org/bot${config.botToken}`,
      ...(adapter ? { adapter } : {}),
    });
  }

  // ── Send a plain text message ────────────────────────────────
  async sendMessage(chatId: string, text: string): Promise<void> {
    try {
      await this.http.post('/sendMessage', {
        chat_id: chatId,
        text:    truncate(text, MAX_MESSAGE_LENGTH),
      }, { timeout: 10_000 });
    } catch (err: unknown) {
      console.error('⚠️  Telegram sendMessage failed:', errorMessage(err));
    }
  }

  // ── Register bot commands (shows "/" menu button in Telegram) ─
  async registerCommands(): Promise<void> {
    try {
      await this.http.post('/setMyCommands', {
        commands: [
          { command: 'start', description: '👋 Greeting and example questions' },
          { command: 'help',  description: '❓ Example questions' },
        ],
      }, { timeout: 8_000 });
      console.log('📱 Telegram commands registered (/start /help)');
    } catch (err: unknown) {
      console.warn('⚠️  Could not register Telegram commands:', errorMessage(err));
    }
  }

  // ── One getUpdates round; returns the number of replies sent ─
  async pollOnce(): Promise<number> {
    let data: unknown;
    const controller = new AbortController();
    this.inflight = controller;
    try {
      const res = await this.http.get<unknown>('/getUpdates', {
        params:  { offset: this.lastUpdateId + 1, timeout: LONG_POLL_SECONDS, allowed_updates: ['message'] },
        timeout: (LONG_POLL_SECONDS + 5) * 1_000,
        signal:  controller.signal,
      });
      data = res.data;
    } catch (err: unknown) {
      if (axios.isCancel(err)) return 0;   // stop() while waiting
      console.warn('⚠️  Telegram getUpdates failed:', errorMessage(err));
      return 0;
    } finally {
      if (this.inflight === controller) this.inflight = null;
    }

    const { lastUpdateId, messages } = parseUpdates(data);
    if (lastUpdateId > this.lastUpdateId) this.lastUpdateId = lastUpdateId;

    let replied = 0;
    for (const msg of messages) {
      if (this.config.chatId && msg.chatId !== this.config.chatId) continue;
      const reply = await this.agent.handle(msg.text, msg.chatId);
      await this.sendMessage(msg.chatId, reply);
      replied++;
    }
    return replied;
  }

  // ── Start / stop the poll loop ───────────────────────────────
  start(): void {
    if (this.polling || !this.config.botToken) return;
    this.polling = true;
    console.log('📬 Telegram poller started');
    void this.registerCommands();
    this.loop();
  }

  stop(): void {
    this.polling = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.inflight?.abort();
    this.inflight = null;
  }

  private loop(): void {
    if (!this.polling) return;
    void this.pollOnce()
      .catch((err: unknown) => {
        console.error('❌ Telegram poll failed:', errorMessage(err));
        return 0;
      })
      .then(() => {
        if (this.polling) this.timer = setTimeout(() => this.loop(), this.config.pollIntervalMs);
      });
  }
}

export function describeChat(config: TelegramConfig): string {
  return config.chatId ? `chat ${config.chatId}` : 'all chats';
}
