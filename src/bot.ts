import { Bot, type Context } from 'grammy';
import { HttpsProxyAgent } from 'https-proxy-agent';
import type { ConversationEngine } from './conversation.js';
import { extract_fields } from './extractor.js';
import { create_profile } from './profile.js';
import { t } from './i18n/index.js';
import { FIELD_ORDER } from './types.js';
import type { SessionSummary } from './types.js';

/** Bot whose Telegram API calls go through the proxy when one is configured. */
export function create_bot(token: string, proxy_url?: string): Bot {
  if (!proxy_url) return new Bot(token);
  console.log(`[bot] Proxy configured: ${proxy_url}`);
  return new Bot(token, {
    client: { baseFetchConfig: { agent: new HttpsProxyAgent(proxy_url), compress: true } },
  });
}

// ─── i18n helpers ─────────────────────────────────────────────────────────────

/** Telegram UI language decides the session locale; anything not Chinese gets the default. */
export function chat_lang(language_code: string | undefined, fallback: string): string {
  return language_code?.startsWith('zh') ? 'zh-CN' : fallback;
}

export function session_id_for_chat(chat_id: number): string {
  return `tg:${chat_id}`;
}

export function render_status(summary: SessionSummary | null, lng: string): string {
  if (!summary) return t('status.none', lng);
  const lines = [
    t('status.title', lng),
    t('status.state', lng, { state: t(`states.${summary.state}`, lng) }),
    t('status.progress', lng, { completed: summary.questions_completed, total: summary.total_questions }),
    summary.is_complete
      ? t('status.complete', lng)
      : t('status.missing', lng, {
        fields: summary.missing_fields.map(field => t(`fields.${field}`, lng)).join(t('list.separator', lng)),
      }),
  ];
  return lines.join('\n');
}

export function mentions_details(text: string): boolean {
  return Object.keys(extract_fields(text, FIELD_ORDER, create_profile())).length > 0;
}

// ─── Handlers ─────────────────────────────────────────────────────────────────

export function register_handlers(bot: Bot, engine: ConversationEngine, default_locale: string): void {
  // chats that have had a session since boot; a missing session there means it expired
  const known_chats = new Set<string>();

  const lang_of = (ctx: Context) => chat_lang(ctx.from?.language_code, default_locale);

  async function greet(ctx: Context, session_id: string): Promise<void> {
    const { greeting } = await engine.start_session(session_id, lang_of(ctx));
    known_chats.add(session_id);
    await ctx.reply(greeting);
  }

  bot.command('start', async (ctx) => {
    await ctx.replyWithChatAction('typing');
    await greet(ctx, session_id_for_chat(ctx.chat.id));
  });

  bot.command('reset', async (ctx) => {
    const session_id = session_id_for_chat(ctx.chat.id);
    await ctx.replyWithChatAction('typing');
    const greeting = await engine.reset_session(session_id, lang_of(ctx));
    known_chats.add(session_id);
    await ctx.reply(greeting);
  });

  bot.command('status', async (ctx) => {
    const summary = engine.get_session_summary(session_id_for_chat(ctx.chat.id));
    await ctx.reply(render_status(summary, lang_of(ctx)));
  });

  bot.on('message:text', async (ctx) => {
    const text = ctx.message.text;
    if (text.startsWith('/')) return;
    const session_id = session_id_for_chat(ctx.chat.id);

    if (!engine.has_session(session_id) && !known_chats.has(session_id)) {
      await ctx.replyWithChatAction('typing');
      await greet(ctx, session_id);
      // details typed before /start still count; small talk only gets the greeting
      if (mentions_details(text)) await ctx.reply(await engine.process_turn(session_id, text));
      return;
    }

    await ctx.replyWithChatAction('typing');
    const reply = await engine.process_turn(session_id, text);
    // the next message after an expiry notice starts over
    if (!engine.has_session(session_id)) known_chats.delete(session_id);
    await ctx.reply(reply);
  });

  bot.catch((err) => {
    console.error('[bot] Unhandled error:', err);
  });
}
