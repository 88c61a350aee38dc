import { config } from './config.js';
import { SessionStore } from './store.js';
import { ConversationEngine } from './conversation.js';
import { create_anthropic_llm } from './llm.js';
import { create_bot, register_handlers } from './bot.js';
import { start_session_sweeper } from './scheduler.js';

async function main() {
  const store = await SessionStore.open();
  const llm = config.anthropic.api_key
    ? create_anthropic_llm({
      api_key: config.anthropic.api_key,
      base_url: config.anthropic.base_url,
      model: config.anthropic.model,
    })
    : null;
  if (!llm) console.warn('[bot] ANTHROPIC_API_KEY is not set; questions come from the fallback set');

  const engine = new ConversationEngine({
    store,
    llm,
    default_locale: config.default_locale,
    llm_timeout_ms: config.anthropic.timeout_ms,
    llm_assist: config.llm_assist,
    company_name: config.company_name,
  });

  const bot = create_bot(config.telegram.bot_token, config.proxy_url);
  register_handlers(bot, engine, config.default_locale);
  const sweeper = start_session_sweeper(engine, config.session.idle_minutes);

  const stop = (signal: string) => {
    console.log(`[bot] ${signal} received, shutting down`);
    sweeper?.stop();
    void bot.stop();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  // resolves once the bot has stopped polling
  await bot.start({
    onStart: (info) => {
      console.log(`[bot] Started as @${info.username}`);
    },
  });
  store.close();
  console.log('[bot] Stopped');
}

main().catch(console.error);
