import dotenv from 'dotenv';
// Load .env first (defaults/comments), then .env.local overrides with real secrets
dotenv.config();
dotenv.config({ path: '.env.local', override: true });

function require_env(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required environment variable: ${key}`);
  return val;
}

export function int_env(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  return parsed;
}

export function bool_env(key: string, fallback: boolean): boolean {
  const raw = process.env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

export const config = {
  telegram: {
    bot_token: require_env('TELEGRAM_BOT_TOKEN'),
  },
  anthropic: {
    // optional: without a key the screener runs on its deterministic fallbacks
    api_key: process.env.ANTHROPIC_API_KEY ?? '',
    base_url: process.env.ANTHROPIC_BASE_URL || undefined,
    model: process.env.ANTHROPIC_MODEL ?? 'claude-3-5-haiku-latest',
    timeout_ms: int_env('LLM_TIMEOUT_MS', 20_000),
  },
  company_name: process.env.COMPANY_NAME ?? 'Northwind Talent',
  default_locale: process.env.DEFAULT_LOCALE ?? 'en-US',
  llm_assist: bool_env('LLM_ASSIST', false),
  session: {
    // 0 keeps sessions for the life of the process
    idle_minutes: int_env('SESSION_IDLE_MINUTES', 0),
  },
  proxy_url: process.env.HTTPS_PROXY ?? process.env.HTTP_PROXY,
} as const;
