import { createRequire } from 'module';
import i18next from 'i18next';

const _require = createRequire(import.meta.url);
const enUS: unknown = _require('./locales/en-US.json');
const zhCN: unknown = _require('./locales/zh-CN.json');

export const SUPPORTED_LANGS = ['en-US', 'zh-CN'] as const;
export type SupportedLang = (typeof SUPPORTED_LANGS)[number];
export const DEFAULT_LANG: SupportedLang = 'en-US';

function is_resource(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

if (!is_resource(enUS) || !is_resource(zhCN)) {
  throw new Error('Locale files are malformed');
}

// All resources are bundled, so init settles without a backend
await i18next.init({
  resources: {
    'en-US': { translation: enUS },
    'zh-CN': { translation: zhCN },
  },
  lng: DEFAULT_LANG,
  fallbackLng: DEFAULT_LANG,
  interpolation: { escapeValue: false },
});

export function is_supported_lang(value: string): value is SupportedLang {
  return SUPPORTED_LANGS.some(lang => lang === value);
}

export function t(key: string, lng: string, vars?: Record<string, unknown>): string {
  return String(i18next.t(key, { lng, ...vars }));
}
