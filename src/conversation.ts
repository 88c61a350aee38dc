import { randomUUID } from 'crypto';
import { extract_fields, coerce_model_fields } from './extractor.js';
import { clone_profile, is_complete, merge_extraction, missing_fields } from './profile.js';
import { build_questions as default_build_questions } from './questions.js';
import type { QuestionBuilder } from './questions.js';
import {
  build_extraction_prompt,
  build_free_reply_prompt,
  build_greeting_prompt,
  build_tech_classification_prompt,
} from './prompts.js';
import type { PromptPair } from './prompts.js';
import { extract_json_array, extract_json_object, generate_safely } from './llm.js';
import type { LlmCapability } from './llm.js';
import { serialize_session, deserialize_session } from './session.js';
import type { SessionStore } from './store.js';
import { KeyedLock } from './lock.js';
import { t, is_supported_lang, DEFAULT_LANG } from './i18n/index.js';
import { FIELD_ORDER } from './types.js';
import type {
  CandidateProfile,
  ConversationMessage,
  ConversationSession,
  ConversationState,
  ExtractedFields,
  FieldName,
  SessionSummary,
} from './types.js';

export const MAX_UTTERANCE_LENGTH = 1000;
const DEFAULT_LLM_TIMEOUT_MS = 20_000;

const ENDING_KEYWORDS = [
  'bye', 'goodbye', 'exit', 'quit', 'thank you', 'thanks', 'done',
  'stop', 'finish', "that's all", 'no more questions', 'end',
];
const ENDING_PATTERN = new RegExp(
  `\\b(?:${ENDING_KEYWORDS.map(k => k.replace("'", "['’]")).join('|')})\\b`,
  'i',
);

export function is_ending_utterance(text: string): boolean {
  return ENDING_PATTERN.test(text);
}

export interface ConversationEngineOptions {
  store: SessionStore;
  llm?: LlmCapability | null;
  default_locale?: string;
  llm_timeout_ms?: number;
  // model greeting, model-assisted extraction and model free-form replies
  llm_assist?: boolean;
  company_name?: string;
  build_questions?: QuestionBuilder;
  now?: () => number;
}

export interface StartedSession {
  session_id: string;
  greeting: string;
}

function clone_session(session: ConversationSession): ConversationSession {
  return {
    ...session,
    profile: clone_profile(session.profile),
    messages: [...session.messages],
    questions: [...session.questions],
  };
}

/**
 * Turn-by-turn screening dialogue. Every turn for a session runs under that
 * session's lock against a copy of the stored session; the copy is committed
 * only when the turn finishes, so a failed turn leaves state, profile and
 * questions as they were.
 */
export class ConversationEngine {
  private readonly store: SessionStore;
  private readonly llm: LlmCapability | null;
  private readonly default_locale: string;
  private readonly llm_timeout_ms: number;
  private readonly llm_assist: boolean;
  private readonly company_name: string;
  private readonly build_questions: QuestionBuilder;
  private readonly now: () => number;
  private readonly lock = new KeyedLock();

  constructor(options: ConversationEngineOptions) {
    this.store = options.store;
    this.llm = options.llm ?? null;
    this.default_locale = this.resolve_locale(options.default_locale);
    this.llm_timeout_ms = options.llm_timeout_ms ?? DEFAULT_LLM_TIMEOUT_MS;
    this.llm_assist = options.llm_assist ?? false;
    this.company_name = options.company_name ?? 'our company';
    this.build_questions = options.build_questions ?? default_build_questions;
    this.now = options.now ?? Date.now;
  }

  private resolve_locale(locale: string | undefined): string {
    return locale && is_supported_lang(locale) ? locale : DEFAULT_LANG;
  }

  private assisted(): LlmCapability | null {
    return this.llm_assist ? this.llm : null;
  }

  private ask_model(llm: LlmCapability, prompt: PromptPair, max_output_tokens: number, label: string) {
    return generate_safely({
      llm,
      system_prompt: prompt.system,
      user_prompt: prompt.user,
      max_output_tokens,
      timeout_ms: this.llm_timeout_ms,
      label,
    });
  }

  // ── Session lifecycle ───────────────────────────────────────────────────────

  private async open_session(session_id: string, locale: string): Promise<string> {
    const session = this.store.create(session_id, locale, this.now());
    const greeting = await this.greeting(locale);
    const message: ConversationMessage = { role: 'assistant', content: greeting, timestamp: this.now() };
    session.messages.push(message);
    session.updated_at = message.timestamp;
    this.store.commit(session, [message]);
    return greeting;
  }

  async start_session(session_id?: string, locale?: string): Promise<StartedSession> {
    const id = session_id?.trim() || randomUUID();
    const lng = this.resolve_locale(locale ?? this.default_locale);
    return this.lock.run(id, async () => {
      const greeting = await this.open_session(id, lng);
      console.log(`[conversation] Session ${id} started (${lng})`);
      return { session_id: id, greeting };
    });
  }

  /** Drop the session and start over in `greeting` under the same id. */
  async reset_session(session_id: string, locale?: string): Promise<string> {
    return this.lock.run(session_id, async () => {
      const existing = this.store.get(session_id);
      const lng = this.resolve_locale(locale ?? existing?.locale ?? this.default_locale);
      this.store.delete(session_id);
      const greeting = await this.open_session(session_id, lng);
      console.log(`[conversation] Session ${session_id} reset`);
      return greeting;
    });
  }

  has_session(session_id: string): boolean {
    return this.store.has(session_id);
  }

  // ── Turns ───────────────────────────────────────────────────────────────────

  async process_turn(session_id: string, utterance: string): Promise<string> {
    return this.lock.run(session_id, async () => {
      const loaded = this.store.get(session_id);
      if (!loaded) return t('errors.session_expired', this.default_locale);

      const text = utterance.trim().slice(0, MAX_UTTERANCE_LENGTH);
      if (!text) return this.empty_reply(loaded);

      const user_message: ConversationMessage = { role: 'user', content: text, timestamp: this.now() };
      let session = clone_session(loaded);
      let reply: string;
      try {
        reply = await this.advance(session, text);
      } catch (err) {
        console.error(`[conversation] Turn failed for session ${session_id}:`, err);
        session = loaded;
        reply = t('errors.apology', loaded.locale);
      }

      const assistant_message: ConversationMessage = { role: 'assistant', content: reply, timestamp: this.now() };
      session.messages.push(user_message, assistant_message);
      session.updated_at = assistant_message.timestamp;
      this.store.commit(session, [user_message, assistant_message]);
      return reply;
    });
  }

  private transition(session: ConversationSession, next: ConversationState): void {
    if (session.state === next) return;
    console.log(`[conversation] Session ${session.session_id}: ${session.state} -> ${next}`);
    session.state = next;
  }

  private async advance(session: ConversationSession, text: string): Promise<string> {
    if (session.state === 'ending') return t('ending.already_complete', session.locale);

    if (is_ending_utterance(text)) {
      this.transition(session, 'ending');
      return this.farewell(session);
    }

    switch (session.state) {
      case 'greeting':
        // the first reply may already carry details
        this.transition(session, 'collecting_info');
        return this.collect(session, text);
      case 'collecting_info':
      case 'collecting_tech_stack':
        return this.collect(session, text);
      case 'generating_questions':
        return this.begin_questions(session, '');
      case 'asking_questions':
        return this.record_answer(session);
    }
  }

  private empty_reply(session: ConversationSession): string {
    const lng = session.locale;
    if (session.state === 'ending') return t('ending.already_complete', lng);
    if (session.state === 'asking_questions') return this.render_question(session);
    const missing = missing_fields(session.profile);
    if (missing.length === 0) return t('collect.empty', lng);
    return `${t('collect.empty', lng)} ${t(`collect.ask.${missing[0]}`, lng)}`;
  }

  // ── Collecting ──────────────────────────────────────────────────────────────

  private async collect(session: ConversationSession, text: string): Promise<string> {
    const lng = session.locale;
    const missing_before = missing_fields(session.profile);
    const applied = new Set(merge_extraction(session.profile, extract_fields(text, missing_before, session.profile)));

    const llm = this.assisted();
    const still_missing = missing_fields(session.profile);
    if (llm && still_missing.length > 0) {
      const assisted = await this.assisted_extraction(llm, session.state, text, still_missing);
      for (const field of merge_extraction(session.profile, assisted)) applied.add(field);
    }

    const acknowledged = FIELD_ORDER.filter(field => applied.has(field));
    if (acknowledged.length > 0) {
      console.log(`[conversation] Session ${session.session_id} filled: ${acknowledged.join(', ')}`);
    }
    const missing = missing_fields(session.profile);

    if (missing.length === 0) {
      return this.begin_questions(session, acknowledged.length > 0 ? this.acknowledge(acknowledged, lng) : '');
    }
    if (missing.length === 1 && missing[0] === 'tech_stack') {
      this.transition(session, 'collecting_tech_stack');
    }

    const next = missing[0];
    const ask = t(`collect.ask.${next}`, lng);
    if (acknowledged.length > 0) return `${this.acknowledge(acknowledged, lng)}\n\n${ask}`;

    if (llm) {
      const free = await this.ask_model(llm, build_free_reply_prompt(text, t(`fields.${next}`, lng), lng), 200, 'free reply');
      if (free) return `${free}\n\n${ask}`;
    }
    return t(`collect.retry.${next}`, lng);
  }

  private async assisted_extraction(
    llm: LlmCapability,
    state: ConversationState,
    text: string,
    missing: readonly FieldName[],
  ): Promise<ExtractedFields> {
    if (state === 'collecting_tech_stack') {
      const raw = await this.ask_model(llm, build_tech_classification_prompt(text), 300, 'tech classification');
      const names = raw === null ? null : extract_json_array(raw);
      const tech_stack = (names ?? []).filter((n): n is string => typeof n === 'string' && n.trim() !== '');
      return tech_stack.length > 0 ? { tech_stack } : {};
    }
    const raw = await this.ask_model(llm, build_extraction_prompt(text, missing), 500, 'field extraction');
    const parsed = raw === null ? null : extract_json_object(raw);
    return parsed ? coerce_model_fields(parsed, missing) : {};
  }

  private join_list(items: readonly string[], lng: string): string {
    if (items.length <= 1) return items.join('');
    return `${items.slice(0, -1).join(t('list.separator', lng))}${t('list.and', lng)}${items[items.length - 1]}`;
  }

  private acknowledge(fields: readonly FieldName[], lng: string): string {
    const labels = fields.map(field => t(`fields.${field}`, lng));
    return labels.length === 1
      ? t('collect.ack_single', lng, { field: labels[0] })
      : t('collect.ack_multiple', lng, { fields: this.join_list(labels, lng) });
  }

  // ── Questions ───────────────────────────────────────────────────────────────

  private async begin_questions(session: ConversationSession, preface: string): Promise<string> {
    const lng = session.locale;
    this.transition(session, 'generating_questions');
    if (session.questions.length === 0) {
      session.questions = await this.build_questions(session.profile.tech_stack, session.profile.experience_years, {
        llm: this.llm,
        lng,
        timeout_ms: this.llm_timeout_ms,
      });
      session.question_cursor = 0;
    }
    if (session.questions.length === 0) throw new Error('Question builder returned no questions');
    this.transition(session, 'asking_questions');

    const intro = t('questions.intro', lng, {
      tech: this.join_list(session.profile.tech_stack, lng),
      total: session.questions.length,
    });
    return [preface, intro, this.render_question(session)].filter(part => part !== '').join('\n\n');
  }

  private render_question(session: ConversationSession): string {
    const question = session.questions[session.question_cursor];
    return t('questions.item', session.locale, {
      number: session.question_cursor + 1,
      total: session.questions.length,
      technology: question.technology,
      question: question.question,
    });
  }

  // Answers are recorded in the history only; nothing grades them
  private record_answer(session: ConversationSession): string {
    session.question_cursor = Math.min(session.question_cursor + 1, session.questions.length);
    if (session.question_cursor < session.questions.length) {
      return `${t('questions.next', session.locale)}\n\n${this.render_question(session)}`;
    }
    this.transition(session, 'ending');
    return this.farewell(session);
  }

  // ── Ending ──────────────────────────────────────────────────────────────────

  private render_field(profile: CandidateProfile, field: FieldName, lng: string): string {
    const not_provided = t('farewell.not_provided', lng);
    switch (field) {
      case 'experience_years':
        return profile.experience_years === null
          ? not_provided
          : t('farewell.experience_value', lng, { count: profile.experience_years });
      case 'tech_stack':
        return profile.tech_stack.length > 0 ? profile.tech_stack.join(', ') : not_provided;
      default:
        return profile[field] ?? not_provided;
    }
  }

  private farewell(session: ConversationSession): string {
    const lng = session.locale;
    const { profile } = session;
    const thanks = profile.full_name
      ? t('farewell.thanks', lng, { name: profile.full_name })
      : t('farewell.thanks_anonymous', lng);
    const lines = FIELD_ORDER.map(field => t('farewell.field_line', lng, {
      label: t(`labels.${field}`, lng),
      value: this.render_field(profile, field, lng),
    }));
    return [
      thanks,
      [t('farewell.summary_heading', lng), ...lines].join('\n'),
      t('farewell.next_steps', lng),
      t('farewell.closing', lng, { company: this.company_name }),
    ].join('\n\n');
  }

  private async greeting(lng: string): Promise<string> {
    const llm = this.assisted();
    if (llm) {
      const generated = await this.ask_model(llm, build_greeting_prompt(this.company_name, lng), 300, 'greeting');
      if (generated) return generated;
    }
    return t('greeting', lng, { company: this.company_name });
  }

  // ── Introspection ───────────────────────────────────────────────────────────

  get_missing_fields(session_id: string): FieldName[] | null {
    const session = this.store.get(session_id);
    return session ? missing_fields(session.profile) : null;
  }

  get_profile(session_id: string): CandidateProfile | null {
    return this.store.get(session_id)?.profile ?? null;
  }

  get_session_summary(session_id: string): SessionSummary | null {
    const session = this.store.get(session_id);
    if (!session) return null;
    return {
      session_id,
      state: session.state,
      questions_completed: session.question_cursor,
      total_questions: session.questions.length,
      is_complete: is_complete(session.profile),
      missing_fields: missing_fields(session.profile),
      conversation_length: session.messages.length,
    };
  }

  get_session(session_id: string): ConversationSession | null {
    return this.store.get(session_id);
  }

  export_session(session_id: string): string | null {
    const session = this.store.get(session_id);
    return session ? serialize_session(session) : null;
  }

  /** Restore a snapshot, replacing any session with the same id. */
  async import_session(snapshot: string): Promise<string> {
    const session = deserialize_session(snapshot);
    return this.lock.run(session.session_id, async () => {
      this.store.replace(session);
      console.log(`[conversation] Session ${session.session_id} imported (${session.messages.length} messages)`);
      return session.session_id;
    });
  }

  /** Remove sessions idle longer than max_idle_ms. Sessions with a turn in flight are skipped. */
  sweep_idle_sessions(max_idle_ms: number): string[] {
    const cutoff = this.now() - max_idle_ms;
    const removed = this.store.find_idle(cutoff).filter(id => !this.lock.is_busy(id) && this.store.delete(id));
    if (removed.length > 0) console.log(`[conversation] Swept ${removed.length} idle session(s)`);
    return removed;
  }
}
