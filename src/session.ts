import { CONVERSATION_STATES } from './types.js';
import type {
  CandidateProfile,
  ConversationMessage,
  ConversationSession,
  ConversationState,
  Difficulty,
  TechnicalQuestion,
} from './types.js';

export const SNAPSHOT_VERSION = 1;

const DIFFICULTIES: readonly Difficulty[] = ['beginner', 'intermediate', 'advanced'];
const MESSAGE_ROLES: ReadonlyArray<ConversationMessage['role']> = ['user', 'assistant'];

function invalid(reason: string): Error {
  return new Error(`Invalid session snapshot: ${reason}`);
}

function is_record(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nullable_string(value: unknown, field: string): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') throw invalid(`${field} must be a string or null`);
  return value;
}

function finite_number(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) throw invalid(`${field} must be a number`);
  return value;
}

export function parse_state(value: unknown): ConversationState {
  const state = CONVERSATION_STATES.find(s => s === value);
  if (!state) throw invalid(`unknown state ${JSON.stringify(value)}`);
  return state;
}

export function parse_profile(value: unknown): CandidateProfile {
  if (!is_record(value)) throw invalid('profile must be an object');
  const experience = value.experience_years;
  if (experience !== null && experience !== undefined
    && (typeof experience !== 'number' || !Number.isInteger(experience) || experience < 0 || experience > 50)) {
    throw invalid('profile.experience_years must be an integer between 0 and 50');
  }
  const tech_stack = value.tech_stack ?? [];
  if (!Array.isArray(tech_stack) || !tech_stack.every(v => typeof v === 'string')) {
    throw invalid('profile.tech_stack must be a list of strings');
  }
  return {
    full_name: nullable_string(value.full_name, 'profile.full_name'),
    email: nullable_string(value.email, 'profile.email'),
    phone: nullable_string(value.phone, 'profile.phone'),
    experience_years: typeof experience === 'number' ? experience : null,
    desired_position: nullable_string(value.desired_position, 'profile.desired_position'),
    location: nullable_string(value.location, 'profile.location'),
    tech_stack: tech_stack.filter((v): v is string => typeof v === 'string'),
  };
}

function parse_question(value: unknown, index: number): TechnicalQuestion {
  if (!is_record(value)) throw invalid(`questions[${index}] must be an object`);
  const difficulty = DIFFICULTIES.find(d => d === value.difficulty);
  if (typeof value.question !== 'string' || typeof value.technology !== 'string' || !difficulty) {
    throw invalid(`questions[${index}] is incomplete`);
  }
  const concepts = value.concepts ?? [];
  if (!Array.isArray(concepts)) throw invalid(`questions[${index}].concepts must be a list`);
  return {
    question: value.question,
    technology: value.technology,
    difficulty,
    concepts: concepts.filter((c): c is string => typeof c === 'string'),
  };
}

export function parse_questions(value: unknown): TechnicalQuestion[] {
  if (!Array.isArray(value)) throw invalid('questions must be a list');
  return value.map(parse_question);
}

function parse_message(value: unknown, index: number): ConversationMessage {
  if (!is_record(value)) throw invalid(`messages[${index}] must be an object`);
  const role = MESSAGE_ROLES.find(r => r === value.role);
  if (!role) throw invalid(`messages[${index}].role is invalid`);
  if (typeof value.content !== 'string') throw invalid(`messages[${index}].content must be a string`);
  return {
    role,
    content: value.content,
    timestamp: finite_number(value.timestamp, `messages[${index}].timestamp`),
  };
}

export function serialize_session(session: ConversationSession): string {
  return JSON.stringify({ version: SNAPSHOT_VERSION, ...session });
}

export function deserialize_session(text: string): ConversationSession {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw invalid('not valid JSON');
  }
  if (!is_record(raw)) throw invalid('expected an object');
  if (raw.version !== SNAPSHOT_VERSION) throw invalid(`unsupported version ${JSON.stringify(raw.version)}`);
  if (typeof raw.session_id !== 'string' || !raw.session_id.trim()) throw invalid('session_id is required');
  if (typeof raw.locale !== 'string' || !raw.locale) throw invalid('locale is required');
  if (!Array.isArray(raw.messages)) throw invalid('messages must be a list');

  const questions = parse_questions(raw.questions ?? []);
  const cursor = finite_number(raw.question_cursor ?? 0, 'question_cursor');
  if (!Number.isInteger(cursor) || cursor < 0 || cursor > questions.length) {
    throw invalid('question_cursor is out of range');
  }

  return {
    session_id: raw.session_id,
    state: parse_state(raw.state),
    locale: raw.locale,
    profile: parse_profile(raw.profile),
    messages: raw.messages.map(parse_message),
    questions,
    question_cursor: cursor,
    created_at: finite_number(raw.created_at, 'created_at'),
    updated_at: finite_number(raw.updated_at, 'updated_at'),
  };
}
