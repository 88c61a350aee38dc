import { tech_category } from './vocabulary.js';
import type { TechCategory } from './vocabulary.js';
import { build_question_prompt } from './prompts.js';
import type { QuestionFocus } from './prompts.js';
import { generate_safely, extract_json_array } from './llm.js';
import type { LlmCapability } from './llm.js';
import { t } from './i18n/index.js';
import type { Difficulty, ExperienceTier, TechnicalQuestion } from './types.js';

export const MIN_QUESTIONS = 3;
export const MAX_QUESTIONS = 5;
const QUESTION_MAX_TOKENS = 1500;

const TIER_DIFFICULTY: Record<ExperienceTier, Difficulty> = {
  junior: 'beginner',
  mid: 'intermediate',
  senior: 'advanced',
};

const DIFFICULTY_ALIASES: Record<string, Difficulty> = {
  beginner: 'beginner',
  easy: 'beginner',
  intermediate: 'intermediate',
  medium: 'intermediate',
  advanced: 'advanced',
  hard: 'advanced',
};

// language and tool entries say nothing about the kind of role
const CATEGORY_FOCUS: Partial<Record<TechCategory, QuestionFocus>> = {
  data_ml: 'machine_learning',
  systems_language: 'systems',
  frontend: 'frontend',
  backend: 'backend',
  database: 'data',
  cloud: 'cloud_devops',
  devops: 'cloud_devops',
  mobile: 'mobile',
};

const GENERAL_QUESTIONS: ReadonlyArray<{ key: string; concepts: string[] }> = [
  { key: 'questions.general.problem_solving', concepts: ['problem solving', 'debugging'] },
  { key: 'questions.general.collaboration', concepts: ['communication', 'teamwork'] },
  { key: 'questions.general.learning', concepts: ['learning', 'adaptability'] },
];

export function experience_tier(experience_years: number | null): ExperienceTier {
  if (experience_years === null) return 'mid';
  if (experience_years < 2) return 'junior';
  if (experience_years < 5) return 'mid';
  return 'senior';
}

/** Majority category of the stack; ties go to the category seen first. */
export function classify_focus(tech_stack: readonly string[]): QuestionFocus {
  const votes = new Map<QuestionFocus, number>();
  for (const tech of tech_stack) {
    const category = tech_category(tech);
    const focus = category ? CATEGORY_FOCUS[category] : undefined;
    if (focus) votes.set(focus, (votes.get(focus) ?? 0) + 1);
  }
  let best: QuestionFocus = 'general';
  let best_votes = 0;
  for (const [focus, count] of votes) {
    if (count > best_votes) {
      best = focus;
      best_votes = count;
    }
  }
  return best;
}

export function fallback_questions(tech_stack: readonly string[], lng: string): TechnicalQuestion[] {
  const questions: TechnicalQuestion[] = tech_stack.slice(0, MIN_QUESTIONS).map(tech => ({
    question: t('questions.fallback', lng, { tech }),
    technology: tech,
    difficulty: 'intermediate',
    concepts: ['experience', 'practical application'],
  }));
  for (const general of GENERAL_QUESTIONS) {
    if (questions.length >= MIN_QUESTIONS) break;
    questions.push({
      question: t(general.key, lng),
      technology: 'general',
      difficulty: 'intermediate',
      concepts: [...general.concepts],
    });
  }
  return questions;
}

function parse_question_entry(
  value: unknown,
  tech_stack: readonly string[],
  tier: ExperienceTier,
): TechnicalQuestion | null {
  if (typeof value !== 'object' || value === null) return null;
  const entry: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const question = typeof entry.question === 'string' ? entry.question.trim() : '';
  if (!question) return null;

  const technology = typeof entry.technology === 'string' && entry.technology.trim()
    ? entry.technology.trim()
    : tech_stack.length === 1 ? tech_stack[0] : 'mixed';
  const difficulty_key = typeof entry.difficulty === 'string' ? entry.difficulty.trim().toLowerCase() : '';
  const concepts = Array.isArray(entry.concepts)
    ? entry.concepts.filter((c): c is string => typeof c === 'string' && c.trim() !== '').map(c => c.trim())
    : [];

  return {
    question,
    technology,
    difficulty: DIFFICULTY_ALIASES[difficulty_key] ?? TIER_DIFFICULTY[tier],
    concepts,
  };
}

/**
 * Parse a model reply into questions. Returns null when the reply holds no JSON
 * array or fewer than MIN_QUESTIONS usable entries.
 */
export function parse_question_list(
  raw: string,
  tech_stack: readonly string[],
  tier: ExperienceTier,
): TechnicalQuestion[] | null {
  const entries = extract_json_array(raw);
  if (!entries) return null;
  const questions = entries
    .map(entry => parse_question_entry(entry, tech_stack, tier))
    .filter((q): q is TechnicalQuestion => q !== null);
  if (questions.length < MIN_QUESTIONS) return null;
  return questions.slice(0, MAX_QUESTIONS);
}

export interface BuildQuestionsOptions {
  llm: LlmCapability | null;
  lng: string;
  timeout_ms: number;
}

export type QuestionBuilder = (
  tech_stack: readonly string[],
  experience_years: number | null,
  options: BuildQuestionsOptions,
) => Promise<TechnicalQuestion[]>;

export const build_questions: QuestionBuilder = async (tech_stack, experience_years, options) => {
  const tier = experience_tier(experience_years);

  if (options.llm) {
    const focus = classify_focus(tech_stack);
    const prompt = build_question_prompt(tech_stack, tier, focus, options.lng);
    const raw = await generate_safely({
      llm: options.llm,
      system_prompt: prompt.system,
      user_prompt: prompt.user,
      max_output_tokens: QUESTION_MAX_TOKENS,
      timeout_ms: options.timeout_ms,
      label: 'question generation',
    });
    const parsed = raw === null ? null : parse_question_list(raw, tech_stack, tier);
    if (parsed) {
      console.log(`[questions] source=model count=${parsed.length} tier=${tier} focus=${focus}`);
      return parsed;
    }
    if (raw !== null) console.warn('[questions] model reply had no usable question list');
  }

  const questions = fallback_questions(tech_stack, options.lng);
  console.log(`[questions] source=fallback count=${questions.length} tier=${tier}`);
  return questions;
};
