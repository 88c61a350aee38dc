import type { ExperienceTier, FieldName } from './types.js';

export type QuestionFocus =
  | 'machine_learning'
  | 'systems'
  | 'frontend'
  | 'backend'
  | 'data'
  | 'cloud_devops'
  | 'mobile'
  | 'general';

export interface PromptPair {
  system: string;
  user: string;
}

const LANGUAGE_NAMES: Record<string, string> = {
  'en-US': 'English',
  'zh-CN': 'Simplified Chinese',
};

function language_name(lng: string): string {
  return LANGUAGE_NAMES[lng] ?? 'English';
}

// Extra guidance for the question writer, chosen once per stack by classify_focus
export const FOCUS_GUIDANCE: Record<QuestionFocus, string> = {
  machine_learning:
    'Lean towards model training and evaluation, data preparation, overfitting, and taking models to production.',
  systems:
    'Lean towards memory management, concurrency, performance profiling, and undefined or unsafe behaviour.',
  frontend:
    'Lean towards rendering performance, state management, accessibility, and browser compatibility.',
  backend:
    'Lean towards API design, request lifecycles, authentication, caching, and error handling under load.',
  data:
    'Lean towards schema design, indexing, query planning, transactions, and migrations.',
  cloud_devops:
    'Lean towards deployment pipelines, infrastructure as code, observability, and incident response.',
  mobile:
    'Lean towards app lifecycle, offline behaviour, battery and network constraints, and release management.',
  general:
    'Cover problem solving, code quality, testing, and debugging in the listed technologies.',
};

export function build_greeting_prompt(company_name: string, lng: string): PromptPair {
  return {
    system: `You are the screening assistant of ${company_name}, a technology recruiting agency.
Write in ${language_name(lng)}. Keep it under 80 words, friendly and professional.`,
    user: `Write the opening message of a candidate screening chat. Briefly explain that you will collect basic details
(name, contact details, experience, desired role, location), then the candidate's tech stack, then ask a few technical
questions. Mention that the candidate can type "bye" at any time to finish. End by asking for the candidate's full name.`,
  };
}

export function build_extraction_prompt(utterance: string, missing: readonly FieldName[]): PromptPair {
  return {
    system: `You extract candidate details for a hiring assistant. Output strict JSON only, no other text.
Use exactly these keys and include only the ones asked for:
{
  "full_name": "full name or null",
  "email": "email address or null",
  "phone": "phone number or null",
  "experience_years": integer number of years or null,
  "desired_position": "job title or null",
  "location": "city or country or null",
  "tech_stack": ["technologies mentioned"]
}
Only report what the message states explicitly. Do not guess. Standardize technology names ("js" -> "JavaScript").`,
    user: `Fields to look for: ${missing.join(', ')}\n\nCandidate message:\n${utterance}`,
  };
}

export function build_question_prompt(
  tech_stack: readonly string[],
  tier: ExperienceTier,
  focus: QuestionFocus,
  lng: string,
): PromptPair {
  return {
    system: `You are a senior technical interviewer. Write questions in ${language_name(lng)}.
Output a JSON array only, no other text.`,
    user: `Write 3 to 5 technical screening questions for a ${tier}-level candidate who works with: ${tech_stack.join(', ')}.

Requirements:
1. Practical and scenario based, answerable in a few paragraphs of chat
2. Cover problem solving, design and best practices
3. Difficulty suited to a ${tier}-level candidate
4. ${FOCUS_GUIDANCE[focus]}

Return:
[
  {
    "question": "question text",
    "technology": "the main technology it tests",
    "difficulty": "beginner | intermediate | advanced",
    "concepts": ["concept 1", "concept 2"]
  }
]`,
  };
}

export function build_free_reply_prompt(utterance: string, field_label: string, lng: string): PromptPair {
  return {
    system: `You are a friendly hiring assistant collecting a candidate's details. Reply in ${language_name(lng)}
in at most two sentences. Do not ask any question; another message will ask for the next detail.
Never invent details about the candidate or the company.`,
    user: `We are waiting for the candidate's ${field_label}. The candidate wrote:\n${utterance}`,
  };
}

export function build_tech_classification_prompt(utterance: string): PromptPair {
  return {
    system: `You identify technologies in text. Output a JSON array of standard technology names only,
for example ["Python", "Django"]. Output [] when none are mentioned.`,
    user: utterance,
  };
}
