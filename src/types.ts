export type ConversationState =
  | 'greeting'
  | 'collecting_info'
  | 'collecting_tech_stack'
  | 'generating_questions'
  | 'asking_questions'
  | 'ending';

export const CONVERSATION_STATES: readonly ConversationState[] = [
  'greeting',
  'collecting_info',
  'collecting_tech_stack',
  'generating_questions',
  'asking_questions',
  'ending',
];

export type FieldName =
  | 'full_name'
  | 'email'
  | 'phone'
  | 'experience_years'
  | 'desired_position'
  | 'location'
  | 'tech_stack';

// Canonical prompting order
export const FIELD_ORDER: readonly FieldName[] = [
  'full_name',
  'email',
  'phone',
  'experience_years',
  'desired_position',
  'location',
  'tech_stack',
];

export interface CandidateProfile {
  full_name: string | null;
  email: string | null;
  phone: string | null;
  experience_years: number | null;
  desired_position: string | null;
  location: string | null;
  tech_stack: string[];
}

export interface ExperienceMention {
  value: number;
  unit: 'years' | 'months';
}

// Raw candidates from one utterance, validated later by merge_extraction
export interface ExtractedFields {
  full_name?: string;
  email?: string;
  phone?: string;
  experience_years?: ExperienceMention;
  desired_position?: string;
  location?: string;
  tech_stack?: string[];
}

export type Difficulty = 'beginner' | 'intermediate' | 'advanced';

export type ExperienceTier = 'junior' | 'mid' | 'senior';

export interface TechnicalQuestion {
  question: string;
  technology: string; // or 'mixed' / 'general'
  difficulty: Difficulty;
  concepts: string[];
}

export interface ConversationMessage {
  role: 'assistant' | 'user';
  content: string;
  timestamp: number;
}

export interface ConversationSession {
  session_id: string;
  state: ConversationState;
  locale: string;
  profile: CandidateProfile;
  messages: ConversationMessage[];
  questions: TechnicalQuestion[];
  question_cursor: number;
  created_at: number;
  updated_at: number;
}

export interface SessionSummary {
  session_id: string;
  state: ConversationState;
  questions_completed: number;
  total_questions: number;
  is_complete: boolean;
  missing_fields: FieldName[];
  conversation_length: number;
}
