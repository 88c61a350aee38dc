import { createRequire } from 'module';

const _require = createRequire(import.meta.url);

export type TechCategory =
  | 'language'
  | 'systems_language'
  | 'frontend'
  | 'backend'
  | 'database'
  | 'cloud'
  | 'devops'
  | 'data_ml'
  | 'mobile'
  | 'tool';

export interface TechnologyEntry {
  name: string;
  category: TechCategory;
  aliases: string[];
  case_sensitive_aliases?: string[];
}

export interface RoleTitle {
  title: string;
  variants: string[];
}

interface Vocabulary {
  technologies: TechnologyEntry[];
  role_titles: RoleTitle[];
  role_keywords: string[];
  places: string[];
  filler_words: string[];
}

const TECH_CATEGORIES: readonly TechCategory[] = [
  'language', 'systems_language', 'frontend', 'backend', 'database',
  'cloud', 'devops', 'data_ml', 'mobile', 'tool',
];

function is_record(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function is_string_array(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function is_tech_category(value: unknown): value is TechCategory {
  return TECH_CATEGORIES.some(category => category === value);
}

function parse_technology(value: unknown): TechnologyEntry {
  if (!is_record(value) || typeof value.name !== 'string' || !is_tech_category(value.category) || !is_string_array(value.aliases)) {
    throw new Error(`Invalid technology entry in vocabulary: ${JSON.stringify(value)}`);
  }
  const entry: TechnologyEntry = { name: value.name, category: value.category, aliases: value.aliases };
  if (is_string_array(value.case_sensitive_aliases)) entry.case_sensitive_aliases = value.case_sensitive_aliases;
  return entry;
}

function parse_role_title(value: unknown): RoleTitle {
  if (!is_record(value) || typeof value.title !== 'string' || !is_string_array(value.variants)) {
    throw new Error(`Invalid role title in vocabulary: ${JSON.stringify(value)}`);
  }
  return { title: value.title, variants: value.variants };
}

function load_vocabulary(): Vocabulary {
  const raw: unknown = _require('./data/vocabulary.json');
  if (!is_record(raw) || !Array.isArray(raw.technologies) || !Array.isArray(raw.role_titles)
    || !is_string_array(raw.role_keywords) || !is_string_array(raw.places) || !is_string_array(raw.filler_words)) {
    throw new Error('Vocabulary file is malformed');
  }
  return {
    technologies: raw.technologies.map(parse_technology),
    role_titles: raw.role_titles.map(parse_role_title),
    role_keywords: raw.role_keywords,
    places: raw.places,
    filler_words: raw.filler_words,
  };
}

export const vocabulary = load_vocabulary();

// lowercased alias / canonical name -> entry
const tech_index = new Map<string, TechnologyEntry>();
for (const entry of vocabulary.technologies) {
  tech_index.set(entry.name.toLowerCase(), entry);
  for (const alias of entry.aliases) tech_index.set(alias.toLowerCase(), entry);
}

export const FILLER_WORDS: ReadonlySet<string> = new Set(vocabulary.filler_words);
export const ROLE_KEYWORDS: ReadonlySet<string> = new Set(vocabulary.role_keywords);

/** Map a technology name or abbreviation to its standard spelling ("k8s" → "Kubernetes"). */
export function canonical_tech(name: string): string {
  const trimmed = name.trim();
  return tech_index.get(trimmed.toLowerCase())?.name ?? trimmed;
}

const tech_patterns: Array<{ pattern: RegExp; entry: TechnologyEntry }> = [];
for (const entry of vocabulary.technologies) {
  for (const alias of entry.aliases) tech_patterns.push({ pattern: term_pattern(alias, 'gi'), entry });
  for (const alias of entry.case_sensitive_aliases ?? []) tech_patterns.push({ pattern: term_pattern(alias, 'g'), entry });
}

/**
 * Canonical technologies mentioned in the text, in order of first appearance.
 * Overlapping hits keep the longest one ("React Native" rather than "React").
 */
export function match_technologies(text: string): string[] {
  const hits: Array<{ start: number; end: number; name: string }> = [];
  for (const { pattern, entry } of tech_patterns) {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      hits.push({ start: match.index, end: match.index + match[0].length, name: entry.name });
    }
  }
  hits.sort((a, b) => a.start - b.start || b.end - a.end);

  const names: string[] = [];
  let covered_until = 0;
  for (const hit of hits) {
    if (hit.start < covered_until) continue;
    covered_until = hit.end;
    if (!names.includes(hit.name)) names.push(hit.name);
  }
  return names;
}

export function tech_category(name: string): TechCategory | null {
  return tech_index.get(name.trim().toLowerCase())?.category ?? null;
}

export function is_known_tech(token: string): boolean {
  return tech_index.has(token.trim().toLowerCase());
}

export function escape_regex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Word-boundary pattern that also treats `+`, `#` and `.` as part of a word,
 * so "c++" and "node.js" match whole while "java" does not match inside "javascript".
 */
export function term_pattern(term: string, flags: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}+#.])${escape_regex(term)}(?![\\p{L}\\p{N}+#])`, `${flags}u`);
}
