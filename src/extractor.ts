import {
  vocabulary,
  match_technologies,
  is_known_tech,
  term_pattern,
  FILLER_WORDS,
  ROLE_KEYWORDS,
} from './vocabulary.js';
import type { CandidateProfile, ExtractedFields, FieldName } from './types.js';

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
// digits with at most two separator characters (space, dash, dot, parenthesis) between them
const PHONE_CANDIDATE = /\+?\(?\d(?:[\s().-]{0,2}\d)*/g;

const EXPERIENCE_WITH_UNIT = /(\d+(?:\.\d+)?)\s*\+?\s*(years?|yrs?|months?|mos?)\b/i;
const EXPERIENCE_AFTER_CUE = /\bexperience\b\D{0,20}?\b(\d{1,2})\b/i;
const EXPERIENCE_BEFORE_CUE = /\b(\d{1,2})\b\+?\D{0,20}?\bexperience\b/i;
const BARE_NUMBER = /^(\d{1,2})\s*\+?\s*\.?$/;

const NAME_CUE = /\b(my name is|my name's|i am|i['’]m|call me|this is)\s+(.+)$/i;
// cues that also introduce descriptions: "I'm happy to be here", "I am Senior Backend Developer"
const DESCRIPTIVE_CUE = /^(?:i am|i['’]m|this is)$/i;
const DESCRIPTION_LINKS = new Set(['to', 'about', 'with', 'for']);
const NAME_TOKEN = /^\p{L}[\p{L}'’.-]*$/u;
const MAX_NAME_TOKENS = 4;

const LOCATION_CUE = /\b(?:live in|living in|located in|based in|based out of|reside in|residing in|from)\s+([^,.;!?\n]+)/i;
const LOCATION_STOP = /\s+(?:and|but|where|with|since|for|as|working|currently)\b.*$/i;
const MAX_LOCATION_TOKENS = 4;

const LIST_MARKER = /\b(?:languages|frameworks|tools|databases|libraries|skills|tech stack)\s*:/i;

const role_patterns = vocabulary.role_titles.flatMap(role =>
  role.variants.map(variant => ({ pattern: term_pattern(variant, 'i'), title: role.title })),
);
// longest place names first so "New Delhi" wins over "Delhi"
const place_patterns = [...vocabulary.places]
  .sort((a, b) => b.length - a.length)
  .map(place => ({ pattern: term_pattern(place, 'i'), place }));

function strip_punctuation(token: string): string {
  return token.replace(/^[("'“]+|[)"'”,.!?;:]+$/g, '');
}

function title_case(text: string): string {
  return text
    .split(/\s+/)
    .map(word => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

// Keep the user's capitalisation unless they typed everything in lower case
function normalise_case(text: string): string {
  return text === text.toLowerCase() ? title_case(text) : text;
}

function find_place(text: string): string | null {
  let best: { index: number; place: string } | null = null;
  for (const { pattern, place } of place_patterns) {
    const match = pattern.exec(text);
    if (match && (best === null || match.index < best.index)) best = { index: match.index, place };
  }
  return best?.place ?? null;
}

function is_name_token(token: string): boolean {
  const lower = token.toLowerCase();
  return NAME_TOKEN.test(token)
    && !FILLER_WORDS.has(lower)
    && !ROLE_KEYWORDS.has(lower)
    && !is_known_tech(lower);
}

export function extract_email(text: string): string | null {
  return text.match(EMAIL_PATTERN)?.[0] ?? null;
}

/** First digit run with 10–15 digits once separators are dropped. */
export function extract_phone(text: string): string | null {
  for (const match of text.matchAll(PHONE_CANDIDATE)) {
    const phone = phone_prefixes(match[0]).find(prefix => {
      const digits = prefix.replace(/\D/g, '').length;
      return digits >= 10 && digits <= 15;
    });
    if (phone) return phone;
  }
  return null;
}

// Shortest first, cut at whitespace gaps, so "9876543210 5 years" stops before the 5
function phone_prefixes(candidate: string): string[] {
  const prefixes: string[] = [];
  for (const gap of candidate.matchAll(/\s+/g)) prefixes.push(candidate.slice(0, gap.index ?? candidate.length).trim());
  prefixes.push(candidate.trim());
  return prefixes;
}

export function extract_experience(
  text: string,
  prompted: boolean,
): ExtractedFields['experience_years'] | null {
  const with_unit = text.match(EXPERIENCE_WITH_UNIT);
  if (with_unit) {
    const unit = with_unit[2].toLowerCase().startsWith('m') ? 'months' : 'years';
    return { value: parseFloat(with_unit[1]), unit };
  }
  const around_cue = text.match(EXPERIENCE_AFTER_CUE) ?? text.match(EXPERIENCE_BEFORE_CUE);
  if (around_cue) return { value: parseInt(around_cue[1], 10), unit: 'years' };

  // a bare number only counts when we just asked for experience
  if (prompted) {
    const bare = text.trim().match(BARE_NUMBER);
    if (bare) return { value: parseInt(bare[1], 10), unit: 'years' };
  }
  return null;
}

function is_description(text: string, first: string, stop: string | null): boolean {
  if (stop === null) return false;
  if (ROLE_KEYWORDS.has(stop)) return true;
  // a lower-case word in otherwise capitalised text, then "to"/"about"/...: "I'm hoping to join"
  const lower_in_cased_text = /^\p{Ll}/u.test(first) && text !== text.toLowerCase();
  return lower_in_cased_text && DESCRIPTION_LINKS.has(stop);
}

export function extract_name(text: string): string | null {
  const cue = text.match(NAME_CUE);
  if (cue) {
    const tokens: string[] = [];
    let stop: string | null = null;
    for (const raw of cue[2].split(/\s+/)) {
      const token = strip_punctuation(raw);
      if (!is_name_token(token)) {
        stop = token.toLowerCase();
        break;
      }
      tokens.push(token);
      if (tokens.length === MAX_NAME_TOKENS || /[,.!?;]$/.test(raw)) break;
    }
    if (tokens.length === 0) return null;
    if (DESCRIPTIVE_CUE.test(cue[1]) && is_description(text, tokens[0], stop)) return null;
    return normalise_case(tokens.join(' '));
  }

  // Short capitalised reply with nothing that marks it as another answer: "Asha Rao"
  const trimmed = text.trim();
  if (/[@\d:]/.test(trimmed)) return null;
  const tokens = trimmed.split(/\s+/).map(strip_punctuation).filter(t => t.length > 0);
  if (tokens.length === 0 || tokens.length > MAX_NAME_TOKENS) return null;
  if (!/^\p{Lu}/u.test(tokens[0])) return null;
  if (!tokens.every(is_name_token)) return null;
  if (find_place(trimmed) !== null || match_technologies(trimmed).length > 0) return null;
  return tokens.join(' ');
}

export function extract_position(text: string): string | null {
  for (const { pattern, title } of role_patterns) {
    if (pattern.test(text)) return title;
  }

  const words = text.split(/[\s,;]+/).map(strip_punctuation).filter(w => w.length > 0);
  for (let i = 0; i < words.length; i += 1) {
    if (!ROLE_KEYWORDS.has(words[i].toLowerCase())) continue;
    const previous = i > 0 ? words[i - 1] : null;
    if (previous && /^\p{L}[\p{L}+#.-]*$/u.test(previous) && !FILLER_WORDS.has(previous.toLowerCase())) {
      return title_case(`${previous} ${words[i]}`);
    }
    return title_case(words[i]);
  }
  return null;
}

export function extract_location(text: string): string | null {
  const place = find_place(text);
  if (place) return place;

  const cue = text.match(LOCATION_CUE);
  if (!cue) return null;
  const candidate = cue[1].replace(LOCATION_STOP, '').trim();
  const tokens = candidate.split(/\s+/).filter(t => t.length > 0);
  if (tokens.length === 0 || tokens.length > MAX_LOCATION_TOKENS) return null;
  if (!/^\p{L}/u.test(tokens[0]) || FILLER_WORDS.has(tokens[0].toLowerCase())) return null;
  if (match_technologies(candidate).length > 0) return null;
  return normalise_case(candidate);
}

export function extract_tech_stack(text: string, prompted: boolean): string[] | null {
  if (LIST_MARKER.test(text)) return [text.trim()];
  // A list right after asking for the stack is kept whole and resolved item by item
  // on merge, so unknown names next to known ones survive
  if (prompted && /[,;]|\band\b/i.test(text)) return [text.trim()];
  const matched = match_technologies(text);
  return matched.length > 0 ? matched : null;
}

/** Coerce a model's JSON extraction into the same shape the pattern rules produce. */
export function coerce_model_fields(raw: Record<string, unknown>, missing: readonly FieldName[]): ExtractedFields {
  const result: ExtractedFields = {};
  for (const field of missing) {
    const value = raw[field];
    if (value === null || value === undefined) continue;
    switch (field) {
      case 'experience_years': {
        const years = typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
        if (Number.isFinite(years)) result.experience_years = { value: years, unit: 'years' };
        break;
      }
      case 'tech_stack': {
        if (!Array.isArray(value)) break;
        const names = value.filter((v): v is string => typeof v === 'string' && v.trim() !== '');
        if (names.length > 0) result.tech_stack = names.map(name => name.trim());
        break;
      }
      default:
        if (typeof value === 'string' && value.trim()) result[field] = value.trim();
    }
  }
  return result;
}

/**
 * Pull candidate values for the still-missing fields out of one utterance.
 * Rules run independently, so a single reply can fill several fields. Email and
 * phone spans are blanked before the other rules run so their digits and words
 * do not leak into experience or name matching. The first missing field is the
 * one the assistant just asked for.
 */
export function extract_fields(
  utterance: string,
  missing: readonly FieldName[],
  _known: CandidateProfile,
): ExtractedFields {
  const wants = (field: FieldName) => missing.includes(field);
  const prompted = missing[0];
  const result: ExtractedFields = {};
  let rest = utterance;

  const email = extract_email(rest);
  if (email) {
    if (wants('email')) result.email = email;
    rest = rest.replace(email, ' ');
  }

  const phone = extract_phone(rest);
  if (phone) {
    if (wants('phone')) result.phone = phone;
    rest = rest.replace(phone, ' ');
  }

  if (wants('experience_years')) {
    const experience = extract_experience(rest, prompted === 'experience_years');
    if (experience) result.experience_years = experience;
  }

  if (wants('full_name')) {
    const name = extract_name(rest);
    if (name) result.full_name = name;
  }

  if (wants('desired_position')) {
    const position = extract_position(rest);
    if (position) result.desired_position = position;
  }

  if (wants('location')) {
    const location = extract_location(rest);
    if (location) result.location = location;
  }

  if (wants('tech_stack')) {
    const tech = extract_tech_stack(rest, prompted === 'tech_stack');
    if (tech) result.tech_stack = tech;
  }

  return result;
}
