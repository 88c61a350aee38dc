import { canonical_tech, is_known_tech, match_technologies, FILLER_WORDS } from './vocabulary.js';
import { FIELD_ORDER } from './types.js';
import type { CandidateProfile, ExtractedFields, ExperienceMention, FieldName } from './types.js';

export const MAX_TECH_STACK = 20;
const MAX_TEXT_LENGTH = 100;

const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

export function create_profile(): CandidateProfile {
  return {
    full_name: null,
    email: null,
    phone: null,
    experience_years: null,
    desired_position: null,
    location: null,
    tech_stack: [],
  };
}

export function clone_profile(profile: CandidateProfile): CandidateProfile {
  return { ...profile, tech_stack: [...profile.tech_stack] };
}

export function is_valid_email(email: string): boolean {
  return EMAIL_PATTERN.test(email.trim());
}

/** 7–15 digits once spaces, dashes, parentheses and a leading plus are removed. */
export function is_valid_phone(phone: string): boolean {
  const digits = phone.replace(/[\s\-().+]/g, '');
  return /^\d{7,15}$/.test(digits);
}

function is_field_missing(profile: CandidateProfile, field: FieldName): boolean {
  if (field === 'tech_stack') return profile.tech_stack.length === 0;
  if (field === 'experience_years') return profile.experience_years === null;
  const value = profile[field];
  return value === null || value.trim() === '';
}

export function missing_fields(profile: CandidateProfile): FieldName[] {
  return FIELD_ORDER.filter(field => is_field_missing(profile, field));
}

export function is_complete(profile: CandidateProfile): boolean {
  return missing_fields(profile).length === 0;
}

function clean_text(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim().replace(/\s+/g, ' ');
  if (!trimmed || trimmed.length > MAX_TEXT_LENGTH) return null;
  return trimmed;
}

export function experience_to_years(mention: ExperienceMention): number | null {
  if (!Number.isFinite(mention.value) || mention.value < 0) return null;
  const years = mention.unit === 'months' ? Math.floor(mention.value / 12) : Math.floor(mention.value);
  return years <= 50 ? years : null;
}

/**
 * Split a raw tech entry into individual technologies. Entries come either from
 * keyword matches (already one technology) or from a whole "Languages: ..., Tools: ..." reply.
 */
export function segment_tech_entry(entry: string): string[] {
  return entry
    .replace(/\b[\p{L} ]{2,30}:/gu, ',')
    .split(/[,;|\n]|\s\/\s|\band\b|&/i)
    .map(part => part.trim().replace(/^[-•*]\s*/, '').replace(/[.!?]+$/, ''))
    .filter(part => part.length > 0 && part.length <= 40);
}

// Unknown names are kept only when short and free of filler words ("Elixir", "Phoenix LiveView").
function resolve_tech_segment(segment: string): string[] {
  if (is_known_tech(segment)) return [canonical_tech(segment)];
  const matched = match_technologies(segment);
  if (matched.length > 0) return matched;
  const words = segment.split(/\s+/);
  if (words.length > 3 || words.some(w => FILLER_WORDS.has(w.toLowerCase()))) return [];
  return [segment];
}

function union_tech_stack(existing: readonly string[], incoming: readonly string[]): string[] {
  const result = [...existing];
  const seen = new Set(existing.map(t => t.toLowerCase()));
  for (const entry of incoming) {
    for (const tech of segment_tech_entry(entry).flatMap(resolve_tech_segment)) {
      if (result.length >= MAX_TECH_STACK) return result;
      const key = tech.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      result.push(tech);
    }
  }
  return result;
}

/**
 * Merge one extraction into the profile in place. Scalar fields are only filled
 * while empty; tech_stack is an order-preserving, case-insensitive union. Values
 * failing validation are dropped. Returns the fields that changed.
 */
export function merge_extraction(profile: CandidateProfile, extracted: ExtractedFields): FieldName[] {
  const applied: FieldName[] = [];

  const fill_text = (field: 'full_name' | 'desired_position' | 'location', value: string | undefined) => {
    if (!is_field_missing(profile, field)) return;
    const cleaned = clean_text(value);
    if (cleaned === null) return;
    profile[field] = cleaned;
    applied.push(field);
  };

  fill_text('full_name', extracted.full_name);

  if (extracted.email !== undefined && is_field_missing(profile, 'email')) {
    const email = extracted.email.trim();
    if (is_valid_email(email)) {
      profile.email = email;
      applied.push('email');
    }
  }

  if (extracted.phone !== undefined && is_field_missing(profile, 'phone')) {
    const phone = extracted.phone.trim();
    if (is_valid_phone(phone)) {
      profile.phone = phone;
      applied.push('phone');
    }
  }

  if (extracted.experience_years !== undefined && is_field_missing(profile, 'experience_years')) {
    const years = experience_to_years(extracted.experience_years);
    if (years !== null) {
      profile.experience_years = years;
      applied.push('experience_years');
    }
  }

  fill_text('desired_position', extracted.desired_position);
  fill_text('location', extracted.location);

  if (extracted.tech_stack !== undefined) {
    const merged = union_tech_stack(profile.tech_stack, extracted.tech_stack);
    if (merged.length > profile.tech_stack.length) {
      profile.tech_stack = merged;
      applied.push('tech_stack');
    }
  }

  // keep canonical order for acknowledgements
  return FIELD_ORDER.filter(field => applied.includes(field));
}
