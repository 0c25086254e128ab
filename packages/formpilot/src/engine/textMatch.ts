/**
 * Text scoring shared by the FieldMatcher (attribute ↔ field caption) and the
 * ValueCoercer (value ↔ option text).
 */

import type { AttributePath } from '../profile/attributes';

// ── Normalization ───────────────────────────────────────────────────────

/**
 * Lowercase, split camelCase, turn punctuation into spaces, collapse runs.
 * `contactEmail`, `contact_email` and `Contact e-mail:` all tokenize alike
 * except for the e-mail hyphen, which yields "e mail".
 */
export function normalizeText(input: string): string {
  return input
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function tokenize(input: string): string[] {
  const norm = normalizeText(input);
  return norm ? norm.split(' ') : [];
}

/** Words that never decide which attribute a caption belongs to. */
const STOP_WORDS = new Set(['a', 'an', 'the', 'of', 'your', 'you', 'my', 'and', 'or', 'in', 'at', 'for', 'to', 'please', 'enter']);

// ── Edit distance ───────────────────────────────────────────────────────

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}

/** 1 - lev/maxLen over normalized strings; 1.0 for identical input. */
export function similarity(a: string, b: string): number {
  const na = normalizeText(a);
  const nb = normalizeText(b);
  const maxLen = Math.max(na.length, nb.length);
  if (maxLen === 0) return 1;
  return 1 - levenshtein(na, nb) / maxLen;
}

// ── Token sequence helpers ──────────────────────────────────────────────

export function containsSequence(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  outer: for (let i = 0; i <= haystack.length - needle.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return true;
  }
  return false;
}

function containsAll(haystack: string[], needle: string[]): boolean {
  const set = new Set(haystack);
  return needle.length > 0 && needle.every((t) => set.has(t));
}

// ── Alias scoring ───────────────────────────────────────────────────────

export const NAME_EXACT_SCORE = 1.0;
export const NAME_CONTAINS_SCORE = 0.9;
export const LABEL_EXACT_SCORE = 0.95;
export const LABEL_CONTAINS_SCORE = 0.85;
export const LABEL_ALL_TOKENS_SCORE = 0.8;
export const LABEL_FUZZY_SCALE = 0.8;

interface NormalizedAlias {
  text: string;
  compact: string;
  tokens: string[];
}

/**
 * Scores captions and attribute names against one alias table.
 *
 * A caption that carries a token belonging only to another attribute's
 * aliases ("Company Name" for fullName, "Email Address" for address) is not
 * a match for this attribute, however much of it overlaps.
 */
export class AliasScorer {
  private readonly aliases = new Map<AttributePath, NormalizedAlias[]>();
  private readonly ownTokens = new Map<AttributePath, Set<string>>();
  private readonly allTokens = new Map<string, Set<AttributePath>>();

  constructor(table: ReadonlyMap<AttributePath, string[]>) {
    for (const [path, list] of table) {
      const normalized = list
        .map((alias) => {
          const tokens = tokenize(alias);
          return { text: tokens.join(' '), compact: tokens.join(''), tokens };
        })
        .filter((a) => a.tokens.length > 0);
      this.aliases.set(path, normalized);

      const own = new Set<string>();
      for (const alias of normalized) {
        for (const token of alias.tokens) {
          own.add(token);
          const owners = this.allTokens.get(token) ?? new Set<AttributePath>();
          owners.add(path);
          this.allTokens.set(token, owners);
        }
      }
      this.ownTokens.set(path, own);
    }
  }

  /** True when any token of `text` appears anywhere in the alias table. */
  sharesAliasToken(text: string): boolean {
    return tokenize(text).some((t) => !STOP_WORDS.has(t) && this.allTokens.has(t));
  }

  /**
   * Exact-token strategy over a raw `name`/`id` attribute.
   * 1.0 on a whole match (with or without separators), 0.9 when an alias
   * appears as a contiguous token run inside the name.
   */
  scoreName(path: AttributePath, raw: string): number | null {
    const tokens = tokenize(raw);
    if (tokens.length === 0) return null;
    const text = tokens.join(' ');
    const compact = tokens.join('');

    let best: number | null = null;
    for (const alias of this.aliases.get(path) ?? []) {
      if (alias.text === text || alias.compact === compact) return NAME_EXACT_SCORE;
      if (containsSequence(tokens, alias.tokens) && !this.hasForeignToken(path, tokens, alias)) {
        best = NAME_CONTAINS_SCORE;
      }
    }
    return best;
  }

  /**
   * Caption strategy (label or placeholder).
   * Exact 0.95; contiguous alias run 0.85; every alias token present 0.8;
   * otherwise edit-distance similarity scaled by 0.8, kept only at or above
   * `floor` and only when the caption shares a token with the alias.
   */
  scoreCaption(path: AttributePath, raw: string, floor: number): number | null {
    const tokens = tokenize(raw);
    if (tokens.length === 0) return null;
    const text = tokens.join(' ');

    let best: number | null = null;
    const keep = (score: number) => {
      if (best === null || score > best) best = score;
    };

    for (const alias of this.aliases.get(path) ?? []) {
      if (alias.text === text) return LABEL_EXACT_SCORE;
      if (this.hasForeignToken(path, tokens, alias)) continue;

      if (containsSequence(tokens, alias.tokens)) {
        keep(LABEL_CONTAINS_SCORE);
        continue;
      }
      if (containsAll(tokens, alias.tokens)) {
        keep(LABEL_ALL_TOKENS_SCORE);
        continue;
      }
      const shared = alias.tokens.some((t) => !STOP_WORDS.has(t) && tokens.includes(t));
      if (!shared) continue;
      const fuzzy = LABEL_FUZZY_SCALE * similarity(text, alias.text);
      if (fuzzy >= floor) keep(fuzzy);
    }
    return best;
  }

  private hasForeignToken(path: AttributePath, tokens: string[], alias: NormalizedAlias): boolean {
    const own = this.ownTokens.get(path);
    return tokens.some((t) => {
      if (STOP_WORDS.has(t) || alias.tokens.includes(t) || own?.has(t)) return false;
      return this.allTokens.has(t);
    });
  }
}

// ── Option scoring ──────────────────────────────────────────────────────

export const OPTION_EXACT_SCORE = 1.0;
export const OPTION_LEVEL_SCORE = 0.9;
export const OPTION_CONTAINS_SCORE = 0.85;
/** Below this length, edit distance alone does not make two options alike. */
const FUZZY_OPTION_MIN_LENGTH = 6;

/**
 * normalizeText that keeps `+` and `#` as words, so "C", "C++" and "C#"
 * stay three different options.
 */
export function normalizeOptionText(input: string): string {
  return normalizeText(input.replace(/\+/g, ' plus ').replace(/#/g, ' sharp '));
}

/**
 * Canonical level of a degree phrase ("Bachelor of Science", "BS",
 * "Bachelor's" → "bachelor"), or null. Levels are checked in table order so
 * the most specific entries should come first.
 */
export function degreeLevel(text: string, levels: Record<string, string[]>): string | null {
  const tokens = tokenize(text);
  for (const [level, aliases] of Object.entries(levels)) {
    for (const alias of aliases) {
      if (containsSequence(tokens, tokenize(alias))) return level;
    }
  }
  return null;
}

/**
 * How well a profile value fits one option's text (and raw value).
 * Pass `degreeLevels` to let equivalent degree spellings score as a match.
 */
export function scoreOption(
  value: string,
  option: { value: string; displayText: string },
  degreeLevels?: Record<string, string[]>,
): number {
  const nv = normalizeOptionText(value);
  const nd = normalizeOptionText(option.displayText);
  const nval = normalizeOptionText(option.value);
  if (!nv) return 0;
  if (nv === nd || nv === nval) return OPTION_EXACT_SCORE;

  let best = 0;

  if (degreeLevels) {
    const level = degreeLevel(nv, degreeLevels);
    if (level && (level === degreeLevel(nd, degreeLevels) || level === degreeLevel(nval, degreeLevels))) {
      best = OPTION_LEVEL_SCORE;
    }
  }

  const vt = tokenize(nv);
  const dt = tokenize(nd);
  const shorter = vt.length <= dt.length ? vt : dt;
  const longer = vt.length <= dt.length ? dt : vt;
  if (shorter.join('').length >= 3 && containsSequence(longer, shorter)) {
    best = Math.max(best, OPTION_CONTAINS_SCORE);
  }

  const dtSet = new Set(dt);
  const overlap = vt.filter((t) => dtSet.has(t)).length;
  const union = new Set([...vt, ...dt]).size;
  if (union > 0) best = Math.max(best, overlap / union);

  if (overlap === 0 && Math.min(nv.length, nd.length) < FUZZY_OPTION_MIN_LENGTH) return best;
  return Math.max(best, similarity(nv, nd));
}
