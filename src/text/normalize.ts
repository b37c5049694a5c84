/** Upper bound on how much of a message any matcher ever looks at */
export const MAX_NORMALIZED_LENGTH = 4000;

const TOKEN_RE = /[\p{L}\p{N}]+/gu;

/**
 * Canonical form every matcher runs against:
 * NFC, lower-cased, whitespace collapsed, trimmed and bounded.
 */
export function normalize(text: string): string {
  return text
    .normalize('NFC')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_NORMALIZED_LENGTH);
}

export function tokenize(text: string): string[] {
  return normalize(text).match(TOKEN_RE) ?? [];
}

/**
 * Token text padded with single spaces, so phrase lookups can anchor on
 * word boundaries with plain `includes`. Works for å/ä/ö where `\b` does not.
 */
export interface TokenText {
  tokens: string[];
  padded: string;
}

export function toTokenText(text: string): TokenText {
  const tokens = tokenize(text);
  return { tokens, padded: ` ${tokens.join(' ')} ` };
}

/**
 * A lexicon term. `vattenläck*` matches any word starting with the stem,
 * `fungerar inte` matches that exact word sequence.
 */
export interface CompiledTerm {
  source: string;
  needle: string;
  prefix: boolean;
  weight: number;
}

export function compileTerm(source: string, weight = 1): CompiledTerm {
  const prefix = source.trim().endsWith('*');
  const body = prefix ? source.trim().slice(0, -1) : source;
  const joined = tokenize(body).join(' ');
  return {
    source,
    needle: prefix ? ` ${joined}` : ` ${joined} `,
    prefix,
    weight,
  };
}

export function termMatches(term: CompiledTerm, text: TokenText): boolean {
  if (term.needle.trim() === '') return false;
  return text.padded.includes(term.needle);
}

/** Indexes of tokens a single-word term matches */
export function termPositions(term: CompiledTerm, text: TokenText): number[] {
  const word = term.needle.trim();
  if (word === '' || word.includes(' ')) return [];
  const positions: number[] = [];
  text.tokens.forEach((token, i) => {
    if (term.prefix ? token.startsWith(word) : token === word) positions.push(i);
  });
  return positions;
}
