import { HEAVYWEIGHT, NAME_SUFFIXES } from '../constants';

/**
 * Name and weight normalisation shared by roster indexing and transcript lookups.
 */

const SUFFIXES = new Set<string>(NAME_SUFFIXES);

/**
 * Lookup key for a competitor name.
 *
 * "José O'Neil Jr." and "jose oneil" produce the same key: accents are
 * stripped, apostrophes and periods removed, other punctuation becomes a
 * space, and a trailing generational suffix is dropped.
 */
export function normalizeName(name: string): string {
  const tokens = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/['’`.]/g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(' ')
    .filter((token) => token !== '');

  while (tokens.length > 1 && SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens.join(' ');
}

/**
 * Looser key (first initial + last name) used to spot near-duplicate roster
 * rows such as "Mike Jones" and "Michael Jones".
 */
export function looseNameKey(name: string): string {
  const tokens = normalizeName(name).split(' ').filter((token) => token !== '');
  if (tokens.length === 0) return '';
  if (tokens.length === 1) return tokens[0];
  return `${tokens[0][0]} ${tokens[tokens.length - 1]}`;
}

/**
 * Canonical weight class: "125 lbs" -> "125", "HWT" -> "285".
 * Anything without digits is returned trimmed as written.
 */
export function normalizeWeightClass(weight: string | number): string {
  const text = String(weight).trim();
  if (/^(hwt|heavyweight|hvy)\.?$/i.test(text)) return HEAVYWEIGHT;
  const digits = text.match(/\d+/);
  return digits ? String(parseInt(digits[0], 10)) : text;
}
