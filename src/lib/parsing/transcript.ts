/**
 * Transcript Reader
 *
 * Walks a bracket transcript line by line. Weight headers ("125", "133 lbs",
 * "Heavyweight") switch the current weight class; every other non-blank line
 * goes through the match line parser with that weight class attached.
 */

import { DiagnosticsCollector } from '../diagnostics';
import { createLogger } from '../logger';
import { normalizeName, normalizeWeightClass } from '../roster/names';
import { parseMatchLine } from './match-line';
import type { MatchEvent } from '../../types/wrestling';

const logger = createLogger('transcript-reader');

const WEIGHT_HEADER_PATTERN = /^(?:weight(?:\s+class)?\s*:?\s*)?(\d{2,3}|hwt|heavyweight)\s*(?:lbs?\.?|pounds)?\s*:?$/i;
const WIN_PHRASE_PATTERN = /won (?:by|in) (.*?) over/;

export interface TranscriptOptions {
  /** Known weight classes; a bare number outside the list is not a header */
  weightClasses?: readonly string[];
  /** Names to flag whenever a line mentions them */
  watchList?: readonly string[];
}

/**
 * Recognise a weight header line.
 *
 * @returns The normalised weight class, or null for any other line
 */
export function detectWeightHeader(line: string, weightClasses?: readonly string[]): string | null {
  const m = line.trim().match(WEIGHT_HEADER_PATTERN);
  if (!m) return null;
  const weight = normalizeWeightClass(m[1]);
  if (weightClasses && weightClasses.length > 0 && !weightClasses.includes(weight)) {
    return null;
  }
  return weight;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Parse every match line of a transcript, in order.
 *
 * Events parsed before the first weight header keep a null weight class and
 * are reported once each as "missing-weight-class".
 */
export function parseTranscript(
  text: string,
  diagnostics: DiagnosticsCollector,
  options: TranscriptOptions = {}
): MatchEvent[] {
  const events: MatchEvent[] = [];
  const watchList = (options.watchList ?? []).map((name) => ({ name, key: normalizeName(name) }));
  let currentWeight: string | null = null;

  splitLines(text).forEach((rawLine, index) => {
    const line = rawLine.trim();
    const lineNumber = index + 1;
    if (line === '') return;

    const header = detectWeightHeader(line, options.weightClasses);
    if (header !== null) {
      currentWeight = header;
      logger.debug('Weight class header', { lineNumber, weightClass: header });
      return;
    }

    if (watchList.length > 0) {
      const normalizedLine = normalizeName(line);
      for (const watched of watchList) {
        if (watched.key !== '' && normalizedLine.includes(watched.key)) {
          diagnostics.add('watch-list-match', `Line mentions watched competitor ${watched.name}`, {
            lineNumber,
            rawText: line,
          });
        }
      }
    }

    const event = parseMatchLine(line, { weightClass: currentWeight, lineNumber }, diagnostics);
    if (!event) return;

    if (event.weightClass === null) {
      diagnostics.add('missing-weight-class', 'Match appears before any weight class header', {
        lineNumber,
        rawText: line,
      });
    }
    events.push(event);
  });

  logger.debug('Transcript parsed', { events: events.length });
  return events;
}

/**
 * Distinct win phrases in a transcript, sorted. Used to audit phrasing the
 * classifier may not know about.
 */
export function collectWinPhrases(text: string): string[] {
  const phrases = new Set<string>();
  for (const line of splitLines(text)) {
    const m = line.match(WIN_PHRASE_PATTERN);
    if (m) {
      const phrase = m[1].trim();
      if (phrase !== '') phrases.add(phrase);
    }
  }
  return [...phrases].sort();
}

/** Lines mentioning a competitor, for manual lookups */
export function findLinesMentioning(text: string, name: string): string[] {
  const key = normalizeName(name);
  if (key === '') return [];
  return splitLines(text)
    .map((line) => line.trim())
    .filter((line) => line !== '' && normalizeName(line).includes(key));
}
