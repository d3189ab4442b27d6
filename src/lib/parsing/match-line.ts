/**
 * Match Line Parser
 *
 * Turns one line of a bracket transcript into a MatchEvent. Two line shapes
 * are understood:
 *
 *   Champ. Round 2 - John Smith (Iowa) 20-1 won by fall over Mike Jones (Ohio State) 15-9 (Fall 2:10)
 *   3rd Place Match - John Smith (Iowa) won by major decision over Mike Jones (Ohio State) (MD 12-3)
 *
 * Grammars are an ordered list of matchers. Each returns a captured shape or
 * null, and the parser takes the first one that matches. The permissive
 * fallback grammar only runs for bracket rounds; it drops the win phrase and
 * assumes a decision. Placement lines have a single grammar.
 *
 * A line that no grammar accepts yields null plus an "unparsed-line"
 * diagnostic. Parsing never throws.
 */

import {
  CHAMPIONSHIP_ADVANCEMENT,
  CONSOLATION_ADVANCEMENT,
  FALLBACK_WIN_PHRASE,
  PLACEMENT_ADVANCEMENT,
  PLACEMENT_PAIRS,
} from '../constants';
import { DiagnosticsCollector } from '../diagnostics';
import { createLogger } from '../logger';
import { classifyWinType, isOvertimeWin, overtimeOverride, type WinTypeResult } from './win-type';
import type {
  GrammarName,
  MatchEvent,
  PlacementMatchEvent,
  PlacementOrdinal,
  RegularMatchEvent,
} from '../../types/wrestling';

const logger = createLogger('match-line-parser');

const PLACEMENT_DETECT = /(1st|2nd|3rd|4th|5th|6th|7th|8th) Place Match/;

const PLACEMENT_PATTERN =
  /(1st|2nd|3rd|4th|5th|6th|7th|8th) Place Match - (.*?) \((.*?)\)(.*?)won (?:by|in) (.*?) over (.*?) \((.*?)\)(.*)/;

const PRIMARY_PATTERN =
  /(Champ|Cons)\. Round (\d+) - (.*?) \((.*?)\)(.*?)won (?:by|in) (.*?) over (.*?) \((.*?)\)(.*)/;

const FALLBACK_PATTERN =
  /(Champ|Cons)\. Round (\d+) - (.*?) \((.*?)\)(.*?)won\b.*? over (.*?) \((.*?)\)(.*)/;

// "#4" or "(#4)" beside a record
const SEED_PATTERN = /#(\d+)/;
// A seed written ahead of the name: "#4 John Smith" or "(#4) John Smith"
const LEADING_SEED_PATTERN = /^\(?#(\d+)\)?\s+(.+)$/;

/** Where a line sits in the transcript */
export interface LineContext {
  weightClass: string | null;
  lineNumber?: number;
}

/** Fields every grammar captures */
interface CapturedSides {
  winnerField: string;
  winnerSchool: string;
  winnerTrail: string;
  loserField: string;
  loserSchool: string;
  loserTrail: string;
  /** Null when the grammar does not capture a phrase */
  winPhrase: string | null;
}

interface CapturedRound extends CapturedSides {
  bracket: 'Championship' | 'Consolation';
  roundNumber: number;
}

interface CapturedPlacement extends CapturedSides {
  placementMatch: PlacementOrdinal;
}

interface GrammarMatcher<T> {
  name: GrammarName;
  match: (line: string) => T | null;
}

const roundMatcher = (name: GrammarName, pattern: RegExp, hasPhrase: boolean): GrammarMatcher<CapturedRound> => ({
  name,
  match: (line) => {
    const m = line.match(pattern);
    if (!m) return null;
    // The fallback grammar has no phrase group, so loser groups shift down by one
    const loserIndex = hasPhrase ? 7 : 6;
    return {
      bracket: m[1] === 'Champ' ? 'Championship' : 'Consolation',
      roundNumber: parseInt(m[2], 10),
      winnerField: m[3],
      winnerSchool: m[4],
      winnerTrail: m[5],
      winPhrase: hasPhrase ? m[6] : null,
      loserField: m[loserIndex],
      loserSchool: m[loserIndex + 1],
      loserTrail: m[loserIndex + 2],
    };
  },
});

const isPlacementOrdinal = (value: string): value is PlacementOrdinal =>
  /^[1-8](st|nd|rd|th)$/.test(value);

const placementMatcher: GrammarMatcher<CapturedPlacement> = {
  name: 'placement',
  match: (line) => {
    const m = line.match(PLACEMENT_PATTERN);
    if (!m || !isPlacementOrdinal(m[1])) return null;
    return {
      placementMatch: m[1],
      winnerField: m[2],
      winnerSchool: m[3],
      winnerTrail: m[4],
      winPhrase: m[5],
      loserField: m[6],
      loserSchool: m[7],
      loserTrail: m[8],
    };
  },
};

/** Bracket-round grammars, tried in order */
export const ROUND_GRAMMARS: readonly GrammarMatcher<CapturedRound>[] = [
  roundMatcher('primary', PRIMARY_PATTERN, true),
  roundMatcher('fallback', FALLBACK_PATTERN, false),
];

function firstMatch<T>(grammars: readonly GrammarMatcher<T>[], line: string): { grammar: GrammarName; captured: T } | null {
  for (const grammar of grammars) {
    const captured = grammar.match(line);
    if (captured) return { grammar: grammar.name, captured };
  }
  return null;
}

/**
 * Split an optional leading seed off a captured name field.
 */
export function splitSeedFromName(field: string): { name: string; seed: number | null } {
  const trimmed = field.trim();
  const leading = trimmed.match(LEADING_SEED_PATTERN);
  if (leading) {
    return { name: leading[2].trim(), seed: parseInt(leading[1], 10) };
  }
  return { name: trimmed, seed: null };
}

/** Seed annotation in the text that follows a competitor's school, if any */
export function extractSeed(trail: string): number | null {
  const m = trail.match(SEED_PATTERN);
  return m ? parseInt(m[1], 10) : null;
}

export function isPlacementLine(line: string): boolean {
  return PLACEMENT_DETECT.test(line);
}

function sides(captured: CapturedSides) {
  const winner = splitSeedFromName(captured.winnerField);
  const loser = splitSeedFromName(captured.loserField);
  return {
    winnerName: winner.name,
    winnerSchool: captured.winnerSchool.trim(),
    winnerSeed: winner.seed ?? extractSeed(captured.winnerTrail),
    loserName: loser.name,
    loserSchool: captured.loserSchool.trim(),
    loserSeed: loser.seed ?? extractSeed(captured.loserTrail),
  };
}

function scoreWin(winPhrase: string, line: string): WinTypeResult {
  return overtimeOverride(line) ?? classifyWinType(winPhrase, line);
}

function noteOvertime(event: MatchEvent, diagnostics: DiagnosticsCollector): void {
  if (!isOvertimeWin(event.winType)) return;
  const kind = event.winType === 'SuddenVictory' ? 'sudden-victory' : 'tie-breaker';
  diagnostics.add(kind, `${event.winType} result in ${event.roundLabel}`, {
    lineNumber: event.lineNumber,
    rawText: event.rawText,
    details: { winPhrase: event.winPhrase, weightClass: event.weightClass },
  });
}

function parsePlacementLine(
  line: string,
  context: LineContext,
  diagnostics: DiagnosticsCollector
): PlacementMatchEvent | null {
  const lineNumber = context.lineNumber ?? 0;
  const found = placementMatcher.match(line);
  if (!found) {
    logger.debug('Failed to parse placement match', { lineNumber, line });
    diagnostics.add('unparsed-line', 'Placement match line did not fit the placement grammar', {
      lineNumber,
      rawText: line,
    });
    return null;
  }

  const winPhrase = found.winPhrase ?? FALLBACK_WIN_PHRASE;
  const { winType, bonusPoints } = scoreWin(winPhrase, line);
  const pair = PLACEMENT_PAIRS[found.placementMatch];

  if (!pair) {
    diagnostics.add(
      'unknown-placement',
      `${found.placementMatch} Place Match does not name a winner/loser placement pair`,
      { lineNumber, rawText: line, details: { placementMatch: found.placementMatch } }
    );
  }

  const event: PlacementMatchEvent = Object.freeze({
    bracket: 'Placement' as const,
    placementMatch: found.placementMatch,
    roundLabel: `${found.placementMatch} Place Match`,
    weightClass: context.weightClass,
    ...sides(found),
    winnerPlacement: pair ? pair[0] : null,
    loserPlacement: pair ? pair[1] : null,
    winType,
    winPhrase: winPhrase.trim(),
    advancementPoints: PLACEMENT_ADVANCEMENT,
    bonusPoints,
    totalPoints: PLACEMENT_ADVANCEMENT + bonusPoints,
    grammar: 'placement' as const,
    lineNumber,
    rawText: line,
  });

  noteOvertime(event, diagnostics);
  return event;
}

function parseRoundLine(
  line: string,
  context: LineContext,
  diagnostics: DiagnosticsCollector
): RegularMatchEvent | null {
  const lineNumber = context.lineNumber ?? 0;
  const found = firstMatch(ROUND_GRAMMARS, line);
  if (!found) {
    logger.debug('Failed to parse with all patterns', { lineNumber, line });
    diagnostics.add('unparsed-line', 'Line matched no match grammar', { lineNumber, rawText: line });
    return null;
  }

  const { grammar, captured } = found;
  if (grammar === 'fallback') {
    logger.debug('Parsed with fallback pattern', { lineNumber, line });
    diagnostics.add('fallback-pattern', 'Parsed with the fallback grammar; win type assumed from the line', {
      lineNumber,
      rawText: line,
    });
  }

  const winPhrase = (captured.winPhrase ?? FALLBACK_WIN_PHRASE).trim();
  const { winType, bonusPoints } = scoreWin(winPhrase, line);
  const advancementPoints =
    captured.bracket === 'Championship' ? CHAMPIONSHIP_ADVANCEMENT : CONSOLATION_ADVANCEMENT;
  const prefix = captured.bracket === 'Championship' ? 'Champ' : 'Cons';

  const event: RegularMatchEvent = Object.freeze({
    bracket: captured.bracket,
    roundNumber: captured.roundNumber,
    roundLabel: `${prefix} R${captured.roundNumber}`,
    weightClass: context.weightClass,
    ...sides(captured),
    winType,
    winPhrase,
    advancementPoints,
    bonusPoints,
    totalPoints: advancementPoints + bonusPoints,
    grammar,
    lineNumber,
    rawText: line,
  });

  noteOvertime(event, diagnostics);
  return event;
}

/**
 * Parse a single transcript line.
 *
 * @param line - One line of transcript text
 * @param context - Current weight class and line number
 * @param diagnostics - Receives parse failures and audit notes
 * @returns The parsed event, or null when no grammar accepts the line
 */
export function parseMatchLine(
  line: string,
  context: LineContext,
  diagnostics: DiagnosticsCollector
): MatchEvent | null {
  const text = line.trim();
  if (isPlacementLine(text)) {
    return parsePlacementLine(text, context, diagnostics);
  }
  return parseRoundLine(text, context, diagnostics);
}
