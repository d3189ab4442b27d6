/**
 * Win Type Classification
 *
 * Maps the free-text win description of a match ("won by tech fall",
 * "won in sudden victory - 1") to one of the fixed win categories and the
 * bonus points that category is worth.
 *
 * Rules are checked in priority order and the first match wins. "tech fall"
 * is tested before "fall" so a technical fall is never scored as a pin.
 * When the phrase names no known method, the full line is scanned for the
 * overtime markers the results service prints in the score summary.
 */

import {
  BONUS_POINTS,
  SUDDEN_VICTORY_MARKERS,
  SUDDEN_VICTORY_OVERRIDE,
  TIE_BREAKER_MARKERS,
  TIE_BREAKER_OVERRIDE,
} from '../constants';
import type { WinType } from '../../types/wrestling';

export interface WinTypeResult {
  winType: WinType;
  bonusPoints: number;
}

interface WinTypeRule {
  winType: WinType;
  test: (phrase: string) => boolean;
}

const includesAny = (text: string, needles: readonly string[]) =>
  needles.some((needle) => text.includes(needle));

const WIN_TYPE_RULES: readonly WinTypeRule[] = [
  { winType: 'TechFall', test: (p) => p.includes('tech fall') },
  { winType: 'MajorDecision', test: (p) => p.includes('major decision') },
  { winType: 'Fall', test: (p) => includesAny(p, ['fall', 'pin']) },
  {
    winType: 'DefaultOrDQ',
    test: (p) => includesAny(p, ['default', 'forfeit', 'disqualification', 'misconduct']),
  },
  { winType: 'SuddenVictory', test: (p) => p.startsWith('sudden victory') || p.includes('sudden victory') },
  { winType: 'TieBreaker', test: (p) => p.startsWith('tie breaker') || p.includes('tie breaker') },
  { winType: 'Decision', test: (p) => p.includes('decision') },
];

const result = (winType: WinType): WinTypeResult => ({
  winType,
  bonusPoints: BONUS_POINTS[winType],
});

/**
 * Classify a win phrase.
 *
 * @param winPhrase - Text between "won by|in" and "over"
 * @param matchText - The whole transcript line, scanned only when the phrase is unrecognised
 */
export function classifyWinType(winPhrase: string, matchText: string): WinTypeResult {
  const phrase = winPhrase.trim().toLowerCase();

  for (const rule of WIN_TYPE_RULES) {
    if (rule.test(phrase)) {
      return result(rule.winType);
    }
  }

  const line = matchText.toLowerCase();
  if (line.includes('sudden victory') || includesAny(matchText, SUDDEN_VICTORY_MARKERS)) {
    return result('SuddenVictory');
  }
  if (line.includes('tie breaker') || includesAny(matchText, TIE_BREAKER_MARKERS)) {
    return result('TieBreaker');
  }
  return result('Other');
}

/**
 * Explicit overtime override. A literal "(SV-1" or "(TB-1" in the line
 * decides the win type no matter what the phrase says, because the phrase
 * alone has been seen to read "decision" for these results.
 *
 * @returns The forced result, or null when the line carries neither marker
 */
export function overtimeOverride(matchText: string): WinTypeResult | null {
  if (matchText.includes(SUDDEN_VICTORY_OVERRIDE)) return result('SuddenVictory');
  if (matchText.includes(TIE_BREAKER_OVERRIDE)) return result('TieBreaker');
  return null;
}

/** Overtime results are flagged for manual audit */
export function isOvertimeWin(winType: WinType): winType is 'SuddenVictory' | 'TieBreaker' {
  return winType === 'SuddenVictory' || winType === 'TieBreaker';
}
