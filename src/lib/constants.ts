import type { Placement, PlacementOrdinal, WinType } from '../types/wrestling';

// Standard collegiate weight classes, lightest first
export const WEIGHT_CLASSES = [
  '125', '133', '141', '149', '157',
  '165', '174', '184', '197', '285',
] as const;

// Heavyweight is written several ways in transcripts and rosters
export const HEAVYWEIGHT = '285';

// Group used for events seen before any weight header
export const UNASSIGNED_WEIGHT = 'Unassigned';

/**
 * Scoring constants
 */

// Advancement points per bracket win
export const CHAMPIONSHIP_ADVANCEMENT = 1.0;
export const CONSOLATION_ADVANCEMENT = 0.5;
export const PLACEMENT_ADVANCEMENT = 0;

// Bonus points per win method
export const BONUS_POINTS: Record<WinType, number> = {
  TechFall: 1.5,
  MajorDecision: 1.0,
  Fall: 2.0,
  DefaultOrDQ: 2.0,
  SuddenVictory: 0,
  TieBreaker: 0,
  Decision: 0,
  Other: 0,
};

// Short codes shown in round grid cells
export const WIN_TYPE_CODES: Record<WinType, string> = {
  Decision: 'Dec',
  MajorDecision: 'MD',
  TechFall: 'TF',
  Fall: 'Fall',
  DefaultOrDQ: 'Def/DQ',
  SuddenVictory: 'SV',
  TieBreaker: 'TB',
  Other: 'Other',
};

export const PLACEMENT_ORDINALS: readonly PlacementOrdinal[] = [
  '1st', '2nd', '3rd', '4th', '5th', '6th', '7th', '8th',
];

// Only odd ordinals name a winner/loser pair; the rest leave both placements unknown
export const PLACEMENT_PAIRS: Partial<Record<PlacementOrdinal, readonly [Placement, Placement]>> = {
  '1st': [1, 2],
  '3rd': [3, 4],
  '5th': [5, 6],
  '7th': [7, 8],
};

// Markers that identify overtime results even when the phrase says otherwise
export const SUDDEN_VICTORY_MARKERS = ['(SV-1', 'SV-2'] as const;
export const TIE_BREAKER_MARKERS = ['(TB-1', 'TB-2'] as const;
export const SUDDEN_VICTORY_OVERRIDE = '(SV-1';
export const TIE_BREAKER_OVERRIDE = '(TB-1';

// Win type assumed when the fallback grammar cannot capture a phrase
export const FALLBACK_WIN_PHRASE = 'decision';

// Generational suffixes dropped during name normalisation
export const NAME_SUFFIXES = ['jr', 'sr', 'ii', 'iii', 'iv'] as const;
