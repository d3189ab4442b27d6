// Tournament Bracket Type Definitions
// Shared by the transcript parser, the roster resolver, the bracket tracker and the scorer

/** Which bracket a match belongs to */
export type BracketKind = 'Championship' | 'Consolation' | 'Placement';

/** Win method categories, each worth a fixed number of bonus points */
export type WinType =
  | 'Decision'
  | 'MajorDecision'
  | 'TechFall'
  | 'Fall'
  | 'DefaultOrDQ'
  | 'SuddenVictory'
  | 'TieBreaker'
  | 'Other';

/** Final placement in a weight class (top eight place) */
export type Placement = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

/** Ordinal label used by placement-match lines */
export type PlacementOrdinal = '1st' | '2nd' | '3rd' | '4th' | '5th' | '6th' | '7th' | '8th';

/** Which grammar produced an event */
export type GrammarName = 'primary' | 'fallback' | 'placement';

/** Fields common to every parsed match line */
interface MatchEventBase {
  /** Column label in the round grid ("Champ R1", "Cons R3", "1st Place Match") */
  readonly roundLabel: string;
  /** Weight class from the most recent header, or null before any header */
  readonly weightClass: string | null;
  readonly winnerName: string;
  readonly winnerSchool: string;
  readonly winnerSeed: number | null;
  readonly loserName: string;
  readonly loserSchool: string;
  readonly loserSeed: number | null;
  readonly winType: WinType;
  /** Phrase between "won by|in" and "over", as written */
  readonly winPhrase: string;
  readonly advancementPoints: number;
  readonly bonusPoints: number;
  readonly totalPoints: number;
  readonly grammar: GrammarName;
  /** 1-based line number in the transcript, 0 when parsed outside a transcript */
  readonly lineNumber: number;
  readonly rawText: string;
}

/** Championship or consolation bracket match */
export interface RegularMatchEvent extends MatchEventBase {
  readonly bracket: 'Championship' | 'Consolation';
  readonly roundNumber: number;
}

/** Terminal match deciding a pair of final placements */
export interface PlacementMatchEvent extends MatchEventBase {
  readonly bracket: 'Placement';
  readonly placementMatch: PlacementOrdinal;
  /** Null when the ordinal does not name a winner/loser pair (2nd, 4th, ...) */
  readonly winnerPlacement: Placement | null;
  readonly loserPlacement: Placement | null;
}

export type MatchEvent = RegularMatchEvent | PlacementMatchEvent;

/** One drafted competitor */
export interface RosterEntry {
  owner: string;
  wrestlerName: string;
  /** Normalised weight class ("125", "285") */
  weightClass: string;
  seed: number | null;
  school: string | null;
}

/** Owner name to the competitors that owner drafted, in roster order */
export type Roster = ReadonlyMap<string, readonly RosterEntry[]>;

/** Outcome of attributing a transcript competitor to the roster */
export type Resolution =
  | { kind: 'resolved'; entry: RosterEntry; via: 'name' | 'seed' | 'owner' }
  | { kind: 'ambiguous'; candidates: RosterEntry[] }
  | { kind: 'unmatched'; reason: 'not-on-roster' | 'weight-mismatch' };

/** One side of a match after resolution */
export interface ResolvedCompetitor {
  name: string;
  school: string;
  seed: number | null;
  resolution: Resolution;
}

export interface ResolvedMatchEvent {
  event: MatchEvent;
  winner: ResolvedCompetitor;
  loser: ResolvedCompetitor;
}

/** A single row of a competitor's match history */
export interface MatchHistoryEntry {
  roundLabel: string;
  bracket: BracketKind;
  result: 'W' | 'L';
  opponent: string;
  opponentSchool: string;
  winType: WinType;
  winPhrase: string;
  /** Points this competitor earned from the match (zero for the loser) */
  advancementPoints: number;
  bonusPoints: number;
  totalPoints: number;
}

export type ResolutionStatus = Resolution['kind'];

/** Accumulated results for one competitor identity (weight + name, plus owner once attributed) */
export interface CompetitorRecord {
  key: string;
  name: string;
  school: string;
  weightClass: string;
  seed: number | null;
  owner: string | null;
  status: ResolutionStatus;
  /** Owners a name collided across when status is "ambiguous" */
  candidateOwners: string[];
  matches: MatchHistoryEntry[];
  champWins: number;
  consWins: number;
  champAdvancement: number;
  champBonus: number;
  consAdvancement: number;
  consBonus: number;
  /** Bonus points earned in placement matches */
  placementPoints: number;
  advancementPoints: number;
  bonusPoints: number;
  totalPoints: number;
  placement: Placement | null;
  /** Round label to outcome code ("W Fall", "L Dec") */
  rounds: Record<string, string>;
}

export interface RoundGridRow {
  key: string;
  name: string;
  weightClass: string;
  owner: string | null;
  seed: number | null;
  cells: Record<string, string>;
}

export interface RoundGrid {
  /** Round labels in bracket order */
  columns: string[];
  rows: RoundGridRow[];
}

export interface PlacementRow {
  weightClass: string;
  placement: Placement;
  name: string;
  school: string;
  owner: string | null;
  seed: number | null;
  placementPoints: number;
}

export interface TeamSummary {
  owner: string;
  totalPoints: number;
  totalAdvancement: number;
  totalBonus: number;
  totalPlacementPoints: number;
  /** Owned competitors with a total above zero */
  scoringCompetitors: number;
  /** Owned competitors that appeared in the transcript */
  competitorsSeen: number;
  /** Owned competitors with a final placement */
  placers: number;
}
