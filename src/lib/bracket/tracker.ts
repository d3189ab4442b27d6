/**
 * Bracket Tracker
 *
 * Replays resolved match events through the championship and consolation
 * brackets of each weight class and accumulates one CompetitorRecord per
 * competitor identity: weight class + normalised name, plus the owner for
 * competitors attributed to a roster entry.
 *
 * Per weight class the tracker keeps:
 * - the highest championship round seen
 * - the highest consolation round seen
 * - the placement matches decided so far
 * - the competitor records
 *
 * Scoring per event:
 * - Championship/consolation win: the winner gets the event's advancement
 *   and bonus points and one win in that bracket. The loser gets nothing.
 * - Placement match: both sides get their final placement; the winner gets
 *   the bonus points only (placement events carry no advancement).
 *
 * Weight classes never share state, so each one runs against its own
 * diagnostics collector and the results are merged in weight-class order.
 * Within a weight class events must arrive in transcript order.
 */

import { PLACEMENT_ORDINALS, UNASSIGNED_WEIGHT, WIN_TYPE_CODES } from '../constants';
import { DiagnosticsCollector } from '../diagnostics';
import { createLogger } from '../logger';
import { normalizeName } from '../roster/names';
import type {
  CompetitorRecord,
  MatchEvent,
  Placement,
  PlacementMatchEvent,
  PlacementRow,
  RegularMatchEvent,
  ResolvedCompetitor,
  ResolvedMatchEvent,
  RoundGrid,
} from '../../types/wrestling';

const logger = createLogger('bracket-tracker');

export interface TrackerResult {
  competitors: CompetitorRecord[];
  grid: RoundGrid;
  placements: PlacementRow[];
}

/**
 * Record key. Competitors attributed to an owner are keyed by that owner's
 * roster entry, so two owners' same-named entries never share a record.
 */
export function competitorKey(weightClass: string, name: string, owner: string | null = null): string {
  const key = `${weightClass}|${normalizeName(name)}`;
  return owner === null ? key : `${key}|${owner}`;
}

/** Name, seed and school a record should carry, preferring the roster's values */
function identity(competitor: ResolvedCompetitor) {
  const { resolution } = competitor;
  if (resolution.kind === 'resolved') {
    return {
      name: resolution.entry.wrestlerName,
      seed: resolution.entry.seed ?? competitor.seed,
      owner: resolution.entry.owner,
    };
  }
  return { name: competitor.name, seed: competitor.seed, owner: null };
}

function candidateOwners(competitor: ResolvedCompetitor): string[] {
  if (competitor.resolution.kind !== 'ambiguous') return [];
  return [...new Set(competitor.resolution.candidates.map((entry) => entry.owner))];
}

function newRecord(key: string, weightClass: string, competitor: ResolvedCompetitor): CompetitorRecord {
  const { name, seed, owner } = identity(competitor);
  return {
    key,
    name,
    school: competitor.school,
    weightClass,
    seed,
    owner,
    status: competitor.resolution.kind,
    candidateOwners: candidateOwners(competitor),
    matches: [],
    champWins: 0,
    consWins: 0,
    champAdvancement: 0,
    champBonus: 0,
    consAdvancement: 0,
    consBonus: 0,
    placementPoints: 0,
    advancementPoints: 0,
    bonusPoints: 0,
    totalPoints: 0,
    placement: null,
    rounds: {},
  };
}

/**
 * Bracket state for a single weight class.
 */
export class WeightClassBracket {
  championshipRound = 0;
  consolationRound = 0;
  private readonly records: CompetitorRecord[] = [];
  private readonly byKey = new Map<string, CompetitorRecord>();
  /** Owners whose entries a name has resolved to, per name key */
  private readonly claims = new Map<string, Set<string>>();
  /** Name keys whose unseeded matches went to a claiming owner */
  private readonly absorbed = new Set<string>();
  private readonly decided = new Map<string, { winner: string; loser: string }>();

  constructor(
    readonly weightClass: string,
    private readonly diagnostics: DiagnosticsCollector
  ) {}

  apply(resolved: ResolvedMatchEvent): void {
    const { event } = resolved;
    const winner = this.recordFor(resolved.winner, event);
    const loser = this.recordFor(resolved.loser, event);
    const code = WIN_TYPE_CODES[event.winType];

    if (event.bracket === 'Placement') {
      this.applyPlacement(event, winner, loser);
    } else {
      this.applyRound(event, winner, loser);
    }

    winner.rounds[event.roundLabel] = `W ${code}`;
    loser.rounds[event.roundLabel] = `L ${code}`;

    winner.matches.push({
      roundLabel: event.roundLabel,
      bracket: event.bracket,
      result: 'W',
      opponent: loser.name,
      opponentSchool: loser.school,
      winType: event.winType,
      winPhrase: event.winPhrase,
      advancementPoints: event.advancementPoints,
      bonusPoints: event.bonusPoints,
      totalPoints: event.totalPoints,
    });
    loser.matches.push({
      roundLabel: event.roundLabel,
      bracket: event.bracket,
      result: 'L',
      opponent: winner.name,
      opponentSchool: winner.school,
      winType: event.winType,
      winPhrase: event.winPhrase,
      advancementPoints: 0,
      bonusPoints: 0,
      totalPoints: 0,
    });
  }

  competitors(): CompetitorRecord[] {
    return [...this.records];
  }

  /** Placement matches decided so far, keyed by ordinal */
  placementMatches(): ReadonlyMap<string, { winner: string; loser: string }> {
    return this.decided;
  }

  /**
   * Record for one side of a match.
   *
   * - Resolved sides use their owner's record. The first time an owner claims
   *   a name, an ambiguous record under that name (unseeded earlier lines) is
   *   taken over by the owner.
   * - Ambiguous sides go to the claiming owner's record while exactly one
   *   owner has claimed the name, and to a name-only record otherwise.
   * - A second owner claiming a name whose unseeded matches already went to
   *   the first owner is reported; nothing is moved between owners.
   */
  private recordFor(competitor: ResolvedCompetitor, event: MatchEvent): CompetitorRecord {
    const { name, owner } = identity(competitor);
    const nameKey = competitorKey(this.weightClass, name);

    if (owner !== null) {
      return this.ownedRecord(competitor, nameKey, owner, event);
    }

    if (competitor.resolution.kind === 'ambiguous') {
      const owners = this.claims.get(nameKey);
      if (owners && owners.size === 1) {
        const [claimant] = owners;
        const claimed = this.byKey.get(competitorKey(this.weightClass, name, claimant));
        if (claimed) {
          this.absorbed.add(nameKey);
          return claimed;
        }
      }
    }

    const existing = this.byKey.get(nameKey);
    if (existing) {
      if (existing.seed === null && competitor.seed !== null) {
        existing.seed = competitor.seed;
      }
      return existing;
    }
    return this.addRecord(nameKey, competitor);
  }

  private ownedRecord(
    competitor: ResolvedCompetitor,
    nameKey: string,
    owner: string,
    event: MatchEvent
  ): CompetitorRecord {
    const { name, seed } = identity(competitor);
    const ownedKey = competitorKey(this.weightClass, name, owner);

    let owners = this.claims.get(nameKey);
    if (!owners) {
      owners = new Set<string>();
      this.claims.set(nameKey, owners);
    }
    if (!owners.has(owner)) {
      if (owners.size > 0 && this.absorbed.has(nameKey)) {
        this.diagnostics.add(
          'conflicting-claim',
          `${name} (${this.weightClass}) now resolves to ${owner}; unseeded matches already credited to ${[...owners].join(', ')}`,
          {
            lineNumber: event.lineNumber,
            rawText: event.rawText,
            details: { name, weightClass: this.weightClass, owners: [...owners, owner] },
          }
        );
      }
      owners.add(owner);
    }

    const existing = this.byKey.get(ownedKey);
    if (existing) {
      existing.seed = existing.seed ?? seed;
      return existing;
    }

    const pending = this.byKey.get(nameKey);
    if (pending && pending.status === 'ambiguous' && owners.size === 1 && pending.candidateOwners.includes(owner)) {
      this.byKey.delete(nameKey);
      pending.key = ownedKey;
      pending.owner = owner;
      pending.status = 'resolved';
      pending.candidateOwners = [];
      pending.seed = pending.seed ?? seed;
      this.byKey.set(ownedKey, pending);
      this.absorbed.add(nameKey);
      return pending;
    }

    return this.addRecord(ownedKey, competitor);
  }

  private addRecord(key: string, competitor: ResolvedCompetitor): CompetitorRecord {
    const record = newRecord(key, this.weightClass, competitor);
    this.records.push(record);
    this.byKey.set(key, record);
    return record;
  }

  private applyRound(event: RegularMatchEvent, winner: CompetitorRecord, loser: CompetitorRecord): void {
    const championship = event.bracket === 'Championship';
    const current = championship ? this.championshipRound : this.consolationRound;

    if (event.roundNumber < current) {
      this.diagnostics.add(
        'round-out-of-order',
        `${event.roundLabel} follows round ${current} of the same bracket`,
        { lineNumber: event.lineNumber, rawText: event.rawText, details: { weightClass: this.weightClass } }
      );
    }
    if (championship) {
      this.championshipRound = Math.max(current, event.roundNumber);
    } else {
      this.consolationRound = Math.max(current, event.roundNumber);
    }

    for (const record of [winner, loser]) {
      if (record.placement !== null) {
        this.diagnostics.add(
          'match-after-placement',
          `${record.name} already placed ${record.placement} before ${event.roundLabel}`,
          { lineNumber: event.lineNumber, rawText: event.rawText }
        );
      }
    }

    if (championship) {
      winner.champWins += 1;
      winner.champAdvancement += event.advancementPoints;
      winner.champBonus += event.bonusPoints;
    } else {
      winner.consWins += 1;
      winner.consAdvancement += event.advancementPoints;
      winner.consBonus += event.bonusPoints;
    }
    winner.advancementPoints += event.advancementPoints;
    winner.bonusPoints += event.bonusPoints;
    winner.totalPoints += event.totalPoints;
  }

  private applyPlacement(event: PlacementMatchEvent, winner: CompetitorRecord, loser: CompetitorRecord): void {
    this.assignPlacement(winner, event.winnerPlacement, event);
    this.assignPlacement(loser, event.loserPlacement, event);
    this.decided.set(event.placementMatch, { winner: winner.key, loser: loser.key });

    winner.placementPoints += event.bonusPoints;
    winner.bonusPoints += event.bonusPoints;
    winner.totalPoints += event.totalPoints;
  }

  private assignPlacement(record: CompetitorRecord, placement: Placement | null, event: MatchEvent): void {
    if (placement === null) return;
    if (record.placement !== null) {
      this.diagnostics.add(
        'repeat-placement',
        `${record.name} already placed ${record.placement}; ignoring placement ${placement}`,
        { lineNumber: event.lineNumber, rawText: event.rawText }
      );
      return;
    }
    record.placement = placement;
  }
}

const ROUND_LABEL_PATTERN = /^(Champ|Cons) R(\d+)$/;

/** Orders grid columns: Champ rounds, Cons rounds, placement matches */
export function compareRoundLabels(a: string, b: string): number {
  const rank = (label: string): [number, number] => {
    const m = label.match(ROUND_LABEL_PATTERN);
    if (m) return [m[1] === 'Champ' ? 0 : 1, parseInt(m[2], 10)];
    const ordinal = PLACEMENT_ORDINALS.findIndex((o) => label.startsWith(o));
    return [2, ordinal === -1 ? PLACEMENT_ORDINALS.length : ordinal];
  };
  const [groupA, orderA] = rank(a);
  const [groupB, orderB] = rank(b);
  if (groupA !== groupB) return groupA - groupB;
  if (orderA !== orderB) return orderA - orderB;
  return a.localeCompare(b);
}

export function buildRoundGrid(competitors: readonly CompetitorRecord[]): RoundGrid {
  const labels = new Set<string>();
  for (const record of competitors) {
    for (const label of Object.keys(record.rounds)) labels.add(label);
  }
  return {
    columns: [...labels].sort(compareRoundLabels),
    rows: competitors.map((record) => ({
      key: record.key,
      name: record.name,
      weightClass: record.weightClass,
      owner: record.owner,
      seed: record.seed,
      cells: { ...record.rounds },
    })),
  };
}

export function buildPlacementRows(competitors: readonly CompetitorRecord[]): PlacementRow[] {
  const rows: PlacementRow[] = [];
  for (const record of competitors) {
    if (record.placement === null) continue;
    rows.push({
      weightClass: record.weightClass,
      placement: record.placement,
      name: record.name,
      school: record.school,
      owner: record.owner,
      seed: record.seed,
      placementPoints: record.placementPoints,
    });
  }
  // Stable sort keeps weight classes in transcript order
  const weightOrder = [...new Set(rows.map((row) => row.weightClass))];
  return rows.sort(
    (a, b) => weightOrder.indexOf(a.weightClass) - weightOrder.indexOf(b.weightClass) || a.placement - b.placement
  );
}

/**
 * Track every weight class of a run.
 *
 * @param events - Resolved events in transcript order
 * @param diagnostics - Receives each weight class's diagnostics after it finishes
 */
export function trackBrackets(
  events: readonly ResolvedMatchEvent[],
  diagnostics: DiagnosticsCollector
): TrackerResult {
  const byWeight = new Map<string, ResolvedMatchEvent[]>();
  for (const resolved of events) {
    const weight = resolved.event.weightClass ?? UNASSIGNED_WEIGHT;
    const list = byWeight.get(weight);
    if (list) {
      list.push(resolved);
    } else {
      byWeight.set(weight, [resolved]);
    }
  }

  const competitors: CompetitorRecord[] = [];
  for (const [weightClass, weightEvents] of byWeight) {
    const local = new DiagnosticsCollector();
    const bracket = new WeightClassBracket(weightClass, local);
    for (const resolved of weightEvents) {
      bracket.apply(resolved);
    }
    diagnostics.merge(local);
    competitors.push(...bracket.competitors());
    logger.debug('Weight class tracked', {
      weightClass,
      events: weightEvents.length,
      championshipRound: bracket.championshipRound,
      consolationRound: bracket.consolationRound,
    });
  }

  return {
    competitors,
    grid: buildRoundGrid(competitors),
    placements: buildPlacementRows(competitors),
  };
}
