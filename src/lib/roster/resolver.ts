/**
 * Wrestler Resolver
 *
 * Attributes the competitors named in a transcript to the fantasy owners
 * who drafted them.
 *
 * Two lookups are built once from the roster:
 * - by normalised name (primary)
 * - by (weight class, seed), used when one name maps to several entries
 *
 * Resolution order for one transcript competitor:
 * 1. Entries with the same normalised name in the event's weight class.
 *    Exactly one -> resolved.
 * 2. Several -> the (weight, seed) key narrows them. Exactly one -> resolved.
 * 3. All remaining entries belong to one owner -> resolved to that owner.
 * 4. Otherwise ambiguous. Cross-owner collisions are never tie-broken.
 *
 * Names that are not on the roster at all are unmatched; that is the normal
 * case for undrafted competitors. Roster irregularities (a name under two
 * owners, a name at two weights, near-identical spellings, a shared seed)
 * are recorded as problem entries when the index is built.
 */

import { DiagnosticsCollector } from '../diagnostics';
import { createLogger } from '../logger';
import { looseNameKey, normalizeName } from './names';
import { rosterEntries } from './roster';
import type {
  MatchEvent,
  ResolvedCompetitor,
  ResolvedMatchEvent,
  Resolution,
  Roster,
  RosterEntry,
} from '../../types/wrestling';

const logger = createLogger('wrestler-resolver');

export type ProblemKind =
  | 'duplicate-across-owners'
  | 'inconsistent-weight'
  | 'near-duplicate'
  | 'duplicate-seed'
  | 'duplicate-entry';

/** Roster irregularity kept for manual review */
export interface ProblemEntry {
  kind: ProblemKind;
  /** Normalised name or weight/seed key the problem was found under */
  key: string;
  message: string;
  entries: RosterEntry[];
}

export interface RosterIndex {
  entries: RosterEntry[];
  byName: Map<string, RosterEntry[]>;
  byWeightSeed: Map<string, RosterEntry[]>;
  problems: ProblemEntry[];
}

const weightSeedKey = (weightClass: string, seed: number) => `${weightClass}#${seed}`;

const distinct = <T>(values: T[]): T[] => [...new Set(values)];

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

function describe(entries: RosterEntry[]): string {
  return entries.map((e) => `${e.wrestlerName} (${e.weightClass}, ${e.owner})`).join(', ');
}

function findProblems(index: Omit<RosterIndex, 'problems'>): ProblemEntry[] {
  const problems: ProblemEntry[] = [];

  for (const [key, entries] of index.byName) {
    if (entries.length < 2) continue;
    const owners = distinct(entries.map((e) => e.owner));
    const weights = distinct(entries.map((e) => e.weightClass));
    const spellings = distinct(entries.map((e) => e.wrestlerName));

    if (owners.length > 1) {
      problems.push({
        kind: 'duplicate-across-owners',
        key,
        message: `Drafted by ${owners.join(' and ')}: ${describe(entries)}`,
        entries,
      });
    }
    if (weights.length > 1) {
      problems.push({
        kind: 'inconsistent-weight',
        key,
        message: `Listed at weights ${weights.join(', ')}: ${describe(entries)}`,
        entries,
      });
    }
    if (spellings.length > 1) {
      problems.push({
        kind: 'near-duplicate',
        key,
        message: `Spelled ${spellings.map((s) => `"${s}"`).join(' and ')}`,
        entries,
      });
    }
    if (owners.length === 1 && weights.length === 1) {
      problems.push({
        kind: 'duplicate-entry',
        key,
        message: `Listed ${entries.length} times by ${owners[0]}`,
        entries,
      });
    }
  }

  // Same weight, same initial and last name, different full names
  const byLooseKey = new Map<string, RosterEntry[]>();
  for (const entry of index.entries) {
    pushTo(byLooseKey, `${entry.weightClass}|${looseNameKey(entry.wrestlerName)}`, entry);
  }
  for (const [key, entries] of byLooseKey) {
    if (distinct(entries.map((e) => normalizeName(e.wrestlerName))).length > 1) {
      problems.push({
        kind: 'near-duplicate',
        key,
        message: `Similar names at ${entries[0].weightClass}: ${describe(entries)}`,
        entries,
      });
    }
  }

  for (const [key, entries] of index.byWeightSeed) {
    if (distinct(entries.map((e) => normalizeName(e.wrestlerName))).length > 1) {
      problems.push({
        kind: 'duplicate-seed',
        key,
        message: `Seed shared at ${entries[0].weightClass}: ${describe(entries)}`,
        entries,
      });
    }
  }

  return problems;
}

export function buildRosterIndex(roster: Roster): RosterIndex {
  const entries = rosterEntries(roster);
  const byName = new Map<string, RosterEntry[]>();
  const byWeightSeed = new Map<string, RosterEntry[]>();

  for (const entry of entries) {
    pushTo(byName, normalizeName(entry.wrestlerName), entry);
    if (entry.seed !== null) {
      pushTo(byWeightSeed, weightSeedKey(entry.weightClass, entry.seed), entry);
    }
  }

  const problems = findProblems({ entries, byName, byWeightSeed });
  if (problems.length > 0) {
    logger.warn('Roster has entries needing review', { problems: problems.length });
  }
  return { entries, byName, byWeightSeed, problems };
}

export class WrestlerResolver {
  private readonly index: RosterIndex;

  constructor(roster: Roster) {
    this.index = buildRosterIndex(roster);
  }

  get problems(): ProblemEntry[] {
    return this.index.problems;
  }

  get entries(): RosterEntry[] {
    return this.index.entries;
  }

  /**
   * Resolve one competitor.
   *
   * @param name - Name as written in the transcript
   * @param weightClass - Weight class of the match, or null when unknown
   * @param seed - Seed from the transcript, if any
   */
  resolve(name: string, weightClass: string | null, seed: number | null): Resolution {
    const candidates = this.index.byName.get(normalizeName(name)) ?? [];
    if (candidates.length === 0) {
      return { kind: 'unmatched', reason: 'not-on-roster' };
    }

    const scoped = weightClass === null
      ? candidates
      : candidates.filter((entry) => entry.weightClass === weightClass);
    if (scoped.length === 0) {
      return { kind: 'unmatched', reason: 'weight-mismatch' };
    }
    if (scoped.length === 1) {
      return { kind: 'resolved', entry: scoped[0], via: 'name' };
    }

    if (seed !== null) {
      const weights = distinct(scoped.map((entry) => entry.weightClass));
      const seeded = weights
        .flatMap((weight) => this.index.byWeightSeed.get(weightSeedKey(weight, seed)) ?? [])
        .filter((entry) => scoped.includes(entry));
      if (seeded.length === 1) {
        return { kind: 'resolved', entry: seeded[0], via: 'seed' };
      }
    }

    if (distinct(scoped.map((entry) => entry.owner)).length === 1) {
      return { kind: 'resolved', entry: scoped[0], via: 'owner' };
    }

    return { kind: 'ambiguous', candidates: scoped };
  }

  /**
   * Resolve both sides of a match, recording ambiguous and unmatched
   * competitors once per name and weight class.
   */
  resolveEvent(event: MatchEvent, diagnostics: DiagnosticsCollector): ResolvedMatchEvent {
    return {
      event,
      winner: this.resolveSide(event, event.winnerName, event.winnerSchool, event.winnerSeed, diagnostics),
      loser: this.resolveSide(event, event.loserName, event.loserSchool, event.loserSeed, diagnostics),
    };
  }

  private resolveSide(
    event: MatchEvent,
    name: string,
    school: string,
    seed: number | null,
    diagnostics: DiagnosticsCollector
  ): ResolvedCompetitor {
    const resolution = this.resolve(name, event.weightClass, seed);
    const dedupeKey = `${event.weightClass ?? ''}|${normalizeName(name)}`;
    const context = {
      lineNumber: event.lineNumber,
      rawText: event.rawText,
    };

    switch (resolution.kind) {
      case 'resolved':
        break;
      case 'ambiguous': {
        const owners = distinct(resolution.candidates.map((entry) => entry.owner));
        diagnostics.addOnce('ambiguous-competitor', dedupeKey, `${name} matches roster entries of ${owners.join(', ')}`, {
          ...context,
          details: { name, weightClass: event.weightClass, owners },
        });
        break;
      }
      case 'unmatched':
        if (resolution.reason === 'weight-mismatch') {
          const weights = distinct((this.index.byName.get(normalizeName(name)) ?? []).map((e) => e.weightClass));
          diagnostics.addOnce(
            'weight-mismatch',
            dedupeKey,
            `${name} is on the roster at ${weights.join(', ')} but wrestled at ${event.weightClass}`,
            { ...context, details: { name, weightClass: event.weightClass, rosterWeights: weights } }
          );
        } else {
          diagnostics.addOnce('unmatched-competitor', dedupeKey, `${name} (${school}) is not on the roster`, {
            ...context,
            details: { name, school, weightClass: event.weightClass },
          });
        }
        break;
    }

    return { name, school, seed, resolution };
  }
}
