import { normalizeWeightClass } from './names';
import type { RosterRow } from '../validation/schemas';
import type { Roster, RosterEntry } from '../../types/wrestling';

/**
 * Group validated roster rows by owner, in the order owners first appear.
 * Rows are kept as written apart from trimming and weight normalisation;
 * duplicates are not merged here (the resolver reports them).
 */
export function buildRoster(rows: readonly RosterRow[]): Roster {
  const roster = new Map<string, RosterEntry[]>();
  for (const row of rows) {
    const owner = row.owner.trim();
    const entry: RosterEntry = {
      owner,
      wrestlerName: row.wrestler_name.trim(),
      weightClass: normalizeWeightClass(row.weight_class),
      seed: row.seed ?? null,
      school: row.school ?? null,
    };
    const entries = roster.get(owner);
    if (entries) {
      entries.push(entry);
    } else {
      roster.set(owner, [entry]);
    }
  }
  return roster;
}

export function rosterEntries(roster: Roster): RosterEntry[] {
  return [...roster.values()].flat();
}
