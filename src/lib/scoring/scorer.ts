/**
 * Team Scoring
 *
 * Rolls competitor records up into one summary row per fantasy owner.
 *
 * Only competitors attributed to an owner count. Ambiguous and unmatched
 * competitors stay in the competitor table for inspection but add nothing to
 * any team, so the team totals always equal the sum over owned competitors.
 */

import { createLogger } from '../logger';
import type { CompetitorRecord, TeamSummary } from '../../types/wrestling';

const logger = createLogger('scorer');

function emptySummary(owner: string): TeamSummary {
  return {
    owner,
    totalPoints: 0,
    totalAdvancement: 0,
    totalBonus: 0,
    totalPlacementPoints: 0,
    scoringCompetitors: 0,
    competitorsSeen: 0,
    placers: 0,
  };
}

/**
 * Calculate team summaries.
 *
 * @param competitors - Finalised competitor records from the bracket tracker
 * @param owners - Roster owners; each gets a row even with no competitors in the transcript
 * @returns One row per owner, roster owners first in roster order
 */
export function calculateTeamSummaries(
  competitors: readonly CompetitorRecord[],
  owners: Iterable<string> = []
): TeamSummary[] {
  const summaries = new Map<string, TeamSummary>();
  for (const owner of owners) {
    summaries.set(owner, emptySummary(owner));
  }

  for (const record of competitors) {
    if (record.status !== 'resolved' || record.owner === null) continue;

    let summary = summaries.get(record.owner);
    if (!summary) {
      summary = emptySummary(record.owner);
      summaries.set(record.owner, summary);
    }

    summary.totalPoints += record.totalPoints;
    summary.totalAdvancement += record.advancementPoints;
    summary.totalBonus += record.bonusPoints;
    summary.totalPlacementPoints += record.placementPoints;
    summary.competitorsSeen += 1;
    if (record.totalPoints > 0) summary.scoringCompetitors += 1;
    if (record.placement !== null) summary.placers += 1;
  }

  logger.debug('Team summaries calculated', { teams: summaries.size });
  return [...summaries.values()];
}

/** Sum of total points over owned competitors */
export function ownedPointsTotal(competitors: readonly CompetitorRecord[]): number {
  return competitors
    .filter((record) => record.status === 'resolved' && record.owner !== null)
    .reduce((sum, record) => sum + record.totalPoints, 0);
}
