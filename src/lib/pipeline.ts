/**
 * Scoring Pipeline
 *
 * Composes the stages of a run:
 *
 *   transcript text -> parsed events -> resolved events -> competitor records -> team summaries
 *
 * Inputs are validated first. A missing or malformed roster or transcript
 * throws PipelineInputError before anything is parsed. After that nothing
 * throws: unparsed lines, unattributed competitors and unusual results are
 * collected in the diagnostics report returned with the tables.
 *
 * The run is synchronous and deterministic; the same roster and transcript
 * always produce the same tables and the same diagnostics.
 */

import { DiagnosticsCollector, type DiagnosticsReport } from './diagnostics';
import { createLogger } from './logger';
import { trackBrackets } from './bracket/tracker';
import { collectWinPhrases, parseTranscript } from './parsing/transcript';
import { normalizeWeightClass } from './roster/names';
import { WrestlerResolver, type ProblemEntry } from './roster/resolver';
import { buildRoster } from './roster/roster';
import { calculateTeamSummaries } from './scoring/scorer';
import { PipelineInputError, validateInput } from './validation/input';
import {
  pipelineOptionsSchema,
  rosterSchema,
  transcriptSchema,
  type PipelineOptionsInput,
} from './validation/schemas';
import type {
  CompetitorRecord,
  MatchEvent,
  PlacementRow,
  RosterEntry,
  RoundGrid,
  TeamSummary,
} from '../types/wrestling';

const logger = createLogger('pipeline');

export interface PipelineInput {
  /** Roster rows: owner, wrestler_name, weight_class, optional seed and school */
  roster: unknown;
  /** Transcript text */
  transcript: unknown;
  options?: PipelineOptionsInput;
}

export interface PipelineResult {
  events: MatchEvent[];
  competitors: CompetitorRecord[];
  roundGrid: RoundGrid;
  placements: PlacementRow[];
  teams: TeamSummary[];
  problems: ProblemEntry[];
  diagnostics: DiagnosticsReport;
}

function validate(input: PipelineInput) {
  try {
    return {
      rows: validateInput('roster', rosterSchema, input.roster),
      transcript: validateInput('transcript', transcriptSchema, input.transcript),
      options: validateInput('options', pipelineOptionsSchema, input.options ?? {}),
    };
  } catch (error) {
    if (error instanceof PipelineInputError) {
      logger.error('Pipeline input rejected', { input: error.input, details: error.details });
    }
    throw error;
  }
}

/**
 * Run the whole pipeline.
 *
 * @throws PipelineInputError when the roster, transcript or options are invalid
 */
export function runPipeline(input: PipelineInput): PipelineResult {
  const { rows, transcript, options } = validate(input);
  const diagnostics = new DiagnosticsCollector();

  const roster = buildRoster(rows);
  const resolver = new WrestlerResolver(roster);
  logger.info('Pipeline started', { owners: roster.size, rosterEntries: rows.length });

  const events = parseTranscript(transcript, diagnostics, {
    watchList: options.watchList,
    weightClasses: options.weightClasses.map(normalizeWeightClass),
  });

  const resolved = events.map((event) => resolver.resolveEvent(event, diagnostics));
  const tracked = trackBrackets(resolved, diagnostics);
  const teams = calculateTeamSummaries(tracked.competitors, roster.keys());

  if (options.reportUnseenRosterEntries) {
    const seen = new Set<RosterEntry>();
    for (const { winner, loser } of resolved) {
      for (const side of [winner, loser]) {
        if (side.resolution.kind === 'resolved') seen.add(side.resolution.entry);
        if (side.resolution.kind === 'ambiguous') side.resolution.candidates.forEach((entry) => seen.add(entry));
      }
    }
    for (const entry of resolver.entries) {
      if (seen.has(entry)) continue;
      diagnostics.add(
        'roster-entry-unseen',
        `${entry.wrestlerName} (${entry.weightClass}, ${entry.owner}) does not appear in the transcript`,
        { details: { owner: entry.owner, name: entry.wrestlerName, weightClass: entry.weightClass } }
      );
    }
  }

  const report = diagnostics.report(collectWinPhrases(transcript));
  logger.info('Pipeline finished', {
    events: events.length,
    competitors: tracked.competitors.length,
    diagnostics: report.entries.length,
  });

  return {
    events,
    competitors: tracked.competitors,
    roundGrid: tracked.grid,
    placements: tracked.placements,
    teams,
    problems: resolver.problems,
    diagnostics: report,
  };
}
