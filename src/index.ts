export { runPipeline, type PipelineInput, type PipelineResult } from './lib/pipeline';
export { DiagnosticsCollector, type Diagnostic, type DiagnosticKind, type DiagnosticsReport } from './lib/diagnostics';
export { classifyWinType, overtimeOverride, type WinTypeResult } from './lib/parsing/win-type';
export { parseMatchLine, type LineContext } from './lib/parsing/match-line';
export { parseTranscript, collectWinPhrases, findLinesMentioning, detectWeightHeader } from './lib/parsing/transcript';
export { normalizeName, normalizeWeightClass } from './lib/roster/names';
export { buildRoster } from './lib/roster/roster';
export { WrestlerResolver, buildRosterIndex, type ProblemEntry, type ProblemKind } from './lib/roster/resolver';
export { trackBrackets, WeightClassBracket, type TrackerResult } from './lib/bracket/tracker';
export { calculateTeamSummaries } from './lib/scoring/scorer';
export { PipelineInputError } from './lib/validation/input';
export { readRosterSheet, buildResultSheets, createWorkbook, sheetToCsv, workbookToBuffer, type ExcelSheet } from './lib/excel';
export { WEIGHT_CLASSES, HEAVYWEIGHT } from './lib/constants';
export type * from './types/wrestling';
