import * as XLSX from 'xlsx';
import { validateInput } from './validation/input';
import { rosterSchema, type RosterRow } from './validation/schemas';
import type { PipelineResult } from './pipeline';

export interface ExcelSheet {
  name: string;
  data: (string | number)[][];
  headers: string[];
}

// Spreadsheet headers people actually type, mapped to roster fields
const ROSTER_HEADER_ALIASES: Record<string, string> = {
  owner: 'owner',
  team: 'owner',
  wrestler_name: 'wrestler_name',
  wrestler: 'wrestler_name',
  name: 'wrestler_name',
  weight_class: 'weight_class',
  weight: 'weight_class',
  seed: 'seed',
  school: 'school',
};

const headerKey = (header: string) => header.trim().toLowerCase().replace(/[\s-]+/g, '_');

/**
 * Read roster rows from the first sheet of a CSV string or an XLSX file's bytes.
 * Headers are matched loosely ("Wrestler", "Weight", "Team" work).
 *
 * @throws PipelineInputError when the rows do not form a valid roster
 */
export function readRosterSheet(data: string | Uint8Array): RosterRow[] {
  const workbook = typeof data === 'string'
    ? XLSX.read(data, { type: 'string' })
    : XLSX.read(data, { type: 'array' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  const rawRows = sheet
    ? XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' })
    : [];

  const rows = rawRows.map((raw) => {
    const row: Record<string, unknown> = {};
    for (const [header, value] of Object.entries(raw)) {
      const field = ROSTER_HEADER_ALIASES[headerKey(header)];
      if (field && !(field in row)) row[field] = value;
    }
    return row;
  });

  return validateInput('roster', rosterSchema, rows);
}

const formatPoints = (points: number) => Number(points.toFixed(2));

/** Output tables of a run as spreadsheet sheets */
export function buildResultSheets(result: PipelineResult): ExcelSheet[] {
  const competitors: ExcelSheet = {
    name: 'Competitors',
    headers: [
      'Wrestler', 'Weight', 'Seed', 'Owner', 'Status',
      'Champ Wins', 'Champ Adv Pts', 'Champ Bonus Pts',
      'Cons Wins', 'Cons Adv Pts', 'Cons Bonus Pts',
      'Placement', 'Place Pts', 'Total Pts', 'Matches',
    ],
    data: result.competitors.map((c) => [
      c.name,
      c.weightClass,
      c.seed ?? '',
      c.owner ?? '',
      c.status,
      c.champWins,
      formatPoints(c.champAdvancement),
      formatPoints(c.champBonus),
      c.consWins,
      formatPoints(c.consAdvancement),
      formatPoints(c.consBonus),
      c.placement ?? '',
      formatPoints(c.placementPoints),
      formatPoints(c.totalPoints),
      c.matches.map((m) => `${m.roundLabel}: ${m.result} ${m.winType} vs ${m.opponent}`).join('; '),
    ]),
  };

  const rounds: ExcelSheet = {
    name: 'Rounds',
    headers: ['Wrestler', 'Weight', 'Owner', 'Seed', ...result.roundGrid.columns],
    data: result.roundGrid.rows.map((row) => [
      row.name,
      row.weightClass,
      row.owner ?? '',
      row.seed ?? '',
      ...result.roundGrid.columns.map((column) => row.cells[column] ?? ''),
    ]),
  };

  const placements: ExcelSheet = {
    name: 'Placements',
    headers: ['Weight', 'Place', 'Wrestler', 'School', 'Owner', 'Seed', 'Points'],
    data: result.placements.map((p) => [
      p.weightClass,
      p.placement,
      p.name,
      p.school,
      p.owner ?? '',
      p.seed ?? '',
      formatPoints(p.placementPoints),
    ]),
  };

  const teams: ExcelSheet = {
    name: 'Teams',
    headers: [
      'Owner', 'Total Points', 'Adv Points', 'Bonus Points', 'Place Points',
      'Wrestlers with Points', 'Wrestlers Seen', 'Placers',
    ],
    data: result.teams.map((t) => [
      t.owner,
      formatPoints(t.totalPoints),
      formatPoints(t.totalAdvancement),
      formatPoints(t.totalBonus),
      formatPoints(t.totalPlacementPoints),
      t.scoringCompetitors,
      t.competitorsSeen,
      t.placers,
    ]),
  };

  const diagnostics: ExcelSheet = {
    name: 'Diagnostics',
    headers: ['Kind', 'Severity', 'Line', 'Message', 'Text'],
    data: result.diagnostics.entries.map((d) => [
      d.kind,
      d.severity,
      d.lineNumber ?? '',
      d.message,
      d.rawText ?? '',
    ]),
  };

  return [competitors, rounds, placements, teams, diagnostics];
}

export function createWorkbook(sheets: ExcelSheet[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  sheets.forEach((sheet) => {
    const worksheetData = [
      sheet.headers,
      ...sheet.data,
    ];

    const ws = XLSX.utils.aoa_to_sheet(worksheetData);

    // Set column widths
    ws['!cols'] = sheet.headers.map((header) => ({
      wch: Math.max(header.length, 15),
    }));

    XLSX.utils.book_append_sheet(workbook, ws, sheet.name);
  });

  return workbook;
}

/** Workbook bytes, for the caller to write or send */
export function workbookToBuffer(workbook: XLSX.WorkBook): Buffer {
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

export function sheetToCsv(sheet: ExcelSheet): string {
  const ws = XLSX.utils.aoa_to_sheet([sheet.headers, ...sheet.data]);
  return XLSX.utils.sheet_to_csv(ws);
}
