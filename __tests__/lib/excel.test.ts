import * as XLSX from 'xlsx';
import { describe, it, expect } from '@jest/globals';
import {
  readRosterSheet,
  buildResultSheets,
  createWorkbook,
  workbookToBuffer,
  sheetToCsv,
  type ExcelSheet,
} from '@/lib/excel';
import { runPipeline } from '@/lib/pipeline';
import { PipelineInputError } from '@/lib/validation/input';

function sheetNamed(sheets: ExcelSheet[], name: string): ExcelSheet {
  const sheet = sheets.find((s) => s.name === name);
  if (!sheet) throw new Error(`No sheet ${name}`);
  return sheet;
}

describe('readRosterSheet', () => {
  it('should read roster rows from CSV with loose headers', () => {
    const csv = 'Owner,Wrestler,Weight,Seed,School\nalpha,John Smith,125,3,Iowa\nbravo,Mike Jones,HWT,,\n';

    expect(readRosterSheet(csv)).toEqual([
      { owner: 'alpha', wrestler_name: 'John Smith', weight_class: 125, seed: 3, school: 'Iowa' },
      { owner: 'bravo', wrestler_name: 'Mike Jones', weight_class: 'HWT', seed: null, school: null },
    ]);
  });

  it('should read roster rows from workbook bytes', () => {
    const workbook = createWorkbook([
      { name: 'Roster', headers: ['owner', 'wrestler_name', 'weight_class'], data: [['alpha', 'John Smith', 125]] },
    ]);

    expect(readRosterSheet(workbookToBuffer(workbook))).toEqual([
      { owner: 'alpha', wrestler_name: 'John Smith', weight_class: 125 },
    ]);
  });

  it('should reject rows with a blank wrestler name', () => {
    expect(() => readRosterSheet('Owner,Wrestler,Weight\nalpha,,125\n')).toThrow(
      'Invalid roster: 0.wrestler_name: Wrestler name is required'
    );
  });

  it('should reject a sheet with no rows', () => {
    expect(() => readRosterSheet('Owner,Wrestler,Weight\n')).toThrow(PipelineInputError);
  });
});

describe('buildResultSheets', () => {
  const result = runPipeline({
    roster: [{ owner: 'alpha', wrestler_name: 'John Smith', weight_class: '125' }],
    transcript: '125\nChamp. Round 1 - John Smith (Iowa) won by fall over Walk On (Cornell)',
  });
  const sheets = buildResultSheets(result);

  it('should produce one sheet per output table', () => {
    expect(sheets.map((sheet) => sheet.name)).toEqual(['Competitors', 'Rounds', 'Placements', 'Teams', 'Diagnostics']);
  });

  it('should break competitor points down by bracket', () => {
    expect(sheetNamed(sheets, 'Competitors').data[0]).toEqual([
      'John Smith', '125', '', 'alpha', 'resolved',
      1, 1, 2,
      0, 0, 0,
      '', 0, 3,
      'Champ R1: W Fall vs Walk On',
    ]);
  });

  it('should lay out the round grid with one column per round', () => {
    const rounds = sheetNamed(sheets, 'Rounds');

    expect(rounds.headers).toEqual(['Wrestler', 'Weight', 'Owner', 'Seed', 'Champ R1']);
    expect(rounds.data).toEqual([
      ['John Smith', '125', 'alpha', '', 'W Fall'],
      ['Walk On', '125', '', '', 'L Fall'],
    ]);
  });

  it('should list team totals and diagnostics', () => {
    expect(sheetNamed(sheets, 'Teams').data).toEqual([['alpha', 3, 1, 2, 0, 1, 1, 0]]);
    expect(sheetNamed(sheets, 'Diagnostics').data).toEqual([
      [
        'unmatched-competitor',
        'info',
        2,
        'Walk On (Cornell) is not on the roster',
        'Champ. Round 1 - John Smith (Iowa) won by fall over Walk On (Cornell)',
      ],
    ]);
    expect(sheetNamed(sheets, 'Placements').data).toEqual([]);
  });

  it('should write CSV with a header row', () => {
    expect(sheetToCsv(sheetNamed(sheets, 'Teams')).split('\n')).toEqual([
      'Owner,Total Points,Adv Points,Bonus Points,Place Points,Wrestlers with Points,Wrestlers Seen,Placers',
      'alpha,3,1,2,0,1,1,0',
    ]);
  });
});

describe('createWorkbook', () => {
  it('should add every sheet with minimum column widths', () => {
    const workbook = createWorkbook([
      { name: 'Teams', headers: ['Owner', 'A very long column header'], data: [['alpha', 1]] },
    ]);
    const sheet = workbook.Sheets['Teams'];

    expect(workbook.SheetNames).toEqual(['Teams']);
    expect(sheet['!cols']).toEqual([{ wch: 15 }, { wch: 25 }]);
    expect(sheet['A2'].v).toBe('alpha');
  });

  it('should write a workbook that reads back with the same sheet names', () => {
    const buffer = workbookToBuffer(createWorkbook([
      { name: 'One', headers: ['a'], data: [] },
      { name: 'Two', headers: ['b'], data: [] },
    ]));

    expect(XLSX.read(buffer, { type: 'buffer' }).SheetNames).toEqual(['One', 'Two']);
  });
});
