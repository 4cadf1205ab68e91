import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';

import { auditSnapshot } from '../src/audit.js';
import { buildDatatape, summaryRows } from '../src/datatape.js';
import { CYCLE, snapshotOf } from './helpers.js';

const report = auditSnapshot(snapshotOf(CYCLE, 'loop.xlsx'));

describe('datatape', () => {
  it('leads the summary with the report headline', () => {
    expect(summaryRows(report).slice(0, 6)).toEqual([
      ['Source', 'loop.xlsx'],
      ['Generated from', 'workbook'],
      ['Summary', '1 structural issue(s) found: 1 high.'],
      ['Complexity score', 3],
      ['Complexity drivers', 'formula density 100% > 80%'],
      ['Issues', 1]
    ]);
  });

  it('writes a workbook with Summary and Issues sheets', () => {
    const book = XLSX.read(buildDatatape(report), { type: 'buffer' });
    expect(book.SheetNames).toEqual(['Summary', 'Issues']);

    const issues = XLSX.utils.sheet_to_json<string[]>(book.Sheets.Issues, { header: 1 });
    expect(issues[0]).toEqual(['ID', 'Kind', 'Severity', 'Confidence', 'Primary cell', 'Message', 'Why it matters', 'Suggested fix']);
    expect(issues[1].slice(0, 6)).toEqual([
      report.issues[0].id,
      'circular-reference',
      'high',
      'normal',
      'Sheet1!A1',
      'Circular reference through 2 cell(s): Sheet1!A1, Sheet1!B1'
    ]);

    const summary = XLSX.utils.sheet_to_json<(string | number)[]>(book.Sheets.Summary, { header: 1 });
    expect(summary).toContainEqual(['Cycles', 1]);
  });
});
