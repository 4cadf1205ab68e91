import * as XLSX from 'xlsx';

import type { AuditReport, GraphStats } from './types.js';

export const DATATAPE_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const ISSUE_HEADER = ['ID', 'Kind', 'Severity', 'Confidence', 'Primary cell', 'Message', 'Why it matters', 'Suggested fix'];

const STAT_LABELS: [keyof GraphStats, string][] = [
  ['sheetCount', 'Sheets'],
  ['totalCells', 'Populated cells'],
  ['formulaCells', 'Formula cells'],
  ['literalCells', 'Literal cells'],
  ['errorCells', 'Error cells'],
  ['formulaDensity', 'Formula density'],
  ['nodeCount', 'Graph nodes'],
  ['edgeCount', 'Graph edges'],
  ['missingCount', 'Dangling references'],
  ['maxDepth', 'Max dependency depth'],
  ['crossSheetEdges', 'Cross-sheet edges'],
  ['crossSheetEdgeRatio', 'Cross-sheet edge ratio'],
  ['maxFanIn', 'Max fan-in'],
  ['maxFanOut', 'Max fan-out'],
  ['avgFanIn', 'Average fan-in'],
  ['cycleCount', 'Cycles'],
  ['orphanCount', 'Orphan formulas'],
  ['leafInputs', 'Leaf inputs'],
  ['terminalOutputs', 'Terminal outputs']
];

export function summaryRows(report: AuditReport): (string | number)[][] {
  const rows: (string | number)[][] = [
    ['Source', report.source],
    ['Generated from', report.generatedFrom],
    ['Summary', report.summary],
    ['Complexity score', report.complexity.score],
    ['Complexity drivers', report.complexity.drivers.join('; ')],
    ['Issues', report.issues.length],
    []
  ];
  for (const [key, label] of STAT_LABELS) {
    const value = report.stats[key];
    rows.push([label, Number.isInteger(value) ? value : Math.round(value * 10000) / 10000]);
  }
  return rows;
}

export function issueRows(report: AuditReport): string[][] {
  return [
    ISSUE_HEADER,
    ...report.issues.map(i => [
      i.id,
      i.kind,
      i.severity,
      i.confidence,
      i.evidence[0]?.address ?? '',
      i.message,
      i.explanation.why,
      i.explanation.fix
    ])
  ];
}

/** Tabular export of a report: Summary and Issues sheets, as xlsx bytes. */
export function buildDatatape(report: AuditReport): Buffer {
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(summaryRows(report)), 'Summary');
  XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(issueRows(report)), 'Issues');
  return XLSX.write(book, { type: 'buffer', bookType: 'xlsx' }) as Buffer;
}
