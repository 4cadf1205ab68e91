import type { ErrorToken, Explanation, IssueKind } from './types.js';

const EXPLANATIONS: Record<IssueKind, Explanation> = {
  'external-reference': {
    why: 'Links to other files break when the model is shared or the source moves, and the linked values can change without the model being re-checked.',
    cause: 'Usually left behind by copying sheets or paste-linking from another workbook, or by formulas pointing at data-feed exports.',
    fix: 'Paste historical linked data as values. For live feeds, route them through one documented inputs sheet.'
  },
  'broken-reference': {
    why: 'Spreadsheet errors propagate: every formula that reads an error cell shows an error too, which can silently break outputs.',
    cause: 'A formula points at a cell, range or sheet that no longer exists, or evaluates to an error.',
    fix: "Trace the error to its first occurrence and repair the formula there rather than wrapping dependents in IFERROR."
  },
  'hard-coded-plug': {
    why: 'A typed-in number inside a row of formulas stops assumptions from flowing through, so the model can produce misleading results without any warning.',
    cause: 'Typically entered to force a result when the model did not tie out, or left over from a rushed update.',
    fix: 'Work out what the cell should calculate and restore the formula; if the result looks wrong, fix the upstream logic instead.'
  },
  'balance-sheet-imbalance': {
    why: 'Assets must equal liabilities plus equity in every period; a gap means an entry is missing its other side.',
    cause: 'Working-capital movements not reaching cash, financing flows hitting only one side, or retained earnings not linked to net income.',
    fix: 'Add a balance check row, find the first period that is out, and trace every entry posted in that period.'
  },
  'circular-reference': {
    why: 'Circular chains make a model depend on iterative calculation, which is fragile, slow and hard to audit.',
    cause: 'Most often interest on average debt feeding back through cash and net income, or revolver sizing.',
    fix: 'Break the loop with opening balances, or isolate it behind a clearly documented circuit-breaker switch.'
  },
  'orphaned-region': {
    why: 'Calculations that neither read nor feed anything are dead weight and often leftovers that confuse reviewers.',
    cause: 'Scratch work, abandoned scenarios, or formulas whose inputs were replaced by constants.',
    fix: 'Delete the cells, or link them into the model if they were meant to be used.'
  }
};

const ERROR_CAUSES: Partial<Record<ErrorToken, string>> = {
  '#REF!': 'A formula refers to a cell or range that was deleted or moved out of bounds.',
  '#NAME?': 'A function name is misspelled or a named range does not exist.',
  '#VALUE!': 'A formula received the wrong type of argument, such as text where a number is expected.',
  '#DIV/0!': 'A formula divides by zero or by an empty cell.',
  '#N/A': 'A lookup found no match.',
  '#NUM!': 'A calculation produced a number that is out of range or invalid.'
};

export function explain(kind: IssueKind, error?: ErrorToken): Explanation {
  const base = EXPLANATIONS[kind];
  if (kind !== 'broken-reference' || !error) return { ...base };
  return { ...base, cause: ERROR_CAUSES[error] ?? base.cause };
}
