/** The file is missing, corrupt, or not a spreadsheet container we can open. */
export class UnreadableWorkbookError extends Error {
  constructor(readonly source: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not read file ${source}: ${reason}`, options);
    this.name = 'UnreadableWorkbookError';
  }
}

/** The input can only carry values (CSV and friends) but formula analysis was requested. */
export class UnsupportedFormatError extends Error {
  constructor(readonly source: string, readonly format: string) {
    super(`${source}: ${format} files carry values only; formula analysis needs a workbook (.xlsx, .xlsm, .xlsb, .xls, .ods)`);
    this.name = 'UnsupportedFormatError';
  }
}

/** The optional narrative capability is not configured or the model could not be reached. */
export class UnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnavailableError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Thrown by the tokenizer; caught per cell and turned into a ParseWarning. */
export class FormulaSyntaxError extends Error {
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'FormulaSyntaxError';
  }
}
