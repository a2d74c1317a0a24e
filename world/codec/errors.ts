/** A board text (level or save) that cannot be decoded */
export class BoardFormatError extends Error {
  /** 1-based line of the offending input, when known */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = 'BoardFormatError';
    this.line = line;
  }
}

/** Level source rejected at construction */
export class LevelFormatError extends BoardFormatError {
  constructor(message: string, line?: number) {
    super(message, line);
    this.name = 'LevelFormatError';
  }
}

/** Persisted state rejected on load; the live game is never touched */
export class CorruptSaveError extends BoardFormatError {
  constructor(message: string, line?: number) {
    super(message, line);
    this.name = 'CorruptSaveError';
  }
}
