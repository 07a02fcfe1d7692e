/**
 * Raised when lock file text has no usable structure. No partial model is
 * ever returned alongside it.
 */
export class ParseError extends Error {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, location?: { line: number; column: number }) {
    super(location ? `${message} (line ${location.line}, column ${location.column})` : message);
    this.name = 'ParseError';
    this.line = location?.line;
    this.column = location?.column;
  }
}

/**
 * Raised when a batch file header matches neither supported layout.
 */
export class FormatError extends Error {
  readonly header: string;

  constructor(header: string) {
    super(`Unrecognized batch file format: ${header}`);
    this.name = 'FormatError';
    this.header = header;
  }
}
