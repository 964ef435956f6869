// src/model/Errors.ts

/** The sheet selection or another run setting has an unusable shape. */
export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

export class FileNotFoundError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/** The input exists but could not be opened or parsed as a spreadsheet. */
export class UnreadableFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Error reading Excel file "${filePath}": ${reason}`, { cause });
    this.name = 'UnreadableFileError';
    this.filePath = filePath;
  }
}
