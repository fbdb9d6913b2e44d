export class TitleValidationError extends Error {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super(message);
    this.name = "TitleValidationError";
    this.fields = fields;
  }
}

export class DocumentWriteError extends Error {
  readonly outputPath: string;

  constructor(message: string, outputPath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentWriteError";
    this.outputPath = outputPath;
  }
}

export class DocumentReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentReadError";
  }
}

export class FormatRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatRequestError";
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
