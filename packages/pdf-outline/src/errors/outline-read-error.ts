/**
 * OutlineReadError
 *
 * Base error class for failures that prevent reading a document outline.
 * A document without an outline is not an error.
 */
export class OutlineReadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OutlineReadError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * PdfFileNotFoundError
 *
 * Error thrown when the input path does not point to an existing file.
 */
export class PdfFileNotFoundError extends OutlineReadError {
  readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = 'PdfFileNotFoundError';
    this.path = path;
  }
}

/**
 * NotAPdfError
 *
 * Error thrown when the input path does not carry a `.pdf` extension.
 */
export class NotAPdfError extends OutlineReadError {
  readonly path: string;

  constructor(path: string) {
    super(`Not a PDF file: ${path}`);
    this.name = 'NotAPdfError';
    this.path = path;
  }
}

/**
 * MalformedPdfError
 *
 * Error thrown when pdf-lib reports structural corruption while parsing.
 */
export class MalformedPdfError extends OutlineReadError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MalformedPdfError';
  }

  /**
   * Wrap a parser failure
   */
  static fromError(error: unknown): MalformedPdfError {
    return new MalformedPdfError(
      `Error reading PDF: ${OutlineReadError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * UnexpectedOutlineError
 *
 * Error thrown for any other failure during extraction.
 */
export class UnexpectedOutlineError extends OutlineReadError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UnexpectedOutlineError';
  }

  static fromError(error: unknown): UnexpectedOutlineError {
    return new UnexpectedOutlineError(
      `Unexpected error: ${OutlineReadError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
