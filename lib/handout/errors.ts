/**
 * Handout error taxonomy.
 *
 * Every failure of a handout run is one of these. All of them are terminal for
 * the run; nothing in the pipeline retries.
 */

export class HandoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HandoutError";
  }
}

/** Source PDF could not be read, opened or rendered. */
export class SourceDocumentError extends HandoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceDocumentError";
  }
}

/** Presentation to PDF conversion failed before the core ran. */
export class ConversionError extends HandoutError {
  readonly inputPath: string;

  constructor(message: string, inputPath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
    this.inputPath = inputPath;
  }
}

/** Planner was called with input it cannot lay out. */
export class LayoutError extends HandoutError {
  constructor(message: string) {
    super(message);
    this.name = "LayoutError";
  }
}

/** A page or tile was added to an output document that is already finalized. */
export class HandoutSealedError extends HandoutError {
  constructor() {
    super("Handout document is already finalized; no more tiles can be added.");
    this.name = "HandoutSealedError";
  }
}
