export class RescaleError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "RescaleError";
  }
}

/** Raised before any file is processed; the run cannot start. */
export class SetupError extends RescaleError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "SetupError";
  }
}

export class InputDirectoryMissingError extends SetupError {
  readonly directory: string;

  constructor(directory: string, cause?: unknown) {
    super(`Input directory '${directory}' does not exist or is not a directory.`, { cause });
    this.name = "InputDirectoryMissingError";
    this.directory = directory;
  }
}

export class EmptyInputDirectoryError extends SetupError {
  readonly directory: string;
  readonly extension: string;

  constructor(directory: string, extension: string) {
    super(`No .${extension} files found in '${directory}'.`);
    this.name = "EmptyInputDirectoryError";
    this.directory = directory;
    this.extension = extension;
  }
}

export class InvalidFactorError extends SetupError {
  readonly factor: unknown;

  constructor(factor: unknown) {
    super(`Scaling factor must be a finite number greater than 0, got ${String(factor)}.`);
    this.name = "InvalidFactorError";
    this.factor = factor;
  }
}

export class InvalidReferenceError extends SetupError {
  constructor(reference: string) {
    super(`Reference '${reference}' must have the form LABEL=DIRECTORY.`);
    this.name = "InvalidReferenceError";
  }
}

export class FactorStoreError extends RescaleError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "FactorStoreError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
