// Error taxonomy: core rules report failures as result values; these cover
// input, content and persistence failures that cross a service boundary.

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
  }
}

export class ContentError extends GameError {
  constructor(message = 'Content failed validation', details?: Record<string, unknown>) {
    super('CONTENT_INVALID', message, details);
  }
}

export class SaveNotFoundError extends GameError {
  constructor(message = 'Save file not found', details?: Record<string, unknown>) {
    super('SAVE_NOT_FOUND', message, details);
  }
}

export class SaveCorruptError extends GameError {
  constructor(message = 'Save file is corrupt', details?: Record<string, unknown>) {
    super('SAVE_CORRUPT', message, details);
  }
}

export class SaveWriteError extends GameError {
  constructor(message = 'Save file could not be written', details?: Record<string, unknown>) {
    super('SAVE_WRITE_FAILED', message, details);
  }
}
