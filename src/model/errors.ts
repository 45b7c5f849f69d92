/**
 * Errors the interactive session recovers from (reported in the status line)
 * and the persistence failures the CLI reports at startup.
 */
export class CalendarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalendarError';
  }
}

export class InvalidKeystrokeError extends CalendarError {
  constructor(
    public readonly key: string,
    detail?: string
  ) {
    super(detail ?? `Unknown key: ${key}`);
    this.name = 'InvalidKeystrokeError';
  }
}

export class MalformedCommandLineError extends CalendarError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedCommandLineError';
  }
}

export class ReferentialViolationError extends CalendarError {
  constructor(message: string) {
    super(message);
    this.name = 'ReferentialViolationError';
  }
}

export class EmptyTitleError extends CalendarError {
  constructor() {
    super('Task title cannot be empty');
    this.name = 'EmptyTitleError';
  }
}

export class NoTaskAtCursorError extends CalendarError {
  constructor() {
    super('No task at cursor');
    this.name = 'NoTaskAtCursorError';
  }
}

export class DuplicateNameError extends CalendarError {
  constructor(name: string) {
    super(`Subcalendar '${name}' already exists`);
    this.name = 'DuplicateNameError';
  }
}

export class EmptyHistoryError extends CalendarError {
  constructor(direction: 'undo' | 'redo') {
    super(`Nothing to ${direction}`);
    this.name = 'EmptyHistoryError';
  }
}

export class EmptyRegisterError extends CalendarError {
  constructor() {
    super('Nothing to paste');
    this.name = 'EmptyRegisterError';
  }
}

export class PersistenceCorruptError extends CalendarError {
  constructor(
    public readonly filePath: string,
    detail: string
  ) {
    super(`${filePath}: ${detail}`);
    this.name = 'PersistenceCorruptError';
  }
}

export class PersistenceWriteError extends CalendarError {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${filePath}: ${detail}`);
    this.name = 'PersistenceWriteError';
  }
}
