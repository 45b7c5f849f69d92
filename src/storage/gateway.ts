import path from 'node:path';
import { CalendarStore } from '../model/calendar-store.js';
import { PersistenceCorruptError, ReferentialViolationError } from '../model/errors.js';
import type { Color, StoreDocument } from '../schema/index.js';
import { readStoreFile, writeStoreFile } from './store-file.js';

export type LoadResult =
  | { kind: 'loaded'; store: CalendarStore }
  | { kind: 'created'; store: CalendarStore };

export interface PersistenceGateway {
  /** Throws PersistenceCorruptError when the store exists but cannot be used. */
  load(): LoadResult;
  /** Atomic whole-file write. Throws PersistenceWriteError. */
  save(doc: StoreDocument): void;
  /** Same as save, to a different location. */
  saveTo(doc: StoreDocument, targetPath: string): void;
  readonly location: string;
}

export interface DefaultSubcalendar {
  name: string;
  color: Color;
}

export const DEFAULT_SUBCALENDAR: DefaultSubcalendar = { name: 'Default', color: 'blue' };

export function getDefaultDataPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  const dataHome =
    process.env.XDG_DATA_HOME || path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.local', 'share');
  return path.join(dataHome, 'mcal', 'calendar.json');
}

export function createDefaultStore(defaults: DefaultSubcalendar = DEFAULT_SUBCALENDAR): CalendarStore {
  const store = CalendarStore.empty();
  store.createSubcalendar(defaults.name, defaults.color);
  return store;
}

export class FileStoreGateway implements PersistenceGateway {
  constructor(
    public readonly location: string,
    private readonly defaults: DefaultSubcalendar = DEFAULT_SUBCALENDAR
  ) {}

  load(): LoadResult {
    const file = readStoreFile(this.location);
    if (!file) {
      return { kind: 'created', store: createDefaultStore(this.defaults) };
    }
    try {
      return { kind: 'loaded', store: CalendarStore.fromDocument(file) };
    } catch (error) {
      if (error instanceof ReferentialViolationError) {
        throw new PersistenceCorruptError(this.location, error.message);
      }
      throw error;
    }
  }

  save(doc: StoreDocument): void {
    writeStoreFile(doc, this.location);
  }

  saveTo(doc: StoreDocument, targetPath: string): void {
    writeStoreFile(doc, path.resolve(targetPath));
  }
}
