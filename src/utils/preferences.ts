import fs from 'node:fs/promises';
import path from 'node:path';
import type { KeyValueStore } from '../types.js';
import { readErrorMessage } from './http-client.js';

export const LAST_LOCATION_KEY = 'last_location';

export const createMemoryStore = (initial: Record<string, string> = {}): KeyValueStore => {
  const values = new Map<string, string>(Object.entries(initial));
  return {
    getString: async (key) => values.get(key) ?? null,
    setString: async (key, value) => {
      values.set(key, value);
    },
  };
};

const isNodeError = (error: unknown): error is NodeJS.ErrnoException => error instanceof Error && 'code' in error;

const readStoreFile = async (filePath: string): Promise<Record<string, string>> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return {};
    }
    return Object.fromEntries(
      Object.entries(parsed).filter((entry): entry is [string, string] => typeof entry[1] === 'string'),
    );
  } catch (error) {
    console.warn(`[Preferences] Ignoring unreadable store ${filePath}:`, readErrorMessage(error));
    return {};
  }
};

// JSON object on disk; every write rewrites the whole file.
export const createFileStore = (filePath: string): KeyValueStore => {
  const resolvedPath = path.resolve(filePath);
  return {
    getString: async (key) => {
      const values = await readStoreFile(resolvedPath);
      return values[key] ?? null;
    },
    setString: async (key, value) => {
      const values = await readStoreFile(resolvedPath);
      values[key] = value;
      await fs.mkdir(path.dirname(resolvedPath), { recursive: true });
      await fs.writeFile(resolvedPath, `${JSON.stringify(values, null, 2)}\n`, 'utf8');
    },
  };
};

export const readLastLocation = async (store: KeyValueStore): Promise<string | null> => {
  const saved = await store.getString(LAST_LOCATION_KEY);
  return saved && saved.trim() ? saved.trim() : null;
};

export const writeLastLocation = async (store: KeyValueStore, query: string): Promise<void> => {
  const trimmed = query.trim();
  if (!trimmed) {
    return;
  }
  await store.setString(LAST_LOCATION_KEY, trimmed);
};
