import { promises as fsp } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import config from '../config/index.js';
import logger from '../utils/logger.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { PersistFailedError, errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/output.js';
import type { ProfileState, StateValue } from '../types/device.js';

const stateValueSchema: z.ZodType<StateValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(stateValueSchema), z.record(stateValueSchema)])
);
const profileStateSchema = z.record(stateValueSchema);

/** The subset of fs/promises the store touches. */
export interface StateFileSystem {
  mkdir(path: string, options: { recursive: true }): Promise<unknown>;
  readFile(path: string, encoding: 'utf-8'): Promise<string>;
  writeFile(path: string, data: string, encoding: 'utf-8'): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(path: string): Promise<void>;
}

export interface ProfileStoreOptions {
  dir?: string;
  attempts?: number;
  backoffMs?: number;
  fs?: StateFileSystem;
}

function isNotFound(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

function isStateObject(value: StateValue | undefined): value is ProfileState {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Merges `patch` into `base` without mutating either. Nested objects merge
 * recursively, a null value deletes the key, anything else replaces.
 */
export function mergeState(base: ProfileState, patch: ProfileState): ProfileState {
  const merged: ProfileState = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete merged[key];
      continue;
    }
    const current = merged[key];
    if (isStateObject(value) && isStateObject(current)) {
      merged[key] = mergeState(current, value);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Durable per-device facts, one JSON file per device key. Updates for one
 * key are serialized; different keys never wait on each other. Files are
 * replaced by rename so a reader sees the old or the new state, never a
 * partial one.
 */
export class ProfileStore {
  private readonly dir: string;
  private readonly attempts: number;
  private readonly backoffMs: number;
  private readonly fs: StateFileSystem;
  private readonly lock = new KeyedLock();

  constructor(options: ProfileStoreOptions = {}) {
    this.dir = options.dir ?? config.paths.stateDir;
    this.attempts = options.attempts ?? config.persistence.attempts;
    this.backoffMs = options.backoffMs ?? config.persistence.backoffMs;
    this.fs = options.fs ?? fsp;
  }

  pathFor(deviceKey: string): string {
    return join(this.dir, `${encodeURIComponent(deviceKey)}.json`);
  }

  async read(deviceKey: string): Promise<ProfileState> {
    const file = this.pathFor(deviceKey);
    let text: string;
    try {
      text = await this.fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return {};
      }
      throw error;
    }

    if (text.trim().length === 0) {
      return {};
    }
    try {
      return profileStateSchema.parse(JSON.parse(text));
    } catch (error) {
      logger.warn('Ignoring unreadable profile state', { device: deviceKey, file, error: errorMessage(error) });
      return {};
    }
  }

  update(deviceKey: string, patch: ProfileState): Promise<ProfileState> {
    return this.lock.withLock(deviceKey, async () => {
      const current = await this.read(deviceKey);
      const next = mergeState(current, patch);
      await this.persist(deviceKey, next);
      logger.debug('Profile state updated', { device: deviceKey, keys: Object.keys(patch) });
      return next;
    });
  }

  private async persist(deviceKey: string, state: ProfileState): Promise<void> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        await this.writeAtomically(this.pathFor(deviceKey), JSON.stringify(state, null, 2));
        return;
      } catch (error) {
        lastError = error;
        logger.warn('Persisting profile state failed', {
          device: deviceKey,
          attempt,
          attempts: this.attempts,
          error: errorMessage(error),
        });
        if (attempt < this.attempts) {
          await delay(this.backoffMs * 2 ** (attempt - 1));
        }
      }
    }
    throw new PersistFailedError(deviceKey, this.attempts, lastError);
  }

  private async writeAtomically(file: string, data: string): Promise<void> {
    await this.fs.mkdir(this.dir, { recursive: true });
    const tmp = `${file}.${uuidv4()}.tmp`;
    try {
      await this.fs.writeFile(tmp, data, 'utf-8');
      await this.fs.rename(tmp, file);
    } catch (error) {
      await this.fs.unlink(tmp).catch((cleanupError: unknown) => {
        logger.debug('Temp state file not removed', { file: tmp, error: errorMessage(cleanupError) });
      });
      throw error;
    }
  }
}
