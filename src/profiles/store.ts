/**
 * profiles/store.ts
 *
 * Durable profile storage: one human-readable JSON file,
 *
 *     { "profiles": { "<name>": Profile, ... } }
 *
 * Key order is the user's profile order. Every entry is validated on the
 * way in and on the way out; a corrupted entry is logged and dropped.
 * A file that isn't JSON at all is an error and is never overwritten.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { Profile } from '../core/types';
import {
  ProfileExistsError,
  ProfileNotFoundError,
  StoreError,
  ValidationError,
  errorMessage
} from '../core/errors';
import { scopedLogger } from '../core/logger';
import { validateProfile } from './validation';

const log = scopedLogger('profiles/store');

interface ReadOptions {
  /** Import is all-or-nothing; the live store drops bad entries. */
  strict: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ProfileStore {
  constructor(readonly filePath: string) {}

  // -----------------------------------------------------------------------
  // File I/O
  // -----------------------------------------------------------------------

  private async readFile(file: string, options: ReadOptions): Promise<Profile[]> {
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (e) {
      if (isRecord(e) && e.code === 'ENOENT') {
        if (options.strict) throw new StoreError(`File not found: ${file}`, file);
        return [];
      }
      throw new StoreError(`Cannot read profiles: ${errorMessage(e)}`, file);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new StoreError(`Profiles file is not valid JSON: ${errorMessage(e)}`, file);
    }

    const entries = isRecord(parsed) ? parsed.profiles : undefined;
    if (!isRecord(entries)) {
      throw new StoreError('Profiles file has no "profiles" object', file);
    }

    const profiles: Profile[] = [];
    for (const [key, entry] of Object.entries(entries)) {
      try {
        validateProfile(entry);
        if (entry.name !== key) {
          throw new ValidationError('schema', `Entry "${key}" holds a profile named "${entry.name}"`);
        }
        profiles.push(entry);
      } catch (e) {
        if (options.strict) throw e;
        log.warn({ file, profile: key, error: errorMessage(e) }, 'Invalid profile in store: skipped');
      }
    }
    return profiles;
  }

  private async writeFile(file: string, profiles: readonly Profile[]): Promise<void> {
    const data: { profiles: Record<string, Profile> } = { profiles: {} };
    for (const profile of profiles) {
      data.profiles[profile.name] = profile;
    }

    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      const tmp = `${file}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
      await fs.rename(tmp, file);
    } catch (e) {
      throw new StoreError(`Cannot write profiles: ${errorMessage(e)}`, file);
    }
    log.debug({ file, count: profiles.length }, 'Profiles written');
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  /** Every valid profile, in the user's order. */
  async loadAll(): Promise<Profile[]> {
    return this.readFile(this.filePath, { strict: false });
  }

  async get(name: string): Promise<Profile> {
    const found = (await this.loadAll()).find(p => p.name === name);
    if (!found) throw new ProfileNotFoundError(name);
    return found;
  }

  // -----------------------------------------------------------------------
  // Mutations
  // -----------------------------------------------------------------------

  /**
   * Creates the profile, or replaces the one with the same name in place.
   * Writes exactly what it is given.
   */
  async save(profile: Profile): Promise<Profile> {
    validateProfile(profile);
    const profiles = await this.loadAll();
    const copy = structuredClone(profile);

    const index = profiles.findIndex(p => p.name === profile.name);
    if (index >= 0) profiles[index] = copy;
    else profiles.push(copy);

    await this.writeFile(this.filePath, profiles);
    log.info({ profile: profile.name, replaced: index >= 0 }, 'Profile saved');
    return structuredClone(copy);
  }

  async delete(name: string): Promise<void> {
    const profiles = await this.loadAll();
    const remaining = profiles.filter(p => p.name !== name);
    if (remaining.length === profiles.length) throw new ProfileNotFoundError(name);

    await this.writeFile(this.filePath, remaining);
    log.info({ profile: name }, 'Profile deleted');
  }

  /** Keeps the profile's position; bumps updatedAt. */
  async rename(oldName: string, newName: string, now = new Date()): Promise<Profile> {
    if (newName.trim().length === 0) {
      throw new ValidationError('empty-name', 'Profile name must not be empty');
    }
    const profiles = await this.loadAll();
    const index = profiles.findIndex(p => p.name === oldName);
    if (index < 0) throw new ProfileNotFoundError(oldName);
    if (oldName !== newName && profiles.some(p => p.name === newName)) throw new ProfileExistsError(newName);

    const renamed: Profile = { ...profiles[index], name: newName, updatedAt: now.toISOString() };
    profiles[index] = renamed;

    await this.writeFile(this.filePath, profiles);
    log.info({ from: oldName, to: newName }, 'Profile renamed');
    return renamed;
  }

  /** Swaps the profiles at two positions. */
  async move(fromIndex: number, toIndex: number): Promise<string[]> {
    const profiles = await this.loadAll();
    const inRange = (i: number): boolean => Number.isInteger(i) && i >= 0 && i < profiles.length;
    if (!inRange(fromIndex) || !inRange(toIndex)) {
      throw new ValidationError('schema', `Cannot move profile ${fromIndex} to ${toIndex}: ${profiles.length} profiles`, {
        fromIndex,
        toIndex
      });
    }

    [profiles[fromIndex], profiles[toIndex]] = [profiles[toIndex], profiles[fromIndex]];
    await this.writeFile(this.filePath, profiles);
    return profiles.map(p => p.name);
  }

  // -----------------------------------------------------------------------
  // Export / import
  // -----------------------------------------------------------------------

  async exportTo(file: string): Promise<number> {
    const profiles = await this.loadAll();
    await this.writeFile(file, profiles);
    log.info({ file, count: profiles.length }, 'Profiles exported');
    return profiles.length;
  }

  /** Merges another profiles file in; same-named profiles are replaced. */
  async importFrom(file: string): Promise<string[]> {
    const incoming = await this.readFile(file, { strict: true });
    const profiles = await this.loadAll();

    for (const profile of incoming) {
      const index = profiles.findIndex(p => p.name === profile.name);
      if (index >= 0) profiles[index] = profile;
      else profiles.push(profile);
    }

    await this.writeFile(this.filePath, profiles);
    log.info({ file, count: incoming.length }, 'Profiles imported');
    return incoming.map(p => p.name);
  }
}
