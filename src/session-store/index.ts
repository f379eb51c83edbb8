/**
 * Session Store Module
 *
 * Responsibilities:
 * - Persist and load per-service authentication state across restarts
 * - Keep each service's state in its own directory (no cross-service reads)
 * - Write atomically: temp file in the same directory, then rename
 * - Serialize writes per service
 * - Track probe outcomes (valid / expired) without touching the auth blob
 *
 * Layout:
 * - <root>/<serviceId>/profile.json
 *
 * A service that was never authenticated loads as `{ found: false }`;
 * callers treat that as "interactive login required", not as an error.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import type {
  AuthState,
  AuthStatus,
  Logger,
  ServiceId,
  ServiceProfile,
} from '../types/index.js';
import { ServiceLockManager } from '../locks/index.js';
import { createConsoleLogger } from '../observability/index.js';

export type { AuthState, ServiceProfile };

export type LoadResult =
  | { found: true; authState: AuthState; profile: ServiceProfile }
  | { found: false; profile: ServiceProfile | null };

export interface SaveOptions {
  /** ISO-8601 time after which the state must be considered expired */
  expiresAt?: string | null;
}

export interface SessionStore {
  save(serviceId: ServiceId, authState: AuthState, options?: SaveOptions): Promise<ServiceProfile>;
  load(serviceId: ServiceId): Promise<LoadResult>;
  invalidate(serviceId: ServiceId): Promise<void>;
  getProfile(serviceId: ServiceId): Promise<ServiceProfile | null>;
  markStatus(serviceId: ServiceId, status: AuthStatus): Promise<ServiceProfile | null>;
  listServices(): Promise<ServiceId[]>;
}

export interface SessionStoreOptions {
  /** Profiles not updated for this long load as expired */
  maxAgeMs?: number | null;
  logger?: Logger;
  /** Clock override for tests */
  now?: () => number;
}

// Never integer-like, so per-service maps keep insertion order
export const SERVICE_ID_PATTERN = /^[a-z][a-z0-9_-]*$/;
const PROFILE_FILE = 'profile.json';

const StoredCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expires: z.number().optional(),
});

const AuthStateSchema = z.object({
  cookies: z.array(StoredCookieSchema),
  localStorage: z.record(z.string()),
  data: z.record(z.unknown()).optional(),
});

export const ServiceProfileSchema = z.object({
  serviceId: z.string(),
  persistedAuthState: AuthStateSchema.nullable(),
  authStatus: z.enum(['unknown', 'valid', 'expired']),
  lastValidatedAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  expiresAt: z.string().nullable(),
});

/**
 * Reject ids that could address a path outside the service's directory
 */
export function assertValidServiceId(serviceId: string): void {
  if (!SERVICE_ID_PATTERN.test(serviceId)) {
    throw new Error(
      `Invalid serviceId "${serviceId}": expected a lowercase letter, then lowercase letters, digits, "-" or "_"`
    );
  }
}

/**
 * Apply age and expiry rules to a stored profile
 */
function withEffectiveStatus(
  profile: ServiceProfile,
  now: number,
  maxAgeMs: number | null
): ServiceProfile {
  const expiredByDate = profile.expiresAt !== null && Date.parse(profile.expiresAt) <= now;
  const expiredByAge = maxAgeMs !== null && now - Date.parse(profile.updatedAt) > maxAgeMs;

  if ((expiredByDate || expiredByAge) && profile.authStatus !== 'expired') {
    return { ...profile, authStatus: 'expired' };
  }
  return profile;
}

function toLoadResult(profile: ServiceProfile | null): LoadResult {
  if (!profile || !profile.persistedAuthState) {
    return { found: false, profile };
  }
  return { found: true, authState: profile.persistedAuthState, profile };
}

/**
 * Shared save / markStatus / invalidate logic; subclasses supply raw I/O
 */
abstract class BaseSessionStore implements SessionStore {
  protected readonly maxAgeMs: number | null;
  protected readonly logger: Logger;
  protected readonly now: () => number;
  private readonly writeLocks = new ServiceLockManager();

  constructor(options: SessionStoreOptions = {}) {
    this.maxAgeMs = options.maxAgeMs ?? null;
    this.logger = options.logger ?? createConsoleLogger('session-store');
    this.now = options.now ?? Date.now;
  }

  protected abstract readProfile(serviceId: ServiceId): Promise<ServiceProfile | null>;
  protected abstract writeProfile(profile: ServiceProfile): Promise<void>;
  abstract listServices(): Promise<ServiceId[]>;

  async save(serviceId: ServiceId, authState: AuthState, options: SaveOptions = {}): Promise<ServiceProfile> {
    assertValidServiceId(serviceId);
    return this.writeLocks.withLock(serviceId, 'save', async () => {
      const existing = await this.readProfile(serviceId);
      const timestamp = new Date(this.now()).toISOString();
      const profile: ServiceProfile = {
        serviceId,
        persistedAuthState: authState,
        authStatus: existing?.authStatus === 'valid' ? 'valid' : 'unknown',
        lastValidatedAt: existing?.lastValidatedAt ?? null,
        createdAt: existing?.createdAt ?? timestamp,
        updatedAt: timestamp,
        expiresAt: options.expiresAt ?? null,
      };
      await this.writeProfile(profile);
      this.logger.debug('Session state saved', { serviceId, cookies: authState.cookies.length });
      return profile;
    });
  }

  async load(serviceId: ServiceId): Promise<LoadResult> {
    const profile = await this.getProfile(serviceId);
    return toLoadResult(profile);
  }

  async getProfile(serviceId: ServiceId): Promise<ServiceProfile | null> {
    assertValidServiceId(serviceId);
    const profile = await this.readProfile(serviceId);
    return profile ? withEffectiveStatus(profile, this.now(), this.maxAgeMs) : null;
  }

  /**
   * Record the outcome of an authentication probe
   *
   * @returns Updated profile, or null when the service has no profile
   */
  async markStatus(serviceId: ServiceId, status: AuthStatus): Promise<ServiceProfile | null> {
    assertValidServiceId(serviceId);
    return this.writeLocks.withLock(serviceId, 'markStatus', async () => {
      const existing = await this.readProfile(serviceId);
      if (!existing) {
        return null;
      }
      const timestamp = new Date(this.now()).toISOString();
      const profile: ServiceProfile = {
        ...existing,
        authStatus: status,
        lastValidatedAt: status === 'unknown' ? existing.lastValidatedAt : timestamp,
      };
      await this.writeProfile(profile);
      this.logger.info('Session status recorded', { serviceId, status });
      return profile;
    });
  }

  /**
   * Drop the persisted auth state (logout or detected expiry).
   * The profile record is kept, marked expired, for later re-login.
   */
  async invalidate(serviceId: ServiceId): Promise<void> {
    assertValidServiceId(serviceId);
    await this.writeLocks.withLock(serviceId, 'invalidate', async () => {
      const existing = await this.readProfile(serviceId);
      if (!existing) {
        return;
      }
      await this.writeProfile({
        ...existing,
        persistedAuthState: null,
        authStatus: 'expired',
        updatedAt: new Date(this.now()).toISOString(),
      });
      this.logger.info('Session invalidated', { serviceId });
    });
  }
}

/**
 * File-backed session store
 */
export class FileSessionStore extends BaseSessionStore {
  private readonly rootDir: string;

  constructor(rootDir: string, options: SessionStoreOptions = {}) {
    super(options);
    this.rootDir = rootDir;
  }

  /**
   * Directory holding one service's state
   */
  serviceDir(serviceId: ServiceId): string {
    assertValidServiceId(serviceId);
    return join(this.rootDir, serviceId);
  }

  protected async readProfile(serviceId: ServiceId): Promise<ServiceProfile | null> {
    const path = join(this.serviceDir(serviceId), PROFILE_FILE);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (parseError) {
      this.logger.error('Session profile is not valid JSON; treating as absent', {
        serviceId,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      return null;
    }

    const parsed = ServiceProfileSchema.safeParse(parsedJson);
    if (!parsed.success || parsed.data.serviceId !== serviceId) {
      this.logger.error('Session profile failed schema check; treating as absent', { serviceId });
      return null;
    }
    return parsed.data;
  }

  protected async writeProfile(profile: ServiceProfile): Promise<void> {
    const dir = this.serviceDir(profile.serviceId);
    await mkdir(dir, { recursive: true, mode: 0o700 });

    const target = join(dir, PROFILE_FILE);
    const tmp = join(dir, `${PROFILE_FILE}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`);

    try {
      await writeFile(tmp, JSON.stringify(profile, null, 2), { encoding: 'utf-8', mode: 0o600 });
      await rename(tmp, target);
    } catch (error) {
      await unlink(tmp).catch((cleanupError: unknown) => {
        if (!isNotFound(cleanupError)) {
          this.logger.warn('Failed to remove temp session file', { tmp });
        }
      });
      throw error;
    }
  }

  async listServices(): Promise<ServiceId[]> {
    let entries: string[];
    try {
      entries = await readdir(this.rootDir);
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
    return entries.filter((entry) => SERVICE_ID_PATTERN.test(entry)).sort();
  }
}

/**
 * In-memory session store for testing and development
 */
export class MemorySessionStore extends BaseSessionStore {
  private profiles: Map<ServiceId, ServiceProfile> = new Map();

  protected async readProfile(serviceId: ServiceId): Promise<ServiceProfile | null> {
    const profile = this.profiles.get(serviceId);
    return profile ? structuredClone(profile) : null;
  }

  protected async writeProfile(profile: ServiceProfile): Promise<void> {
    this.profiles.set(profile.serviceId, structuredClone(profile));
  }

  async listServices(): Promise<ServiceId[]> {
    return Array.from(this.profiles.keys()).sort();
  }

  /**
   * Remove everything (useful for test cleanup)
   */
  clear(): void {
    this.profiles.clear();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
