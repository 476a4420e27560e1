/**
 * Settings Manager Service
 *
 * Provides settings persistence using JSON file storage. Settings are stored
 * at %APPDATA%/master-dispatch/settings.json (Windows) or
 * ~/.config/master-dispatch/settings.json (other platforms).
 *
 * Precedence: CLI flags > environment > settings file > defaults.
 * Invalid values in the file fall back to their defaults field by field.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DEFAULT_SETTINGS } from '../../shared/types';
import type { AppSettings } from '../../shared/types';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for configuring the SettingsManager */
export interface SettingsManagerOptions {
  /** Custom directory to store settings file. Defaults to platform-specific appdata */
  settingsDir?: string;
  /** Custom filename for the settings file. Defaults to 'settings.json' */
  fileName?: string;
  /** Receives warnings about unreadable or unwritable settings files */
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'master-dispatch';

const DEFAULT_SETTINGS_FILENAME = 'settings.json';

/** Environment variables read by applyEnvironmentOverrides() */
export const ENV_ENDPOINT = 'MASTER_DISPATCH_ENDPOINT';
export const ENV_OUTPUT = 'MASTER_DISPATCH_OUTPUT';

const MIN_DOMINANT_SHARE = 0.5;
const MAX_DOMINANT_SHARE = 0.95;

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the default settings directory path based on the platform.
 * On Windows: %APPDATA%/master-dispatch/
 * On other platforms: ~/.config/master-dispatch/
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Validates a concurrency value and clamps it to the valid range (1-10).
 */
export function validateConcurrency(value: unknown): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return DEFAULT_SETTINGS.concurrency;
  }
  return Math.max(1, Math.min(10, Math.round(value)));
}

/**
 * Accepts http(s) URLs only.
 */
export function validateEndpoint(value: unknown): boolean {
  const endpoint = nonEmptyString(value);
  return endpoint !== null && /^https?:\/\/\S+$/i.test(endpoint);
}

/**
 * Validates and sanitizes a partial settings object, merging with defaults.
 * Returns a complete, valid AppSettings object.
 */
export function validateSettings(partial: unknown): AppSettings {
  const validated: AppSettings = { ...DEFAULT_SETTINGS, searchRoots: [...DEFAULT_SETTINGS.searchRoots] };
  if (!isRecord(partial)) {
    return validated;
  }
  const raw = partial;

  // outputDir: non-empty string
  const outputDir = nonEmptyString(raw.outputDir);
  if (outputDir) {
    validated.outputDir = outputDir;
  }

  // concurrency: number (1-10)
  if (raw.concurrency !== undefined) {
    validated.concurrency = validateConcurrency(raw.concurrency);
  }

  // masteringEndpoint: http(s) URL
  if (validateEndpoint(raw.masteringEndpoint)) {
    validated.masteringEndpoint = String(raw.masteringEndpoint).trim();
  }

  // referenceLibraryDir: string | null
  if (raw.referenceLibraryDir === null || typeof raw.referenceLibraryDir === 'string') {
    validated.referenceLibraryDir = nonEmptyString(raw.referenceLibraryDir);
  }

  // searchRoots: string[] (blank entries dropped)
  if (Array.isArray(raw.searchRoots)) {
    validated.searchRoots = raw.searchRoots.flatMap((root) => {
      const value = nonEmptyString(root);
      return value ? [value] : [];
    });
  }

  // blendDominantShare: number (0.5-0.95)
  if (
    typeof raw.blendDominantShare === 'number' &&
    raw.blendDominantShare >= MIN_DOMINANT_SHARE &&
    raw.blendDominantShare <= MAX_DOMINANT_SHARE
  ) {
    validated.blendDominantShare = raw.blendDominantShare;
  }

  // numberedRatio: number in (0, 1]
  if (typeof raw.numberedRatio === 'number' && raw.numberedRatio > 0 && raw.numberedRatio <= 1) {
    validated.numberedRatio = raw.numberedRatio;
  }

  // albumMinTracks / albumMaxTracks: integers, 2 <= min <= max
  const minTracks = Number.isInteger(raw.albumMinTracks) ? Number(raw.albumMinTracks) : validated.albumMinTracks;
  const maxTracks = Number.isInteger(raw.albumMaxTracks) ? Number(raw.albumMaxTracks) : validated.albumMaxTracks;
  if (minTracks >= 2 && maxTracks >= minTracks) {
    validated.albumMinTracks = minTracks;
    validated.albumMaxTracks = maxTracks;
  }

  // recordHistory: boolean
  if (typeof raw.recordHistory === 'boolean') {
    validated.recordHistory = raw.recordHistory;
  }

  // logDir: string | null
  if (raw.logDir === null || typeof raw.logDir === 'string') {
    validated.logDir = nonEmptyString(raw.logDir);
  }

  return validated;
}

/**
 * Applies MASTER_DISPATCH_ENDPOINT and MASTER_DISPATCH_OUTPUT on top of
 * `settings`. Invalid values are ignored.
 */
export function applyEnvironmentOverrides(
  settings: AppSettings,
  env: NodeJS.ProcessEnv = process.env,
): AppSettings {
  return validateSettings({
    ...settings,
    masteringEndpoint: env[ENV_ENDPOINT] ?? settings.masteringEndpoint,
    outputDir: env[ENV_OUTPUT] ?? settings.outputDir,
  });
}

/**
 * Serializes settings to a JSON string for file storage.
 */
export function serializeSettings(settings: AppSettings): string {
  return JSON.stringify(settings, null, 2);
}

/**
 * Parses settings JSON.
 *
 * @returns the parsed object, or null if the JSON is invalid or not an object
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error: unknown) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
  return isRecord(parsed) ? parsed : null;
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Manages application settings with file-based persistence.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize(); // Load settings from file (or use defaults)
 *
 * const settings = manager.get(); // Read current settings
 * await manager.save({ concurrency: 3 }); // Partial update + persist
 * ```
 */
export class SettingsManager {
  private settings: AppSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private readonly logger: Logger | null;
  private initialized = false;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getDefaultSettingsDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.logger = options?.logger ?? null;
    this.settings = validateSettings({});
  }

  /**
   * Loads settings from file. A missing file means defaults; an unreadable
   * or corrupt one is logged and also means defaults.
   */
  async initialize(): Promise<void> {
    const filePath = this.getFilePath();
    try {
      const content = await fs.promises.readFile(filePath, 'utf-8');
      const parsed = deserializeSettings(content);
      if (parsed) {
        this.settings = validateSettings(parsed);
      } else {
        this.logger?.warn(`Settings file is not a JSON object, using defaults: ${filePath}`, { step: 'configuring' });
      }
    } catch (error: unknown) {
      if (!isMissingFile(error)) {
        this.logger?.warn(`Could not read settings file, using defaults: ${describeError(error)}`, { step: 'configuring' });
      }
    }

    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Gets the current settings (copy to prevent mutation).
   */
  get(): AppSettings {
    return { ...this.settings, searchRoots: [...this.settings.searchRoots] };
  }

  /**
   * Updates settings with a partial update and persists to file.
   * Validates all values and merges with current settings.
   *
   * @throws when the settings file cannot be written
   */
  async save(updates: Partial<AppSettings>): Promise<AppSettings> {
    this.settings = validateSettings({ ...this.settings, ...updates });

    await fs.promises.mkdir(this.settingsDir, { recursive: true });
    await fs.promises.writeFile(this.getFilePath(), serializeSettings(this.settings), 'utf-8');

    return this.get();
  }

  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }

  getSettingsDir(): string {
    return this.settingsDir;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
