/**
 * Settings Manager Service
 *
 * Persists library settings as JSON at %APPDATA%/media-metadata-lookup/settings.json
 * (Windows) or ~/.config/media-metadata-lookup/settings.json (other platforms).
 *
 * Features:
 * - JSON-based file persistence
 * - Validation with safe defaults
 * - Settings change notification via listener pattern
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { LookupSettings, DEFAULT_SETTINGS } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for configuring the SettingsManager */
export interface SettingsManagerOptions {
  /** Custom directory to store settings file. Defaults to platform-specific appdata */
  settingsDir?: string;
  /** Custom filename for the settings file. Defaults to 'settings.json' */
  fileName?: string;
}

/** Listener callback type for settings changes */
export type SettingsChangeListener = (settings: LookupSettings) => void;

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'media-metadata-lookup';

const DEFAULT_SETTINGS_FILENAME = 'settings.json';

/** Allowed range for requestTimeoutMs */
const MIN_TIMEOUT_MS = 1000;
const MAX_TIMEOUT_MS = 60000;

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the default settings directory path based on the platform.
 * On Windows: %APPDATA%/media-metadata-lookup/
 * On other platforms: ~/.config/media-metadata-lookup/
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

/**
 * Validates a request timeout and clamps it to 1000-60000 ms.
 * Non-numeric values fall back to the default.
 */
export function validateTimeout(value: unknown): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return DEFAULT_SETTINGS.requestTimeoutMs;
  }
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, Math.round(value)));
}

/**
 * Checks that a base URL is an absolute http(s) URL.
 */
export function validateApiBaseUrl(value: unknown): boolean {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return false;
  }
  try {
    const url = new URL(value.trim());
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function readOptionalPath(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Validates and sanitizes a partial settings object, merging with defaults.
 * Returns a complete, valid LookupSettings object.
 */
export function validateSettings(partial: unknown): LookupSettings {
  if (partial === null || partial === undefined || typeof partial !== 'object') {
    return { ...DEFAULT_SETTINGS };
  }

  const raw = (key: keyof LookupSettings): unknown => Reflect.get(partial, key);
  const validated: LookupSettings = { ...DEFAULT_SETTINGS };

  const apiBaseUrl = raw('apiBaseUrl');
  if (validateApiBaseUrl(apiBaseUrl) && typeof apiBaseUrl === 'string') {
    validated.apiBaseUrl = apiBaseUrl.trim().replace(/\/+$/, '');
  }

  if (raw('requestTimeoutMs') !== undefined) {
    validated.requestTimeoutMs = validateTimeout(raw('requestTimeoutMs'));
  }

  const userAgent = raw('userAgent');
  if (typeof userAgent === 'string' && userAgent.trim().length > 0) {
    validated.userAgent = userAgent.trim();
  }

  const accessToken = raw('accessToken');
  if (typeof accessToken === 'string') {
    validated.accessToken = accessToken.trim();
  }

  const useLocalCache = raw('useLocalCache');
  if (typeof useLocalCache === 'boolean') {
    validated.useLocalCache = useLocalCache;
  }

  validated.logDir = readOptionalPath(raw('logDir'));

  const logLevel = raw('logLevel');
  if (logLevel === 'ERROR' || logLevel === 'WARN' || logLevel === 'INFO') {
    validated.logLevel = logLevel;
  }

  return validated;
}

/**
 * Serializes settings to a JSON string for file storage.
 */
export function serializeSettings(settings: LookupSettings): string {
  return JSON.stringify(settings, null, 2);
}

/**
 * Parses a settings file. Returns null if the JSON is invalid or not an object.
 */
export function deserializeSettings(json: string): object | null {
  try {
    const parsed: unknown = JSON.parse(json);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return parsed;
    }
    return null;
  } catch {
    return null;
  }
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Manages library settings with file-based persistence.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize(); // Load settings from file (or use defaults)
 *
 * const settings = manager.get();
 * await manager.save({ requestTimeoutMs: 5000 }); // Partial update + persist
 * await manager.reset(); // Reset to defaults + persist
 * ```
 */
export class SettingsManager {
  private settings: LookupSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private readonly listeners: SettingsChangeListener[] = [];
  private initialized = false;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getDefaultSettingsDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.settings = { ...DEFAULT_SETTINGS };
  }

  /**
   * Loads settings from file. A missing or corrupt file leaves the defaults
   * in place; other read errors propagate.
   */
  async initialize(): Promise<void> {
    let content: string | null = null;
    try {
      content = await fs.promises.readFile(this.getFilePath(), 'utf-8');
    } catch (error: unknown) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }

    if (content !== null) {
      const parsed = deserializeSettings(content);
      if (parsed) {
        this.settings = validateSettings(parsed);
      }
    }

    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Gets a copy of the current settings.
   */
  get(): LookupSettings {
    return { ...this.settings };
  }

  /**
   * Merges a partial update, validates, persists and notifies listeners.
   *
   * @returns The updated settings
   */
  async save(updates: Partial<LookupSettings>): Promise<LookupSettings> {
    this.settings = validateSettings({ ...this.settings, ...updates });

    await this.writeToFile();
    this.notifyListeners();

    return { ...this.settings };
  }

  /**
   * Resets all settings to defaults and persists.
   */
  async reset(): Promise<LookupSettings> {
    this.settings = { ...DEFAULT_SETTINGS };

    await this.writeToFile();
    this.notifyListeners();

    return { ...this.settings };
  }

  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }

  getSettingsDir(): string {
    return this.settingsDir;
  }

  /**
   * Registers a listener for settings changes.
   * Returns an unsubscribe function.
   */
  onChange(listener: SettingsChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  getListenerCount(): number {
    return this.listeners.length;
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private async writeToFile(): Promise<void> {
    await fs.promises.mkdir(this.settingsDir, { recursive: true });
    await fs.promises.writeFile(this.getFilePath(), serializeSettings(this.settings), 'utf-8');
  }

  private notifyListeners(): void {
    const settingsCopy = { ...this.settings };
    for (const listener of [...this.listeners]) {
      listener(settingsCopy);
    }
  }
}
