import { createLogger } from './logger';

export interface AppConfig {
  lastAnimation?: string;
  position?: [number, number];
  opacity?: number;
  idleAnimation?: string;
}

/** Where the config document lives; the desktop host backs this with the app-config dir. */
export interface ConfigFile {
  read: () => Promise<string | null>;
  write: (text: string) => Promise<void>;
}

export const OPACITY_FLOOR = 0.3;

const log = createLogger('config');

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function toNonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toPosition(value: unknown): [number, number] | undefined {
  if (!Array.isArray(value) || value.length !== 2) {
    return undefined;
  }
  const [x, y] = value;
  if (typeof x !== 'number' || typeof y !== 'number') {
    return undefined;
  }
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    return undefined;
  }
  return [Math.round(x), Math.round(y)];
}

export function clampOpacity(value: number): number {
  if (!Number.isFinite(value)) {
    return 1;
  }
  return Math.max(OPACITY_FLOOR, Math.min(1, value));
}

/**
 * Accepts anything parsed from disk. Keys written by the older layout
 * (`last_gif`, `pos`) are read when the current ones are missing.
 */
export function normalizeConfig(raw: unknown): AppConfig {
  const record = asRecord(raw);
  if (!record) {
    return {};
  }

  const config: AppConfig = {};

  const lastAnimation = toNonEmptyString(record.lastAnimation) ?? toNonEmptyString(record.last_gif);
  if (lastAnimation !== undefined) {
    config.lastAnimation = lastAnimation;
  }

  const position = toPosition(record.position) ?? toPosition(record.pos);
  if (position !== undefined) {
    config.position = position;
  }

  if (typeof record.opacity === 'number' && Number.isFinite(record.opacity)) {
    config.opacity = record.opacity;
  }

  const idleAnimation = toNonEmptyString(record.idleAnimation);
  if (idleAnimation !== undefined) {
    config.idleAnimation = idleAnimation;
  }

  return config;
}

export async function loadConfig(file: ConfigFile): Promise<AppConfig> {
  let raw: string | null;
  try {
    raw = await file.read();
  } catch (error) {
    log.debug('Config not readable, using defaults', { error: String(error) });
    return {};
  }

  if (raw === null) {
    return {};
  }

  try {
    return normalizeConfig(JSON.parse(raw) as unknown);
  } catch (error) {
    log.warn('Config is not valid JSON, using defaults', { error: String(error) });
    return {};
  }
}

export async function saveConfig(file: ConfigFile, config: AppConfig): Promise<void> {
  try {
    await file.write(JSON.stringify(config, null, 2));
  } catch (error) {
    // Keep the pets running even if the disk write fails.
    log.warn('Config write failed', { error: String(error) });
  }
}
