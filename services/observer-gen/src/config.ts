import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';

export interface ObserverConfig {
  contentDir: string;
  slotFontFamily: string;
  slotFontSize: number;
  colorSummary: boolean;
}

const ENV = {
  OBSERVER_CONTENT_DIR: 'OBSERVER_CONTENT_DIR',
  OBSERVER_SLOT_FONT_FAMILY: 'OBSERVER_SLOT_FONT_FAMILY',
  OBSERVER_SLOT_FONT_SIZE: 'OBSERVER_SLOT_FONT_SIZE',
  OBSERVER_COLOR_SUMMARY: 'OBSERVER_COLOR_SUMMARY',
  NO_COLOR: 'NO_COLOR',
} as const;

const DEFAULT_CONTENT_DIR = 'content';
const DEFAULT_FONT_FAMILY = 'Arial Narrow, Arial, sans-serif';
const DEFAULT_FONT_SIZE = 300;

const ENV_PATH = join(dirname(fileURLToPath(import.meta.url)), '..', '.env');

let cachedConfig: ObserverConfig | undefined;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ObserverConfig {
  const contentDir = resolve(process.cwd(), optionalEnv(env, ENV.OBSERVER_CONTENT_DIR) ?? DEFAULT_CONTENT_DIR);
  const slotFontFamily = optionalEnv(env, ENV.OBSERVER_SLOT_FONT_FAMILY) ?? DEFAULT_FONT_FAMILY;
  const slotFontSize = parsePositiveInt(env, ENV.OBSERVER_SLOT_FONT_SIZE, DEFAULT_FONT_SIZE);
  const colorFlag = optionalEnv(env, ENV.OBSERVER_COLOR_SUMMARY);
  const colorSummary = colorFlag !== undefined ? parseBoolean(colorFlag) : !optionalEnv(env, ENV.NO_COLOR);

  return {
    contentDir,
    slotFontFamily,
    slotFontSize,
    colorSummary,
  };
}

function optionalEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (!value || !value.trim()) {
    return undefined;
  }
  return value.trim();
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = optionalEnv(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return ['1', 'true', 'yes', 'on'].includes(normalized);
}

export function getConfig(): ObserverConfig {
  if (!cachedConfig) {
    loadEnv({ path: ENV_PATH });
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = undefined;
}
