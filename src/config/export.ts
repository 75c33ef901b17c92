import fs from 'fs-extra';
import path from 'path';
import dotenv from 'dotenv';
import { ZoneOptions } from '../types';
import { isValidLocale, isValidTimeZone } from '../ofx/time';
import { AppError, ErrorType } from '../utils/errors';

// Load environment variables from .env file
dotenv.config();

export const CONFIG_FILE_NAME = 'ofx-export.json';

export interface ExportConfig {
  databasePath: string;
  outputDir: string;
  zone: ZoneOptions;
}

interface ExportConfigFile {
  databasePath?: string;
  outputDir?: string;
  timeZone?: string;
  locale?: string;
}

const DEFAULTS = {
  databasePath: path.join('data', 'accounts.db'),
  outputDir: 'exports',
};

function readConfigFile(configPath: string): ExportConfigFile {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const raw: unknown = fs.readJsonSync(configPath);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `${CONFIG_FILE_NAME} must contain a JSON object`,
      context: { configPath },
    });
  }

  const file: ExportConfigFile = {};
  for (const key of ['databasePath', 'outputDir', 'timeZone', 'locale'] as const) {
    const value: unknown = Reflect.get(raw, key);
    if (value === undefined) continue;
    if (typeof value !== 'string' || value === '') {
      throw new AppError({
        type: ErrorType.CONFIGURATION_ERROR,
        message: `${key} in ${CONFIG_FILE_NAME} must be a non-empty string`,
        context: { configPath, key },
      });
    }
    file[key] = value;
  }
  return file;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Load export configuration
 * Priority: environment variables > ofx-export.json > defaults
 */
export function loadExportConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): ExportConfig {
  const file = readConfigFile(path.join(cwd, CONFIG_FILE_NAME));

  const databasePath = nonEmpty(env.OFX_DB_PATH) ?? file.databasePath ?? DEFAULTS.databasePath;
  const outputDir = nonEmpty(env.OFX_OUTPUT_DIR) ?? file.outputDir ?? DEFAULTS.outputDir;
  const timeZone = nonEmpty(env.OFX_TIMEZONE) ?? file.timeZone;
  const locale = nonEmpty(env.OFX_LOCALE) ?? file.locale;

  if (timeZone !== undefined && !isValidTimeZone(timeZone)) {
    throw new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `Unknown time zone: ${timeZone}`,
      context: { timeZone },
    });
  }

  if (locale !== undefined && !isValidLocale(locale)) {
    throw new AppError({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `Unknown locale: ${locale}`,
      context: { locale },
    });
  }

  const zone: ZoneOptions = {};
  if (timeZone !== undefined) zone.timeZone = timeZone;
  if (locale !== undefined) zone.locale = locale;

  return {
    databasePath: path.resolve(cwd, databasePath),
    outputDir: path.resolve(cwd, outputDir),
    zone,
  };
}

/**
 * Create a template ofx-export.json config file
 */
export function createConfigTemplate(cwd: string = process.cwd()): string {
  const configPath = path.join(cwd, CONFIG_FILE_NAME);
  const template: ExportConfigFile = {
    databasePath: DEFAULTS.databasePath,
    outputDir: DEFAULTS.outputDir,
    timeZone: 'America/Los_Angeles',
    locale: 'en-US',
  };

  fs.writeJsonSync(configPath, template, { spaces: 2 });
  return configPath;
}
