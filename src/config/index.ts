import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export interface AppConfig {
  logLevel: LogLevel;
  logFile: string | null;
  logErrorFile: string | null;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function env(key: string, fallback: string): string {
  const val = process.env[key]?.trim();
  return val ? val : fallback;
}

function envOptional(key: string): string | null {
  const val = process.env[key]?.trim();
  return val ? val : null;
}

function envLogLevel(key: string, fallback: LogLevel): LogLevel {
  const val = env(key, fallback).toLowerCase();
  return LOG_LEVELS.find((level) => level === val) ?? fallback;
}

export const config: AppConfig = {
  logLevel: envLogLevel('LOG_LEVEL', 'info'),
  logFile: envOptional('LOG_FILE'),
  logErrorFile: envOptional('LOG_ERROR_FILE'),
};

export default config;
