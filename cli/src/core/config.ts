/**
 * Configuration
 *
 * Typed view of the environment. Every value has a default except the
 * Google credentials; the calendar is configured only when both the client
 * id and secret are set.
 */

import { join } from "path";
import { isLogLevel, type LogLevel } from "@taskminder/shared/logging";
import { ConfigError } from "./errors.js";
import { resolveHomeDir } from "./env.js";

// ============================================
// TYPES
// ============================================

export interface CalendarConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  calendarId: string;
  /** JSON file holding the OAuth tokens */
  tokenPath: string;
  /** Days ahead of now that `sync` pulls */
  syncWindowDays: number;
  /** Mirror newly added tasks to the calendar */
  pushOnAdd: boolean;
}

export interface AppConfig {
  homeDir: string;
  logging: {
    level: LogLevel;
    consoleLevel: LogLevel;
    /** null when the file transport is disabled */
    logDir: string | null;
  };
  reminders: {
    startLeadMinutes: number;
    endLeadMinutes: number;
  };
  calendar: CalendarConfig | null;
}

// ============================================
// DEFAULTS
// ============================================

const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_CONSOLE_LOG_LEVEL: LogLevel = "warn";
const DEFAULT_START_LEAD_MINUTES = 5;
const DEFAULT_END_LEAD_MINUTES = 2;
const DEFAULT_REDIRECT_URI = "http://localhost";
const DEFAULT_CALENDAR_ID = "primary";
const DEFAULT_SYNC_DAYS = 7;
const TOKEN_FILENAME = "google-token.json";

// ============================================
// LOADING
// ============================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const homeDir = resolveHomeDir(env);

  const logToFile = readBoolean(env, "TASKMINDER_LOG_FILE", true);
  const logDir = readString(env, "TASKMINDER_LOG_DIR") ?? join(homeDir, "logs");

  return {
    homeDir,
    logging: {
      level: readLogLevel(env, "TASKMINDER_LOG_LEVEL", DEFAULT_LOG_LEVEL),
      consoleLevel: readLogLevel(env, "TASKMINDER_CONSOLE_LOG_LEVEL", DEFAULT_CONSOLE_LOG_LEVEL),
      logDir: logToFile ? logDir : null,
    },
    reminders: {
      startLeadMinutes: readMinutes(env, "TASKMINDER_START_LEAD_MINUTES", DEFAULT_START_LEAD_MINUTES),
      endLeadMinutes: readMinutes(env, "TASKMINDER_END_LEAD_MINUTES", DEFAULT_END_LEAD_MINUTES),
    },
    calendar: loadCalendarConfig(env, homeDir),
  };
}

function loadCalendarConfig(env: NodeJS.ProcessEnv, homeDir: string): CalendarConfig | null {
  const clientId = readString(env, "GOOGLE_CLIENT_ID");
  const clientSecret = readString(env, "GOOGLE_CLIENT_SECRET");
  if (!clientId || !clientSecret) return null;

  const syncWindowDays = readMinutes(env, "TASKMINDER_SYNC_DAYS", DEFAULT_SYNC_DAYS);
  if (syncWindowDays === 0) {
    throw new ConfigError("TASKMINDER_SYNC_DAYS must be at least 1");
  }

  return {
    clientId,
    clientSecret,
    redirectUri: readString(env, "GOOGLE_REDIRECT_URI") ?? DEFAULT_REDIRECT_URI,
    calendarId: readString(env, "GOOGLE_CALENDAR_ID") ?? DEFAULT_CALENDAR_ID,
    tokenPath: join(homeDir, TOKEN_FILENAME),
    syncWindowDays,
    pushOnAdd: readBoolean(env, "TASKMINDER_CALENDAR_PUSH", true),
  };
}

// ============================================
// READERS
// ============================================

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** Non-negative whole number (minutes or days). */
function readMinutes(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(Number(raw))) {
    throw new ConfigError(`${name} must be a non-negative whole number, got "${raw}"`);
  }
  return Number(raw);
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = readString(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

function readLogLevel(env: NodeJS.ProcessEnv, name: string, fallback: LogLevel): LogLevel {
  const raw = readString(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (!isLogLevel(raw)) {
    throw new ConfigError(`${name} must be one of trace, debug, info, warn, error, fatal, silent; got "${raw}"`);
  }
  return raw;
}
