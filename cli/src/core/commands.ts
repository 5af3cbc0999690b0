/**
 * Command dispatch
 *
 * One entry point for both the process command line and the interactive
 * shell: `runCommand(args, ctx)` parses the command's flags, runs it against
 * the task service and writes user-facing lines to `ctx.output`.
 */

import { parseArgs } from "util";
import { formatPlainText, type LogEntry } from "@taskminder/shared/logging";
import { buildConsentUrl, createOAuthClient, exchangeCode } from "../calendar/auth.js";
import { createComponentLogger } from "../logging.js";
import type { ReminderScheduler } from "../scheduler/index.js";
import type { TaskService } from "../tasks/service.js";
import type { CalendarConfig } from "./config.js";
import { describeError, TaskminderError, ValidationError } from "./errors.js";
import { formatStatus, formatTaskList, HELP_TEXT } from "./format.js";

const DEFAULT_LOG_COUNT = 20;

// ============================================
// TYPES
// ============================================

export interface CommandOutput {
  info(line: string): void;
  error(line: string): void;
}

/** The two halves of the OAuth consent flow. */
export interface AuthFlow {
  consentUrl(): string;
  exchange(code: string): Promise<void>;
}

export interface CommandContext {
  tasks: TaskService;
  scheduler: ReminderScheduler;
  output: CommandOutput;
  /** Ask the user a question and resolve with the answer */
  prompt(question: string): Promise<string>;
  recentLogs(count: number): LogEntry[];
  /** null when Google credentials are not configured */
  auth: AuthFlow | null;
}

export type CommandOutcome = "ok" | "failed" | "quit";

type CommandHandler = (args: string[], ctx: CommandContext) => Promise<CommandOutcome> | CommandOutcome;

// ============================================
// DISPATCH
// ============================================

const COMMANDS: Record<string, CommandHandler> = {
  add: addCommand,
  list: listCommand,
  remove: removeCommand,
  sync: syncCommand,
  auth: authCommand,
  status: statusCommand,
  logs: logsCommand,
  help: helpCommand,
  quit: () => "quit",
  exit: () => "quit",
};

export async function runCommand(argv: string[], ctx: CommandContext): Promise<CommandOutcome> {
  const [name, ...args] = argv;
  if (name === undefined) return "ok";

  const handler = Object.prototype.hasOwnProperty.call(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!handler) {
    ctx.output.error(`Unknown command '${name}'. Type 'help' for the list of commands.`);
    return "failed";
  }

  try {
    return await handler(args, ctx);
  } catch (error) {
    if (!(error instanceof TaskminderError)) {
      createComponentLogger("cli").error("Command failed", error, { command: name });
    }
    ctx.output.error(`Error: ${describeError(error, `'${name}' failed`)}`);
    return "failed";
  }
}

/** Run an argument parser, turning its errors into ValidationError. */
function parseCommandArgs<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : String(error));
  }
}

// ============================================
// COMMANDS
// ============================================

async function addCommand(args: string[], ctx: CommandContext): Promise<CommandOutcome> {
  const { values, positionals } = parseCommandArgs(() => parseArgs({
    args,
    options: {
      recurring: { type: "boolean", short: "r", default: false },
      every: { type: "string", short: "e" },
    },
    allowPositionals: true,
    strict: true,
  }));

  if (positionals.length < 4 || positionals.length > 5) {
    throw new ValidationError(
      "Usage: add <title> <details> <start> <end> [--recurring [minutes]] [--every <minutes>]",
    );
  }

  const [title, details, start, end, positionalFrequency] = positionals;
  if (positionalFrequency !== undefined && values.every !== undefined) {
    throw new ValidationError("Give the frequency once, either as a number or with --every.");
  }
  const frequencyMinutes = values.every ?? positionalFrequency;

  const result = await ctx.tasks.addTask({
    title,
    details,
    start,
    end,
    // --every implies a recurring task
    recurring: values.recurring === true || values.every !== undefined,
    frequencyMinutes,
  });

  ctx.output.info(`Task '${result.task.title}' added with ID: ${result.task.id}`);
  if (result.calendarWarning) {
    ctx.output.error(`Warning: ${result.calendarWarning}`);
  } else if (result.eventId) {
    ctx.output.info("Added to Google Calendar.");
  }
  return "ok";
}

function listCommand(_args: string[], ctx: CommandContext): CommandOutcome {
  for (const line of formatTaskList(ctx.tasks.listTasks())) {
    ctx.output.info(line);
  }
  return "ok";
}

function removeCommand(args: string[], ctx: CommandContext): CommandOutcome {
  const [raw] = args;
  if (raw === undefined || args.length > 1) {
    throw new ValidationError("Usage: remove <id>");
  }
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(Number(raw))) {
    throw new ValidationError(`Invalid task id "${raw}"`);
  }

  const id = Number(raw);
  const removed = ctx.tasks.removeTask(id);
  if (!removed) {
    ctx.output.info(`Task with ID ${id} not found.`);
    return "ok";
  }

  ctx.output.info(`Task '${removed.task.title}' (ID: ${id}) removed.`);
  return "ok";
}

async function syncCommand(_args: string[], ctx: CommandContext): Promise<CommandOutcome> {
  const result = await ctx.tasks.syncFromCalendar();
  ctx.output.info(`Imported ${result.imported} event(s), skipped ${result.skipped} already imported.`);
  return "ok";
}

async function authCommand(_args: string[], ctx: CommandContext): Promise<CommandOutcome> {
  if (!ctx.auth) {
    ctx.output.error("Google Calendar is not configured. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET.");
    return "failed";
  }

  ctx.output.info("Open this URL in a browser and grant access:");
  ctx.output.info(ctx.auth.consentUrl());
  const code = (await ctx.prompt("Paste the authorization code: ")).trim();
  if (!code) {
    throw new ValidationError("No authorization code given.");
  }

  await ctx.auth.exchange(code);
  ctx.output.info("Google Calendar authorized.");
  return "ok";
}

function statusCommand(_args: string[], ctx: CommandContext): CommandOutcome {
  const lines = formatStatus(ctx.scheduler.getStatus(), ctx.tasks.listTasks().length);
  lines.push(`Calendar: ${ctx.tasks.hasCalendar ? "configured" : "not configured"}`);
  for (const line of lines) {
    ctx.output.info(line);
  }
  return "ok";
}

function logsCommand(args: string[], ctx: CommandContext): CommandOutcome {
  const [raw] = args;
  let count = DEFAULT_LOG_COUNT;
  if (raw !== undefined) {
    if (!/^\d+$/.test(raw) || Number(raw) === 0) {
      throw new ValidationError(`Invalid count "${raw}"`);
    }
    count = Number(raw);
  }

  const entries = ctx.recentLogs(count);
  if (entries.length === 0) {
    ctx.output.info("No log entries.");
    return "ok";
  }
  for (const entry of entries) {
    ctx.output.info(formatPlainText(entry));
  }
  return "ok";
}

function helpCommand(_args: string[], ctx: CommandContext): CommandOutcome {
  for (const line of HELP_TEXT) {
    ctx.output.info(line);
  }
  return "ok";
}

// ============================================
// AUTH FLOW
// ============================================

export function createGoogleAuthFlow(config: CalendarConfig): AuthFlow {
  const client = createOAuthClient(config);
  return {
    consentUrl: () => buildConsentUrl(client),
    exchange: code => exchangeCode(config, client, code),
  };
}
