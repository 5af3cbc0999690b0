/**
 * taskminder
 *
 * Personal task reminders in a terminal. A command given on the command line
 * runs first (a failure exits with status 1); then the interactive shell
 * starts so scheduled reminders keep firing until the user quits.
 */

import type { CalendarBridge } from "./calendar/bridge.js";
import { GoogleCalendarBridge } from "./calendar/google.js";
import { Shell } from "./core/cli.js";
import { createGoogleAuthFlow } from "./core/commands.js";
import { loadConfig, type AppConfig } from "./core/config.js";
import { loadEnvFile, resolveHomeDir } from "./core/env.js";
import { describeError } from "./core/errors.js";
import { formatReminderEvent } from "./core/format.js";
import { createComponentLogger, initCliLogging } from "./logging.js";
import { ReminderScheduler } from "./scheduler/index.js";
import { TaskService } from "./tasks/service.js";
import { TaskStore } from "./tasks/store.js";

// ============================================
// STARTUP
// ============================================

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    loadEnvFile(resolveHomeDir());
    config = loadConfig();
  } catch (error) {
    console.error(`Error: ${describeError(error, "Invalid configuration")}`);
    return 1;
  }

  const logger = initCliLogging({
    minLevel: config.logging.level,
    consoleLevel: config.logging.consoleLevel,
    logDir: config.logging.logDir ?? undefined,
  });
  const log = createComponentLogger("main");

  const store = new TaskStore();
  const scheduler = new ReminderScheduler({ store, config: config.reminders });
  const calendar: CalendarBridge | null = config.calendar
    ? new GoogleCalendarBridge({ config: config.calendar })
    : null;
  const tasks = new TaskService({
    store,
    scheduler,
    calendar,
    pushOnAdd: config.calendar?.pushOnAdd ?? false,
  });

  const shell = new Shell({
    context: {
      tasks,
      scheduler,
      recentLogs: count => logger.getRecentLogs(count),
      auth: config.calendar ? createGoogleAuthFlow(config.calendar) : null,
    },
  });

  scheduler.onEvent(event => shell.print(formatReminderEvent(event)));
  scheduler.start();
  log.info("taskminder started", { homeDir: config.homeDir, calendar: calendar !== null });

  let exitCode = 0;
  const argv = process.argv.slice(2);
  const outcome = argv.length > 0 ? await shell.execute(argv) : "ok";

  if (outcome === "ok") {
    shell.print("taskminder ready. Type 'help' for commands.");
    await shell.run();
  } else {
    exitCode = outcome === "failed" ? 1 : 0;
    shell.close();
  }

  scheduler.stop();
  log.info("taskminder stopped", { exitCode });
  await logger.close();
  return exitCode;
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    console.error("Fatal:", error);
    process.exit(1);
  });
