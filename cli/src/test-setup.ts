/**
 * Vitest setup: a silent logger so modules that log at construction time
 * don't auto-initialize a console transport.
 */

import { initLogger } from "@taskminder/shared/logging";

initLogger({
  minLevel: "silent",
  component: "taskminder",
  transports: [],
});
