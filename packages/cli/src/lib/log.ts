/**
 * CLI Logging
 *
 * - stdout: results only (can be piped)
 * - stderr: status, warnings, errors, debug
 *
 * Levels: info by default, debug with --verbose or SVCSYNC_DEBUG=1,
 * errors only with --quiet.
 *
 * `logger` adapts this module to the core's `Logger` handle, so messages
 * from the session manager and the registry synchronizer land here too.
 */

import type { Logger } from "@svcsync/core";
import { ui } from "@/lib/ui";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = process.env.SVCSYNC_DEBUG === "1" ? "debug" : "info";

function setLevel(level: LogLevel) {
  currentLevel = level;
}

function setVerbose(verbose: boolean) {
  currentLevel = verbose ? "debug" : "info";
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

// =============================================================================
// Core logging functions
// =============================================================================

/** Result output on stdout */
function print(message: string) {
  console.log(message);
}

function debug(message: string) {
  if (shouldLog("debug")) {
    console.error(ui.theme.dim(`[debug] ${message}`));
  }
}

function info(message: string) {
  if (shouldLog("info")) {
    console.error(message);
  }
}

function warn(message: string) {
  if (shouldLog("warn")) {
    console.error(ui.warning(message));
  }
}

function error(message: string) {
  if (shouldLog("error")) {
    console.error(ui.error(message));
  }
}

function success(message: string) {
  if (shouldLog("info")) {
    console.error(ui.success(message));
  }
}

// =============================================================================
// Spinner
// =============================================================================

export type Spinner = {
  update: (message: string) => void;
  stop: () => void;
  success: (message: string) => void;
  fail: (message: string) => void;
};

let oraModule: typeof import("ora") | null = null;

async function getOra() {
  if (!oraModule) {
    oraModule = await import("ora");
  }
  return oraModule.default;
}

/**
 * Spinner on stderr; plain status lines when ora cannot start or stderr
 * is not a terminal.
 */
async function spinner(message: string): Promise<Spinner> {
  if (!process.stderr.isTTY || !shouldLog("info")) {
    return plainSpinner(message);
  }

  try {
    const ora = await getOra();
    const s = ora({ text: message, spinner: "dots", color: "cyan" }).start();
    return {
      update: (msg) => {
        s.text = msg;
      },
      stop: () => {
        s.stop();
      },
      success: (msg) => {
        s.succeed(msg);
      },
      fail: (msg) => {
        s.fail(msg);
      },
    };
  } catch (cause) {
    debug(`spinner unavailable: ${String(cause)}`);
    return plainSpinner(message);
  }
}

function plainSpinner(message: string): Spinner {
  debug(message);
  return {
    update: (msg) => debug(msg),
    stop: () => {
      /* nothing to clear */
    },
    success: (msg) => success(msg),
    fail: (msg) => error(msg),
  };
}

// =============================================================================
// Export
// =============================================================================

export const log = {
  setLevel,
  setVerbose,

  print,
  debug,
  info,
  warn,
  error,
  success,

  spinner,
};

/** Core logger handle; core info messages are demoted to debug. */
export const logger: Logger = {
  debug,
  info: debug,
  warn,
  error,
};
export { ui } from "@/lib/ui";
