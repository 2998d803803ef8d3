/**
 * CLI UI Design System
 *
 * - Minimal, clean output
 * - Monospace code elements
 * - Counts in parens (n)
 * - No heavy decorations
 */

import type { AuthStatus, SyncAction } from "@svcsync/core";
import chalk from "chalk";

// =============================================================================
// Theme
// =============================================================================

export const theme = {
  title: chalk.white.bold,
  muted: chalk.gray,
  dim: chalk.dim,

  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,

  code: chalk.cyan,
  command: chalk.cyan,
} as const;

// =============================================================================
// Symbols
// =============================================================================

export const symbols = {
  success: theme.success("✓"),
  error: theme.error("✗"),
  warning: theme.warning("!"),

  active: theme.success("●"),
  inactive: theme.muted("○"),
} as const;

// =============================================================================
// Formatters
// =============================================================================

/** Format as code/command (cyan, monospace-style) */
export function code(text: string): string {
  return theme.code(text);
}

/** Format a CLI command */
export function command(cmd: string): string {
  return theme.command(cmd);
}

export function muted(text: string): string {
  return theme.muted(text);
}

export function bold(text: string): string {
  return chalk.bold(text);
}

/** Format a count in parens like (10) */
export function countParens(n: number): string {
  return theme.muted(`(${n})`);
}

// =============================================================================
// Layout Helpers
// =============================================================================

export function indent(level = 1): string {
  return "  ".repeat(level);
}

/** Pad string to width, ignoring ANSI codes */
export function pad(
  text: string,
  width: number,
  align: "left" | "right" = "left"
): string {
  const stripped = stripAnsi(text);
  const padding = Math.max(0, width - stripped.length);
  if (align === "right") {
    return " ".repeat(padding) + text;
  }
  return text + " ".repeat(padding);
}

// =============================================================================
// Components
// =============================================================================

/**
 * Section header with optional count
 * e.g., "Endpoints (10)"
 */
export function header(title: string, itemCount?: number): string {
  if (itemCount !== undefined) {
    return `${theme.title(title)} ${countParens(itemCount)}`;
  }
  return theme.title(title);
}

/**
 * Multi-column table with headers
 */
export function tableMulti(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(
      stripAnsi(h).length,
      ...rows.map((row) => stripAnsi(row[i] ?? "").length)
    )
  );
  const renderRow = (row: string[]) =>
    row
      .map((cell, i) => pad(cell, widths[i] ?? 0))
      .join("  ")
      .trimEnd();

  return [theme.muted(renderRow(headers)), ...rows.map(renderRow)].join("\n");
}

// =============================================================================
// Status Messages
// =============================================================================

export function success(message: string): string {
  return `${symbols.success} ${message}`;
}

export function error(message: string): string {
  return `${symbols.error} ${theme.error(message)}`;
}

export function warning(message: string): string {
  return `${symbols.warning} ${message}`;
}

// =============================================================================
// Sync and auth status
// =============================================================================

const syncStatusConfig: Record<
  SyncAction,
  { symbol: string; style: (s: string) => string }
> = {
  add: { symbol: "+", style: theme.success },
  update: { symbol: "~", style: theme.warning },
  keep: { symbol: "=", style: theme.dim },
  remove: { symbol: "-", style: theme.error },
  conflict: { symbol: "!", style: theme.error },
};

/**
 * Format an endpoint sync line
 * e.g., "+ add       drs-1"
 */
export function syncStatus(action: SyncAction, endpointId: string): string {
  const config = syncStatusConfig[action];
  return `${config.style(config.symbol)} ${config.style(pad(action, 9))} ${endpointId}`;
}

const authStatusStyle: Record<AuthStatus, (s: string) => string> = {
  ready: theme.success,
  "refresh-required": theme.warning,
  "reauth-required": theme.warning,
  uninitialized: theme.muted,
};

export function authStatus(status: AuthStatus): string {
  return authStatusStyle[status](status);
}

// =============================================================================
// Special Formats
// =============================================================================

export function hint(text: string): string {
  return theme.dim(text);
}

export function link(url: string): string {
  return chalk.underline.cyan(url);
}

/** Strip ANSI codes for width calculations */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ignore
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");
}

// =============================================================================
// Export
// =============================================================================

export const ui = {
  theme,
  symbols,

  code,
  command,
  muted,
  bold,
  countParens,

  indent,
  pad,

  header,
  tableMulti,

  success,
  error,
  warning,

  syncStatus,
  authStatus,

  hint,
  link,
  stripAnsi,
};

export default ui;
