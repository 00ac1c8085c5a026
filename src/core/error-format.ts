/*
Purpose: turn unknown thrown values into ordered, labelled lines for CLI and log output.
Assumptions: UserFacingError carries title/hint/next; anything else is rendered by message.
Usage: formatErrorLines(err, { mode: "debug" }) then render each line per `kind`.
*/

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// CONSTANTS
// =============================================================================

const UNKNOWN_ERROR_TITLE = "Unexpected error.";

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: UNKNOWN_ERROR_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  const code = error instanceof UserFacingError ? error.code : USER_FACING_ERROR_CODES.unknown;
  lines.push({ kind: "code", text: code });

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
    if (error.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
    }
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!input.stream.isTTY) return false;
  if (input.useColor !== undefined) return input.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}
