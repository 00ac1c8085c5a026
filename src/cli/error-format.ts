/*
Purpose: render command failures for the terminal, including commander usage errors.
Assumptions: stderr is the default stream; colour only on a TTY.
Usage: console.error(renderCliError(err, { debug }));
*/

import { CommanderError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = { label?: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(toDisplayError(error), {
    mode: options.debug ? "debug" : "short",
  });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

/** Commander reports bad flags as `error: ...`; show them like any other config problem. */
export function toDisplayError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) return error;

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid command line.",
    message: error.message.replace(/^error:\s*/i, ""),
    next: "planloom --help",
    cause: error,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (!style.label) return format(line.text, style.textStyles);

  const label = format(style.label, style.labelStyles);
  if (line.kind === "stack") {
    return `${label}\n${format(indent(line.text, 2), style.textStyles)}`;
  }
  return `${label} ${format(line.text, style.textStyles)}`;
}

function indent(value: string, spaces: number): string {
  const prefix = " ".repeat(spaces);
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
