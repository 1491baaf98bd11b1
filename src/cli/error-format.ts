/*
Purpose: render user-facing errors and warnings for CLI output with optional color.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(err, { debug })), console.warn(renderCliWarning(msg)).
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(error, { mode });
  const format = resolveFormatter(options);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function renderCliWarning(
  message: string,
  options: Omit<CliErrorFormatOptions, "debug"> = {},
): string {
  const format = resolveFormatter(options);
  return `${format("Warning:", ["yellow", "bold"])} ${message}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFormatter(options: CliErrorFormatOptions): AnsiFormatter {
  const stream = options.stream ?? process.stderr;
  const useColor = resolveColorEnabled({ stream, useColor: options.useColor });
  return createAnsiFormatter(useColor);
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
      return `${format("Code:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "name":
      return `${format("Name:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "cause":
      return renderBlock("Cause:", line.text, format);
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indentMultiline(line.text, 2), ["dim"])}`;
    default:
      return line.text;
  }
}

// Git output is often several lines; keep the first beside the label.
function renderBlock(label: string, text: string, format: AnsiFormatter): string {
  const [first, ...rest] = text.split("\n");
  const head = `${format(label, ["dim"])} ${format(first, ["dim"])}`;
  if (rest.length === 0) return head;
  return `${head}\n${format(indentMultiline(rest.join("\n"), 2), ["dim"])}`;
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
