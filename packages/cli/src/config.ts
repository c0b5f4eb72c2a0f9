/**
 * ics2json -- environment configuration.
 *
 * Every setting can come from the environment; command-line options
 * override it. Validation is inline: each parser returns null for a value
 * it cannot accept, and the caller decides how to report it.
 */

import { DEFAULT_MAX_LINE_LENGTH } from "@icsjson/ics";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Process environment, or any string map shaped like it. */
export type Env = Readonly<Record<string, string | undefined>>;

export interface CliConfig {
  /** Longest physical line accepted by the decoder, in bytes. */
  readonly maxLineLength: number;
  /** Indent passed to JSON.stringify. */
  readonly indent: string;
  /** Log progress to stderr. */
  readonly verbose: boolean;
}

/** Raised when an ICS2JSON_* variable holds an unusable value. */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const ENV_MAX_LINE_LENGTH = "ICS2JSON_MAX_LINE_LENGTH" as const;
export const ENV_INDENT = "ICS2JSON_INDENT" as const;
export const ENV_VERBOSE = "ICS2JSON_VERBOSE" as const;

/** Widest indent JSON.stringify honours. */
export const MAX_INDENT = 10;

export const DEFAULT_CONFIG: CliConfig = {
  maxLineLength: DEFAULT_MAX_LINE_LENGTH,
  indent: "\t",
  verbose: false,
};

// ---------------------------------------------------------------------------
// Value parsers
// ---------------------------------------------------------------------------

/** Parse a positive integer byte count. */
export function parseMaxLineLength(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n > 0 && Number.isSafeInteger(n) ? n : null;
}

/** "tab" for a tab, or 0-10 for that many spaces. */
export function parseIndent(raw: string): string | null {
  if (raw.toLowerCase() === "tab") return "\t";
  if (!/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n <= MAX_INDENT ? " ".repeat(n) : null;
}

const TRUE_FLAGS = new Set(["1", "true", "yes", "on"]);
const FALSE_FLAGS = new Set(["0", "false", "no", "off"]);

export function parseFlag(raw: string): boolean | null {
  const v = raw.toLowerCase();
  if (TRUE_FLAGS.has(v)) return true;
  if (FALSE_FLAGS.has(v)) return false;
  return null;
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

function read<T>(
  env: Env,
  variable: string,
  parse: (raw: string) => T | null,
  fallback: T,
  expected: string,
): T {
  const raw = env[variable];
  if (raw === undefined || raw === "") return fallback;
  const parsed = parse(raw);
  if (parsed === null) {
    throw new ConfigError(variable, `${variable} must be ${expected}, got "${raw}"`);
  }
  return parsed;
}

/**
 * Build the configuration from environment variables, falling back to
 * DEFAULT_CONFIG for anything unset or empty.
 *
 * @throws ConfigError for a value that does not parse
 */
export function loadConfig(env: Env): CliConfig {
  return {
    maxLineLength: read(env, ENV_MAX_LINE_LENGTH, parseMaxLineLength, DEFAULT_CONFIG.maxLineLength, "a positive integer"),
    indent: read(env, ENV_INDENT, parseIndent, DEFAULT_CONFIG.indent, `"tab" or a number of spaces from 0 to ${MAX_INDENT}`),
    verbose: read(env, ENV_VERBOSE, parseFlag, DEFAULT_CONFIG.verbose, "a boolean flag (1/0, true/false, yes/no, on/off)"),
  };
}
