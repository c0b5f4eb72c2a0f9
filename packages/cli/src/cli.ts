/**
 * ics2json -- command definition.
 *
 * Reads an iCalendar document from a file or standard input, decodes it
 * and prints the events as indented JSON. Any failure prints a single
 * "ics2json: <message>" line on stderr and nothing on stdout.
 *
 * The command never calls process.exit(); run() resolves to the exit code
 * so it can be driven in-process with stand-in streams.
 */

import { createReadStream } from "node:fs";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { decodeStream, isIcsDecodeError } from "@icsjson/ics";
import type { ByteSource } from "@icsjson/ics";
import { loadConfig, parseIndent, parseMaxLineLength, MAX_INDENT } from "./config";
import type { CliConfig, Env } from "./config";
import { serializeCalendar } from "./serialize";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const PROGRAM_NAME = "ics2json" as const;
export const VERSION = "0.1.0";

/** The subset of a writable stream the command needs. */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface CliIo {
  readonly stdin: ByteSource;
  readonly stdout: TextSink;
  readonly stderr: TextSink;
  readonly env: Env;
}

/** Options as commander hands them to the action; absent when not given. */
interface CliOptions {
  readonly maxLineLength?: number;
  readonly indent?: string;
  readonly verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Option parsers
// ---------------------------------------------------------------------------

function toMaxLineLength(raw: string): number {
  const n = parseMaxLineLength(raw);
  if (n === null) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function toIndent(raw: string): string {
  const indent = parseIndent(raw);
  if (indent === null) throw new InvalidArgumentError(`Expected "tab" or 0-${MAX_INDENT}.`);
  return indent;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

async function convert(file: string | undefined, settings: CliConfig, io: CliIo): Promise<number> {
  const source = file ?? "<stdin>";
  try {
    const input: ByteSource = file === undefined ? io.stdin : createReadStream(file);
    const calendar = await decodeStream(input, { maxLineLength: settings.maxLineLength });
    if (settings.verbose) {
      console.error(`[${PROGRAM_NAME}] decoded ${calendar.events.length} event(s) from ${source}`);
    }
    io.stdout.write(serializeCalendar(calendar, settings.indent));
    return 0;
  } catch (err) {
    if (settings.verbose && isIcsDecodeError(err)) {
      console.error(`[${PROGRAM_NAME}] ${err.name} (${err.kind}) while reading ${source}`);
    }
    io.stderr.write(`${PROGRAM_NAME}: ${errorMessage(err)}\n`);
    return 1;
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Run the command.
 *
 * @param argv - Arguments after the executable and script name
 * @returns Process exit code
 */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  let config: CliConfig;
  try {
    config = loadConfig(io.env);
  } catch (err) {
    io.stderr.write(`${PROGRAM_NAME}: ${errorMessage(err)}\n`);
    return 1;
  }

  let exitCode = 0;
  const program = new Command(PROGRAM_NAME)
    .description("Decode an iCalendar file and print its events as JSON")
    .version(VERSION)
    .argument("[file]", "iCalendar file to read (default: standard input)")
    .option("--max-line-length <bytes>", "longest accepted physical line, in bytes", toMaxLineLength)
    .option("--indent <indent>", `JSON indent: "tab" or 0-${MAX_INDENT} spaces`, toIndent)
    .option("-v, --verbose", "log progress to stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .action(async (file: string | undefined, options: CliOptions) => {
      exitCode = await convert(
        file,
        {
          maxLineLength: options.maxLineLength ?? config.maxLineLength,
          indent: options.indent ?? config.indent,
          verbose: options.verbose ?? config.verbose,
        },
        io,
      );
    });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
