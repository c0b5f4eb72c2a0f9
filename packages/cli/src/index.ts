/**
 * @icsjson/cli -- the ics2json command and its JSON rendering.
 */

export type { CliIo, TextSink } from "./cli";
export { run, PROGRAM_NAME, VERSION } from "./cli";

export type { CliConfig, Env } from "./config";
export {
  ConfigError,
  DEFAULT_CONFIG,
  ENV_MAX_LINE_LENGTH,
  ENV_INDENT,
  ENV_VERBOSE,
  loadConfig,
  parseMaxLineLength,
  parseIndent,
  parseFlag,
} from "./config";

export type { CalendarJson, EventJson } from "./serialize";
export { calendarToJson, eventToJson, serializeCalendar } from "./serialize";
