import { resolve } from "node:path";
import { STYLEPACK_LOG_LEVELS } from "@stylepack/types";
import { type Command, Option } from "commander";

const FORMAT_CHOICES = ["text", "json"] as const;

export type OutputFormat = (typeof FORMAT_CHOICES)[number];

/** Options every command sees through `optsWithGlobals()`. */
export type GlobalOptions = {
  format?: OutputFormat;
  json?: boolean;
  logLevel?: string;
  quiet?: boolean;
  cwd?: string;
};

type LoggingOptionConfig = {
  readonly includeDeprecatedJsonAlias?: boolean;
};

export const addLoggingOptions = <T extends Command>(
  command: T,
  { includeDeprecatedJsonAlias = true }: LoggingOptionConfig = {}
): T => {
  command.addOption(
    new Option("--format <mode>", "Output format: text|json").choices([
      ...FORMAT_CHOICES,
    ])
  );

  if (includeDeprecatedJsonAlias) {
    command.addOption(
      new Option("--json", "Output JSON logs (same as --format json)").hideHelp()
    );
  }

  command.addOption(
    new Option("--log-level <level>", "Log level: debug|info|warn|error").choices([
      ...STYLEPACK_LOG_LEVELS,
    ])
  );
  command.option("-q, --quiet", "Quiet mode: only errors are printed");

  return command;
};

/** Absolute project directory for a command, from `--cwd` or the process. */
export function projectDirectory(command: Command): string {
  const { cwd } = command.optsWithGlobals<GlobalOptions>();
  return resolve(cwd ?? process.cwd());
}
