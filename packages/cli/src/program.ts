import { STYLEPACK_VERSION_TAG } from "@stylepack/types";
import { Command } from "commander";
import { applyCommand } from "./commands/apply";
import { checkCommand } from "./commands/check";
import { initCommand } from "./commands/init";
import { installCommand } from "./commands/install";
import { listCommand } from "./commands/list";
import { printCommand } from "./commands/print";
import { schemaCommand } from "./commands/schema";
import { addLoggingOptions, type GlobalOptions } from "./utils/options";

const findOptionValue = (argv: string[], flag: string): string | undefined => {
  const direct = argv.indexOf(flag);
  if (direct !== -1 && argv[direct + 1]) {
    return argv[direct + 1];
  }
  const withEquals = argv.find((arg) => arg.startsWith(`${flag}=`));
  if (withEquals) {
    const [, value = ""] = withEquals.split("=", 2);
    return value.length > 0 ? value : undefined;
  }
  return;
};

/**
 * Sets the logging environment from argv before commander runs, so that
 * output produced while the program is being built already honours it.
 */
export function preParseGlobalFlags(argv: string[]): void {
  const format = findOptionValue(argv, "--format");
  if (format) {
    process.env.STYLEPACK_LOG_FORMAT = format;
  } else if (argv.includes("--json")) {
    process.env.STYLEPACK_LOG_FORMAT = "json";
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    process.env.STYLEPACK_LOG_LEVEL = "error";
  }

  const logLevel = findOptionValue(argv, "--log-level");
  if (logLevel) {
    process.env.STYLEPACK_LOG_LEVEL = logLevel;
  }
}

export function createProgram(): Command {
  const program = new Command()
    .name("stylepack")
    .description("Compose ESLint, Prettier and editor config from presets")
    .version(STYLEPACK_VERSION_TAG)
    .option("-C, --cwd <dir>", "Run as if started in this directory");

  addLoggingOptions(program);

  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    // Only flags given on the command line override the environment.
    const fromCli = (name: string) => thisCommand.getOptionValueSource(name) === "cli";

    if (opts.format && fromCli("format")) {
      process.env.STYLEPACK_LOG_FORMAT = opts.format;
    }
    if (opts.json && fromCli("json")) {
      process.env.STYLEPACK_LOG_FORMAT = "json";
    }
    if (opts.logLevel && fromCli("logLevel")) {
      process.env.STYLEPACK_LOG_LEVEL = opts.logLevel;
    }
    if (opts.quiet && fromCli("quiet")) {
      process.env.STYLEPACK_LOG_LEVEL = "error";
    }
  });

  program.addCommand(initCommand());
  program.addCommand(applyCommand());
  program.addCommand(checkCommand());
  program.addCommand(printCommand());
  program.addCommand(listCommand());
  program.addCommand(installCommand());
  program.addCommand(schemaCommand());

  return program;
}
