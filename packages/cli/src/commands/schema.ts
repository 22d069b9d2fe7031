import { getStylepackSchema, type StylepackSchemaName } from "@stylepack/types";
import { Command, Option } from "commander";

export function schemaCommand(): Command {
  return new Command("schema")
    .description("Print a JSON schema (the project config by default)")
    .addOption(
      new Option("--name <name>", "Schema to print")
        .choices(["projectConfig", "lintEntry", "preset"])
        .default("projectConfig")
    )
    .action((options: { name: StylepackSchemaName }) => {
      process.stdout.write(`${JSON.stringify(getStylepackSchema(options.name), null, 2)}\n`);
    });
}
