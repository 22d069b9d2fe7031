#!/usr/bin/env node
import { createProgram, preParseGlobalFlags } from "./program";

preParseGlobalFlags(process.argv.slice(2));

await createProgram().parseAsync(process.argv);
