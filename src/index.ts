#!/usr/bin/env node
import { createCli } from "./cli/program.js";
import { VERSION } from "./cli/version.js";

const cli = createCli(VERSION);
await cli.runExit(process.argv.slice(2));
