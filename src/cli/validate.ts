#!/usr/bin/env node
import { validateCommand } from "./commands";
import { runCli } from "./run";

process.exitCode = runCli(validateCommand, process.argv.slice(2));
