#!/usr/bin/env node
import { scoreCommand } from "./commands";
import { runCli } from "./run";

process.exitCode = runCli(scoreCommand, process.argv.slice(2));
