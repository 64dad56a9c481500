#!/usr/bin/env node
/**
 * @file CLI entry: serve a directory until interrupted
 */
import { processDeps, runCli } from "./run";

void runCli(process.argv.slice(2), processDeps());
