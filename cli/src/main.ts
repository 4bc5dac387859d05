#!/usr/bin/env node
/**
 * main.ts
 *
 * CLI entrypoint. State is only written by a command that ran to completion;
 * any failure is reported by `reportFailure`.
 */

import {reportFailure, runCli} from "./cli.js";

runCli(process.argv).catch(reportFailure);
