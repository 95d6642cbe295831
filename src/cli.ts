#!/usr/bin/env node
/**
 * convo CLI entry point
 */

import "dotenv/config";

import { runCli } from "./cli/cli-app.js";

await runCli();
