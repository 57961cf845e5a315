#!/usr/bin/env node
import { runCli } from '../core/cli/run';

process.exitCode = runCli(process.argv.slice(2));
