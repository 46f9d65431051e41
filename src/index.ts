#!/usr/bin/env node

import { runFromEnv } from './cli.js';

process.exitCode = runFromEnv(process.argv.slice(2));
