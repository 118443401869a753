#!/usr/bin/env node
import { runContentCli } from './content-cli.js';

process.exitCode = await runContentCli(process.argv.slice(2));
