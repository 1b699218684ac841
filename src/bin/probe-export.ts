#!/usr/bin/env node
import { EXIT_FAILURE, runCli } from '../cli.js';

try {
    process.exitCode = runCli(process.argv.slice(2));
} catch (err: unknown) {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exitCode = EXIT_FAILURE;
}
