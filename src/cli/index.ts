#!/usr/bin/env node
import { main, EXIT_FAILURE } from './main';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(`lgrep: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof Error && e.stack) {
      console.error(e.stack);
    }
    process.exitCode = EXIT_FAILURE;
  },
);
