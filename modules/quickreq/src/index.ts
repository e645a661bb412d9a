#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';

import { run } from './cli.js';
import { isQuickreqError } from './errors.js';

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  // Every reported outcome, including HTTP and transport failures, exits 0.
  await run(argv);
}

/** Prints whatever escaped `main` (an invalid `--json`, a bad config) and exits 1. */
export function reportFatal(error: unknown, exit: (code: number) => void = (code) => process.exit(code)): void {
  if (isQuickreqError(error)) {
    console.error(error.message);
  } else {
    console.error('quickreq failed', error);
  }
  exit(1);
}

if (require.main === module) {
  main().catch((error: unknown) => reportFatal(error));
}
