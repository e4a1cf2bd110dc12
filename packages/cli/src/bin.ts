#!/usr/bin/env tsx

/**
 * mdadf CLI entrypoint
 */

import { reportError, run } from './index';

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    process.exitCode = reportError(err);
  });
