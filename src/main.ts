#!/usr/bin/env node
/**
 * Process entry point. Startup failures (model unavailable, bad config,
 * port in use) are diagnosed and exit nonzero.
 */

import { main } from './cli/index.js';
import { diagnoseError, errorMessage, formatDiagnosedError } from './errors.js';

main().catch((err: unknown) => {
  const diagnosed = diagnoseError(errorMessage(err));
  console.error(formatDiagnosedError(diagnosed));
  process.exit(1);
});
