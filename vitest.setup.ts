/**
 * Centralized Vitest Setup for docshelf
 *
 * Commands resolve their workspace from DOCSHELF_WORKSPACE and turn on debug
 * logging from DOCSHELF_DEBUG. A developer's shell may export either, so both
 * are cleared before each test and debug logging is reset.
 */

import { beforeEach } from 'vitest';
import { setDebugLogging } from './src/telemetry/logger.js';

beforeEach(() => {
  delete process.env.DOCSHELF_WORKSPACE;
  delete process.env.DOCSHELF_DEBUG;
  setDebugLogging(false);
});
