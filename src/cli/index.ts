#!/usr/bin/env node
/**
 * @fileoverview docshelf CLI - publish/unpublish MkDocs articles
 *
 * Commands:
 *   docshelf                      - Interactive publish/unpublish menu
 *   docshelf list                 - List published and draft articles
 *   docshelf publish <path...>    - Move drafts into docs/
 *   docshelf unpublish <path...>  - Move articles from docs/ into drafts/
 *   docshelf nav                  - Regenerate the mkdocs.yml nav
 *   docshelf check                - Report nav drift
 *
 * @packageDocumentation
 */

import { classifyError, formatErrorJson, formatErrorWithHints, getExitCode } from './errors.js';
import { runCli } from './run.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const envelope = classifyError(error);
    const jsonMode = process.argv.includes('--json');
    console.error(jsonMode ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
    process.exitCode = getExitCode(envelope);
  },
);
