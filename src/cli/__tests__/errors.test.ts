/**
 * @fileoverview Tests for structured error contracts
 *
 * Validates that the error system provides:
 * 1. Machine-readable error codes
 * 2. Correct classification of thrown values
 * 3. Exit codes that separate usage mistakes from failures
 * 4. JSON serialization for scripted callers
 */

import { describe, it, expect } from 'vitest';
import {
  CliError,
  ErrorMetadata,
  ExitCodes,
  classifyError,
  createError,
  createErrorEnvelope,
  formatError,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  isErrorEnvelope,
  type ErrorEnvelope,
} from '../errors.js';

describe('ErrorEnvelope', () => {
  describe('createErrorEnvelope', () => {
    it('fills defaults from ErrorMetadata', () => {
      const envelope = createErrorEnvelope('EDESTINATION_EXISTS', 'Destination exists: /site/drafts/a.md');

      expect(envelope).toEqual({
        code: 'EDESTINATION_EXISTS',
        message: 'Destination exists: /site/drafts/a.md',
        retryable: false,
        recoveryHints: ['Pass --force to overwrite the destination file.'],
        context: {},
      });
    });

    it('allows overriding default values', () => {
      const envelope = createErrorEnvelope('EIO', 'Disk full', {
        retryable: false,
        recoveryHints: ['Free some space'],
        context: { path: '/site/docs' },
      });

      expect(envelope.retryable).toBe(false);
      expect(envelope.recoveryHints).toEqual(['Free some space']);
      expect(envelope.context).toEqual({ path: '/site/docs' });
    });

    it('does not share hint arrays with the metadata table', () => {
      const envelope = createErrorEnvelope('EIO', 'x');
      envelope.recoveryHints.push('extra');

      expect(ErrorMetadata.EIO.recoveryHints).toEqual(['Check file permissions and that the paths exist.']);
    });
  });

  describe('isErrorEnvelope', () => {
    it('accepts envelopes and rejects other values', () => {
      const envelope: ErrorEnvelope = {
        code: 'EUNKNOWN',
        message: 'Test',
        retryable: false,
        recoveryHints: [],
      };
      expect(isErrorEnvelope(envelope)).toBe(true);
      expect(isErrorEnvelope({ code: 'ENOTACODE', message: 'x', recoveryHints: [] })).toBe(false);
      expect(isErrorEnvelope(null)).toBe(false);
      expect(isErrorEnvelope('EIO')).toBe(false);
    });
  });
});

describe('classifyError', () => {
  it('keeps the code and context of a CliError', () => {
    const envelope = classifyError(createError('EARTICLE_NOT_FOUND', 'No such article: a.md', { relpath: 'a.md' }));

    expect(envelope.code).toBe('EARTICLE_NOT_FOUND');
    expect(envelope.message).toBe('No such article: a.md');
    expect(envelope.context).toEqual({ relpath: 'a.md' });
  });

  it('maps Node system errors to EIO with the errno code', () => {
    const error = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });

    const envelope = classifyError(error);

    expect(envelope.code).toBe('EIO');
    expect(envelope.retryable).toBe(true);
    expect(envelope.context).toEqual({ errno: 'EACCES' });
  });

  it('falls back to EUNKNOWN', () => {
    expect(classifyError(new Error('boom')).code).toBe('EUNKNOWN');
    expect(classifyError('plain string').message).toBe('plain string');
  });
});

describe('exit codes', () => {
  it('uses 2 for usage mistakes and 1 for failures', () => {
    expect(getExitCode(createErrorEnvelope('EINVALID_ARGUMENT', 'x'))).toBe(ExitCodes.USAGE);
    expect(getExitCode(createErrorEnvelope('EINVALID_CHOICE', 'x'))).toBe(2);
    expect(getExitCode(createErrorEnvelope('EINVALID_SELECTION', 'x'))).toBe(2);
    expect(getExitCode(createErrorEnvelope('EMKDOCS_MISSING', 'x'))).toBe(ExitCodes.FAILURE);
  });
});

describe('formatting', () => {
  it('formats with hints for humans', () => {
    const envelope = createErrorEnvelope('EINVALID_CHOICE', 'Invalid choice.');

    expect(formatErrorWithHints(envelope)).toBe(
      'Error [EINVALID_CHOICE]: Invalid choice.\n\nSuggestions:\n  - Enter 1, 2 or 3, or q to quit.',
    );
  });

  it('omits the suggestions block when there are no hints', () => {
    const envelope = createErrorEnvelope('EUNKNOWN', 'boom');

    expect(formatErrorWithHints(envelope)).toBe(formatError(envelope));
    expect(formatError(envelope)).toBe('Error [EUNKNOWN]: boom');
  });

  it('wraps the envelope under "error" for JSON', () => {
    const envelope = createErrorEnvelope('EUNKNOWN', 'boom');

    expect(JSON.parse(formatErrorJson(envelope))).toEqual({ error: envelope });
  });

  it('CliError carries its name and code', () => {
    const error = new CliError('bad', 'EINVALID_ARGUMENT');
    expect(error.name).toBe('CliError');
    expect(error.code).toBe('EINVALID_ARGUMENT');
    expect(error).toBeInstanceOf(Error);
  });
});
