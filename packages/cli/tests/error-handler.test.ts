import { describe, it, expect, vi, afterEach, beforeAll } from 'vitest';
import chalk from 'chalk';
import {
  ApplyError,
  FileSystemError,
  LockTimeoutError,
  NotFoundError,
  ParseError,
  ValidationError,
} from '@nodeconf/core';
import { ReconcileAbortedError } from '@nodeconf/reconcile';
import { CLIError, ExitCode, describeFailure, exitCodeFor, handleError } from '../src/utils/error-handler.js';

class ExitCalled extends Error {
  constructor(public readonly code: string | number | null | undefined) {
    super(`exit ${String(code)}`);
  }
}

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('exitCodeFor', () => {
  it('should map each failure class to its exit code', () => {
    expect(exitCodeFor(new CLIError('partial', ExitCode.PartialFailure))).toBe(3);
    expect(exitCodeFor(new ValidationError('bad'))).toBe(2);
    expect(exitCodeFor(new ParseError('bad toml', '/etc/nodeconf.toml', 3, 1))).toBe(2);
    expect(exitCodeFor(new LockTimeoutError('locked', '/etc/nodeconf.toml'))).toBe(4);
    expect(exitCodeFor(new FileSystemError('disk full', '/etc/nodeconf.toml'))).toBe(4);
    expect(exitCodeFor(new NotFoundError('missing', 'store', '/etc/nodeconf.toml'))).toBe(1);
    expect(exitCodeFor('plain string')).toBe(1);
  });

  it('should look through an aborted run to a storage failure', () => {
    const storage = new ReconcileAbortedError(
      'Reconciliation aborted during applying: locked',
      'applying',
      [],
      [],
      new LockTimeoutError('locked', '/etc/nodeconf.toml'),
    );
    const other = new ReconcileAbortedError('Reconciliation aborted', 'applying', [], []);
    expect(exitCodeFor(storage)).toBe(4);
    expect(exitCodeFor(other)).toBe(1);
  });

  it('should map an aborted run caused by a malformed store to the parse exit code', () => {
    const parse = new ReconcileAbortedError(
      'Reconciliation aborted during applying: bad toml',
      'applying',
      [],
      [],
      new ParseError('bad toml', '/etc/nodeconf.toml', 2, 1),
    );
    const invalid = new ReconcileAbortedError('aborted', 'applying', [], [], new ValidationError('bad'));
    expect(exitCodeFor(parse)).toBe(2);
    expect(exitCodeFor(invalid)).toBe(2);
  });
});

describe('describeFailure', () => {
  it('should put each violation on its own line', () => {
    const error = ValidationError.fromViolations([
      { path: 'networking.hostname', message: 'not a valid hostname' },
      { path: 'networking.country_code', message: 'unknown country code' },
    ]);
    expect(describeFailure(error)).toEqual([
      'Config model has 2 violations:',
      '  networking.hostname: not a valid hostname',
      '  networking.country_code: unknown country code',
    ]);
  });

  it('should list what an aborted run applied and what failed before it stopped', () => {
    const error = new ReconcileAbortedError(
      'Reconciliation aborted during applying: disk full',
      'applying',
      [{ field: 'networking.hostname', from: 'alpha', to: 'beta', actions: ['hostnamectl set-hostname beta'] }],
      [ApplyError.forField('services.ssh', new Error('unit not found'))],
    );
    expect(describeFailure(error)).toEqual([
      'Reconciliation aborted during applying: disk full',
      '  applied networking.hostname: "alpha" -> "beta"',
      '  Failed to apply services.ssh: unit not found',
    ]);
  });

  it('should use the message for other errors', () => {
    expect(describeFailure(new Error('boom'))).toEqual(['boom']);
  });
});

describe('handleError', () => {
  it('should print every line and exit with the mapped code', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });

    const error = ValidationError.fromViolations([{ path: 'services.ssh', message: 'bad unit name' }]);
    expect(() => handleError(error)).toThrow(ExitCalled);

    expect(errors.mock.calls.map((call) => call[0])).toEqual([
      'Error: Config model has 1 violation:',
      '  services.ssh: bad unit name',
    ]);
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
