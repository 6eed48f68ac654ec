import { describe, it, expect } from 'vitest';
import { ApplyError, ReadError, createModel } from '@nodeconf/core';
import type { ReconcileResult } from '@nodeconf/reconcile';
import { formatValue, redactModel, renderReconcileReport, renderStatus } from '../src/report.js';

function result(overrides: Partial<ReconcileResult>): ReconcileResult {
  return {
    runId: 'run-1',
    phase: 'converged',
    diff: [],
    applied: [],
    failures: [],
    readFailures: [],
    ...overrides,
  };
}

describe('formatValue', () => {
  it('should mask passphrases and mark missing values', () => {
    expect(formatValue([{ ssid: 'mesh', psk: 'test-secret' }])).toBe('[{"ssid":"mesh","psk":"[redacted]"}]');
    expect(formatValue(undefined)).toBe('(unset)');
    expect(formatValue('alpha')).toBe('"alpha"');
  });
});

describe('redactModel', () => {
  it('should mask every non-empty passphrase and keep open networks open', () => {
    const model = createModel({
      networking: { wifi: [{ ssid: 'mesh', psk: 'test-secret' }, { ssid: 'cafe', psk: '' }] },
    });
    expect(redactModel(model).networking.wifi).toEqual([
      { ssid: 'mesh', psk: '[redacted]' },
      { ssid: 'cafe', psk: '' },
    ]);
    expect(model.networking.wifi[0]?.psk).toBe('test-secret');
  });
});

describe('renderStatus', () => {
  it('should report a matching system', () => {
    expect(renderStatus([], [])).toEqual([{ level: 'success', text: 'System matches the configuration.' }]);
  });

  it('should list each differing field and every read failure', () => {
    const lines = renderStatus(
      [{ field: 'networking.hostname', desired: 'beta', current: 'alpha' }],
      [new ReadError('Cannot query systemd: boom', 'services')],
    );
    expect(lines).toEqual([
      { level: 'warn', text: 'could not read services: Cannot query systemd: boom' },
      { level: 'info', text: '1 field(s) differ:' },
      { level: 'info', text: '  networking.hostname: "alpha" -> "beta"' },
    ]);
  });
});

describe('renderReconcileReport', () => {
  it('should say when there is nothing to change', () => {
    expect(renderReconcileReport(result({}))).toEqual([
      { level: 'success', text: 'Nothing to change; the system already matches.' },
    ]);
  });

  it('should list actions, warnings, failures and the summary', () => {
    const lines = renderReconcileReport(
      result({
        phase: 'partially_failed',
        diff: [
          { field: 'networking.hostname', desired: 'beta', current: 'alpha' },
          { field: 'services.ssh', desired: { enabled: true, running: true }, current: undefined },
        ],
        applied: [
          {
            field: 'networking.hostname',
            from: 'alpha',
            to: 'beta',
            actions: ['hostnamectl set-hostname beta', 'write /etc/hostname'],
            warnings: ['avahi-daemon restart failed'],
          },
        ],
        failures: [ApplyError.forField('services.ssh', new Error('unit not found'))],
      }),
    );

    expect(lines).toEqual([
      { level: 'success', text: 'applied networking.hostname: "alpha" -> "beta"' },
      { level: 'info', text: '    hostnamectl set-hostname beta' },
      { level: 'info', text: '    write /etc/hostname' },
      { level: 'warn', text: '    avahi-daemon restart failed' },
      { level: 'error', text: 'Failed to apply services.ssh: unit not found' },
      { level: 'error', text: 'Partially failed: 1 applied, 1 failed.' },
    ]);
  });

  it('should mention a saved store file', () => {
    const lines = renderReconcileReport(
      result({
        diff: [{ field: 'networking.hostname', desired: 'beta', current: 'alpha' }],
        applied: [{ field: 'networking.hostname', from: 'alpha', to: 'beta', actions: [] }],
        saved: { written: true, path: '/etc/nodeconf.toml' },
      }),
    );
    expect(lines.slice(-2)).toEqual([
      { level: 'success', text: 'Converged: 1 applied, 0 failed.' },
      { level: 'info', text: 'Saved configuration to /etc/nodeconf.toml' },
    ]);
  });
});
