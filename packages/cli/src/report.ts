import { mergeModel } from '@nodeconf/core';
import type { ConfigModel, FieldDiff, ReadError } from '@nodeconf/core';
import { REDACTED, redactSecrets } from '@nodeconf/reconcile';
import type { ReconcileResult } from '@nodeconf/reconcile';

/** One line of terminal output; the caller picks the colour from `level`. */
export interface ReportLine {
  level: 'info' | 'success' | 'warn' | 'error';
  text: string;
}

/** Compact rendering of a field value with passphrases masked. */
export function formatValue(value: unknown): string {
  if (value === undefined) return '(unset)';
  return JSON.stringify(redactSecrets(value));
}

/** Copy of `model` whose wifi passphrases are masked. */
export function redactModel(model: ConfigModel): ConfigModel {
  return mergeModel(model, {
    networking: {
      wifi: model.networking.wifi.map((network) => ({
        ssid: network.ssid,
        psk: network.psk === '' ? '' : REDACTED,
      })),
    },
  });
}

function readFailureLines(failures: readonly ReadError[]): ReportLine[] {
  return failures.map((f) => ({ level: 'warn', text: `could not read ${f.adapter}: ${f.message}` }));
}

/** Drift between the stored model and the live system. */
export function renderStatus(diff: readonly FieldDiff[], readFailures: readonly ReadError[]): ReportLine[] {
  const lines = readFailureLines(readFailures);
  if (diff.length === 0) {
    lines.push({ level: 'success', text: 'System matches the configuration.' });
    return lines;
  }
  lines.push({ level: 'info', text: `${diff.length} field(s) differ:` });
  for (const d of diff) {
    lines.push({ level: 'info', text: `  ${d.field}: ${formatValue(d.current)} -> ${formatValue(d.desired)}` });
  }
  return lines;
}

/**
 * Every applied change with its actions and warnings, every failure, and
 * a closing summary.
 */
export function renderReconcileReport(result: ReconcileResult): ReportLine[] {
  const lines = readFailureLines(result.readFailures);

  if (result.diff.length === 0) {
    lines.push({ level: 'success', text: 'Nothing to change; the system already matches.' });
    return lines;
  }

  for (const change of result.applied) {
    lines.push({
      level: 'success',
      text: `applied ${change.field}: ${formatValue(change.from)} -> ${formatValue(change.to)}`,
    });
    for (const action of change.actions) {
      lines.push({ level: 'info', text: `    ${action}` });
    }
    for (const warning of change.warnings ?? []) {
      lines.push({ level: 'warn', text: `    ${warning}` });
    }
  }

  for (const failure of result.failures) {
    lines.push({ level: 'error', text: failure.message });
  }

  const summary = `${result.applied.length} applied, ${result.failures.length} failed`;
  lines.push(
    result.phase === 'converged'
      ? { level: 'success', text: `Converged: ${summary}.` }
      : { level: 'error', text: `Partially failed: ${summary}.` },
  );
  if (result.saved?.written) {
    lines.push({ level: 'info', text: `Saved configuration to ${result.saved.path}` });
  }
  return lines;
}
