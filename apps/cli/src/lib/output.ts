/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { TranscodeOutcome } from '@directplay/core';
import type { CompatibilityVerdict } from '@directplay/media';
import type { BatchTally } from '@directplay/processing';
import { formatDuration } from '@directplay/utils';

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${units[unit]}`;
}

const STATE_LABELS: Record<TranscodeOutcome['state'], string> = {
  'skipped': 'skipped',
  'remuxed': 'remuxed',
  'hw-encoded': 'hw-encoded',
  'sw-encoded': 'sw-encoded',
  'failed': 'FAILED',
};

/**
 * One status line per file
 */
export function formatOutcomeLine(name: string, outcome: TranscodeOutcome): string {
  const label = STATE_LABELS[outcome.state];
  const elapsed = chalk.gray(`(${formatDuration(outcome.elapsedMs)})`);

  switch (outcome.state) {
    case 'failed':
      return `${chalk.red('✗')} ${name} ${chalk.red(label)}: ${outcome.diagnostic} ${elapsed}`;
    case 'skipped':
      return `${chalk.gray('-')} ${name} ${chalk.gray(label)} ${elapsed}`;
    default:
      return `${chalk.green('✓')} ${name} ${chalk.cyan(label)}: ${outcome.diagnostic} ${elapsed}`;
  }
}

export function formatTally(tally: BatchTally): string {
  const converted = tally.remuxed + tally.hwEncoded + tally.swEncoded;
  return [
    `${chalk.green('✓')} ${converted} converted (${tally.remuxed} remuxed, ${tally.hwEncoded} hw, ${tally.swEncoded} sw)`,
    `${chalk.red('✗')} ${tally.failed} failed`,
    `${chalk.gray('-')} ${tally.skipped} skipped`,
  ].join('  ');
}

/**
 * Verdict block for the check command
 */
export function formatVerdict(name: string, verdict: CompatibilityVerdict): string[] {
  if (verdict.compatible) {
    return [`${chalk.green('✓')} ${name}: ready`];
  }
  return [
    `${chalk.red('✗')} ${name}: needs fixing`,
    ...verdict.issues.map(issue => `    ${chalk.gray('-')} ${issue.message}`),
  ];
}
