/**
 * Check Command
 * 
 * Probe and classify files against the target profile without converting.
 */

import { basename } from 'node:path';
import ora from 'ora';
import { classify, FFProbe, type CompatibilityVerdict } from '@directplay/media';
import { ConfigError, ProbeError } from '@directplay/core';
import { getConfig } from '../config/index.js';
import { resolveInputs } from '../lib/inputs.js';
import { formatVerdict, printError, printHeader, printInfo, printJson } from '../lib/output.js';

interface CheckOptions {
  json?: boolean;
}

interface CheckReport {
  file: string;
  verdict: CompatibilityVerdict | null;
  error?: string;
}

export async function checkCommand(paths: string[], options: CheckOptions): Promise<void> {
  const config = getConfig();
  const files = await resolveInputs(paths.length > 0 ? paths : [config.inputDir]);

  if (files.length === 0) {
    printInfo('No media files found');
    return;
  }

  const prober = new FFProbe(config.ffprobePath);
  if (!(await prober.isAvailable())) {
    throw new ConfigError(`ffprobe not runnable at ${config.ffprobePath} (set FFPROBE_PATH)`);
  }

  const spinner = options.json ? null : ora('Checking files...').start();
  const reports: CheckReport[] = [];

  for (const file of files) {
    if (spinner) spinner.text = `Checking ${basename(file)}`;
    try {
      const desc = await prober.probe(file);
      reports.push({ file, verdict: classify(desc, config.profile) });
    } catch (error) {
      if (!(error instanceof ProbeError)) {
        spinner?.stop();
        throw error;
      }
      reports.push({ file, verdict: null, error: error.message });
    }
  }
  spinner?.stop();

  if (options.json) {
    printJson(reports);
    return;
  }

  printHeader('Direct Play Check');
  let ready = 0;
  for (const report of reports) {
    const name = basename(report.file);
    if (!report.verdict) {
      printError(`${name}: ${report.error ?? 'probe failed'}`);
      continue;
    }
    if (report.verdict.compatible) ready++;
    for (const line of formatVerdict(name, report.verdict)) {
      console.log(line);
    }
  }

  console.log();
  printInfo(`${ready} ready, ${reports.length - ready} need fixing`);
  if (ready < reports.length) {
    process.exitCode = 1;
  }
}
