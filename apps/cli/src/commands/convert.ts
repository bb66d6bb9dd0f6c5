/**
 * Convert Command
 * 
 * Make every media file in a folder direct-play compatible. Ctrl+C stops
 * the running encode, removes its partial output and ends the batch.
 */

import { basename, join, resolve } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import { CancelledError, ConfigError, type TranscodeOutcome } from '@directplay/core';
import { FFProbe } from '@directplay/media';
import {
  BatchDriver,
  FFmpeg,
  HardwareEncoderDetector,
  TranscodeOrchestrator,
  type ProgressUpdate,
  type SourceAction,
} from '@directplay/processing';
import { fileExists, getFileSizeBytes, listMediaFiles } from '@directplay/utils';
import { BACKUP_FOLDER, getConfig } from '../config/index.js';
import { handleInterrupts } from '../lib/interrupt.js';
import {
  formatBytes,
  formatOutcomeLine,
  formatTally,
  printError,
  printHeader,
  printInfo,
  printJson,
  printKeyValue,
  printWarning,
} from '../lib/output.js';

interface ConvertOptions {
  hardware: boolean;          // --no-hardware sets false
  sourceAction?: SourceAction;
  json?: boolean;
}

export async function convertCommand(
  inputArg: string | undefined,
  outputArg: string | undefined,
  options: ConvertOptions
): Promise<void> {
  const config = getConfig();
  const inputDir = inputArg ? resolve(inputArg) : config.inputDir;
  const outputDir = outputArg ? resolve(outputArg) : config.outputDir;
  const sourceAction = options.sourceAction ?? config.sourceAction;

  if (inputDir === outputDir) {
    printError('Input and output folders must differ');
    process.exitCode = 1;
    return;
  }

  if (!(await fileExists(inputDir))) {
    printError(`Input folder not found: ${inputDir}`);
    process.exitCode = 1;
    return;
  }

  const files = await listMediaFiles(inputDir);
  if (files.length === 0) {
    printInfo(`No media files in ${inputDir}`);
    return;
  }

  const prober = new FFProbe(config.ffprobePath);
  const runner = new FFmpeg({ ffmpegPath: config.ffmpegPath, killGraceMs: config.killGraceMs });
  if (!(await prober.isAvailable())) {
    throw new ConfigError(`ffprobe not runnable at ${config.ffprobePath} (set FFPROBE_PATH)`);
  }
  if (!(await runner.isAvailable())) {
    throw new ConfigError(`ffmpeg not runnable at ${config.ffmpegPath} (set FFMPEG_PATH)`);
  }

  const detector = new HardwareEncoderDetector(config.ffmpegPath);
  const hardware = await detector.capability(options.hardware && config.useHardwareEncoder);

  if (!options.json) {
    printHeader('Direct Play Converter');
    printKeyValue('Input', inputDir);
    printKeyValue('Output', outputDir);
    printKeyValue('Encoder', hardware.encoder ?? 'libx264 (software)');
    printKeyValue('Files', files.length);
    console.log();
  }

  const orchestrator = new TranscodeOrchestrator({
    prober,
    runner,
    profile: config.profile,
    settings: config.settings,
    hardware,
  });

  const driver = new BatchDriver(orchestrator, {
    outputDir,
    outputExtension: config.settings.outputExtension,
    sourceAction,
    backupDir: join(inputDir, BACKUP_FOLDER),
  });

  const spinner = ora({ isEnabled: !options.json });
  let prefix = '';

  driver.on('start', (file: string, index: number, total: number) => {
    prefix = `[${index + 1}/${total}] ${basename(file)}`;
    spinner.start(prefix);
  });

  driver.on('outcome', (outcome: TranscodeOutcome) => {
    spinner.stop();
    if (!options.json) {
      console.log(formatOutcomeLine(basename(outcome.input), outcome));
    }
  });

  const onProgress = (update: ProgressUpdate): void => {
    spinner.text = `${prefix} ${chalk.cyan(update.strategy)} ${update.percent}%`;
  };

  const interrupts = handleInterrupts(
    () => {
      spinner.text = `${prefix} ${chalk.yellow('cancelling...')}`;
    },
    () => {
      spinner.text = `${prefix} ${chalk.yellow('still cleaning up...')}`;
    }
  );

  try {
    const result = await driver.run(files, { signal: interrupts.signal, onProgress });

    if (options.json) {
      printJson(result);
      return;
    }

    console.log();
    console.log(formatTally(result.tally));

    const written = result.outcomes.flatMap(o => (o.output ? [o.output] : []));
    if (written.length > 0) {
      let total = 0;
      for (const file of written) {
        total += await getFileSizeBytes(file);
      }
      printInfo(`${written.length} file(s) written to ${outputDir} (${formatBytes(total)})`);
    }
    if (sourceAction === 'backup' && result.outcomes.some(o => o.output)) {
      printInfo(`Originals moved to ${join(inputDir, BACKUP_FOLDER)}`);
    }
    if (result.tally.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.stop();
    if (error instanceof CancelledError) {
      printWarning(error.message);
      process.exitCode = 130;
      return;
    }
    throw error;
  } finally {
    interrupts.dispose();
  }
}
