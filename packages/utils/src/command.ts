/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Line streaming for progress feeds
 * - Process-group cancellation
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import { isErrnoException } from './guards.js';
import { createLogger } from './logger.js';

const logger = createLogger({ component: 'command' });

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

export interface StreamingCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  killGraceMs?: number; // SIGTERM -> SIGKILL window
  maxStderrSize?: number; // characters kept from the tail of stderr
  onStdoutLine?: (line: string) => void;
}

export interface StreamingCommandResult {
  exitCode: number;
  stderr: string;
  duration: number;
  cancelled: boolean;
  killed: boolean; // needed SIGKILL after the grace period
}

const USE_PROCESS_GROUPS = process.platform !== 'win32';

/**
 * Send a signal to the child's whole process group, so helpers it forked
 * go down with it. Falls back to the child alone where groups don't exist.
 */
export function killProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }

  if (!USE_PROCESS_GROUPS) {
    child.kill(signal);
    return;
  }

  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    // ESRCH: nothing left in the group
    if (!isErrnoException(error) || error.code !== 'ESRCH') {
      throw error;
    }
  }
}

/**
 * killProcessGroup for use inside listeners and timers, where a throw
 * would be uncaught
 */
function trySignalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  try {
    killProcessGroup(child, signal);
  } catch (error) {
    logger.error(
      { pid: child.pid, signal, error: error instanceof Error ? error.message : String(error) },
      'Failed to signal process group'
    );
  }
}

/**
 * Execute an external command safely
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let forceKillId: NodeJS.Timeout | null = null;

    // Handle timeout
    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      forceKillId = setTimeout(() => child.kill('SIGKILL'), 10000);
    }, timeout);

    // Handle abort signal
    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    // Handle process exit
    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      if (forceKillId) clearTimeout(forceKillId);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      clearTimeout(timeoutId);
      if (forceKillId) clearTimeout(forceKillId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}

/**
 * Run a long-lived command in its own process group, streaming stdout
 * line by line. Aborting the signal sends SIGTERM to the group, waits
 * `killGraceMs`, then SIGKILLs whatever is left. The promise settles
 * only once the process has exited.
 */
export async function runStreamingCommand(
  command: string,
  args: string[],
  options: StreamingCommandOptions = {}
): Promise<StreamingCommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    signal,
    killGraceMs = 2000,
    maxStderrSize = 64 * 1024,
    onStdoutLine,
  } = options;

  const startTime = Date.now();

  if (signal?.aborted) {
    return { exitCode: -1, stderr: '', duration: 0, cancelled: true, killed: false };
  }

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: USE_PROCESS_GROUPS,
    });

    let stderr = '';
    let cancelled = false;
    let killed = false;
    let forceKillId: NodeJS.Timeout | null = null;

    const onAbort = (): void => {
      cancelled = true;
      trySignalGroup(child, 'SIGTERM');
      forceKillId = setTimeout(() => {
        killed = true;
        trySignalGroup(child, 'SIGKILL');
      }, killGraceMs);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      if (forceKillId) clearTimeout(forceKillId);
      signal?.removeEventListener('abort', onAbort);
    };

    if (child.stdout) {
      const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
      lines.on('line', (line) => onStdoutLine?.(line));
    }

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
      if (stderr.length > maxStderrSize) {
        stderr = stderr.slice(-maxStderrSize);
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stderr,
        duration: Date.now() - startTime,
        cancelled,
        killed,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}
