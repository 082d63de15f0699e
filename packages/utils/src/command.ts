/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Optional timeout handling
 * - Output capture
 *
 * Tools run in their own process group, so a Ctrl+C at the terminal does not
 * reach them. Only the timeout stops a running tool.
 */

import { spawn, SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds, 0 = wait forever
}

const MAX_OUTPUT_SIZE = 10 * 1024 * 1024; // 10MB

/**
 * Anything that can run an external tool and hand back its result.
 * Rejects only when the process could not be launched.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

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
  const { timeout = 0 } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = timeout > 0
      ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          // Force kill after 10 seconds
          killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
        }, timeout)
      : undefined;

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      clearTimeout(killTimer);
    };

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < MAX_OUTPUT_SIZE) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < MAX_OUTPUT_SIZE) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Spawn errors (ENOENT, EACCES) mean the tool never ran
    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}

/**
 * Run a command through a runner, folding launch errors into a failed result
 * so callers only ever branch on the exit code.
 */
export async function runTool(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const startTime = Date.now();
  try {
    return await runner(command, args, options);
  } catch (error) {
    return {
      exitCode: -1,
      stdout: '',
      stderr: error instanceof Error ? error.message : String(error),
      duration: Date.now() - startTime,
      timedOut: false,
    };
  }
}
