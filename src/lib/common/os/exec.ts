import { ExecaError, execa } from 'execa';
import { logger } from '../../logger.ts';
import type { ExecOptions, IProcessResult } from './interface.ts';

/**
 * Executes a command, logging it in debug mode.
 * Rejects with the command, exit code and captured output when it fails.
 */
export async function run(
  file: string,
  args: string[],
  options: ExecOptions = {},
): Promise<IProcessResult> {
  const { silent = true, cwd } = options;

  const commandStr = `${file} ${args.join(' ')}`;
  logger.debug(`EXEC: ${commandStr}`);

  try {
    const result = await execa(file, args, {
      cwd,
      stdio: silent ? 'pipe' : 'inherit',
      all: silent,
    });

    if (result.all) {
      logger.debug(`RESULT [${result.exitCode}]:\n${result.all}`);
    }

    return {
      stdout: String(result.stdout ?? ''),
      stderr: String(result.stderr ?? ''),
      exitCode: result.exitCode ?? 0,
      command: result.command,
    };
  } catch (error: unknown) {
    if (!(error instanceof ExecaError)) {
      throw error;
    }

    logger.debug(`FAILED [${error.exitCode}]: ${error.all || error.shortMessage}`);
    throw new Error(
      `Command failed: ${error.command}\n` +
        `Exit code: ${error.exitCode ?? 'none'}\n` +
        `Output: ${error.all || error.stderr || error.shortMessage}`,
    );
  }
}

/**
 * Executes a command with sudo.
 * Interactive commands may prompt for a password, silent ones must not.
 */
export async function sudoRun(
  file: string,
  args: string[],
  options: ExecOptions = {},
): Promise<IProcessResult> {
  const useInteractive = options.silent === false;
  const sudoArgs = useInteractive ? [file, ...args] : ['-n', file, ...args];
  return run('sudo', sudoArgs, options);
}
