import { execa, ExecaError } from 'execa';
import type { EngineLogger } from '../utils/reconcile-logger.js';
import { silentLogger } from '../utils/reconcile-logger.js';

/** Captured output of a finished command. */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs external programs for the adapters.
 * Resolves for any exit status; rejects only when the program could not be
 * started or did not finish in time.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

/** The program is not installed on this system. */
export class CommandUnavailableError extends Error {
  constructor(public readonly command: string) {
    super(`${command} is not installed`);
    this.name = 'CommandUnavailableError';
  }
}

/** The program was killed after exceeding its time budget. */
export class CommandTimeoutError extends Error {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
  ) {
    super(`${command} did not finish within ${timeoutMs}ms`);
    this.name = 'CommandTimeoutError';
  }
}

/** The program ran but exited non-zero. */
export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    super(`${command} exited with code ${exitCode}${stderr ? `: ${stderr}` : ''}`);
    this.name = 'CommandFailedError';
  }
}

function toText(output: unknown): string {
  if (output === undefined || output === null) return '';
  return typeof output === 'string' ? output : String(output);
}

/** CommandRunner backed by execa. */
export class ExecaRunner implements CommandRunner {
  constructor(
    private readonly timeoutMs: number,
    private readonly logger: EngineLogger = silentLogger,
  ) {}

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    this.logger.debug(`${command} ${args.join(' ')}`);
    try {
      const result = await execa(command, [...args], { timeout: this.timeoutMs });
      return { stdout: toText(result.stdout), stderr: toText(result.stderr), exitCode: result.exitCode ?? 0 };
    } catch (error: unknown) {
      if (error instanceof ExecaError) {
        if (error.code === 'ENOENT') {
          throw new CommandUnavailableError(command);
        }
        if (error.timedOut) {
          throw new CommandTimeoutError(command, this.timeoutMs);
        }
        if (error.exitCode !== undefined) {
          return { stdout: toText(error.stdout), stderr: toText(error.stderr), exitCode: error.exitCode };
        }
      }
      throw error;
    }
  }
}

/**
 * Run a command that must succeed.
 *
 * @returns Trimmed stdout
 * @throws {CommandFailedError} On a non-zero exit
 */
export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
): Promise<string> {
  const result = await runner.run(command, args);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(`${command} ${args.join(' ')}`, result.exitCode, result.stderr.trim());
  }
  return result.stdout.trim();
}
