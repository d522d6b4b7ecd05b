/**
 * Process spawning utilities.
 */

import { execa } from "execa";
import type { Logger } from "../logging";

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /**
   * Environment variables.
   * When provided, replaces process.env entirely (no merging).
   */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  /**
   * Exit code, or null if process didn't exit normally.
   * null when: killed by signal or spawn error.
   */
  readonly exitCode: number | null;
  /** Signal name if process was killed (e.g., 'SIGTERM', 'SIGKILL') */
  readonly signal?: string;
}

/**
 * Handle for a spawned process.
 */
export interface SpawnedProcess {
  /**
   * Process ID.
   * undefined if process failed to spawn (e.g., ENOENT, EACCES).
   */
  readonly pid: number | undefined;

  /**
   * Wait for the process to exit.
   * Never throws for process exit status or spawn failures - check result fields instead.
   */
  wait(): Promise<ProcessResult>;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Start a process and return a handle to it.
   * Returns synchronously - the process is spawned immediately.
   *
   * @example
   * const proc = runner.run('which', ['marksman']);
   * const result = await proc.wait();
   * if (result.exitCode === 0) {
   *   console.log(result.stdout.trim());
   * }
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

/**
 * Settled outcome of an execa subprocess run with `reject: false`.
 */
interface SubprocessOutcome {
  readonly stdout?: unknown;
  readonly stderr?: unknown;
  readonly exitCode?: number | undefined;
  readonly signal?: string | undefined;
  readonly failed: boolean;
}

/**
 * The parts of an execa subprocess this module relies on.
 */
interface RunningSubprocess extends PromiseLike<SubprocessOutcome> {
  readonly pid?: number | undefined;
}

/**
 * SpawnedProcess implementation wrapping an execa subprocess.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  private cachedResult: ProcessResult | null = null;

  constructor(
    private readonly subprocess: RunningSubprocess,
    private readonly logger: Logger,
    private readonly command: string
  ) {}

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  async wait(): Promise<ProcessResult> {
    if (this.cachedResult !== null) {
      return this.cachedResult;
    }

    const result = await this.waitForProcess();
    this.cachedResult = result;
    this.logResult(result);
    return result;
  }

  private logResult(result: ProcessResult): void {
    if (result.stderr) {
      this.logger.debug(`[${this.command} ${this.pid ?? 0}] stderr: ${result.stderr.trim()}`);
    }
    this.logger.debug("Exited", {
      command: this.command,
      pid: this.pid ?? 0,
      exitCode: result.exitCode ?? -1,
    });
  }

  private async waitForProcess(): Promise<ProcessResult> {
    try {
      const result = await this.subprocess;

      // With reject: false, spawn errors (ENOENT, EACCES) resolve with failed=true
      // and the reason in originalMessage
      let stderr = typeof result.stderr === "string" ? result.stderr : "";
      if (result.failed && !stderr && "originalMessage" in result) {
        stderr = String(result.originalMessage);
      }

      const processResult: ProcessResult = {
        stdout: typeof result.stdout === "string" ? result.stdout : "",
        stderr,
        exitCode: result.exitCode ?? null,
      };
      return result.signal ? { ...processResult, signal: result.signal } : processResult;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error("Spawn failed", { command: this.command, error: message });
      return { stdout: "", stderr: message, exitCode: null };
    }
  }
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const subprocess = execa(command, [...args], {
      cleanup: true,
      encoding: "utf8",
      reject: false, // Don't throw on non-zero exit - check exitCode instead
      ...(options?.cwd && { cwd: options.cwd }),
      // A custom env replaces process.env instead of extending it
      ...(options?.env && { env: options.env, extendEnv: false }),
    });

    const spawned = new ExecaSpawnedProcess(subprocess, this.logger, command);
    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid });
    }
    return spawned;
  }
}
