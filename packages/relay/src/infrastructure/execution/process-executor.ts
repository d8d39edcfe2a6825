/**
 * @file process-executor.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * Compiles and runs submitted code in a throwaway directory via subprocess.
 * Go is built to WebAssembly for the browser; JavaScript runs under Node.js.
 */

import { spawn } from 'node:child_process';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from 'pino';
import type {
  CodeExecutor,
  ExecutionLanguage,
  ExecutionResult,
} from '../../domain/ports/code-executor.js';
import { ExecutionUnavailableError } from '../../domain/errors/domain-errors.js';

export interface ProcessExecutorConfig {
  /** Kill the subprocess after this long */
  timeoutMs: number;
  /** Combined stdout/stderr beyond this is dropped */
  maxOutputBytes: number;
  /** Defaults to the running Node.js binary */
  nodeBinary?: string;
  /** Defaults to `go` on PATH */
  goBinary?: string;
}

/**
 * Outcome of one subprocess run.
 */
interface ProcessOutcome {
  exitCode: number | null;
  output: string;
  timedOut: boolean;
}

interface RunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export class ProcessExecutor implements CodeExecutor {
  private readonly config: ProcessExecutorConfig;
  private readonly nodeBinary: string;
  private readonly goBinary: string;
  private readonly logger: Logger;

  constructor(config: ProcessExecutorConfig, logger: Logger) {
    this.config = config;
    this.nodeBinary = config.nodeBinary ?? process.execPath;
    this.goBinary = config.goBinary ?? 'go';
    this.logger = logger.child({ component: 'ProcessExecutor' });
  }

  async execute(code: string, language: ExecutionLanguage): Promise<ExecutionResult> {
    const workDir = await mkdtemp(join(tmpdir(), 'codeshare-'));
    try {
      switch (language) {
        case 'go':
          return await this.buildGo(code, workDir);
        case 'javascript':
          return await this.runJavaScript(code, workDir);
      }
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async buildGo(code: string, workDir: string): Promise<ExecutionResult> {
    await writeFile(join(workDir, 'main.go'), code, 'utf8');

    const outcome = await this.run(this.goBinary, ['build', '-o', 'main.wasm', 'main.go'], {
      cwd: workDir,
      env: { ...process.env, GOOS: 'js', GOARCH: 'wasm' },
    });
    if (!this.succeeded(outcome)) {
      return { ok: false, diagnostics: this.diagnostics(outcome) };
    }

    const payload = await readFile(join(workDir, 'main.wasm'));
    return { ok: true, payload, contentType: 'application/wasm' };
  }

  private async runJavaScript(code: string, workDir: string): Promise<ExecutionResult> {
    await writeFile(join(workDir, 'main.js'), code, 'utf8');

    // The program gets PATH only, none of the server's environment
    const outcome = await this.run(this.nodeBinary, ['main.js'], {
      cwd: workDir,
      env: { PATH: process.env.PATH ?? '' },
    });
    if (!this.succeeded(outcome)) {
      return { ok: false, diagnostics: this.diagnostics(outcome) };
    }

    return { ok: true, payload: Buffer.from(outcome.output, 'utf8'), contentType: 'text/plain' };
  }

  private succeeded(outcome: ProcessOutcome): boolean {
    return !outcome.timedOut && outcome.exitCode === 0;
  }

  private diagnostics(outcome: ProcessOutcome): string {
    if (outcome.timedOut) {
      return `${outcome.output}\nExecution timed out after ${this.config.timeoutMs}ms`;
    }
    return outcome.output;
  }

  /**
   * Spawns a command, collecting stdout and stderr into one stream
   * in arrival order.
   *
   * @throws ExecutionUnavailableError if the binary does not exist
   */
  private run(command: string, args: string[], options: RunOptions): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const chunks: Buffer[] = [];
      let collected = 0;
      let timedOut = false;
      let settled = false;

      const collect = (chunk: Buffer): void => {
        const room = this.config.maxOutputBytes - collected;
        if (room <= 0) return;
        const kept = chunk.subarray(0, room);
        chunks.push(kept);
        collected += kept.length;
      };
      child.stdout.on('data', collect);
      child.stderr.on('data', collect);

      const timer = setTimeout(() => {
        timedOut = true;
        this.logger.warn({ command, timeoutMs: this.config.timeoutMs }, 'Execution timed out, killing');
        child.kill('SIGKILL');
      }, this.config.timeoutMs);

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error.code === 'ENOENT') {
          this.logger.error({ command }, 'Execution toolchain not found');
          reject(new ExecutionUnavailableError(command));
        } else {
          reject(error);
        }
      });

      child.on('close', (exitCode) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          exitCode,
          output: Buffer.concat(chunks).toString('utf8'),
          timedOut,
        });
      });
    });
  }
}
