import { spawn } from 'node:child_process';
import { Readable, Writable } from 'node:stream';
import { z } from 'zod';
import { describeError } from '../../core/errors';
import { Logger } from '../../logging/StructuredLogger';

const WorkerResponseSchema = z.object({
  id: z.string().optional(),
  ok: z.boolean().optional(),
  result: z.unknown().optional(),
  error: z.string().optional()
});

export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (reason?: unknown) => void;
  timeoutHandle: NodeJS.Timeout;
}

/** The slice of a child process the worker drives. */
export interface WorkerProcess {
  readonly pid?: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'close', listener: () => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnWorkerProcess = (
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv | undefined
) => WorkerProcess;

const spawnChildProcess: SpawnWorkerProcess = (command, args, env) =>
  spawn(command, args, { env, stdio: 'pipe' });

export interface PersistentWorkerOptions {
  name: string;
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  stopGraceMs?: number;
  spawnProcess?: SpawnWorkerProcess;
}

/** What the engine needs from a worker, whichever wire format it speaks. */
export interface WorkerClient {
  start(): Promise<void>;
  request(payload: Record<string, unknown>, timeoutMs: number, binaryData?: Buffer): Promise<unknown>;
  stop(): Promise<void>;
}

const STDERR_TAIL_CHARS = 4000;

/**
 * A long-lived child process answering id-tagged requests. Subclasses own the wire
 * format: how a request is written to stdin and how replies are cut out of stdout.
 */
export abstract class PersistentWorker implements WorkerClient {
  protected child: WorkerProcess | undefined;
  private startPromise: Promise<void> | undefined;
  private stopping = false;
  private nextRequestId = 0;
  private stderrBuffer = '';
  private pending = new Map<string, PendingRequest>();

  public constructor(protected readonly options: PersistentWorkerOptions) {}

  public async start(): Promise<void> {
    if (this.child) {
      return;
    }

    if (this.startPromise) {
      await this.startPromise;
      return;
    }

    this.startPromise = this.spawnWorker();

    try {
      await this.startPromise;
    } finally {
      this.startPromise = undefined;
    }
  }

  public async request(
    payload: Record<string, unknown>,
    timeoutMs: number,
    binaryData?: Buffer
  ): Promise<unknown> {
    await this.start();

    const current = this.child;
    if (!current) {
      throw new Error(`${this.options.name} worker is not running`);
    }

    const requestId = `${Date.now()}-${++this.nextRequestId}`;

    return new Promise<unknown>((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`${this.options.name} worker request timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending.set(requestId, { resolve, reject, timeoutHandle });

      void this.writeRequest(current, { ...payload, id: requestId }, binaryData).catch((error: unknown) => {
        this.settle(requestId, { id: requestId, ok: false, error: describeError(error) });
      });
    });
  }

  public async stop(): Promise<void> {
    this.stopping = true;

    const current = this.child;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve) => {
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = (): void => {
        if (settled) {
          return;
        }

        settled = true;
        if (killTimer) {
          clearTimeout(killTimer);
        }
        resolve();
      };

      current.once('close', () => {
        finish();
      });

      killTimer = setTimeout(() => {
        killTimer = undefined;
        current.kill('SIGKILL');
        finish();
      }, this.options.stopGraceMs ?? 1500);

      current.kill('SIGTERM');
    });

    this.child = undefined;
  }

  protected abstract writeRequest(
    child: WorkerProcess,
    message: Record<string, unknown>,
    binaryData: Buffer | undefined
  ): Promise<void>;

  protected abstract resetReader(): void;

  protected abstract handleStdoutChunk(chunk: Buffer): void;

  /** Routes one decoded reply to the request waiting for it. */
  protected settle(responseId: string | undefined, response: WorkerResponse): void {
    if (!responseId) {
      this.options.logger?.debug(`${this.options.name} worker response missing id`);
      return;
    }

    const pending = this.pending.get(responseId);
    if (!pending) {
      this.options.logger?.debug(`${this.options.name} worker response for unknown request`, {
        responseId
      });
      return;
    }

    clearTimeout(pending.timeoutHandle);
    this.pending.delete(responseId);

    if (response.ok === false) {
      pending.reject(new Error(response.error ?? `${this.options.name} worker request failed`));
      return;
    }

    pending.resolve(response.result);
  }

  private async spawnWorker(): Promise<void> {
    this.stopping = false;

    await new Promise<void>((resolve, reject) => {
      const spawnProcess = this.options.spawnProcess ?? spawnChildProcess;
      const child = spawnProcess(this.options.command, this.options.args, this.options.env);

      const onError = (error: Error): void => {
        this.child = undefined;
        reject(error);
      };

      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);

        this.child = child;
        this.stderrBuffer = '';
        this.resetReader();

        child.stdout.on('data', (chunk: Buffer) => {
          this.handleStdoutChunk(chunk);
        });

        child.stderr.on('data', (chunk: Buffer) => {
          const text = chunk.toString();
          this.stderrBuffer = tailString(`${this.stderrBuffer}${text}`, STDERR_TAIL_CHARS);
          this.options.logger?.debug(`${this.options.name} worker stderr`, {
            detail: text.trim()
          });
        });

        child.on('error', (error) => {
          this.options.logger?.warn(`${this.options.name} worker process error`, {
            detail: error.message
          });
        });

        child.on('close', (code, signal) => {
          if (this.stopping) {
            this.options.logger?.info(`${this.options.name} worker stopped`, { code, signal });
          } else {
            this.options.logger?.warn(`${this.options.name} worker exited`, {
              code,
              signal,
              stderr: this.stderrBuffer.trim()
            });
          }

          if (this.child === child) {
            this.child = undefined;
          }

          this.rejectAllPending(
            new Error(`${this.options.name} worker exited (code=${code}, signal=${signal ?? 'none'})`)
          );
        });

        this.options.logger?.info(`${this.options.name} worker started`, {
          command: this.options.command,
          pid: child.pid
        });

        resolve();
      });
    });
  }

  private rejectAllPending(error: Error): void {
    const entries = Array.from(this.pending.values());
    this.pending.clear();

    for (const entry of entries) {
      clearTimeout(entry.timeoutHandle);
      entry.reject(error);
    }
  }
}

export const tailString = (value: string, maxLength: number): string =>
  value.length <= maxLength ? value : value.slice(value.length - maxLength);

/** Decodes one reply; undefined when it is not JSON or not shaped like a reply. */
export const parseWorkerResponse = (text: string): WorkerResponse | undefined => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }

  const parsed = WorkerResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
};
