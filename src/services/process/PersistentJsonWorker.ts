import { parseWorkerResponse, PersistentWorker, WorkerProcess } from './PersistentWorker';

/**
 * One JSON object per line in both directions. Binary payloads travel base64-encoded
 * under `audioBase64`.
 */
export class PersistentJsonWorker extends PersistentWorker {
  private stdoutBuffer = '';

  protected async writeRequest(
    child: WorkerProcess,
    message: Record<string, unknown>,
    binaryData: Buffer | undefined
  ): Promise<void> {
    const body =
      binaryData && binaryData.length > 0
        ? { ...message, audioBase64: binaryData.toString('base64') }
        : message;

    await new Promise<void>((resolve, reject) => {
      child.stdin.write(`${JSON.stringify(body)}\n`, (error) => {
        if (error) {
          reject(error);
          return;
        }

        resolve();
      });
    });
  }

  protected resetReader(): void {
    this.stdoutBuffer = '';
  }

  protected handleStdoutChunk(chunk: Buffer): void {
    this.stdoutBuffer += chunk.toString('utf8');

    while (true) {
      const newlineIndex = this.stdoutBuffer.indexOf('\n');
      if (newlineIndex === -1) {
        break;
      }

      const line = this.stdoutBuffer.slice(0, newlineIndex).trim();
      this.stdoutBuffer = this.stdoutBuffer.slice(newlineIndex + 1);

      if (!line) {
        continue;
      }

      const response = parseWorkerResponse(line);
      if (!response) {
        this.options.logger?.debug(`${this.options.name} worker emitted non-JSON line`, { line });
        continue;
      }

      this.settle(response.id, response);
    }
  }
}
