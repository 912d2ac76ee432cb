import { parseWorkerResponse, PersistentWorker, WorkerProcess } from './PersistentWorker';

const FRAME_HEADER_BYTES = 8; // uint32 jsonLen + uint32 binaryLen
const RESPONSE_HEADER_BYTES = 4; // uint32 jsonLen
const MAX_RESPONSE_JSON_BYTES = 8 * 1024 * 1024;

export const encodeRequestFrame = (message: Record<string, unknown>, binaryData?: Buffer): Buffer => {
  const jsonBytes = Buffer.from(JSON.stringify(message), 'utf8');
  const audioBytes = binaryData && binaryData.length > 0 ? binaryData : Buffer.alloc(0);
  const header = Buffer.allocUnsafe(FRAME_HEADER_BYTES);
  header.writeUInt32LE(jsonBytes.length, 0);
  header.writeUInt32LE(audioBytes.length, 4);
  return Buffer.concat([header, jsonBytes, audioBytes]);
};

/**
 * Splits length-prefixed JSON replies out of a byte stream. Returns the decoded
 * bodies and whatever bytes belong to a reply that has not fully arrived.
 */
export const decodeResponseFrames = (
  buffer: Buffer
): { bodies: string[]; rest: Buffer; invalidLength?: number } => {
  const bodies: string[] = [];
  let rest = buffer;

  while (rest.length >= RESPONSE_HEADER_BYTES) {
    const jsonLength = rest.readUInt32LE(0);
    if (jsonLength <= 0 || jsonLength > MAX_RESPONSE_JSON_BYTES) {
      return { bodies, rest: Buffer.alloc(0), invalidLength: jsonLength };
    }

    const frameBytes = RESPONSE_HEADER_BYTES + jsonLength;
    if (rest.length < frameBytes) {
      break;
    }

    bodies.push(rest.subarray(RESPONSE_HEADER_BYTES, frameBytes).toString('utf8'));
    rest = rest.subarray(frameBytes);
  }

  return { bodies, rest: Buffer.from(rest) };
};

/**
 * Requests are `[jsonLen][binaryLen][json][pcm]`, replies `[jsonLen][json]`, all
 * lengths uint32 little-endian. PCM goes over the pipe raw.
 */
export class PersistentFramedWorker extends PersistentWorker {
  private stdoutBuffer = Buffer.alloc(0);
  private stdinWriteQueue: Promise<void> = Promise.resolve();

  protected writeRequest(
    child: WorkerProcess,
    message: Record<string, unknown>,
    binaryData: Buffer | undefined
  ): Promise<void> {
    const frame = encodeRequestFrame(message, binaryData);

    // Frames must never interleave on stdin.
    const write = this.stdinWriteQueue.then(
      () =>
        new Promise<void>((resolve, reject) => {
          child.stdin.write(frame, (error) => {
            if (error) {
              reject(error);
              return;
            }

            resolve();
          });
        })
    );

    this.stdinWriteQueue = write.catch(() => undefined);
    return write;
  }

  protected resetReader(): void {
    this.stdoutBuffer = Buffer.alloc(0);
    this.stdinWriteQueue = Promise.resolve();
  }

  protected handleStdoutChunk(chunk: Buffer): void {
    const combined =
      this.stdoutBuffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.stdoutBuffer, chunk]);
    const decoded = decodeResponseFrames(combined);
    this.stdoutBuffer = decoded.rest;

    if (decoded.invalidLength !== undefined) {
      this.options.logger?.warn(`${this.options.name} framed worker produced invalid response length`, {
        jsonLength: decoded.invalidLength
      });
    }

    for (const body of decoded.bodies) {
      const response = parseWorkerResponse(body);
      if (!response) {
        this.options.logger?.debug(`${this.options.name} worker emitted invalid framed JSON`, {
          responseJson: body
        });
        continue;
      }

      this.settle(response.id, response);
    }
  }
}
