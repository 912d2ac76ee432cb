import { Writable } from 'node:stream';
import { GlobalSegment, TranscriptSink } from '../../types';

/** `mm:ss.s`, rounded to the nearest tenth. */
export const formatTimestamp = (seconds: number): string => {
  const tenths = Math.max(0, Math.round(seconds * 10));
  const minutes = Math.floor(tenths / 600);
  const rest = (tenths % 600) / 10;
  return `${String(minutes).padStart(2, '0')}:${rest.toFixed(1).padStart(4, '0')}`;
};

export const formatSegmentLine = (segment: GlobalSegment): string =>
  `[${formatTimestamp(segment.globalStart)} → ${formatTimestamp(segment.globalEnd)}] ${segment.text}`;

export class TerminalTranscriptSink implements TranscriptSink {
  public constructor(private readonly output: Writable = process.stdout) {}

  public write(segment: GlobalSegment): void {
    this.output.write(`${formatSegmentLine(segment)}\n`);
  }
}
