import { AudioWindow, GlobalSegment, LocalSegment } from '../types';

export interface ReconcileResult {
  emitted: GlobalSegment[];
  discarded: GlobalSegment[];
  watermark: number;
}

const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

/**
 * Maps one window's segments onto the global axis and keeps only those ending past
 * the watermark. Overlapping windows transcribe the shared audio twice; the repeat
 * is recognised by time alone, so differently worded repeats still collapse.
 *
 * A segment that starts before the watermark but ends after it is emitted whole.
 */
export const reconcileSegments = (
  window: Pick<AudioWindow, 'index' | 'globalStart' | 'globalEnd'>,
  localSegments: readonly LocalSegment[],
  watermark: number
): ReconcileResult => {
  const duration = window.globalEnd - window.globalStart;
  const emitted: GlobalSegment[] = [];
  const discarded: GlobalSegment[] = [];
  let current = watermark;

  for (const local of localSegments) {
    const localStart = clamp(local.localStart, 0, duration);
    const localEnd = clamp(local.localEnd, localStart, duration);
    const segment: GlobalSegment = {
      text: local.text.trim(),
      globalStart: window.globalStart + localStart,
      globalEnd: window.globalStart + localEnd,
      windowIndex: window.index
    };

    if (!segment.text || segment.globalEnd <= current) {
      discarded.push(segment);
      continue;
    }

    emitted.push(segment);
    current = Math.max(current, segment.globalEnd);
  }

  return { emitted, discarded, watermark: current };
};

/** Owns one session's watermark. */
export class Deduplicator {
  private watermark = 0;

  public getWatermark(): number {
    return this.watermark;
  }

  public reconcile(
    window: Pick<AudioWindow, 'index' | 'globalStart' | 'globalEnd'>,
    localSegments: readonly LocalSegment[]
  ): ReconcileResult {
    const result = reconcileSegments(window, localSegments, this.watermark);
    this.watermark = result.watermark;
    return result;
  }
}
