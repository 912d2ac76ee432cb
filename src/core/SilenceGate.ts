import { measureLevels } from '../audio/pcm';
import { GateDecision, GateMode, GateThresholds } from '../types';

export interface SilenceGateThresholds {
  start: GateThresholds;
  flush: GateThresholds;
  /** Pair a start-mode window must clear to open a closed gate; defaults to `start`. */
  opening?: GateThresholds;
}

/**
 * Dual-threshold energy gate. Audio counts as silent only when both RMS and peak
 * sit below their thresholds; either one alone lets quiet speech or short bursts
 * through.
 */
export class SilenceGate {
  public constructor(private readonly thresholds: SilenceGateThresholds) {}

  public classify(pcm: Buffer, mode: GateMode = 'start'): GateDecision {
    return this.decide(pcm, mode, this.thresholds[mode]);
  }

  public classifyOpening(pcm: Buffer): GateDecision {
    return this.decide(pcm, 'start', this.thresholds.opening ?? this.thresholds.start);
  }

  private decide(pcm: Buffer, mode: GateMode, thresholds: GateThresholds): GateDecision {
    const levels = measureLevels(pcm);
    const silent = levels.rms < thresholds.rms && levels.peak < thresholds.peak;

    return {
      verdict: silent ? 'silent' : 'voiced',
      mode,
      rms: levels.rms,
      peak: levels.peak,
      thresholds
    };
  }
}
