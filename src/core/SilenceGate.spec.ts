import { describe, expect, it } from 'vitest';
import { silence, squareWave } from '../testing/fakes';
import { SilenceGate } from './SilenceGate';

const gate = new SilenceGate({
  start: { rms: 80, peak: 900 },
  flush: { rms: 120, peak: 1500 }
});

const click = (amplitude: number): Buffer => {
  const pcm = silence(1);
  pcm.writeInt16LE(amplitude, 8000 * 2);
  return pcm;
};

describe('SilenceGate', () => {
  it('should classify digital silence as silent', () => {
    expect(gate.classify(silence(1))).toEqual({
      verdict: 'silent',
      mode: 'start',
      rms: 0,
      peak: 0,
      thresholds: { rms: 80, peak: 900 }
    });
  });

  it('should classify speech-level audio as voiced', () => {
    const decision = gate.classify(squareWave(1, 1000));

    expect(decision.verdict).toBe('voiced');
    expect(decision.rms).toBe(1000);
    expect(decision.peak).toBe(1000);
  });

  it('should let quiet audio through the start gate but not the flush gate', () => {
    const quiet = squareWave(1, 100);

    expect(gate.classify(quiet, 'start').verdict).toBe('voiced');
    expect(gate.classify(quiet, 'flush')).toMatchObject({
      verdict: 'silent',
      mode: 'flush',
      thresholds: { rms: 120, peak: 1500 }
    });
  });

  it('should treat a loud click in silence as voiced', () => {
    const decision = gate.classify(click(2000));

    expect(decision.rms).toBeLessThan(80);
    expect(decision.peak).toBe(2000);
    expect(decision.verdict).toBe('voiced');
  });

  it('should count a level exactly at the threshold as voiced', () => {
    expect(gate.classify(squareWave(1, 80)).verdict).toBe('voiced');
  });

  it('should hold a closed start gate to the opening thresholds', () => {
    const latched = new SilenceGate({
      start: { rms: 80, peak: 900 },
      flush: { rms: 120, peak: 1500 },
      opening: { rms: 120, peak: 1500 }
    });

    expect(latched.classifyOpening(squareWave(1, 100))).toEqual({
      verdict: 'silent',
      mode: 'start',
      rms: 100,
      peak: 100,
      thresholds: { rms: 120, peak: 1500 }
    });
    expect(latched.classifyOpening(squareWave(1, 1000)).verdict).toBe('voiced');
  });

  it('should open on the start thresholds when no opening pair is set', () => {
    expect(gate.classifyOpening(squareWave(1, 100))).toMatchObject({
      verdict: 'voiced',
      thresholds: { rms: 80, peak: 900 }
    });
  });

  it('should classify an empty buffer as silent', () => {
    expect(gate.classify(Buffer.alloc(0)).verdict).toBe('silent');
  });
});
