export const BYTES_PER_SAMPLE = 2; // s16le mono

export interface AudioLevels {
  rms: number;
  peak: number;
  sampleCount: number;
}

export const secondsToSamples = (seconds: number, sampleRate: number): number =>
  Math.round(seconds * sampleRate);

export const samplesToSeconds = (samples: number, sampleRate: number): number =>
  samples / sampleRate;

export const sampleCountOf = (pcm: Buffer): number => Math.floor(pcm.length / BYTES_PER_SAMPLE);

/** RMS and peak in raw int16 units, so thresholds read like "RMS below 80". */
export const measureLevels = (pcm: Buffer): AudioLevels => {
  const sampleCount = sampleCountOf(pcm);
  if (sampleCount === 0) {
    return { rms: 0, peak: 0, sampleCount: 0 };
  }

  let sumSquares = 0;
  let peak = 0;
  for (let index = 0; index < sampleCount; index += 1) {
    const sample = pcm.readInt16LE(index * BYTES_PER_SAMPLE);
    sumSquares += sample * sample;
    const magnitude = Math.abs(sample);
    if (magnitude > peak) {
      peak = magnitude;
    }
  }

  return {
    rms: Math.sqrt(sumSquares / sampleCount),
    peak,
    sampleCount
  };
};
