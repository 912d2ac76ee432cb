import { BackpressurePolicy } from '../types';

export const SUPPORTED_SAMPLE_RATE_HZ = 16000;

export interface PipelineOptions {
  sampleRateHz: number;
  windowSeconds: number;
  overlapSeconds: number;
  minFlushSeconds: number;
  rmsThreshold: number;
  peakThreshold: number;
  startGateEnabled: boolean;
  flushRmsThreshold: number;
  flushPeakThreshold: number;
  queueCapacity: number;
  backpressurePolicy: BackpressurePolicy;
  underrunTimeoutMs: number;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  sampleRateHz: SUPPORTED_SAMPLE_RATE_HZ,
  windowSeconds: 5.0,
  overlapSeconds: 1.5,
  minFlushSeconds: 0.6,
  rmsThreshold: 80,
  peakThreshold: 900,
  startGateEnabled: true,
  flushRmsThreshold: 120,
  flushPeakThreshold: 1500,
  queueCapacity: 20,
  backpressurePolicy: 'block',
  underrunTimeoutMs: 2000
};

const isFinitePositive = (value: number): boolean => Number.isFinite(value) && value > 0;

export const validatePipelineOptions = (options: PipelineOptions): string[] => {
  const errors: string[] = [];

  if (options.sampleRateHz !== SUPPORTED_SAMPLE_RATE_HZ) {
    errors.push(`sampleRateHz must be ${SUPPORTED_SAMPLE_RATE_HZ}.`);
  }

  if (!isFinitePositive(options.windowSeconds)) {
    errors.push('windowSeconds must be a positive number.');
  }

  if (!Number.isFinite(options.overlapSeconds) || options.overlapSeconds < 0) {
    errors.push('overlapSeconds must be zero or a positive number.');
  }

  if (options.overlapSeconds >= options.windowSeconds) {
    errors.push(
      `overlapSeconds (${options.overlapSeconds}) must be smaller than windowSeconds (${options.windowSeconds}).`
    );
  }

  if (!isFinitePositive(options.minFlushSeconds) || options.minFlushSeconds > options.windowSeconds) {
    errors.push('minFlushSeconds must be positive and no longer than windowSeconds.');
  }

  if (!isFinitePositive(options.rmsThreshold) || !isFinitePositive(options.peakThreshold)) {
    errors.push('rmsThreshold and peakThreshold must be positive numbers.');
  }

  if (
    options.flushRmsThreshold < options.rmsThreshold ||
    options.flushPeakThreshold < options.peakThreshold
  ) {
    errors.push(
      'Flush-gate thresholds must be at least as strict as the standard thresholds (flushRmsThreshold >= rmsThreshold, flushPeakThreshold >= peakThreshold).'
    );
  }

  if (!Number.isInteger(options.queueCapacity) || options.queueCapacity < 1) {
    errors.push('queueCapacity must be a positive integer.');
  }

  if (!['block', 'drop-oldest'].includes(options.backpressurePolicy)) {
    errors.push('backpressurePolicy must be one of: block, drop-oldest.');
  }

  if (!isFinitePositive(options.underrunTimeoutMs)) {
    errors.push('underrunTimeoutMs must be a positive number.');
  }

  return errors;
};
