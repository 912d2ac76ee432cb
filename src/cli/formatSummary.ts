import { SessionSummary } from '../core/TranscriptionPipeline';
import { formatTimestamp } from '../services/sink/TerminalTranscriptSink';

export const formatSummary = (summary: SessionSummary): string[] => [
  '--- session summary ---',
  `windows: ${summary.windowsProduced} produced, ${summary.windowsTranscribed} transcribed, ${summary.windowsSilent} silent, ${summary.windowsDropped} dropped`,
  `segments: ${summary.segmentsEmitted} emitted, ${summary.segmentsDiscarded} discarded as overlap`,
  `engine failures: ${summary.engineFailures}, underruns: ${summary.underruns}`,
  `transcribed up to ${formatTimestamp(summary.watermark)}${summary.flushedFinalWindow ? ' (final window flushed)' : ''}`,
  `engine p50/p95: ${summary.latency.engineMs.p50}/${summary.latency.engineMs.p95} ms, real-time factor ${summary.latency.realTimeFactor}`,
  '-----------------------'
];
