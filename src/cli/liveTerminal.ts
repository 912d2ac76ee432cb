#!/usr/bin/env node
import readline from 'node:readline';
import { runStartupChecks } from '../bootstrap/startupChecks';
import { resolveConfig, toPipelineOptions, validateConfig } from '../config';
import { ConfigurationError, describeError } from '../core/errors';
import { TranscriptionPipeline } from '../core/TranscriptionPipeline';
import { StructuredLogger } from '../logging/StructuredLogger';
import { WhisperWorkerEngine } from '../services/asr/WhisperWorkerEngine';
import { FfmpegAudioSource } from '../services/capture/FfmpegAudioSource';
import { formatTimestamp, TerminalTranscriptSink } from '../services/sink/TerminalTranscriptSink';
import { formatSummary } from './formatSummary';

const note = (text: string): void => {
  process.stderr.write(`${text}\n`);
};

const printUsage = (): void => {
  note('Usage: tidemark [audio-file]');
  note('');
  note('Without a file, captures the device named by TIDEMARK_AUDIO_INPUT / TIDEMARK_AUDIO_FORMAT.');
  note('The transcript goes to stdout; status and the session summary go to stderr.');
};

const printHelp = (): void => {
  note('');
  note('Commands:');
  note('  /status             Print stage, watermark and window stride');
  note('  /stop               Stop listening, transcribe the tail, print the summary');
  note('  /quit               Same as /stop; a second /quit exits immediately');
  note('  /help               Show this help');
  note('');
};

const main = async (): Promise<void> => {
  const fileArgument = process.argv[2];
  if (fileArgument === '--help' || fileArgument === '-h') {
    printUsage();
    return;
  }

  const config = resolveConfig(process.env, fileArgument);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  const logger = await StructuredLogger.create(config.logDir, {
    level: config.logLevel,
    echo: config.logLevel === 'debug'
  });
  logger.info('Tidemark starting', {
    logPath: logger.getLogPath(),
    input: config.audioInput,
    format: config.audioInputFormat,
    model: config.asrModel,
    transport: config.asrTransport
  });

  await runStartupChecks(config, logger);

  const engine = new WhisperWorkerEngine(config, logger);
  const pipeline = new TranscriptionPipeline(
    { engine, sink: new TerminalTranscriptSink() },
    logger,
    toPipelineOptions(config)
  );
  const source = new FfmpegAudioSource(
    {
      input: config.audioInput,
      format: config.audioInputFormat,
      realtime: config.realtimeFileInput,
      sampleRateHz: config.sampleRateHz,
      frameMs: config.frameMs
    },
    logger
  );

  pipeline.on('stateChanged', (state) => {
    note(`[state] ${state.stage}${state.detail ? ` (${state.detail})` : ''}`);
  });
  pipeline.on('engineFailure', (window, failure) => {
    note(`[engine] window ${window.index} at ${formatTimestamp(window.globalStart)} failed: ${failure.message}`);
  });
  pipeline.on('underrun', (underrun) => {
    note(`[audio] ${underrun.message}`);
  });
  pipeline.on('windowDropped', (window, reason) => {
    note(`[queue] window ${window.index} dropped (${reason})`);
  });

  let stopping = false;
  const requestStop = (): void => {
    if (stopping) {
      note('[stop] forcing exit');
      process.exit(130);
    }

    stopping = true;
    note('[stop] finishing the current window...');
    pipeline.stop().catch((error: unknown) => {
      note(`[error] ${describeError(error)}`);
    });
  };

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
    terminal: Boolean(process.stdin.isTTY)
  });

  rl.on('line', (line) => {
    const input = line.trim();

    if (input === '/status') {
      const state = pipeline.getState();
      note(
        `[status] stage=${state.stage}${state.detail ? ` detail=${state.detail}` : ''} watermark=${formatTimestamp(pipeline.getWatermark())} stride=${pipeline.getStrideSeconds()}s`
      );
      return;
    }

    if (input === '/stop' || input === '/quit') {
      requestStop();
      return;
    }

    if (input === '/help') {
      printHelp();
      return;
    }

    if (input.length > 0) {
      note('Unknown command. Use /help, /status, /stop, or /quit.');
    }
  });

  process.on('SIGINT', requestStop);

  printHelp();

  try {
    const summary = await pipeline.run(source);
    for (const line of formatSummary(summary)) {
      note(line);
    }
  } finally {
    rl.close();
    process.off('SIGINT', requestStop);
    await engine.shutdown().catch((error: unknown) => {
      logger.warn('ASR worker did not shut down cleanly', { detail: describeError(error) });
    });
    logger.info('Tidemark exiting', { logPath: logger.getLogPath() });
    await logger.flush();
  }
};

main().catch((error: unknown) => {
  note(describeError(error));
  process.exit(1);
});
