import fs from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { Logger } from '../logging/StructuredLogger';
import {
  CommandResult,
  makeOfflineEnv,
  RunCommandOptions,
  runCommand
} from '../services/process/runCommand';
import { AppConfig } from '../types';

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

export type StartupCheckConfig = Pick<
  AppConfig,
  'pythonBin' | 'asrScriptPath' | 'audioInput' | 'audioInputFormat' | 'enforceOffline'
>;

const ASR_IMPORT_SNIPPET = 'import faster_whisper, numpy; print("deps-ok")';

const assertPathExists = (absolutePath: string, label: string): void => {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. Update your TIDEMARK_* settings.`);
  }
};

/**
 * Fails fast, before the model load, on anything that would break the session later:
 * python and its packages, the worker script, ffmpeg, and a file input that is missing.
 */
export const runStartupChecks = async (
  config: StartupCheckConfig,
  logger?: Logger,
  run: CommandRunner = runCommand
): Promise<void> => {
  logger?.info('Running startup checks');

  assertPathExists(path.resolve(config.asrScriptPath), 'ASR worker script');

  if (config.audioInputFormat === 'file') {
    assertPathExists(path.resolve(config.audioInput), 'Audio file');
  }

  if (path.isAbsolute(config.pythonBin) && fs.existsSync(config.pythonBin)) {
    fs.accessSync(config.pythonBin, fsConstants.X_OK);
  }

  const python = await run(config.pythonBin, ['--version'], { timeoutMs: 8000 });
  logger?.debug('Python found', { version: `${python.stdout}${python.stderr}`.trim() });

  await run(config.pythonBin, ['-c', ASR_IMPORT_SNIPPET], {
    timeoutMs: 20000,
    env: makeOfflineEnv(config.enforceOffline)
  });

  await run('ffmpeg', ['-version'], { timeoutMs: 8000 });

  logger?.info('Startup checks completed successfully');
};
