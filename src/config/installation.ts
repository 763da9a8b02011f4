import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import type { LoggerOptions } from '../utils/logger.js';
import { loadSettings, resolveInstallationPaths } from './settings.js';
import type { InstallationPaths, Settings } from './settings.js';

export interface InstallationOptions {
  home?: string;
  logLevel?: string;
  /**
   * Tee warnings into `logs/error_log.txt`. Only runs that write to the
   * installation set this; previews and reports leave the tree untouched.
   */
  errorLog?: boolean;
}

export interface Installation {
  paths: InstallationPaths;
  settings: Settings;
  logger: Logger;
}

export function installationLoggerOptions(paths: InstallationPaths, options: InstallationOptions): LoggerOptions {
  return {
    level: options.logLevel,
    errorLogPath: options.errorLog === true ? paths.errorLogFile : undefined
  };
}

export async function openInstallation(
  options: InstallationOptions,
  makeLogger: (options: LoggerOptions) => Logger = createLogger
): Promise<Installation> {
  const paths = resolveInstallationPaths(options.home);
  const logger = makeLogger(installationLoggerOptions(paths, options));
  const settings = await loadSettings(paths.configFile, logger);
  return { paths, settings, logger };
}
