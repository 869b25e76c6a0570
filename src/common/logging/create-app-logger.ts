import { env } from '../../config/env.validation';
import { AppLogger } from './app-logger';

export function createAppLogger(context: string): AppLogger {
  return new AppLogger(context, {
    errorLogPath: env.ERROR_LOG_PATH,
    fileLevel: env.ERROR_LOG_LEVEL,
  });
}
