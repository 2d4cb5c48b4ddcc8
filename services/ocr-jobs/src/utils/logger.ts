/**
 * Service logger for the OCR jobs service
 */

import { createLogger } from '@pageline/logger';
import { config } from '../config';

export const logger = createLogger({
  service: 'ocr-jobs',
  level: config.logLevel,
  format: config.logFormat,
  environment: config.nodeEnv,
  enableDailyRotate: config.logRotate,
  logDir: config.logDir,
});
