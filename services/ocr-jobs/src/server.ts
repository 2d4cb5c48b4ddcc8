/**
 * OCR Jobs API server
 *
 * Wires the job store, collaborators, runners and control surface together
 * and serves them over HTTP.
 */

import { createServer, Server as HTTPServer } from 'http';
import { errorMessage } from '@pageline/errors';
import { createExpressApp } from './app';
import { BaiduOcrClient } from './clients/BaiduOcrClient';
import { config } from './config';
import { RowBuilder } from './layout/rows';
import { LayoutClassifier } from './layout/LayoutClassifier';
import { LineSorter } from './layout/LineSorter';
import { JobRunner } from './orchestration/JobRunner';
import { RetryRunner } from './orchestration/RetryRunner';
import { ImageSetRenderer } from './renderers/ImageSetRenderer';
import { PdfPageRenderer } from './renderers/PdfPageRenderer';
import { RoutingRenderer } from './renderers/RoutingRenderer';
import { JobStore } from './repositories/JobStore';
import { JobService } from './services/JobService';
import { CsvResultStore } from './storage/ResultStore';
import { logger } from './utils/logger';

const SHUTDOWN_GRACE_MS = 10000;

export function createJobService(): JobService {
  const store = new JobStore();
  const recognizer = new BaiduOcrClient({
    tokenUrl: config.baiduTokenUrl,
    ocrUrl: config.baiduOcrUrl,
    timeoutMs: config.recognizerTimeoutMs,
  });
  const renderer = new RoutingRenderer({
    pdf: new PdfPageRenderer({ pdftoppmPath: config.pdftoppmPath }),
    images: new ImageSetRenderer(),
  });
  const results = new CsvResultStore();
  const rowBuilder = new RowBuilder(new LayoutClassifier(config.layout), new LineSorter(config.layout));

  const shared = { store, recognizer, results, rowBuilder, logger, pageIntervalMs: config.pageIntervalMs };

  return new JobService({
    store,
    runner: new JobRunner({ ...shared, renderer }),
    retryRunner: new RetryRunner(shared),
    runsDir: config.runsDir,
    defaultLanguageHint: config.defaultLanguageType,
    defaultResolution: config.defaultDpi,
    logger,
  });
}

/**
 * Graceful shutdown: stop accepting requests, then give running jobs a
 * bounded time to settle.
 */
function setupGracefulShutdown(httpServer: HTTPServer, service: JobService): void {
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    httpServer.close(() => {
      logger.info('HTTP server closed');
    });

    const timer = setTimeout(() => {
      logger.warn('Forcing shutdown after timeout');
      process.exit(0);
    }, SHUTDOWN_GRACE_MS);
    timer.unref();

    await service.drain();
    logger.info('All job runs settled');
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

async function main(): Promise<void> {
  const service = createJobService();
  const app = createExpressApp(service, {
    runsDir: config.runsDir,
    maxUploadBytes: config.maxUploadBytes,
    nodeEnv: config.nodeEnv,
  });

  const httpServer = createServer(app);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  logger.info('OCR jobs API running', {
    port: config.port,
    host: config.host,
    env: config.nodeEnv,
    runsDir: config.runsDir,
    endpoints: {
      rest: `http://${config.host}:${config.port}/ocr/api`,
      health: `http://${config.host}:${config.port}/health`,
    },
  });

  setupGracefulShutdown(httpServer, service);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Failed to start OCR jobs API', { error });
    process.exit(1);
  });
}
