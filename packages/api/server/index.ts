/**
 * pipetrack API Server
 *
 * Wires configuration, store, protocol, runner and dispatcher together and
 * listens. Runs report their status in process unless PIPETRACK_STATUS_URL
 * points them at another instance.
 */

import {
  createLogger,
  errorMessage,
  EventBus,
  loadConfig,
  PipelineStore,
} from '@pipetrack/shared';
import {
  createDefaultSteps,
  FlowRunner,
  HttpStatusReporter,
  LocalStatusReporter,
  PipelineDispatcher,
  StatusUpdateProtocol,
  storeFieldRecorder,
  type StatusReporter,
} from '@pipetrack/flow';
import { createApp } from './app.js';

function main(): void {
  const config = loadConfig();
  const logger = createLogger({ level: config.log.level, format: config.log.format });

  const store = new PipelineStore(config.dbPath);
  const bus = new EventBus({ logger: logger.child({ component: 'bus' }) });
  const protocol = new StatusUpdateProtocol(store, { bus, logger });

  const reporter: StatusReporter = config.statusUrl
    ? new HttpStatusReporter({ baseUrl: config.statusUrl })
    : new LocalStatusReporter(protocol);

  const runner = new FlowRunner({
    steps: createDefaultSteps(config),
    reporter,
    recorder: storeFieldRecorder(store),
    logger,
    reportRetry: config.statusRetry,
    defaultTimeoutMs: config.stageTimeoutMs,
  });
  const dispatcher = new PipelineDispatcher(store, protocol, runner, { logger, bus });

  const app = createApp({ store, protocol, dispatcher, bus, logger });
  const server = app.listen(config.port, config.host, () => {
    logger.info('api server listening', {
      url: `http://${config.host}:${config.port}`,
      dbPath: config.dbPath,
      statusTransport: config.statusUrl ? 'http' : 'local',
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('shutting down', { signal, activeRuns: dispatcher.activeRuns().length });
    server.close();
    dispatcher.waitForIdle().then(
      () => {
        store.close();
        process.exit(0);
      },
      (err: unknown) => {
        logger.error('shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (err) {
  process.stderr.write(`pipetrack api failed to start: ${errorMessage(err)}\n`);
  process.exit(1);
}
