import { ConsoleAlertSink } from './alerts';
import { LaunchDetector } from './detector';
import { config, createLogger, errorMessage, getConnection } from './utils';

const log = createLogger('main');

async function main() {
  log.info('Rug detector starting', {
    program: config.programs.pumpFun,
    maxConcurrentLaunches: config.detector.maxConcurrentLaunches,
    fetchTimeoutMs: config.detector.fetchTimeoutMs,
  });

  const detector = new LaunchDetector({
    client: getConnection(),
    sink: new ConsoleAlertSink(),
    settings: config.detector,
  });

  // Throws when the initial subscription cannot be set up
  await detector.start();

  const shutdown = async () => {
    await detector.stop();
    log.info('Goodbye');
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch(err => {
      log.error('Shutdown failed', { error: errorMessage(err) });
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await detector.run();
}

main().catch(err => {
  log.error('Fatal error', { error: errorMessage(err) });
  process.exit(1);
});
