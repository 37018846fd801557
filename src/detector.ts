import { PublicKey } from '@solana/web3.js';
import type { AlertSink } from './alerts';
import { isLaunchEvent, LogFeed } from './monitor';
import type { LaunchEvent } from './monitor';
import { runLaunchPipeline, TaskPool } from './pipeline';
import type { LaunchOutcome } from './pipeline';
import { config, createLogger, errorMessage, withTimeout } from './utils';
import type { DetectorSettings, LedgerClient } from './utils';

const log = createLogger('detector');

export class SubscriptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubscriptionError';
  }
}

export interface DetectorStats {
  received: number;
  matched: number;
  alerted: number;
  skipped: number;
  failed: number;
  dropped: number;
}

export interface DetectorDeps {
  client: LedgerClient;
  sink: AlertSink;
  settings: DetectorSettings;
  programId?: PublicKey;
}

export class LaunchDetector {
  private readonly feed: LogFeed;
  private readonly pool: TaskPool;
  private statsTimer: ReturnType<typeof setInterval> | null = null;
  private stopping: Promise<void> | null = null;
  private stopped = false;
  private counts: DetectorStats = { received: 0, matched: 0, alerted: 0, skipped: 0, failed: 0, dropped: 0 };

  constructor(private readonly deps: DetectorDeps) {
    const programId = deps.programId ?? new PublicKey(config.programs.pumpFun);
    this.feed = new LogFeed(deps.client, programId);
    this.pool = new TaskPool(deps.settings.maxConcurrentLaunches, deps.settings.maxQueuedLaunches);
  }

  stats(): DetectorStats {
    return { ...this.counts };
  }

  /** Check the endpoint answers, then subscribe. Throws SubscriptionError when it does not. */
  async start() {
    try {
      const slot = await withTimeout(
        this.deps.client.getSlot('confirmed'),
        this.deps.settings.fetchTimeoutMs,
        'getSlot'
      );
      log.info('RPC reachable', { slot });
      this.feed.start();
    } catch (err) {
      throw new SubscriptionError(`Could not establish log subscription: ${errorMessage(err)}`);
    }

    this.statsTimer = setInterval(() => log.info('Status', this.statusSnapshot()), this.deps.settings.statsIntervalMs);
    this.statsTimer.unref();
    log.info('Listening for new launches...');
  }

  /** Consume the feed until it is closed. */
  async run() {
    for await (const event of this.feed) {
      this.counts.received++;
      if (!isLaunchEvent(event.logLines)) continue;
      this.counts.matched++;
      this.dispatch(event);
    }
    log.info('Feed loop ended');
  }

  /** Stop the feed, give in-flight launches a grace period, then unsubscribe. */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown() {
    log.info('Shutting down...');
    if (this.statsTimer) clearInterval(this.statsTimer);
    this.feed.close();
    const finished = await this.pool.drain(this.deps.settings.shutdownGraceMs);
    // Launches still running past the grace period must not alert any more
    this.stopped = true;
    await this.feed.release();
    log.info('Detector stopped', { ...this.counts, drainedCleanly: finished });
  }

  private dispatch(event: LaunchEvent) {
    log.debug('Launch candidate', { signature: event.signature });
    const accepted = this.pool.submit(async () => {
      const outcome = await runLaunchPipeline(event, {
        client: this.deps.client,
        fetchTimeoutMs: this.deps.settings.fetchTimeoutMs,
      });
      if (this.stopped) {
        log.debug('Discarding outcome after shutdown', { signature: event.signature, status: outcome.status });
        return;
      }
      try {
        this.handleOutcome(event, outcome);
      } catch (err) {
        this.counts.failed++;
        log.error('Alert sink failed', { signature: event.signature, error: errorMessage(err) });
      }
    });
    if (!accepted) {
      this.counts.dropped++;
      log.warn('Launch dropped, worker queue full', { signature: event.signature });
    }
  }

  private handleOutcome(event: LaunchEvent, outcome: LaunchOutcome) {
    const signature = event.signature;
    switch (outcome.status) {
      case 'alerted':
        log.info('Launch evaluated', {
          signature,
          mint: outcome.verdict.mint,
          highRisk: outcome.verdict.highRisk,
          latencyMs: Date.now() - event.receivedAt,
        });
        this.deps.sink.emit(outcome.verdict);
        this.counts.alerted++;
        break;
      case 'not-found':
        this.counts.skipped++;
        log.info('Skipping: no transaction data available', { signature });
        break;
      case 'mint-not-identified':
        this.counts.skipped++;
        log.info('Skipping: could not identify mint address', { signature });
        break;
      case 'timeout':
        this.counts.failed++;
        log.warn('Launch timed out', { signature, operation: outcome.operation });
        break;
      case 'failed':
        this.counts.failed++;
        log.error('Error processing transaction', { signature, error: outcome.error });
        break;
    }
  }

  private statusSnapshot() {
    return {
      ...this.counts,
      running: this.pool.running,
      queued: this.pool.queued,
      buffered: this.feed.buffered,
    };
  }
}
