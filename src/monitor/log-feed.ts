import type { Commitment, Logs, PublicKey } from '@solana/web3.js';
import { createLogger } from '../utils';
import type { LedgerClient } from '../utils';
import type { LaunchEvent } from './types';

const log = createLogger('feed');

export interface LogFeedOptions {
  commitment?: Commitment;
  /** Signatures remembered per dedup generation */
  maxSigsPerGen?: number;
}

type LogSubscriber = Pick<LedgerClient, 'onLogs' | 'removeOnLogsListener'>;

/**
 * Program-mention log subscription exposed as an async iterable.
 *
 * The websocket callback only appends to a buffer, so a slow consumer never
 * blocks the receive path. Reconnects are handled by the web3.js websocket
 * client, which resubscribes on its own; the feed just keeps yielding.
 */
export class LogFeed implements AsyncIterable<LaunchEvent> {
  private buffer: LaunchEvent[] = [];
  private waiters: ((result: IteratorResult<LaunchEvent>) => void)[] = [];
  private subscriptionId: number | null = null;
  private closed = false;

  // Dedup: the same tx can be delivered more than once around reconnects
  private seenSignatures = new Set<string>();
  private previousSignatures = new Set<string>();
  private readonly maxSigsPerGen: number;
  private readonly commitment: Commitment;

  constructor(
    private readonly client: LogSubscriber,
    private readonly programId: PublicKey,
    options: LogFeedOptions = {}
  ) {
    this.commitment = options.commitment ?? 'confirmed';
    this.maxSigsPerGen = options.maxSigsPerGen ?? 2000;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  start() {
    if (this.subscriptionId !== null || this.closed) return;
    this.subscriptionId = this.client.onLogs(
      this.programId,
      (logInfo: Logs) => this.handleLogs(logInfo),
      this.commitment
    );
    log.info('Subscribed to program logs', {
      program: this.programId.toBase58(),
      commitment: this.commitment,
    });
  }

  /** Stop yielding. Buffered events are discarded and pending reads end. */
  close() {
    if (this.closed) return;
    this.closed = true;
    const dropped = this.buffer.length;
    this.buffer = [];
    for (const resolve of this.waiters.splice(0)) {
      resolve({ done: true, value: undefined });
    }
    log.info('Feed closed', { droppedBuffered: dropped });
  }

  /** Drop the websocket listener. */
  async release() {
    this.close();
    if (this.subscriptionId === null) return;
    const subId = this.subscriptionId;
    this.subscriptionId = null;
    await this.client.removeOnLogsListener(subId);
    log.info('Unsubscribed from program logs', { program: this.programId.toBase58() });
  }

  [Symbol.asyncIterator](): AsyncIterator<LaunchEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }

  private next(): Promise<IteratorResult<LaunchEvent>> {
    const event = this.buffer.shift();
    if (event) return Promise.resolve({ done: false, value: event });
    if (this.closed) return Promise.resolve({ done: true, value: undefined });
    return new Promise(resolve => this.waiters.push(resolve));
  }

  private handleLogs(logInfo: Logs) {
    if (this.closed) return;
    // Failed transactions cannot have created anything
    if (logInfo.err) return;
    if (this.isDuplicateSignature(logInfo.signature)) return;

    const event: LaunchEvent = {
      signature: logInfo.signature,
      logLines: [...logInfo.logs],
      receivedAt: Date.now(),
    };

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: event });
    } else {
      this.buffer.push(event);
    }
  }

  private isDuplicateSignature(sig: string): boolean {
    if (this.seenSignatures.has(sig) || this.previousSignatures.has(sig)) return true;
    this.seenSignatures.add(sig);
    if (this.seenSignatures.size >= this.maxSigsPerGen) {
      this.previousSignatures = this.seenSignatures;
      this.seenSignatures = new Set();
    }
    return false;
  }
}
