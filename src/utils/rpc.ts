import { Connection } from '@solana/web3.js';
import type {
  AccountInfo,
  Commitment,
  GetVersionedTransactionConfig,
  LogsCallback,
  ParsedTransactionWithMeta,
  PublicKey,
} from '@solana/web3.js';
import { config } from './config';
import { createLogger } from './logger';

const log = createLogger('rpc');

/**
 * The slice of `Connection` the detector talks to. Workers share one
 * instance read-only; tests substitute an in-process fake.
 */
export interface LedgerClient {
  getSlot(commitment?: Commitment): Promise<number>;
  getParsedTransaction(
    signature: string,
    config: GetVersionedTransactionConfig
  ): Promise<ParsedTransactionWithMeta | null>;
  getAccountInfo(publicKey: PublicKey, commitment?: Commitment): Promise<AccountInfo<Buffer> | null>;
  onLogs(filter: PublicKey, callback: LogsCallback, commitment?: Commitment): number;
  removeOnLogsListener(subscriptionId: number): Promise<void>;
}

let _connection: Connection | null = null;

export function getConnection(): Connection {
  if (!_connection) {
    const rpcUrl = config.rpc.httpUrl;
    _connection = new Connection(rpcUrl, {
      wsEndpoint: config.rpc.wssUrl || undefined,
      commitment: 'confirmed',
    });
    log.info('RPC connection initialized', {
      rpc: rpcUrl.replace(/api-key=[^&]*/, 'api-key=***'),
      ws: config.rpc.wssUrl ? 'custom' : 'derived',
    });
  }
  return _connection;
}
