import { PublicKey } from '@solana/web3.js';
import type {
  AccountInfo,
  Commitment,
  GetVersionedTransactionConfig,
  Logs,
  LogsCallback,
  ParsedTransactionWithMeta,
  TransactionError,
} from '@solana/web3.js';
import type { AlertSink } from '../src/alerts';
import type { RiskVerdict } from '../src/analysis';
import type { LedgerClient } from '../src/utils';

export const TOKEN_PROGRAM = new PublicKey('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA');

/** Deterministic address made of one repeated byte */
export function addr(byte: number): string {
  return new PublicKey(new Uint8Array(32).fill(byte)).toBase58();
}

export function mintData(opts: { mintAuthority?: number; freezeAuthority?: number; length?: number } = {}): Buffer {
  const data = Buffer.alloc(opts.length ?? 82);
  if (opts.mintAuthority !== undefined) data.fill(opts.mintAuthority, 4, 36);
  if (opts.freezeAuthority !== undefined) data.fill(opts.freezeAuthority, 36, 68);
  return data;
}

export function mintAccount(data: Buffer): AccountInfo<Buffer> {
  return { executable: false, owner: TOKEN_PROGRAM, lamports: 1_461_600, data };
}

export function buildTx(opts: {
  feePayer?: string;
  balances?: { mint: string; amount: string }[];
  withMeta?: boolean;
}): ParsedTransactionWithMeta {
  const accountKeys = opts.feePayer
    ? [{ pubkey: new PublicKey(opts.feePayer), signer: true, writable: true }]
    : [];
  const postTokenBalances = (opts.balances ?? []).map((b, i) => ({
    accountIndex: i + 1,
    mint: b.mint,
    uiTokenAmount: { amount: b.amount, decimals: 6, uiAmount: null },
  }));

  return {
    slot: 1,
    transaction: {
      signatures: ['sig'],
      message: { accountKeys, instructions: [], recentBlockhash: addr(9) },
    },
    meta:
      opts.withMeta === false
        ? null
        : {
            fee: 5000,
            preBalances: [],
            postBalances: [],
            preTokenBalances: [],
            postTokenBalances,
            err: null,
          },
    blockTime: null,
  };
}

/** In-process stand-in for the RPC connection */
export class FakeLedger implements LedgerClient {
  transactions = new Map<string, ParsedTransactionWithMeta>();
  accounts = new Map<string, AccountInfo<Buffer>>();
  txErrors = new Map<string, Error>();
  hangingTxs = new Set<string>();
  txDelaysMs = new Map<string, number>();
  accountError: Error | null = null;
  slotError: Error | null = null;

  txCalls: { signature: string; config: GetVersionedTransactionConfig }[] = [];
  accountCalls: { address: string; commitment?: Commitment }[] = [];
  subscriptions: { id: number; program: string; commitment?: Commitment }[] = [];
  removed: number[] = [];

  private listeners = new Map<number, LogsCallback>();
  private nextId = 1;

  async getSlot(): Promise<number> {
    if (this.slotError) throw this.slotError;
    return 123;
  }

  getParsedTransaction(
    signature: string,
    config: GetVersionedTransactionConfig
  ): Promise<ParsedTransactionWithMeta | null> {
    this.txCalls.push({ signature, config });
    if (this.hangingTxs.has(signature)) {
      return new Promise(() => {});
    }
    const err = this.txErrors.get(signature);
    if (err) return Promise.reject(err);
    const tx = this.transactions.get(signature) ?? null;
    const delayMs = this.txDelaysMs.get(signature);
    if (delayMs !== undefined) {
      return new Promise(resolve => setTimeout(() => resolve(tx), delayMs));
    }
    return Promise.resolve(tx);
  }

  async getAccountInfo(publicKey: PublicKey, commitment?: Commitment) {
    this.accountCalls.push({ address: publicKey.toBase58(), commitment });
    if (this.accountError) throw this.accountError;
    return this.accounts.get(publicKey.toBase58()) ?? null;
  }

  onLogs(filter: PublicKey, callback: LogsCallback, commitment?: Commitment): number {
    const id = this.nextId++;
    this.listeners.set(id, callback);
    this.subscriptions.push({ id, program: filter.toBase58(), commitment });
    return id;
  }

  async removeOnLogsListener(subscriptionId: number) {
    this.listeners.delete(subscriptionId);
    this.removed.push(subscriptionId);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  push(signature: string, logs: string[], err: TransactionError | null = null) {
    const message: Logs = { signature, logs, err };
    for (const cb of this.listeners.values()) cb(message, { slot: 1 });
  }
}

export class RecordingSink implements AlertSink {
  verdicts: RiskVerdict[] = [];
  /** Number of upcoming emits that throw instead of recording */
  failures = 0;

  emit(verdict: RiskVerdict) {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('sink down');
    }
    this.verdicts.push(verdict);
  }
}

/** Let queued microtasks and zero-delay timers run */
export function flush(): Promise<void> {
  return new Promise(r => setTimeout(r, 0));
}
