import type { ParsedTransactionWithMeta } from '@solana/web3.js';
import { config, createLogger, withTimeout } from '../utils';
import type { LedgerClient } from '../utils';
import type { ResolveResult } from './types';

const log = createLogger('resolver');

export interface ResolveOptions {
  fetchTimeoutMs: number;
}

/**
 * Pull creator and freshly minted token out of a parsed create tx.
 *
 * The mint is the first post-balance holding exactly the launchpad's
 * initial supply. This assumes no other token movement in the same tx
 * lands on that exact amount.
 */
export function extractLaunch(signature: string, tx: ParsedTransactionWithMeta): ResolveResult {
  const accountKeys = tx.transaction.message.accountKeys;
  const feePayer = accountKeys[0];
  if (!feePayer) {
    throw new Error(`Transaction ${signature} has no account keys`);
  }

  const postTokenBalances = tx.meta?.postTokenBalances || [];
  const minted = postTokenBalances.find(
    bal => bal.uiTokenAmount.amount === config.launchpad.initialSupplyRaw
  );
  if (!minted) {
    return { ok: false, reason: 'mint-not-identified' };
  }

  return {
    ok: true,
    launch: {
      signature,
      creator: feePayer.pubkey.toBase58(),
      mint: minted.mint,
    },
  };
}

export async function resolveLaunch(
  client: Pick<LedgerClient, 'getParsedTransaction'>,
  signature: string,
  options: ResolveOptions
): Promise<ResolveResult> {
  const tx = await withTimeout(
    client.getParsedTransaction(signature, {
      commitment: 'confirmed',
      maxSupportedTransactionVersion: 0,
    }),
    options.fetchTimeoutMs,
    'getParsedTransaction'
  );

  if (!tx) {
    log.debug('No transaction data', { signature });
    return { ok: false, reason: 'not-found' };
  }

  return extractLaunch(signature, tx);
}
