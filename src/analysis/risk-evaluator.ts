import { PublicKey } from '@solana/web3.js';
import { config, createLogger, errorMessage, withTimeout } from '../utils';
import type { LedgerClient } from '../utils';
import { hasLiquidityBurn } from './liquidity';
import { decodeMintAuthorities } from './mint-authority';
import type { AuthorityStatus, ResolvedLaunch, RiskVerdict } from './types';

const log = createLogger('risk');

export interface EvaluateOptions {
  fetchTimeoutMs: number;
}

function checkAuthority(
  label: string,
  status: AuthorityStatus,
  goodSigns: string[],
  redFlags: string[]
) {
  switch (status.state) {
    case 'revoked':
      goodSigns.push(`${label} authority REVOKED`);
      break;
    case 'active':
      redFlags.push(`${label} authority ACTIVE: ${status.holder}`);
      break;
    case 'undetermined':
      break;
  }
}

/**
 * Red-flag existence test: a single flag makes the launch high risk no
 * matter how many good signs there are. Pure, so the same inputs always
 * give the same lists in the same order.
 */
export function assessRisk(
  launch: ResolvedLaunch,
  accountData: Uint8Array | null,
  logLines: readonly string[]
): RiskVerdict {
  const goodSigns: string[] = [];
  const redFlags: string[] = [];

  if (accountData && accountData.length > 0) {
    const authorities = decodeMintAuthorities(accountData);
    checkAuthority('Mint', authorities.mintAuthority, goodSigns, redFlags);
    checkAuthority('Freeze', authorities.freezeAuthority, goodSigns, redFlags);
  } else {
    redFlags.push('Mint account info unavailable');
  }

  if (hasLiquidityBurn(logLines)) {
    goodSigns.push('Liquidity pool tokens BURNED');
  } else {
    redFlags.push('LP tokens NOT burned');
  }

  return {
    signature: launch.signature,
    mint: launch.mint,
    creator: launch.creator,
    goodSigns,
    redFlags,
    highRisk: redFlags.length > 0,
  };
}

async function fetchMintData(
  client: Pick<LedgerClient, 'getAccountInfo'>,
  mint: string,
  timeoutMs: number
): Promise<Buffer | null> {
  try {
    const account = await withTimeout(
      client.getAccountInfo(new PublicKey(mint), 'confirmed'),
      timeoutMs,
      'getAccountInfo'
    );
    if (!account) {
      log.warn('Mint account not found', { mint });
      return null;
    }
    if (account.owner.toBase58() !== config.programs.tokenProgram) {
      log.debug('Mint owned by a different token program', { mint, owner: account.owner.toBase58() });
    }
    return account.data;
  } catch (err) {
    log.warn('Mint account fetch failed', { mint, error: errorMessage(err) });
    return null;
  }
}

export async function evaluateRisk(
  client: Pick<LedgerClient, 'getAccountInfo'>,
  launch: ResolvedLaunch,
  logLines: readonly string[],
  options: EvaluateOptions
): Promise<RiskVerdict> {
  const data = await fetchMintData(client, launch.mint, options.fetchTimeoutMs);
  const verdict = assessRisk(launch, data, logLines);

  log.debug('Risk assessed', {
    mint: launch.mint,
    goodSigns: verdict.goodSigns.length,
    redFlags: verdict.redFlags.length,
    highRisk: verdict.highRisk,
  });

  return verdict;
}
