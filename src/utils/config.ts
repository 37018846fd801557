import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = parseInt(raw, 10);
  if (!Number.isFinite(val) || val <= 0) {
    throw new Error(`Invalid value for ${key}: expected a positive integer, got "${raw}"`);
  }
  return val;
}

export const config = {
  rpc: {
    httpUrl: optional('SOLANA_RPC', 'https://api.mainnet-beta.solana.com'),
    // Empty means web3.js derives the websocket URL from httpUrl
    wssUrl: optional('SOLANA_WSS', ''),
  },
  detector: {
    maxConcurrentLaunches: optionalInt('MAX_CONCURRENT_LAUNCHES', 4),
    maxQueuedLaunches: optionalInt('MAX_QUEUED_LAUNCHES', 200),
    fetchTimeoutMs: optionalInt('FETCH_TIMEOUT_MS', 5_000),
    shutdownGraceMs: optionalInt('SHUTDOWN_GRACE_MS', 10_000),
    statsIntervalMs: optionalInt('STATS_INTERVAL_MS', 60_000),
  },
  // Well-known program IDs
  programs: {
    pumpFun: '6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P',
    raydiumAmm: '675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSUt1Mp8',
    tokenProgram: 'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA',
  },
  launchpad: {
    // pump.fun mints the whole supply to the bonding curve in the create tx (raw units)
    initialSupplyRaw: '1000000000',
  },
} as const;

export type DetectorSettings = typeof config.detector;
