import type { RiskVerdict } from '../analysis';

const RULE = '='.repeat(80);

// What each verdict line means for a holder, keyed by its leading text
const HINTS: [prefix: string, hint: string][] = [
  ['Mint authority REVOKED', 'cannot mint more tokens'],
  ['Freeze authority REVOKED', "cannot freeze holders' tokens"],
  ['Liquidity pool tokens BURNED', 'liquidity cannot be rugged'],
  ['Mint authority ACTIVE', 'high risk - dev can dilute supply'],
  ['Freeze authority ACTIVE', 'high risk - dev can freeze wallets'],
  ['LP tokens NOT burned', 'high risk - dev can pull liquidity'],
];

function withHint(line: string): string {
  const match = HINTS.find(([prefix]) => line.startsWith(prefix));
  return match ? `  ${line} (${match[1]})` : `  ${line}`;
}

export function explorerLinks(verdict: Pick<RiskVerdict, 'signature' | 'mint'>) {
  return {
    solscan: `https://solscan.io/tx/${verdict.signature}`,
    // Approximate: pump.fun pages are keyed by mint, the tx signature prefix is a best guess
    pumpFun: `https://pump.fun/${verdict.signature.slice(0, 44)}`,
    dexscreener: `https://dexscreener.com/solana/${verdict.mint}`,
  };
}

export function formatReport(verdict: RiskVerdict): string[] {
  const links = explorerLinks(verdict);
  const lines = [
    'NEW PUMP.FUN LAUNCH DETECTED',
    `Transaction: ${links.solscan}`,
    `Pump.fun: ${links.pumpFun}`,
    `Token Mint: ${verdict.mint}`,
    `Creator: ${verdict.creator}`,
    `Dexscreener: ${links.dexscreener}`,
    '',
    'GOOD SIGNS:',
  ];

  if (verdict.goodSigns.length > 0) {
    lines.push(...verdict.goodSigns.map(withHint));
  } else {
    lines.push('  None');
  }

  lines.push('', 'RED FLAGS:');
  if (verdict.redFlags.length > 0) {
    lines.push(...verdict.redFlags.map(withHint));
  } else {
    lines.push('  None detected so far');
  }

  lines.push('', verdict.highRisk ? 'HIGH RISK - POSSIBLE RUG' : 'SAFER TOKEN (always DYOR)', RULE);
  return lines;
}
