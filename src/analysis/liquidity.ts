import { config } from '../utils';

const BURN_MARKER = 'Burn';
const AMM_MARKERS = ['Raydium', config.programs.raydiumAmm];

/**
 * Text heuristic, not an instruction decode: a line has to mention both a
 * burn and the AMM. Can miss burns and can match unrelated ones.
 */
export function hasLiquidityBurn(logLines: readonly string[]): boolean {
  return logLines.some(l => l.includes(BURN_MARKER) && AMM_MARKERS.some(m => l.includes(m)));
}
