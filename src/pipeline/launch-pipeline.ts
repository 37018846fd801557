import { evaluateRisk, resolveLaunch } from '../analysis';
import type { RiskVerdict } from '../analysis';
import type { LaunchEvent } from '../monitor';
import { errorMessage, TimeoutError } from '../utils';
import type { LedgerClient } from '../utils';

export type LaunchOutcome =
  | { status: 'alerted'; verdict: RiskVerdict }
  | { status: 'not-found' }
  | { status: 'mint-not-identified' }
  | { status: 'timeout'; operation: string }
  | { status: 'failed'; error: string };

export interface PipelineDeps {
  client: Pick<LedgerClient, 'getParsedTransaction' | 'getAccountInfo'>;
  fetchTimeoutMs: number;
}

/**
 * Resolve then evaluate one launch. Never rejects: every failure comes back
 * as an outcome so the feed loop can log it and move on.
 */
export async function runLaunchPipeline(event: LaunchEvent, deps: PipelineDeps): Promise<LaunchOutcome> {
  const opts = { fetchTimeoutMs: deps.fetchTimeoutMs };
  try {
    const resolved = await resolveLaunch(deps.client, event.signature, opts);
    if (!resolved.ok) return { status: resolved.reason };

    const verdict = await evaluateRisk(deps.client, resolved.launch, event.logLines, opts);
    return { status: 'alerted', verdict };
  } catch (err) {
    if (err instanceof TimeoutError) return { status: 'timeout', operation: err.operation };
    return { status: 'failed', error: errorMessage(err) };
  }
}
