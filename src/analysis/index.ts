export { resolveLaunch, extractLaunch } from './transaction-resolver';
export type { ResolveOptions } from './transaction-resolver';
export { decodeMintAuthorities } from './mint-authority';
export { hasLiquidityBurn } from './liquidity';
export { assessRisk, evaluateRisk } from './risk-evaluator';
export type { EvaluateOptions } from './risk-evaluator';
export type { ResolvedLaunch, ResolveResult, AuthorityStatus, MintAuthorityState, RiskVerdict } from './types';
