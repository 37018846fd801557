export { config } from './config';
export type { DetectorSettings } from './config';
export { createLogger, errorMessage } from './logger';
export { getConnection } from './rpc';
export type { LedgerClient } from './rpc';
export { TimeoutError, withTimeout } from './timeout';
