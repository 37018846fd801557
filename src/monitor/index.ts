export { LogFeed } from './log-feed';
export type { LogFeedOptions } from './log-feed';
export { isLaunchEvent } from './launch-filter';
export type { LaunchEvent } from './types';
