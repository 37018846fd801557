export { runLaunchPipeline } from './launch-pipeline';
export type { LaunchOutcome, PipelineDeps } from './launch-pipeline';
export { TaskPool } from './task-pool';
export type { Task } from './task-pool';
