export { formatReport, explorerLinks } from './report';
export { ConsoleAlertSink } from './sink';
export type { AlertSink } from './sink';
