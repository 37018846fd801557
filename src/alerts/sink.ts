import type { RiskVerdict } from '../analysis';
import { formatReport } from './report';

export interface AlertSink {
  emit(verdict: RiskVerdict): void;
}

export class ConsoleAlertSink implements AlertSink {
  constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

  emit(verdict: RiskVerdict) {
    this.write(formatReport(verdict).join('\n'));
  }
}
