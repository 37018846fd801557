export interface LaunchEvent {
  readonly signature: string;
  readonly logLines: readonly string[];
  readonly receivedAt: number; // unix ms
}
