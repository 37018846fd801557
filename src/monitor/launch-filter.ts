// Coarse on purpose: any log line mentioning "create" passes. Non-launch
// matches are weeded out later when no freshly minted supply is found.
export function isLaunchEvent(logLines: readonly string[]): boolean {
  return logLines.some(l => l.toLowerCase().includes('create'));
}
