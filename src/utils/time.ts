export function getCurrentTimestamp(): string {
  return new Date().toISOString();
}

export function secondsSince(startMs: number): number {
  return (Date.now() - startMs) / 1000;
}
