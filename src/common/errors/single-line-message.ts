export function singleLineMessage(e: Error): string {
  return (e.stack ?? e.message ?? e.name ?? 'undefined').replace(/\s+/g, ' ');
}

export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) {
    return singleLineMessage(thrown);
  }
  if (typeof thrown === 'object' && thrown !== null) {
    return JSON.stringify(thrown);
  }
  return String(thrown);
}
