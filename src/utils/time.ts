export function nowIso(): string {
  return new Date().toISOString();
}

export function fileStamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[-:.]/g, "");
}
