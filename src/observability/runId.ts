/** `scout-20240501T120000Z-k3x9qa`: sortable by start time, unique enough for one machine. */
export function createRunId(now = new Date(), prefix = "scout"): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${prefix}-${stamp}-${suffix}`;
}
