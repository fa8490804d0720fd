/**
 * Collector debug tracing, enabled with SQLTRAIL_COLLECTOR_DEBUG=1
 */

export const COLLECTOR_DEBUG = process.env['SQLTRAIL_COLLECTOR_DEBUG'] === '1';

export function debugLog(message: string): void {
  if (!COLLECTOR_DEBUG) return;
  console.log(`[collector] ${message}`);
}

function formatBytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)}MB`;
}

export function logCollectorMemory(label: string): void {
  if (!COLLECTOR_DEBUG) return;
  const mem = process.memoryUsage();
  console.log(
    `[collector] mem ${label}: rss=${formatBytes(mem.rss)} heapUsed=${formatBytes(mem.heapUsed)} heapTotal=${formatBytes(mem.heapTotal)}`
  );
}
