import type { LoadProgress } from '../types/load';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatFileSize(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), SIZE_UNITS.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(i === 0 ? 0 : 1)} ${SIZE_UNITS[i]}`;
}

/**
 * "YYYY-MM-DD HH:mm" in UTC, or "Unknown" for a missing or invalid date.
 */
export function formatDateTime(iso: string): string {
  if (!iso) return 'Unknown';
  const d = new Date(iso);
  if (isNaN(d.getTime())) return 'Unknown';
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`
  );
}

export function formatProgress(progress: LoadProgress): string {
  const percent =
    progress.totalBytes > 0
      ? Math.min(100, Math.floor((progress.bytesRead / progress.totalBytes) * 100))
      : 100;
  return `${percent}% (${formatFileSize(progress.bytesRead)} of ${formatFileSize(
    progress.totalBytes
  )}, ${progress.messageCount} messages)`;
}

export function truncate(str: string, maxLen: number): string {
  if (!str) return '';
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 1) + '…';
}
