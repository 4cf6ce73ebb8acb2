/**
 * Display formatting shared by the CLI and the export renderers.
 * Human-readable timestamps are always UTC so exports are reproducible.
 */

/**
 * "2026-10-19T04:31:05.120Z" → "2026-10-19 04:31:05"
 */
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  return date.toISOString().slice(0, 19).replace("T", " ");
}

/**
 * "2026-10-19T04:31:05.120Z" → "04:31:05"
 */
export function formatClockTime(iso: string): string {
  return formatTimestamp(iso).slice(11);
}

/**
 * Milliseconds → "H:MM:SS". Sub-second remainders are dropped.
 */
export function formatDuration(ms: number | null): string {
  if (ms === null) {
    return "N/A";
  }
  const totalSeconds = Math.max(0, Math.floor(ms / 1_000));
  const hours = Math.floor(totalSeconds / 3_600);
  const minutes = Math.floor((totalSeconds % 3_600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1_024) {
    return `${bytes} bytes`;
  }
  if (bytes < 1_024 * 1_024) {
    return `${(bytes / 1_024).toFixed(1)} KB`;
  }
  return `${(bytes / (1_024 * 1_024)).toFixed(1)} MB`;
}

/**
 * Filesystem-safe sortable stamp: "20261019T043105120Z".
 */
export function fileStamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, "");
}

/**
 * Thousands separators without depending on the host locale.
 */
export function formatCount(value: number): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}
