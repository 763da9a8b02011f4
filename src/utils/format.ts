const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/** 1536 -> "1.50 KB" */
export function formatFileSize(sizeBytes: number): string {
  let size = sizeBytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(2)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(2)} PB`;
}

/** 42.3 -> "42.3s", 125 -> "2m 5s", 3725 -> "1h 2m 5s" */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return `${minutes}m ${secs}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);
  return `${hours}h ${minutes}m ${secs}s`;
}

export function formatSpeed(bytesPerSecond: number): string {
  return `${formatFileSize(bytesPerSecond)}/s`;
}
