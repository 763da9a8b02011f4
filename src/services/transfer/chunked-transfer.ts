import { open } from 'fs/promises';
import type { PlatformId, TransferProgress } from '../../types/upload.js';
import { TransferError } from '../../utils/errors.js';

export interface ChunkRange {
  start: number;
  /** Inclusive. */
  end: number;
  total: number;
  data: Buffer;
}

export interface ChunkAck<T> {
  /** Bytes the server holds after this chunk; the next chunk starts here. */
  committedBytes: number;
  /** Set when the server answered the chunk with the final resource. */
  result?: T;
}

export interface ChunkedTransferOptions<T> {
  platform: PlatformId;
  filePath: string;
  totalBytes: number;
  chunkSize: number;
  sendChunk: (chunk: ChunkRange) => Promise<ChunkAck<T>>;
  onProgress?: (progress: TransferProgress) => void;
  /** Milliseconds; injectable for tests. */
  now?: () => number;
}

export interface ChunkedTransferResult<T> {
  result: T | undefined;
  bytesTransferred: number;
  elapsedSeconds: number;
}

export function chunkCount(totalBytes: number, chunkSize: number): number {
  return Math.ceil(totalBytes / chunkSize);
}

export function measureProgress(bytesTransferred: number, totalBytes: number, elapsedSeconds: number): TransferProgress {
  const speed = elapsedSeconds > 0 ? bytesTransferred / elapsedSeconds : 0;
  return {
    bytesTransferred,
    totalBytes,
    elapsedSeconds,
    speedBytesPerSecond: speed,
    etaSeconds: speed > 0 ? (totalBytes - bytesTransferred) / speed : 0
  };
}

/**
 * Send a file as consecutive `Content-Range` chunks. A failed chunk fails the
 * whole file; chunks are not retried.
 */
export async function transferInChunks<T>(options: ChunkedTransferOptions<T>): Promise<ChunkedTransferResult<T>> {
  const { platform, filePath, totalBytes, chunkSize, sendChunk, onProgress } = options;
  const now = options.now ?? Date.now;

  if (totalBytes <= 0) {
    throw new TransferError(platform, 'validation', 'Video file is empty');
  }

  const startedAt = now();
  let offset = 0;
  let result: T | undefined;

  const handle = await open(filePath, 'r');
  try {
    while (offset < totalBytes && result === undefined) {
      const length = Math.min(chunkSize, totalBytes - offset);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, offset);
      if (bytesRead === 0) {
        throw new TransferError(platform, 'validation', `File ended at byte ${offset} of ${totalBytes}`);
      }

      const ack = await sendChunk({
        start: offset,
        end: offset + bytesRead - 1,
        total: totalBytes,
        data: bytesRead === length ? buffer : buffer.subarray(0, bytesRead)
      });

      if (ack.result !== undefined) {
        result = ack.result;
        offset = totalBytes;
      } else if (ack.committedBytes <= offset) {
        throw new TransferError(platform, 'transport', `Server acknowledged no new bytes after offset ${offset}`);
      } else {
        offset = Math.min(ack.committedBytes, totalBytes);
      }

      onProgress?.(measureProgress(offset, totalBytes, (now() - startedAt) / 1000));
    }
  } finally {
    await handle.close();
  }

  return { result, bytesTransferred: offset, elapsedSeconds: (now() - startedAt) / 1000 };
}
