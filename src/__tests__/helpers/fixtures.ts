import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { resolveInstallationPaths } from '../../config/settings.js';
import type { InstallationPaths } from '../../config/settings.js';
import type { VideoAsset } from '../../types/upload.js';

export const silentLogger = pino({ level: 'silent' });

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function makeInstallation(): Promise<InstallationPaths> {
  const paths = resolveInstallationPaths(await makeTempDir('bulk-uploader'));
  await mkdir(paths.clipsDir, { recursive: true });
  return paths;
}

/** Writes `size` bytes of filler to `dir/filename`. */
export async function writeVideo(dir: string, filename: string, size: number): Promise<VideoAsset> {
  const filePath = path.join(dir, filename);
  await mkdir(dir, { recursive: true });
  await writeFile(filePath, Buffer.alloc(size, 7));
  return { path: filePath, filename, sizeBytes: size };
}
