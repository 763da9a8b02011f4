import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { readFile, writeFile, mkdir } from 'fs/promises';
import path from 'path';
import type { InstallationPaths } from '../config/settings.js';
import { UploadTracker, isUploadedToAllIn } from '../services/upload-tracker.js';
import { makeInstallation, removeDir, silentLogger, writeVideo } from './helpers/fixtures.js';

const EXTENSIONS = ['.mp4', '.mov'];

describe('UploadTracker', () => {
  let paths: InstallationPaths;
  let tracker: UploadTracker;

  beforeEach(async () => {
    paths = await makeInstallation();
    tracker = new UploadTracker(paths.trackingFile, paths.sentDir, silentLogger);
  });

  afterEach(async () => {
    await removeDir(paths.rootDir);
  });

  it('starts empty without a tracking file', async () => {
    expect(await tracker.load()).toEqual({});
    expect(await tracker.getStatus('a.mp4')).toEqual({});
  });

  it('starts empty when the tracking file is corrupt', async () => {
    await mkdir(paths.logsDir, { recursive: true });
    await writeFile(paths.trackingFile, '{ broken');

    expect(await tracker.load()).toEqual({});
  });

  it('persists statuses in the on-disk layout', async () => {
    await tracker.markUploaded('a.mp4', 'youtube', { remoteId: 'vid1', scheduledTime: '2030-01-01T08:00:00.000-03:00' });

    const stored = JSON.parse(await readFile(paths.trackingFile, 'utf-8'));
    expect(stored['a.mp4'].youtube).toMatchObject({
      uploaded: true,
      video_id: 'vid1',
      scheduled_time: '2030-01-01T08:00:00.000-03:00',
      error: null
    });
    expect(typeof stored['a.mp4'].youtube.uploaded_at).toBe('string');
  });

  it('records failures without marking the platform uploaded', async () => {
    const status = await tracker.markUploaded('a.mp4', 'tiktok', { error: 'Upload failed: timeout' });

    expect(status.uploaded).toBe(false);
    expect((await tracker.getStatus('a.mp4')).tiktok?.error).toBe('Upload failed: timeout');
  });

  it('replaces only the marked platform', async () => {
    await tracker.markUploaded('a.mp4', 'youtube', { remoteId: 'vid1' });
    await tracker.markUploaded('a.mp4', 'tiktok', { error: 'boom' });
    await tracker.markUploaded('a.mp4', 'tiktok', { remoteId: 'pub1' });

    const status = await tracker.getStatus('a.mp4');
    expect(status.youtube?.remoteId).toBe('vid1');
    expect(status.tiktok).toMatchObject({ uploaded: true, remoteId: 'pub1' });
    expect(status.tiktok?.error).toBeUndefined();
  });

  it('requires every listed platform for delivery', async () => {
    await tracker.markUploaded('a.mp4', 'youtube', { remoteId: 'vid1' });

    expect(await tracker.isUploadedToAll('a.mp4', ['youtube'])).toBe(true);
    expect(await tracker.isUploadedToAll('a.mp4', ['youtube', 'tiktok'])).toBe(false);
    expect(await tracker.shouldMoveToSent('a.mp4', ['youtube', 'tiktok'])).toBe(false);
    expect(isUploadedToAllIn({}, 'a.mp4', [])).toBe(true);
  });

  it('lists pending videos sorted by filename and filtered by extension', async () => {
    await writeVideo(paths.clipsDir, 'c.MOV', 3);
    await writeVideo(paths.clipsDir, 'a.mp4', 5);
    await writeVideo(paths.clipsDir, 'b.mp4', 4);
    await writeVideo(paths.clipsDir, 'notes.txt', 1);
    await tracker.markUploaded('b.mp4', 'youtube', { remoteId: 'vid1' });

    const pending = await tracker.getPendingVideos(paths.clipsDir, ['youtube'], EXTENSIONS);
    expect(pending.map((video) => video.filename)).toEqual(['a.mp4', 'c.MOV']);
    expect(pending[0].sizeBytes).toBe(5);
  });

  it('treats a missing clips directory as empty', async () => {
    expect(await tracker.getPendingVideos(path.join(paths.rootDir, 'nowhere'), ['youtube'], EXTENSIONS)).toEqual([]);
  });

  it('moves a file to the sent folder', async () => {
    const asset = await writeVideo(paths.clipsDir, 'a.mp4', 5);

    expect(await tracker.relocate(asset)).toBe(true);
    expect(existsSync(asset.path)).toBe(false);
    expect(existsSync(path.join(paths.sentDir, 'a.mp4'))).toBe(true);
  });

  it('reports a failed move without throwing', async () => {
    const asset = { path: path.join(paths.clipsDir, 'gone.mp4'), filename: 'gone.mp4', sizeBytes: 1 };
    expect(await tracker.relocate(asset)).toBe(false);
  });

  it('relocates files already delivered everywhere', async () => {
    await writeVideo(paths.clipsDir, 'a.mp4', 5);
    await writeVideo(paths.clipsDir, 'b.mp4', 5);
    await tracker.markUploaded('a.mp4', 'youtube', { remoteId: 'vid1' });
    await tracker.markUploaded('a.mp4', 'tiktok', { remoteId: 'pub1' });
    await tracker.markUploaded('b.mp4', 'youtube', { remoteId: 'vid2' });

    const moved = await tracker.relocateDelivered(paths.clipsDir, ['youtube', 'tiktok'], EXTENSIONS);

    expect(moved).toEqual(['a.mp4']);
    expect(existsSync(path.join(paths.clipsDir, 'b.mp4'))).toBe(true);
  });

  it('summarizes delivery counts', async () => {
    await tracker.markUploaded('a.mp4', 'youtube', { remoteId: 'vid1' });
    await tracker.markUploaded('a.mp4', 'tiktok', { remoteId: 'pub1' });
    await tracker.markUploaded('b.mp4', 'youtube', { remoteId: 'vid2' });
    await tracker.markUploaded('c.mp4', 'tiktok', { error: 'boom' });

    expect(await tracker.getSummary(['youtube', 'tiktok'])).toEqual({
      totalVideos: 3,
      perPlatform: { youtube: 2, tiktok: 1 },
      deliveredToAll: 1
    });
  });

  it('drops malformed platform entries and keeps the rest', async () => {
    await mkdir(paths.logsDir, { recursive: true });
    await writeFile(
      paths.trackingFile,
      JSON.stringify({ 'a.mp4': { youtube: { uploaded: 'yes' }, tiktok: { uploaded: true, video_id: 'pub1' } } })
    );

    expect(await tracker.getStatus('a.mp4')).toEqual({
      tiktok: { uploaded: true, uploadedAt: undefined, remoteId: 'pub1', scheduledTime: undefined, error: undefined }
    });
  });

  it('skips a filename whose value is not an object and keeps the others', async () => {
    await mkdir(paths.logsDir, { recursive: true });
    await writeFile(
      paths.trackingFile,
      JSON.stringify({ 'a.mp4': { youtube: { uploaded: true, video_id: 'v1' } }, 'b.mp4': null })
    );

    expect(await tracker.isUploadedToAll('a.mp4', ['youtube'])).toBe(true);

    await tracker.markUploaded('c.mp4', 'youtube', { remoteId: 'v3' });

    const stored = JSON.parse(await readFile(paths.trackingFile, 'utf-8'));
    expect(stored['a.mp4'].youtube).toEqual({
      uploaded: true,
      uploaded_at: null,
      video_id: 'v1',
      scheduled_time: null,
      error: null
    });
    expect(stored['c.mp4'].youtube.video_id).toBe('v3');
    expect((await tracker.getStatus('a.mp4')).youtube?.remoteId).toBe('v1');
  });

  it('carries keys for other platforms through a save', async () => {
    await mkdir(paths.logsDir, { recursive: true });
    await writeFile(
      paths.trackingFile,
      JSON.stringify({
        'a.mp4': { instagram: { uploaded: true, video_id: 'ig1' }, youtube: { uploaded: true, video_id: 'vid1' } }
      })
    );

    await tracker.markUploaded('a.mp4', 'tiktok', { remoteId: 'pub1' });

    const stored = JSON.parse(await readFile(paths.trackingFile, 'utf-8'));
    expect(stored['a.mp4'].instagram).toEqual({ uploaded: true, video_id: 'ig1' });
    expect(stored['a.mp4'].youtube.video_id).toBe('vid1');
    expect(stored['a.mp4'].tiktok.video_id).toBe('pub1');
  });

  it('gives the same delivery state when a platform is marked twice', async () => {
    const details = { remoteId: 'vid1', scheduledTime: '2030-01-01T08:00:00.000-03:00' };
    await tracker.markUploaded('a.mp4', 'youtube', details);
    await tracker.markUploaded('a.mp4', 'youtube', details);

    expect(await tracker.isUploadedToAll('a.mp4', ['youtube'])).toBe(true);
    expect(await tracker.getStatus('a.mp4')).toMatchObject({
      youtube: { uploaded: true, remoteId: 'vid1', scheduledTime: '2030-01-01T08:00:00.000-03:00' }
    });
    expect(Object.keys(await tracker.load())).toEqual(['a.mp4']);
  });
});
