import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFile } from 'fs/promises';
import path from 'path';
import { DEFAULT_CHUNK_SIZE_BYTES, loadSettings, parseSettings, resolveInstallationPaths } from '../config/settings.js';
import { ConfigurationError } from '../utils/errors.js';
import { makeTempDir, removeDir, silentLogger } from './helpers/fixtures.js';

describe('settings', () => {
  beforeEach(() => {
    vi.stubEnv('YOUTUBE_UPLOAD_CHUNK_MB', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('resolveInstallationPaths', () => {
    it('lays out the installation under its root', () => {
      const paths = resolveInstallationPaths('/srv/uploader');

      expect(paths.clipsDir).toBe('/srv/uploader/clips');
      expect(paths.sentDir).toBe('/srv/uploader/sent');
      expect(paths.trackingFile).toBe('/srv/uploader/logs/upload_tracking.json');
      expect(paths.historyFile).toBe('/srv/uploader/logs/upload_history.json');
      expect(paths.lockFile).toBe('/srv/uploader/.script.lock');
      expect(paths.tiktokTokenFile).toBe('/srv/uploader/tiktok_token.json');
    });
  });

  describe('parseSettings', () => {
    it('applies defaults to an empty config', () => {
      const settings = parseSettings({});

      expect(settings.defaultTimezone).toBe('America/Sao_Paulo');
      expect(settings.defaultHourSlots).toEqual([8, 18]);
      expect(settings.defaultCategoryId).toBe('20');
      expect(settings.privacyStatus).toBe('private');
      expect(settings.tiktokPrivacyLevel).toBe('PUBLIC_TO_EVERYONE');
      expect(settings.schedule).toEqual({ mode: 'daily', weekday: 'monday', hour: 10 });
      expect(settings.playlist).toEqual({ id: null, create: false, title: 'Uploaded Videos' });
      expect(settings.chunkSizeBytes).toBe(DEFAULT_CHUNK_SIZE_BYTES);
      expect(settings.videoExtensions).toContain('.mp4');
    });

    it('normalizes extensions, tags and schedule names', () => {
      const settings = parseSettings({
        video_extensions: ['MP4', '.mov', 'mp4'],
        tags: 'travel, food,,  vlog ',
        schedule_mode: 'Weekly',
        schedule_day: 'FRIDAY'
      });

      expect(settings.videoExtensions).toEqual(['.mp4', '.mov']);
      expect(settings.tags).toEqual(['travel', 'food', 'vlog']);
      expect(settings.schedule.mode).toBe('weekly');
      expect(settings.schedule.weekday).toBe('friday');
    });

    it('rounds chunk sizes down to 256 KiB units', () => {
      expect(parseSettings({ chunk_size_mb: 8 }).chunkSizeBytes).toBe(8 * 1024 * 1024);
      expect(parseSettings({ chunk_size_mb: 1.3 }).chunkSizeBytes).toBe(1310720);
    });

    it('reads the chunk size from the environment when config omits it', () => {
      vi.stubEnv('YOUTUBE_UPLOAD_CHUNK_MB', '2');
      expect(parseSettings({}).chunkSizeBytes).toBe(2 * 1024 * 1024);
    });

    it('rejects invalid values', () => {
      expect(() => parseSettings({ privacy_status: 'secret' })).toThrow(ConfigurationError);
      expect(() => parseSettings({ schedule_hour: 24 }, '/x/config.json')).toThrow(/^Invalid configuration in \/x\/config\.json: schedule_hour:/);
    });
  });

  describe('loadSettings', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir('settings');
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('uses defaults when the file is missing', async () => {
      const settings = await loadSettings(path.join(dir, 'config.json'), silentLogger);
      expect(settings.defaultHourSlots).toEqual([8, 18]);
    });

    it('uses defaults when the file is not valid JSON', async () => {
      const configPath = path.join(dir, 'config.json');
      await writeFile(configPath, '{ not json');

      const settings = await loadSettings(configPath, silentLogger);
      expect(settings.defaultTimezone).toBe('America/Sao_Paulo');
    });

    it('reads values from the file', async () => {
      const configPath = path.join(dir, 'config.json');
      await writeFile(configPath, JSON.stringify({ default_timezone: 'Europe/Lisbon', default_hour_slots: [7] }));

      const settings = await loadSettings(configPath, silentLogger);
      expect(settings.defaultTimezone).toBe('Europe/Lisbon');
      expect(settings.defaultHourSlots).toEqual([7]);
    });

    it('fails on schema violations', async () => {
      const configPath = path.join(dir, 'config.json');
      await writeFile(configPath, JSON.stringify({ video_extensions: [] }));

      await expect(loadSettings(configPath, silentLogger)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
