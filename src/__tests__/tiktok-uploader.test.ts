import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { DateTime } from 'luxon';
import { TIKTOK_API_BASE, TIKTOK_TOKEN_URL, TikTokUploader } from '../services/transfer/tiktok-uploader.js';
import type { TikTokUploaderOptions } from '../services/transfer/tiktok-uploader.js';
import type { UploadRequest, VideoAsset } from '../types/upload.js';
import { AuthenticationError, ScheduleWindowError, TransferError } from '../utils/errors.js';
import { FakeHttp } from './helpers/fake-http.js';
import { makeTempDir, removeDir, silentLogger, writeVideo } from './helpers/fixtures.js';

const INIT_URL = `${TIKTOK_API_BASE}/post/publish/inbox/video/init/`;
const COMMIT_URL = `${TIKTOK_API_BASE}/post/publish/inbox/video/commit/`;
const CHUNK_URL = 'https://upload.example/tiktok/1';

// 1704110400 in epoch seconds.
const NOW = DateTime.fromISO('2024-01-01T12:00:00Z', { zone: 'utc' });

describe('TikTokUploader', () => {
  let dir: string;
  let tokenPath: string;
  let fake: FakeHttp;
  let video: VideoAsset;

  const makeUploader = (overrides: Partial<TikTokUploaderOptions> = {}) =>
    new TikTokUploader({
      clientSecretsPath: path.join(dir, 'tiktok_client_secret.json'),
      tokenPath,
      privacyLevel: 'SELF_ONLY',
      chunkSizeBytes: 4,
      logger: silentLogger,
      http: fake.client,
      clock: () => NOW,
      ...overrides
    });

  const request = (publishTime: DateTime): UploadRequest => ({
    asset: video,
    title: 'My Clip',
    description: 'desc',
    tags: [],
    publishTime
  });

  const acceptUpload = () =>
    fake
      .on('POST', INIT_URL, {
        status: 200,
        data: { data: { upload_url: CHUNK_URL, publish_id: 'pub-1' }, error: { code: 'ok', message: '' } }
      })
      .on('PUT', CHUNK_URL, { status: 206 })
      .on('POST', COMMIT_URL, { status: 200, data: { data: { publish_id: 'pub-1' }, error: { code: 'ok' } } });

  beforeEach(async () => {
    dir = await makeTempDir('tiktok');
    tokenPath = path.join(dir, 'tiktok_token.json');
    fake = new FakeHttp();
    video = await writeVideo(dir, 'clip.mp4', 10);
    await writeFile(
      path.join(dir, 'tiktok_client_secret.json'),
      JSON.stringify({ client_key: 'test-key', client_secret: 'test-secret' })
    );
    await writeFile(
      tokenPath,
      JSON.stringify({ access_token: 'test-access', expires_at: 1704114000, refresh_token: 'test-refresh' })
    );
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('upload', () => {
    it('initializes, sends chunks and commits a scheduled post', async () => {
      acceptUpload();
      const uploader = makeUploader();
      await uploader.authenticate();

      const outcome = await uploader.upload(request(NOW.plus({ days: 2 })));

      expect(outcome.remoteId).toBe('pub-1');
      expect(outcome.scheduledAt).toBe('2024-01-03T12:00:00.000Z');
      expect(outcome.bytesTransferred).toBe(10);

      const [init] = fake.requestsTo('POST', INIT_URL);
      expect(init.headers.get('Authorization')).toBe('Bearer test-access');
      expect(init.body).toEqual({
        source_info: { source: 'FILE_UPLOAD', video_size: 10, chunk_size: 4, total_chunk_count: 3 },
        post_info: {
          title: 'My Clip',
          description: 'desc',
          privacy_level: 'SELF_ONLY',
          disable_duet: false,
          disable_comment: false,
          disable_stitch: false,
          video_cover_timestamp_ms: 1000,
          schedule_time: 1704283200
        }
      });

      const chunks = fake.requestsTo('PUT', CHUNK_URL);
      expect(chunks.map((chunk) => chunk.headers.get('Content-Range'))).toEqual([
        'bytes 0-3/10',
        'bytes 4-7/10',
        'bytes 8-9/10'
      ]);
      expect(chunks[0].headers.get('Content-Type')).toBe('video/mp4');
      expect(fake.requestsTo('POST', COMMIT_URL)[0].body).toEqual({ publish_id: 'pub-1' });
    });

    it('posts immediately inside the minimum lead time', async () => {
      acceptUpload();
      const uploader = makeUploader();

      const outcome = await uploader.upload(request(NOW.plus({ minutes: 5 })));

      expect(outcome.scheduledAt).toBeNull();
      const [init] = fake.requestsTo('POST', INIT_URL);
      expect(init.body).not.toHaveProperty('post_info.schedule_time');
    });

    it('uses one chunk for files smaller than the chunk size', async () => {
      acceptUpload();
      const uploader = makeUploader({ chunkSizeBytes: 64 });

      await uploader.upload(request(NOW.plus({ days: 1 })));

      expect(fake.requestsTo('POST', INIT_URL)[0].body).toMatchObject({
        source_info: { chunk_size: 10, total_chunk_count: 1 }
      });
      expect(fake.requestsTo('PUT', CHUNK_URL)).toHaveLength(1);
    });

    it('rejects publish times beyond ten days before any request', async () => {
      const uploader = makeUploader();

      const error = await uploader.upload(request(NOW.plus({ days: 11 }))).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ScheduleWindowError);
      expect(error instanceof ScheduleWindowError && error.message).toBe('TikTok only allows scheduling up to 10 days in advance');
      expect(fake.requests).toHaveLength(0);
    });

    it('classifies error codes reported in a successful response', async () => {
      fake.on('POST', INIT_URL, {
        status: 200,
        data: { data: {}, error: { code: 'spam_risk_too_many_posts', message: 'Too many posts' } }
      });
      const uploader = makeUploader();

      const error = await uploader.upload(request(NOW.plus({ days: 1 }))).catch((e: unknown) => e);

      expect(error instanceof TransferError && error.category).toBe('quota');
      expect(error instanceof TransferError && error.message).toBe(
        'Initializing upload failed: spam_risk_too_many_posts (Too many posts)'
      );
      expect(fake.requestsTo('PUT', CHUNK_URL)).toHaveLength(0);
    });

    it('fails when the init response lacks an upload URL', async () => {
      fake.on('POST', INIT_URL, { status: 200, data: { data: { publish_id: 'pub-1' }, error: { code: 'ok' } } });

      await expect(makeUploader().upload(request(NOW.plus({ days: 1 })))).rejects.toThrow(
        'Failed to initialize upload: response has no upload_url or publish_id'
      );
    });

    it('reports an invalid token as an authentication failure', async () => {
      fake.on('POST', INIT_URL, { status: 401, data: { error: { code: 'access_token_invalid', message: 'expired' } } });

      const error = await makeUploader().upload(request(NOW.plus({ days: 1 }))).catch((e: unknown) => e);

      expect(error instanceof TransferError && error.category).toBe('auth');
      expect(error instanceof TransferError && error.isFatal).toBe(true);
    });
  });

  describe('authentication', () => {
    it('refreshes an expired token and stores the new one', async () => {
      await writeFile(
        tokenPath,
        JSON.stringify({ access_token: 'old-access', expires_at: 1704110000, refresh_token: 'test-refresh' })
      );
      fake.on('POST', TIKTOK_TOKEN_URL, {
        status: 200,
        data: { access_token: 'new-access', expires_in: 86400, refresh_token: 'new-refresh', token_type: 'Bearer' }
      });
      acceptUpload();
      const uploader = makeUploader();

      await uploader.authenticate();
      await uploader.upload(request(NOW.plus({ days: 1 })));

      const [refresh] = fake.requestsTo('POST', TIKTOK_TOKEN_URL);
      expect(refresh.body).toBe('client_key=test-key&client_secret=test-secret&grant_type=refresh_token&refresh_token=test-refresh');
      expect(JSON.parse(await readFile(tokenPath, 'utf-8'))).toEqual({
        access_token: 'new-access',
        expires_at: 1704196800,
        refresh_token: 'new-refresh',
        token_type: 'Bearer'
      });
      expect(fake.requestsTo('POST', INIT_URL)[0].headers.get('Authorization')).toBe('Bearer new-access');
      expect(fake.requestsTo('POST', TIKTOK_TOKEN_URL)).toHaveLength(1);
    });

    it('refreshes tokens inside the five minute expiry buffer', async () => {
      await writeFile(
        tokenPath,
        JSON.stringify({ access_token: 'old-access', expires_at: 1704110400 + 200, refresh_token: 'test-refresh' })
      );
      fake.on('POST', TIKTOK_TOKEN_URL, { status: 200, data: { access_token: 'new-access', expires_in: 3600 } });

      await makeUploader().authenticate();

      expect(fake.requestsTo('POST', TIKTOK_TOKEN_URL)).toHaveLength(1);
    });

    it('surfaces the reason a refresh was refused', async () => {
      await writeFile(tokenPath, JSON.stringify({ access_token: 'old-access', expires_at: 0, refresh_token: 'test-refresh' }));
      fake.on('POST', TIKTOK_TOKEN_URL, { status: 200, data: { error: 'invalid_request', error_description: 'bad refresh token' } });

      await expect(makeUploader().authenticate()).rejects.toThrow('TikTok token refresh failed: bad refresh token');
    });

    it('fails without a stored token', async () => {
      tokenPath = path.join(dir, 'absent.json');

      const error = await makeUploader().authenticate().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error instanceof AuthenticationError && error.message).toBe(
        `No valid TikTok authorization in ${tokenPath}. Authorize the app once to create it.`
      );
    });

    it('turns an authorization failure during upload into a fatal transfer error', async () => {
      tokenPath = path.join(dir, 'absent.json');

      const error = await makeUploader().upload(request(NOW.plus({ days: 1 }))).catch((e: unknown) => e);

      expect(error instanceof TransferError && error.category).toBe('auth');
    });
  });
});
