import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { DateTime } from 'luxon';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { TikTokPrivacyLevel } from '../../config/settings.js';
import type { UploadOutcome, UploadRequest } from '../../types/upload.js';
import { AuthenticationError, TransferError, errorMessage } from '../../utils/errors.js';
import { atomicWriteJson, readJsonFile } from '../../utils/json-file.js';
import { chunkCount, transferInChunks } from './chunked-transfer.js';
import { classifyHttpFailure, failureFromBody } from './error-signatures.js';
import { TIKTOK_SCHEDULE_WINDOW, planSchedule } from './schedule-window.js';
import type { ProgressListener, TransferClient } from './types.js';

export const TIKTOK_API_BASE = 'https://open.tiktokapis.com/v2';
export const TIKTOK_TOKEN_URL = `${TIKTOK_API_BASE}/oauth/token/`;

// Tokens this close to expiry are refreshed before use.
const TOKEN_EXPIRY_BUFFER_SECONDS = 300;

const clientSecretsSchema = z.object({
  client_key: z.string().min(1),
  client_secret: z.string().min(1)
});

const storedTokenSchema = z
  .object({
    access_token: z.string().nullish(),
    /** epoch seconds */
    expires_at: z.number().default(0),
    refresh_token: z.string().nullish(),
    token_type: z.string().nullish()
  })
  .passthrough();

type StoredToken = z.infer<typeof storedTokenSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string().optional(),
  expires_in: z.number().default(3600),
  refresh_token: z.string().optional(),
  token_type: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional()
});

const apiErrorSchema = z
  .object({
    code: z.string().optional(),
    message: z.string().optional()
  })
  .optional();

const initResponseSchema = z.object({
  data: z
    .object({
      upload_url: z.string().optional(),
      publish_id: z.string().optional()
    })
    .optional(),
  error: apiErrorSchema
});

const commitResponseSchema = z.object({
  data: z.object({ publish_id: z.string().optional() }).optional(),
  error: apiErrorSchema
});

export interface TikTokUploaderOptions {
  clientSecretsPath: string;
  tokenPath: string;
  privacyLevel: TikTokPrivacyLevel;
  chunkSizeBytes: number;
  logger: Logger;
  http?: AxiosInstance;
  clock?: () => DateTime;
}

/** Errors TikTok reports inside a 2xx body; `ok` means none. */
function bodyError(error: z.infer<typeof apiErrorSchema>): { code: string; message: string } | null {
  if (!error?.code || error.code === 'ok') return null;
  return { code: error.code, message: error.message ?? '' };
}

/** TikTok Content Posting API: init, chunked PUTs, commit. */
export class TikTokUploader implements TransferClient {
  readonly platform = 'tiktok' as const;
  readonly scheduleWindow = TIKTOK_SCHEDULE_WINDOW;

  private token: StoredToken | null = null;
  private readonly http: AxiosInstance;
  private readonly clock: () => DateTime;

  constructor(private readonly options: TikTokUploaderOptions) {
    this.http = options.http ?? axios.create();
    this.clock = options.clock ?? (() => DateTime.now());
  }

  async authenticate(): Promise<void> {
    await this.ensureAccessToken();
    this.options.logger.info('TikTok authenticated');
  }

  async upload(request: UploadRequest, onProgress?: ProgressListener): Promise<UploadOutcome> {
    const { asset } = request;
    if (asset.sizeBytes <= 0) {
      throw new TransferError('tiktok', 'validation', 'Video file is empty');
    }
    const plan = planSchedule('tiktok', request.publishTime, this.clock(), this.scheduleWindow);

    let accessToken: string;
    try {
      accessToken = await this.ensureAccessToken();
    } catch (error) {
      throw new TransferError('tiktok', 'auth', errorMessage(error), { cause: error });
    }
    const headers = {
      Authorization: `Bearer ${accessToken}`,
      'Content-Type': 'application/json; charset=UTF-8'
    };

    const chunkSize = Math.min(this.options.chunkSizeBytes, asset.sizeBytes);
    const postInfo: Record<string, string | number | boolean> = {
      title: request.title,
      description: request.description,
      privacy_level: this.options.privacyLevel,
      disable_duet: false,
      disable_comment: false,
      disable_stitch: false,
      video_cover_timestamp_ms: 1000
    };
    if (plan.scheduleAt) {
      postInfo.schedule_time = Math.floor(plan.scheduleAt.toSeconds());
    }

    const initRes = await this.http
      .post<unknown>(
        `${TIKTOK_API_BASE}/post/publish/inbox/video/init/`,
        {
          source_info: {
            source: 'FILE_UPLOAD',
            video_size: asset.sizeBytes,
            chunk_size: chunkSize,
            total_chunk_count: chunkCount(asset.sizeBytes, chunkSize)
          },
          post_info: postInfo
        },
        { headers, validateStatus: (s) => s >= 200 && s < 300 }
      )
      .catch((error: unknown) => {
        throw classifyHttpFailure('tiktok', error, 'Initializing upload');
      });

    const init = initResponseSchema.safeParse(initRes.data);
    const initError = init.success ? bodyError(init.data.error) : null;
    if (initError) {
      throw failureFromBody('tiktok', 'Initializing upload', initError.code, initError.message);
    }
    const uploadUrl = init.success ? init.data.data?.upload_url : undefined;
    const publishId = init.success ? init.data.data?.publish_id : undefined;
    if (!uploadUrl || !publishId) {
      throw new TransferError('tiktok', 'transport', 'Failed to initialize upload: response has no upload_url or publish_id');
    }

    const transfer = await transferInChunks<never>({
      platform: 'tiktok',
      filePath: asset.path,
      totalBytes: asset.sizeBytes,
      chunkSize,
      onProgress,
      sendChunk: async ({ start, end, total, data }) => {
        await this.http
          .put(uploadUrl, data, {
            headers: {
              'Content-Type': 'video/mp4',
              'Content-Length': data.length,
              'Content-Range': `bytes ${start}-${end}/${total}`
            },
            maxBodyLength: Infinity,
            maxContentLength: Infinity,
            validateStatus: (s) => s >= 200 && s < 300
          })
          .catch((error: unknown) => {
            throw classifyHttpFailure('tiktok', error, `Chunk ${start}-${end}`);
          });
        return { committedBytes: end + 1 };
      }
    });

    const commitRes = await this.http
      .post<unknown>(
        `${TIKTOK_API_BASE}/post/publish/inbox/video/commit/`,
        { publish_id: publishId },
        { headers, validateStatus: (s) => s >= 200 && s < 300 }
      )
      .catch((error: unknown) => {
        throw classifyHttpFailure('tiktok', error, 'Committing upload');
      });

    const commit = commitResponseSchema.safeParse(commitRes.data);
    const commitError = commit.success ? bodyError(commit.data.error) : null;
    if (commitError) {
      throw failureFromBody('tiktok', 'Committing upload', commitError.code, commitError.message);
    }
    const remoteId = (commit.success ? commit.data.data?.publish_id : undefined) ?? publishId;

    return {
      remoteId,
      uploadTimeSeconds: transfer.elapsedSeconds,
      bytesTransferred: transfer.bytesTransferred,
      averageSpeed: transfer.elapsedSeconds > 0 ? transfer.bytesTransferred / transfer.elapsedSeconds : 0,
      scheduledAt: plan.scheduleAt?.toUTC().toISO() ?? null,
      sideAssets: { subtitle: false, thumbnail: false },
      warnings: []
    };
  }

  // -------------------------
  // Internals
  // -------------------------

  private isUsable(token: StoredToken | null): token is StoredToken & { access_token: string } {
    return !!token?.access_token && token.expires_at > this.clock().toSeconds() + TOKEN_EXPIRY_BUFFER_SECONDS;
  }

  private async ensureAccessToken(): Promise<string> {
    if (this.isUsable(this.token)) return this.token.access_token;

    const path = this.options.tokenPath;
    const raw = await readJsonFile(path).catch((error: unknown) => {
      throw new AuthenticationError('tiktok', `Could not read ${path}: ${errorMessage(error)}`, { cause: error });
    });
    const parsed = storedTokenSchema.safeParse(raw);
    const stored = parsed.success ? parsed.data : null;
    if (this.isUsable(stored)) {
      this.token = stored;
      return stored.access_token;
    }

    if (!stored?.refresh_token) {
      throw new AuthenticationError('tiktok', `No valid TikTok authorization in ${path}. Authorize the app once to create it.`);
    }
    return this.refresh(stored, stored.refresh_token);
  }

  private async refresh(stored: StoredToken, refreshToken: string): Promise<string> {
    const secretsRaw = await readJsonFile(this.options.clientSecretsPath).catch(() => null);
    const secrets = clientSecretsSchema.safeParse(secretsRaw);
    if (!secrets.success) {
      throw new AuthenticationError(
        'tiktok',
        `${this.options.clientSecretsPath} must hold client_key and client_secret to refresh the TikTok token`
      );
    }

    const form = new URLSearchParams({
      client_key: secrets.data.client_key,
      client_secret: secrets.data.client_secret,
      grant_type: 'refresh_token',
      refresh_token: refreshToken
    });

    const res = await this.http
      .post<unknown>(TIKTOK_TOKEN_URL, form, {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        validateStatus: (s) => s >= 200 && s < 300
      })
      .catch((error: unknown) => {
        throw new AuthenticationError('tiktok', `TikTok token refresh failed: ${classifyHttpFailure('tiktok', error, 'Token refresh').message}`, {
          cause: error
        });
      });

    const body = tokenResponseSchema.safeParse(res.data);
    if (!body.success || !body.data.access_token) {
      const reason = body.success ? (body.data.error_description ?? body.data.error ?? 'no access token') : 'unexpected response';
      throw new AuthenticationError('tiktok', `TikTok token refresh failed: ${reason}`);
    }

    const next: StoredToken = {
      ...stored,
      access_token: body.data.access_token,
      expires_at: this.clock().toSeconds() + body.data.expires_in,
      refresh_token: body.data.refresh_token ?? refreshToken,
      token_type: body.data.token_type ?? stored.token_type ?? 'Bearer'
    };
    try {
      await atomicWriteJson(this.options.tokenPath, next);
    } catch (error) {
      this.options.logger.warn({ error: errorMessage(error) }, 'Could not persist refreshed TikTok token');
    }
    this.token = next;
    this.options.logger.info('TikTok token refreshed');
    return body.data.access_token;
  }
}
