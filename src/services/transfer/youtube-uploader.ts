import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { google } from 'googleapis';
import type { youtube_v3 } from 'googleapis';
import { createReadStream } from 'fs';
import { chmod } from 'fs/promises';
import { DateTime } from 'luxon';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { PrivacyStatus } from '../../config/settings.js';
import type { UploadOutcome, UploadRequest } from '../../types/upload.js';
import { AuthenticationError, TransferError, errorMessage } from '../../utils/errors.js';
import { atomicWriteJson, readJsonFile } from '../../utils/json-file.js';
import { transferInChunks } from './chunked-transfer.js';
import { classifyHttpFailure } from './error-signatures.js';
import { detectCaptionLanguage, findRelatedFiles } from './related-files.js';
import { YOUTUBE_SCHEDULE_WINDOW, planSchedule } from './schedule-window.js';
import type { ProgressListener, TransferClient } from './types.js';

const UPLOAD_URL = 'https://www.googleapis.com/upload/youtube/v3/videos';

type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

const oauthClientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1)
});

const clientSecretsSchema = z.object({
  installed: oauthClientSchema.optional(),
  web: oauthClientSchema.optional()
});

// Accepts both the googleapis token shape and google-auth's authorized-user file.
const storedTokensSchema = z
  .object({
    access_token: z.string().nullish(),
    token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    expiry_date: z.number().nullish(),
    expiry: z.string().nullish(),
    scope: z.string().nullish(),
    token_type: z.string().nullish()
  })
  .passthrough();

type StoredTokens = z.infer<typeof storedTokensSchema>;

const videoResourceSchema = z.object({ id: z.string().min(1) });

type VideoResource = z.infer<typeof videoResourceSchema>;

/** The Data API calls made around an upload; swapped out in tests. */
export interface YouTubeDataApi {
  insertCaption(videoId: string, language: string, filePath: string): Promise<void>;
  setThumbnail(videoId: string, filePath: string): Promise<void>;
  createPlaylist(title: string, privacyStatus: PrivacyStatus): Promise<string>;
  addToPlaylist(playlistId: string, videoId: string): Promise<void>;
}

export class GoogleYouTubeDataApi implements YouTubeDataApi {
  private readonly youtube: youtube_v3.Youtube;

  constructor(auth: OAuth2Client) {
    this.youtube = google.youtube({ version: 'v3', auth });
  }

  async insertCaption(videoId: string, language: string, filePath: string): Promise<void> {
    await this.youtube.captions.insert({
      part: ['snippet'],
      requestBody: { snippet: { videoId, language, name: `${language} subtitles` } },
      media: { body: createReadStream(filePath) }
    });
  }

  async setThumbnail(videoId: string, filePath: string): Promise<void> {
    await this.youtube.thumbnails.set({ videoId, media: { body: createReadStream(filePath) } });
  }

  async createPlaylist(title: string, privacyStatus: PrivacyStatus): Promise<string> {
    const res = await this.youtube.playlists.insert({
      part: ['snippet', 'status'],
      requestBody: { snippet: { title }, status: { privacyStatus } }
    });
    if (!res.data.id) throw new Error('Playlist created but no id returned');
    return res.data.id;
  }

  async addToPlaylist(playlistId: string, videoId: string): Promise<void> {
    await this.youtube.playlistItems.insert({
      part: ['snippet'],
      requestBody: { snippet: { playlistId, resourceId: { kind: 'youtube#video', videoId } } }
    });
  }
}

export interface PlaylistSettings {
  id: string | null;
  create: boolean;
  title: string;
}

export interface YouTubeUploaderOptions {
  clientSecretsPath: string;
  tokenPath: string;
  privacyStatus: PrivacyStatus;
  categoryId: string;
  chunkSizeBytes: number;
  playlist?: PlaylistSettings;
  logger: Logger;
  http?: AxiosInstance;
  dataApi?: (auth: OAuth2Client) => YouTubeDataApi;
  clock?: () => DateTime;
}

function parseRangeCommittedBytes(rangeHeader: unknown): number {
  // "bytes=0-1048575"
  if (typeof rangeHeader !== 'string') return 0;
  const match = rangeHeader.match(/(\d+)-(\d+)/);
  if (!match) return 0;
  return parseInt(match[2], 10) + 1;
}

function expiryFrom(tokens: StoredTokens): number | undefined {
  if (tokens.expiry_date) return tokens.expiry_date;
  if (!tokens.expiry) return undefined;
  const parsed = Date.parse(tokens.expiry);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/** Resumable YouTube uploads over axios, with captions, thumbnails and playlists through googleapis. */
export class YouTubeUploader implements TransferClient {
  readonly platform = 'youtube' as const;
  readonly scheduleWindow = YOUTUBE_SCHEDULE_WINDOW;

  private oauth2Client: OAuth2Client | null = null;
  private dataApi: YouTubeDataApi | null = null;
  private storedTokens: StoredTokens = {};
  private readonly http: AxiosInstance;
  private readonly clock: () => DateTime;

  constructor(private readonly options: YouTubeUploaderOptions) {
    this.http = options.http ?? axios.create();
    this.clock = options.clock ?? (() => DateTime.now());
  }

  async authenticate(): Promise<void> {
    const creds = await this.loadClientCredentials();
    const tokens = await this.loadTokens();

    const client = new google.auth.OAuth2(creds.client_id, creds.client_secret);
    client.setCredentials({
      access_token: tokens.access_token ?? tokens.token ?? undefined,
      refresh_token: tokens.refresh_token ?? undefined,
      expiry_date: expiryFrom(tokens),
      scope: tokens.scope ?? undefined,
      token_type: tokens.token_type ?? undefined
    });
    this.oauth2Client = client;
    this.storedTokens = tokens;

    try {
      await this.getFreshAccessToken(client);
    } catch (error) {
      this.oauth2Client = null;
      throw new AuthenticationError('youtube', `YouTube authentication failed: ${errorMessage(error)}`, { cause: error });
    }

    this.dataApi = (this.options.dataApi ?? ((auth) => new GoogleYouTubeDataApi(auth)))(client);
    this.options.logger.info('YouTube authenticated');
  }

  async upload(request: UploadRequest, onProgress?: ProgressListener): Promise<UploadOutcome> {
    const { asset } = request;
    if (asset.sizeBytes <= 0) {
      throw new TransferError('youtube', 'validation', 'Video file is empty');
    }
    const plan = planSchedule('youtube', request.publishTime, this.clock(), this.scheduleWindow);

    const client = this.oauth2Client;
    if (!client) {
      throw new TransferError('youtube', 'auth', 'YouTube client is not authenticated');
    }
    let accessToken: string;
    try {
      accessToken = await this.getFreshAccessToken(client);
    } catch (error) {
      throw new TransferError('youtube', 'auth', `Could not obtain YouTube access token: ${errorMessage(error)}`, { cause: error });
    }

    const scheduleAt = plan.scheduleAt?.toUTC().toISO() ?? null;
    const uploadUrl = await this.startResumableSession(accessToken, request, scheduleAt);

    const transfer = await transferInChunks<VideoResource>({
      platform: 'youtube',
      filePath: asset.path,
      totalBytes: asset.sizeBytes,
      chunkSize: this.options.chunkSizeBytes,
      onProgress,
      sendChunk: async ({ start, end, total, data }) => {
        const res = await this.http
          .put<unknown>(uploadUrl, data, {
            headers: {
              'Content-Length': data.length,
              'Content-Range': `bytes ${start}-${end}/${total}`
            },
            maxBodyLength: Infinity,
            maxContentLength: Infinity,
            validateStatus: (s) => (s >= 200 && s < 300) || s === 308
          })
          .catch((error: unknown) => {
            throw classifyHttpFailure('youtube', error, `Chunk ${start}-${end}`);
          });

        if (res.status === 308) {
          return { committedBytes: parseRangeCommittedBytes(res.headers['range']) };
        }
        // 2xx finalizes: YouTube returns the video resource.
        const video = videoResourceSchema.safeParse(res.data);
        if (!video.success) {
          throw new TransferError('youtube', 'transport', 'Upload completed but no video ID returned');
        }
        return { committedBytes: end + 1, result: video.data };
      }
    });

    const videoId = transfer.result?.id;
    if (!videoId) {
      throw new TransferError('youtube', 'transport', 'Upload completed but no video ID returned');
    }

    const warnings: string[] = [];
    const sideAssets = await this.uploadSideAssets(videoId, asset.path, warnings);

    return {
      remoteId: videoId,
      uploadTimeSeconds: transfer.elapsedSeconds,
      bytesTransferred: transfer.bytesTransferred,
      averageSpeed: transfer.elapsedSeconds > 0 ? transfer.bytesTransferred / transfer.elapsedSeconds : 0,
      scheduledAt: scheduleAt,
      sideAssets,
      warnings
    };
  }

  /** Add the batch's videos to the configured playlist, creating it when asked to. */
  async finalizeBatch(remoteIds: readonly string[]): Promise<string[]> {
    const playlist = this.options.playlist;
    const api = this.dataApi;
    if (!playlist || remoteIds.length === 0 || !api) return [];
    if (!playlist.id && !playlist.create) return [];

    const warnings: string[] = [];
    let playlistId = playlist.id;
    if (!playlistId) {
      try {
        playlistId = await api.createPlaylist(playlist.title, this.options.privacyStatus);
        this.options.logger.info({ playlistId, title: playlist.title }, 'Created playlist');
      } catch (error) {
        warnings.push(`Failed to create playlist '${playlist.title}': ${errorMessage(error)}`);
        return warnings;
      }
    }

    for (const videoId of remoteIds) {
      try {
        await api.addToPlaylist(playlistId, videoId);
      } catch (error) {
        warnings.push(`Failed to add ${videoId} to playlist ${playlistId}: ${errorMessage(error)}`);
      }
    }
    return warnings;
  }

  // -------------------------
  // Internals
  // -------------------------

  private async startResumableSession(accessToken: string, request: UploadRequest, publishAt: string | null): Promise<string> {
    const response = await this.http
      .post<unknown>(
        UPLOAD_URL,
        {
          snippet: {
            title: request.title,
            description: request.description,
            tags: request.tags,
            categoryId: this.options.categoryId
          },
          status: {
            // Scheduled publishing requires a private video until publishAt.
            privacyStatus: publishAt ? 'private' : this.options.privacyStatus,
            publishAt: publishAt ?? undefined,
            selfDeclaredMadeForKids: false
          }
        },
        {
          params: {
            uploadType: 'resumable',
            part: 'snippet,status'
          },
          headers: {
            Authorization: `Bearer ${accessToken}`,
            'Content-Type': 'application/json; charset=UTF-8',
            'X-Upload-Content-Length': request.asset.sizeBytes,
            'X-Upload-Content-Type': 'video/*'
          },
          validateStatus: (s) => s >= 200 && s < 300
        }
      )
      .catch((error: unknown) => {
        throw classifyHttpFailure('youtube', error, 'Starting upload session');
      });

    const location = response.headers['location'];
    if (typeof location !== 'string' || !location) {
      throw new TransferError('youtube', 'transport', 'YouTube resumable session did not return an upload URL');
    }
    return location;
  }

  private async uploadSideAssets(
    videoId: string,
    videoPath: string,
    warnings: string[]
  ): Promise<UploadOutcome['sideAssets']> {
    const sideAssets = { subtitle: false, thumbnail: false };
    const api = this.dataApi;
    if (!api) return sideAssets;
    const related = await findRelatedFiles(videoPath);

    if (related.subtitle) {
      const language = detectCaptionLanguage(related.subtitle);
      try {
        await api.insertCaption(videoId, language, related.subtitle);
        sideAssets.subtitle = true;
        this.options.logger.info({ videoId, language }, 'Subtitle uploaded');
      } catch (error) {
        warnings.push(`Failed to upload subtitle: ${errorMessage(error)}`);
      }
    }

    if (related.thumbnail) {
      try {
        await api.setThumbnail(videoId, related.thumbnail);
        sideAssets.thumbnail = true;
        this.options.logger.info({ videoId }, 'Thumbnail uploaded');
      } catch (error) {
        warnings.push(`Failed to upload thumbnail: ${errorMessage(error)}`);
      }
    }
    return sideAssets;
  }

  private async loadClientCredentials(): Promise<z.infer<typeof oauthClientSchema>> {
    if (process.env.YOUTUBE_CLIENT_ID && process.env.YOUTUBE_CLIENT_SECRET) {
      return {
        client_id: process.env.YOUTUBE_CLIENT_ID,
        client_secret: process.env.YOUTUBE_CLIENT_SECRET
      };
    }

    const path = this.options.clientSecretsPath;
    const raw = await readJsonFile(path).catch((error: unknown) => {
      throw new AuthenticationError('youtube', `Could not read ${path}: ${errorMessage(error)}`, { cause: error });
    });
    if (raw === null) {
      throw new AuthenticationError('youtube', `${path} not found. Download OAuth client credentials from the Google Cloud Console.`);
    }
    const parsed = clientSecretsSchema.safeParse(raw);
    const node = parsed.success ? (parsed.data.installed ?? parsed.data.web) : undefined;
    if (!node) {
      throw new AuthenticationError('youtube', `Invalid OAuth client file (expected installed/web.client_id/client_secret): ${path}`);
    }
    return node;
  }

  private async loadTokens(): Promise<StoredTokens> {
    const path = this.options.tokenPath;
    const raw = await readJsonFile(path).catch((error: unknown) => {
      throw new AuthenticationError('youtube', `Could not read ${path}: ${errorMessage(error)}`, { cause: error });
    });
    const parsed = storedTokensSchema.safeParse(raw);
    if (raw === null || !parsed.success || (!parsed.data.refresh_token && !parsed.data.access_token && !parsed.data.token)) {
      throw new AuthenticationError('youtube', `No stored YouTube authorization in ${path}. Authorize the app once to create it.`);
    }
    return parsed.data;
  }

  /** Refreshes through the stored refresh token when the access token is expiring. */
  private async getFreshAccessToken(client: OAuth2Client): Promise<string> {
    const { token } = await client.getAccessToken();
    if (!token) throw new Error('Unable to obtain access token');

    if (token !== (this.storedTokens.access_token ?? this.storedTokens.token)) {
      await this.saveTokens(token, client.credentials.expiry_date ?? undefined, client.credentials.refresh_token ?? undefined);
    }
    return token;
  }

  private async saveTokens(accessToken: string, expiryDate: number | undefined, refreshToken: string | undefined): Promise<void> {
    const next: StoredTokens = {
      ...this.storedTokens,
      access_token: accessToken,
      refresh_token: refreshToken ?? this.storedTokens.refresh_token,
      expiry_date: expiryDate ?? null
    };
    try {
      await atomicWriteJson(this.options.tokenPath, next);
      await chmod(this.options.tokenPath, 0o600).catch(() => undefined);
      this.storedTokens = next;
    } catch (error) {
      this.options.logger.warn({ error: errorMessage(error) }, 'Could not persist refreshed YouTube token');
    }
  }
}
