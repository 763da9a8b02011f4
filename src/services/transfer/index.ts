import type { InstallationPaths, Settings } from '../../config/settings.js';
import type { PlatformId } from '../../types/upload.js';
import type { Logger } from 'pino';
import { TikTokUploader } from './tiktok-uploader.js';
import type { TransferClient } from './types.js';
import { YouTubeUploader } from './youtube-uploader.js';

export interface ClientContext {
  categoryId: string;
}

export type TransferClientFactory = (platform: PlatformId, context: ClientContext) => TransferClient;

/** Build the real platform clients from installation files and settings. */
export function createTransferClientFactory(paths: InstallationPaths, settings: Settings, logger: Logger): TransferClientFactory {
  return (platform, context) => {
    switch (platform) {
      case 'youtube':
        return new YouTubeUploader({
          clientSecretsPath: paths.youtubeClientSecretsFile,
          tokenPath: paths.youtubeTokenFile,
          privacyStatus: settings.privacyStatus,
          categoryId: context.categoryId,
          chunkSizeBytes: settings.chunkSizeBytes,
          playlist: settings.playlist,
          logger: logger.child({ platform })
        });
      case 'tiktok':
        return new TikTokUploader({
          clientSecretsPath: paths.tiktokClientSecretsFile,
          tokenPath: paths.tiktokTokenFile,
          privacyLevel: settings.tiktokPrivacyLevel,
          chunkSizeBytes: settings.chunkSizeBytes,
          logger: logger.child({ platform })
        });
    }
  };
}
