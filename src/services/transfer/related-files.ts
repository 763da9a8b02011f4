import { access } from 'fs/promises';
import path from 'path';

export interface RelatedFiles {
  subtitle: string | null;
  thumbnail: string | null;
}

const SUBTITLE_EXTENSIONS = ['.srt', '.vtt'];
const THUMBNAIL_EXTENSION = '.png';
const LANGUAGE_SUFFIX = /\.([A-Za-z]{2,3}(?:-[A-Za-z0-9]{2,4})?)$/;

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Subtitle and thumbnail files sharing the video's stem, in the same directory. */
export async function findRelatedFiles(videoPath: string): Promise<RelatedFiles> {
  const dir = path.dirname(videoPath);
  const stem = path.parse(videoPath).name;

  let subtitle: string | null = null;
  for (const ext of SUBTITLE_EXTENSIONS) {
    const candidate = path.join(dir, `${stem}${ext}`);
    if (await exists(candidate)) {
      subtitle = candidate;
      break;
    }
  }

  const thumbnailPath = path.join(dir, `${stem}${THUMBNAIL_EXTENSION}`);
  return {
    subtitle,
    thumbnail: (await exists(thumbnailPath)) ? thumbnailPath : null
  };
}

/** `talk.pt-BR.srt` -> `pt-BR`; `talk.srt` -> `en`. */
export function detectCaptionLanguage(subtitlePath: string, fallback = 'en'): string {
  const stem = path.parse(subtitlePath).name;
  return LANGUAGE_SUFFIX.exec(stem)?.[1] ?? fallback;
}
