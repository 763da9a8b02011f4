export const MAX_TITLE_LENGTH = 100;
export const DEFAULT_TITLE = 'Untitled Video';

const INVALID_TITLE_CHARS = ['<', '>'];

export interface SanitizedTitle {
  title: string;
  warnings: string[];
}

/** Strip characters the platforms reject and enforce the length limit. Never throws. */
export function sanitizeTitle(raw: string): SanitizedTitle {
  const warnings: string[] = [];
  let title = raw;

  for (const char of INVALID_TITLE_CHARS) {
    if (title.includes(char)) {
      title = title.split(char).join('');
      warnings.push(`Removed invalid character: '${char}'`);
    }
  }

  // Length counts code points, not UTF-16 units.
  const codePoints = Array.from(title);
  if (codePoints.length > MAX_TITLE_LENGTH) {
    warnings.push(`Title is ${codePoints.length} characters (max ${MAX_TITLE_LENGTH}). It will be truncated.`);
    title = codePoints.slice(0, MAX_TITLE_LENGTH).join('');
  } else if (codePoints.length === 0) {
    warnings.push('Title is empty after sanitization. Using default.');
    title = DEFAULT_TITLE;
  }

  return { title, warnings };
}
