import { IgnoreCategory, IgnoreSettings } from './types.js';

/** Extensions (lowercase, no dot) covered by each ignore toggle */
export const IGNORE_CATEGORY_EXTENSIONS: Record<IgnoreCategory, readonly string[]> = {
  images: ['png', 'jpg', 'jpeg', 'gif', 'bmp', 'webp', 'tif', 'tiff', 'ico'],
  documents: ['txt', 'nfo', 'md', 'pdf', 'doc', 'docx', 'rtf', 'htm', 'html'],
  archives: ['zip', '7z', 'rar', 'gz', 'tar', 'bz2', 'xz'],
  metadata: ['xml', 'json', 'ini', 'cfg', 'log', 'db', 'sqlite', 'sqlite-wal', 'sqlite-shm']
};

export const IGNORE_CATEGORIES: IgnoreCategory[] = ['images', 'documents', 'archives', 'metadata'];

export function isIgnoreCategory(value: string): value is IgnoreCategory {
  return IGNORE_CATEGORIES.some(category => category === value);
}

/**
 * Extensions excluded by the enabled toggles
 */
export function ignoredExtensions(ignore: IgnoreSettings): Set<string> {
  const extensions = new Set<string>();
  for (const category of IGNORE_CATEGORIES) {
    if (ignore[category]) {
      IGNORE_CATEGORY_EXTENSIONS[category].forEach(ext => extensions.add(ext));
    }
  }
  return extensions;
}

/**
 * @param extension - with or without the leading dot, any case
 */
export function isIgnoredExtension(extension: string, ignore: IgnoreSettings): boolean {
  const normalized = extension.replace(/^\./, '').toLowerCase();
  if (!normalized) return false;
  return ignoredExtensions(ignore).has(normalized);
}
