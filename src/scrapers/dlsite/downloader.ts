import fs from 'fs/promises';
import path from 'path';
import { isMissingFileError, writeFileAtomic } from '../../atomicWrite.js';
import { describeError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import { bucketFolder, parseCode } from './identifiers.js';
import type { AssetResult, ImageSource, Item } from './types.js';

const CONTENT_TYPE_EXT: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif'
};

const KNOWN_EXTENSIONS = new Set(Object.values(CONTENT_TYPE_EXT));

function getExtensionFromUrl(url: string | undefined): string | null {
  if (!url) {
    return null;
  }
  try {
    const ext = path.extname(new URL(url).pathname).slice(1).toLowerCase();
    if (ext === 'jpeg') {
      return 'jpg';
    }
    return KNOWN_EXTENSIONS.has(ext) ? ext : null;
  } catch {
    return null;
  }
}

export function getExtension(contentType?: string, url?: string): string {
  if (contentType && CONTENT_TYPE_EXT[contentType]) {
    return CONTENT_TYPE_EXT[contentType];
  }
  return getExtensionFromUrl(url) ?? 'jpg';
}

export function mainImageName(code: string, ext: string): string {
  return `${code}_img_main.${ext}`;
}

/** `{root}/{bucket}/{code}`, or null when the code is not a product code. */
export function buildImageDir(root: string, code: string): string | null {
  const identifier = parseCode(code);
  if (!identifier) {
    return null;
  }
  return path.join(root, bucketFolder(identifier), code);
}

export function buildImagePath(root: string, code: string, ext = 'jpg'): string | null {
  const dir = buildImageDir(root, code);
  return dir ? path.join(dir, mainImageName(code, ext)) : null;
}

async function findExisting(dir: string, code: string): Promise<string | null> {
  const prefix = mainImageName(code, '');
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const match = entries.find(entry => entry.isFile() && entry.name.startsWith(prefix));
    return match ? path.join(dir, match.name) : null;
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Keeps one primary image per work on disk. A file already present means
 * there is nothing to do; a missing file is retried on the next run.
 */
export class AssetArchiver {
  constructor(
    private readonly root: string,
    private readonly source: ImageSource,
    private readonly logger: Logger
  ) {}

  async ensure(item: Item, imageUrl?: string | null): Promise<AssetResult> {
    const dir = buildImageDir(this.root, item.code);
    if (!dir) {
      return { code: item.code, status: 'skipped' };
    }

    try {
      const existing = await findExisting(dir, item.code);
      if (existing) {
        return { code: item.code, status: 'existing', path: existing };
      }

      const image = await this.source.fetchImage(item.code, imageUrl ?? undefined);
      const destPath = path.join(dir, mainImageName(item.code, getExtension(image.contentType, image.url)));
      await writeFileAtomic(destPath, image.data);
      this.logger.debug(`Saved image for ${item.code}`);
      return { code: item.code, status: 'downloaded', path: destPath };
    } catch (error) {
      this.logger.warn(`Could not archive the image for ${item.code}`, error);
      return { code: item.code, status: 'failed', error: describeError(error) };
    }
  }
}
