import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export type MediaItem = {
  key: string;
  bytes: Buffer;
};

export type MediaStore = {
  put(item: MediaItem): Promise<{ key: string; path: string }>;
};

function resolveKey(root: string, key: string): string {
  const normalized = key.replace(/\\/g, '/').replace(/^\/+/, '');
  const resolved = path.resolve(root, normalized);
  const base = path.resolve(root);
  if (resolved !== base && !resolved.startsWith(`${base}${path.sep}`)) {
    throw new Error(`Media key escapes store root: ${key}`);
  }
  return resolved;
}

/** Artifact store rooted at DATA_PATH; keys are relative paths such as `metadata/<episodeId>.json`. */
export function createLocalMediaStore(root: string): MediaStore {
  return {
    async put(item: MediaItem) {
      const filePath = resolveKey(root, item.key);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      const tmpPath = `${filePath}.tmp`;
      await fs.writeFile(tmpPath, item.bytes);
      await fs.rename(tmpPath, filePath);
      return { key: item.key, path: filePath };
    },
  };
}
