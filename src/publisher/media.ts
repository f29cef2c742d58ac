import { existsSync } from 'fs';
import { basename, extname, join } from 'path';
import { HardPublishFailure } from '../errors';

export const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi'];

export type MediaKind = 'photo' | 'video';

export interface ResolvedMedia {
  name: string;
  path: string;
  kind: MediaKind;
}

export function mediaKindOf(path: string): MediaKind {
  return VIDEO_EXTENSIONS.includes(extname(path).toLowerCase()) ? 'video' : 'photo';
}

/** Finds media files by name in `<mediaDir>/photos`, then `<mediaDir>/videos`. */
export class MediaLocator {
  readonly photosDir: string;
  readonly videosDir: string;

  constructor(mediaDir: string) {
    this.photosDir = join(mediaDir, 'photos');
    this.videosDir = join(mediaDir, 'videos');
  }

  resolve(name: string): ResolvedMedia {
    // names are plain filenames; anything with a directory part is not ours
    if (!name || basename(name) !== name) {
      throw new HardPublishFailure(`Media file not found: ${name}`);
    }
    for (const dir of [this.photosDir, this.videosDir]) {
      const path = join(dir, name);
      if (existsSync(path)) return { name, path, kind: mediaKindOf(path) };
    }
    throw new HardPublishFailure(`Media file not found: ${name}`);
  }

  resolveAll(names: string[]): ResolvedMedia[] {
    if (names.length === 0) throw new HardPublishFailure('Post has no media to publish');
    return names.map((n) => this.resolve(n));
  }
}
