import path from 'path';
import { MEDIA_EXTENSIONS, VIDEO_EXTENSIONS } from './constants.js';

/**
 * 指定したパスが対応メディア拡張子を持つ場合に true を返します。
 *
 * @param filePath 絶対パスまたは相対パス。
 * @returns メディアとして扱うかどうか。
 */
export function isMediaFile(filePath: string): boolean {
  return MEDIA_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}
