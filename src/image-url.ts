import { IMAGE_URL_PREFIX } from './constants.js';
import { ImageUrlError } from './errors.js';

/**
 * 有効化済み画像の URL。キャプチャグループが画像 ID です。
 */
export const UPLOADED_IMAGE_URL_PATTERN = /^https:\/\/lh3\.googleusercontent\.com\/([A-Za-z0-9_-]+)$/;

/**
 * 画像 URL から画像 ID を取り出します。
 *
 * @param url 有効化リクエストの応答に含まれていた画像 URL。
 * @returns 画像 ID。
 * @throws {ImageUrlError} パターンに一致しない場合。
 */
export function getImageIdFromUrl(url: string): string {
  const match = UPLOADED_IMAGE_URL_PATTERN.exec(url);
  if (match === null) {
    throw new ImageUrlError('no-match', url);
  }
  if (match.length !== 2) {
    throw new ImageUrlError('wrong-capture-count', url);
  }

  return match[1];
}

export function imageUrlFromId(imageId: string): string {
  return `${IMAGE_URL_PREFIX}${imageId}`;
}
