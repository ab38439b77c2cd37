import { imageUrlFromId } from './image-url.js';

/**
 * アップロード結果。途中で失敗した場合は取得できた項目だけが埋まり、残りは空文字列です。
 */
export class UploadResult {
  constructor(
    readonly uploaded: boolean,
    readonly imageId: string = '',
    readonly imageUrl: string = '',
    readonly albumId: string = '',
  ) {}

  /**
   * 画像 ID から表示用 URL を組み立てます。
   */
  urlString(): string {
    return imageUrlFromId(this.imageId);
  }
}
