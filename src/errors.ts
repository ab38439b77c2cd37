import axios from 'axios';

/**
 * アップロード処理のどの段階で失敗したかを表します。
 */
export type UploadPhase =
  | 'request-upload-url'
  | 'transfer-bytes'
  | 'enable-photo'
  | 'parse-image-id'
  | 'move-to-album'
  | 'create-album';

const PHASE_DESCRIPTIONS: Record<UploadPhase, string> = {
  'request-upload-url': "can't get an upload url",
  'transfer-bytes': "can't upload file to the url obtained from the previous request",
  'enable-photo': "can't enable the uploaded photo",
  'parse-image-id': "can't read the image id from the enabled photo url",
  'move-to-album': "can't move the photo into the album",
  'create-album': "can't create the album",
};

/**
 * 通信前の入力検証エラー。ネットワークには一切アクセスしていません。
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * サービスの応答が想定した形をしていない場合のエラー。
 */
export class WireFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireFormatError';
  }
}

export type ImageUrlErrorReason = 'no-match' | 'wrong-capture-count';

/**
 * 画像 URL から画像 ID を取り出せなかった場合のエラー。
 */
export class ImageUrlError extends Error {
  readonly reason: ImageUrlErrorReason;
  readonly url: string;

  constructor(reason: ImageUrlErrorReason, url: string) {
    super(reason === 'no-match'
      ? `url doesn't contain the image id: ${url}`
      : `url matched with an unexpected number of captures: ${url}`);
    this.name = 'ImageUrlError';
    this.reason = reason;
    this.url = url;
  }
}

/**
 * 段階名と元のエラーを保持するアップロード失敗。
 */
export class UploadError extends Error {
  readonly phase: UploadPhase;

  constructor(phase: UploadPhase, cause: unknown) {
    super(`${PHASE_DESCRIPTIONS[phase]}: ${describeError(cause)}`, { cause });
    this.name = 'UploadError';
    this.phase = phase;
  }
}

/**
 * ログ出力用にエラーを文字列化します。axios のエラーには HTTP ステータスを付けます。
 *
 * @param error 任意の throw された値。
 * @returns 表示用メッセージ。
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const statusCode = error.response?.status;
    return statusCode === undefined ? error.message : `${error.message} (status ${statusCode})`;
  }

  return error instanceof Error ? error.message : String(error);
}
