import type { Readable } from 'stream';
import type { CookieJar } from 'tough-cookie';
import type { UploadError } from './errors.js';
import type { UploadResult } from './result.js';

/**
 * 呼び出し側が組み立てるアップロード要求。
 */
export type UploadRequest = {
  /** 画像のバイト列を読み出すストリーム。クローズは呼び出し側の責任です。 */
  stream?: Readable | null;
  byteLength: number;
  name?: string;
  /** 撮影時刻（UNIX エポックからのミリ秒）。 */
  timestamp?: number;
  /** 既存アルバムの ID。指定するとアップロード後にそのアルバムへ移動します。 */
  albumId?: string;
  /** 新規作成するアルバムの名前。 */
  albumName?: string;
};

/**
 * 検証とデフォルト値の補完が済んだアップロード要求。
 */
export type ResolvedUploadRequest = Readonly<{
  stream: Readable;
  byteLength: number;
  name: string;
  timestamp: number;
  albumId: string | null;
  albumName: string | null;
}>;

/**
 * リクエストごとに送るブラウザセッションの認証情報。
 */
export type SessionCredentials = {
  jar: CookieJar;
  /** ページに埋め込まれている at トークン。ミューテーションに必須です。 */
  atToken: string;
  userId: string;
};

/**
 * 認証情報ファイルに保存する Cookie 1 件。
 */
export type StoredCookie = {
  name: string;
  value: string;
  domain?: string;
  path?: string;
};

/**
 * アップロードの結果とエラー。error が非 null でも result.uploaded が true の場合があります。
 */
export type UploadOutcome = {
  result: UploadResult;
  error: UploadError | null;
};

/**
 * 転送済みバイト数の通知。
 */
export type ProgressCallback = (loaded: number, total: number) => void;

/**
 * 有効化リクエストで得られる写真の情報。
 */
export type EnabledPhoto = {
  /** アルバム操作で写真を指定するための ID。応答に含まれない場合は null。 */
  mediaKey: string | null;
  imageUrl: string;
};

/**
 * CLI の進捗表示レンダリングで使用する進捗状態。
 */
export type ProgressState = {
  label: string;
  current: number;
  total: number;
  elapsedText: string;
  etaText: string;
};

/**
 * upload コマンド用にパース済みの CLI 引数。
 */
export type UploadArgs = {
  filePath: string;
  credentialsPath: string;
  name: string | null;
  albumId: string | null;
  albumName: string | null;
  quietSuccess: boolean;
};
