import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

/**
 * セッション Cookie と at トークンを保存した認証情報ファイルのパス。
 */
export const PHOTOS_CREDENTIALS_PATH = path.resolve(process.env.PHOTOS_CREDENTIALS_PATH ?? 'credentials.json');
/**
 * 複数アカウントでログインしている場合に使うアカウント番号（authuser クエリ）。
 */
export const PHOTOS_AUTH_USER = process.env.PHOTOS_AUTH_USER ?? '0';
/**
 * ブラウザセッションを再現するための User-Agent。
 */
export const PHOTOS_USER_AGENT = process.env.PHOTOS_USER_AGENT
  ?? 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
