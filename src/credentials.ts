import fs from 'fs';
import { CookieJar } from 'tough-cookie';
import type { SessionCredentials, StoredCookie } from './types.js';

const COOKIE_ORIGIN = 'https://photos.google.com/';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, where: string): string {
  const value = source[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${where}: "${key}" must be a non-empty string`);
  }
  return value;
}

function readOptionalString(source: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${where}: "${key}" must be a string`);
  }
  return value;
}

function parseStoredCookies(value: unknown, where: string): StoredCookie[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`${where}: "cookies" must be a non-empty array`);
  }

  return value.map((entry: unknown, index) => {
    const entryWhere = `${where}: cookies[${index}]`;
    if (!isRecord(entry)) {
      throw new Error(`${entryWhere} must be an object`);
    }
    return {
      name: readString(entry, 'name', entryWhere),
      value: readOptionalString(entry, 'value', entryWhere) ?? '',
      domain: readOptionalString(entry, 'domain', entryWhere),
      path: readOptionalString(entry, 'path', entryWhere),
    };
  });
}

function toSetCookieString(cookie: StoredCookie): string {
  const parts = [`${cookie.name}=${cookie.value}`];
  parts.push(`Domain=${cookie.domain ?? '.google.com'}`);
  parts.push(`Path=${cookie.path ?? '/'}`);
  parts.push('Secure');
  return parts.join('; ');
}

/**
 * 保存済み Cookie から認証情報を組み立てます。
 *
 * @param cookies ブラウザからエクスポートした Cookie。
 * @param atToken ページに埋め込まれていた at トークン。
 * @param userId アカウントのユーザー ID。
 */
export async function createCredentials(cookies: StoredCookie[], atToken: string, userId: string): Promise<SessionCredentials> {
  const jar = new CookieJar();
  for (const cookie of cookies) {
    await jar.setCookie(toSetCookieString(cookie), COOKIE_ORIGIN);
  }

  return { jar, atToken, userId };
}

/**
 * JSON の認証情報ファイルを読み込みます。
 *
 * ```json
 * { "cookies": [{ "name": "SID", "value": "..." }], "atToken": "...", "userId": "..." }
 * ```
 *
 * @param filePath 認証情報ファイルのパス。
 * @returns Cookie を格納した認証情報。
 */
export async function loadCredentials(filePath: string): Promise<SessionCredentials> {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new Error(`Credentials file is not found: ${filePath}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${filePath}: invalid JSON (${message})`, { cause: error });
  }

  if (!isRecord(document)) {
    throw new Error(`${filePath}: the credentials must be a JSON object`);
  }

  const cookies = parseStoredCookies(document.cookies, filePath);
  return createCredentials(cookies, readString(document, 'atToken', filePath), readString(document, 'userId', filePath));
}
