import { ALBUM_RPC_ID, ENABLE_PHOTO_RPC_ID, XSSI_PREFIX } from './constants.js';
import { WireFormatError } from './errors.js';
import type { EnabledPhoto, ResolvedUploadRequest } from './types.js';

type InlinedField = {
  inlined: {
    name: string;
    content: string;
    contentType: 'text/plain';
  };
};

type ExternalField = {
  external: {
    name: 'file';
    filename: string;
    put: Record<string, never>;
    size: number;
  };
};

/**
 * アップロード URL を要求するセッション作成リクエストの本文。
 */
export type UploadSessionRequest = {
  protocolVersion: '0.8';
  createSessionRequest: {
    fields: Array<ExternalField | InlinedField>;
  };
};

function inlined(name: string, content: string): InlinedField {
  return { inlined: { name, content, contentType: 'text/plain' } };
}

export function buildUploadSessionRequest(request: ResolvedUploadRequest, userId: string): UploadSessionRequest {
  return {
    protocolVersion: '0.8',
    createSessionRequest: {
      fields: [
        { external: { name: 'file', filename: request.name, put: {}, size: request.byteLength } },
        inlined('auto_create_album', 'camera_sync.active'),
        inlined('auto_downsize', 'true'),
        inlined('storage_policy', 'use_manual_setting'),
        inlined('disable_asbe_notification', 'true'),
        inlined('client', 'photosweb'),
        inlined('effective_id', userId),
        inlined('owner_name', userId),
        inlined('timestamp_ms', String(request.timestamp)),
      ],
    },
  };
}

function parseBody(body: unknown): unknown {
  if (typeof body !== 'string') {
    return body;
  }

  const text = body.startsWith(XSSI_PREFIX) ? body.slice(XSSI_PREFIX.length) : body;
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new WireFormatError(`the response body is not JSON (${error instanceof Error ? error.message : String(error)})`);
  }
}

/**
 * オブジェクトのキーと配列の添字をたどって値を取り出します。途中で見つからなければ undefined です。
 */
function dig(value: unknown, ...keys: Array<string | number>): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) {
        return undefined;
      }
      current = current[key];
      continue;
    }
    if (typeof current !== 'object' || current === null || Array.isArray(current)) {
      return undefined;
    }
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new WireFormatError(`${field} not found in the response`);
  }
  return value;
}

export function readUploadUrl(body: unknown): string {
  const url = dig(parseBody(body), 'sessionStatus', 'externalFieldTransfers', 0, 'putInfo', 'url');
  return requireString(url, 'upload url');
}

export function readUploadToken(body: unknown): string {
  const token = dig(
    parseBody(body),
    'sessionStatus',
    'additionalInfo',
    'uploader_service.GoogleRupioAdditionalInfo',
    'completionInfo',
    'customerSpecificInfo',
    'upload_token_base64',
  );
  return requireString(token, 'upload token');
}

/**
 * ミューテーションの f.req と at トークンをフォーム形式にエンコードします。
 */
export function encodeMutation(rpcId: number, args: unknown, atToken: string): string {
  const freq = [['af.maf', [['af.add', rpcId, [{ [String(rpcId)]: args }]]]]];
  const form = new URLSearchParams();
  form.set('f.req', JSON.stringify(freq));
  form.set('at', atToken);
  return form.toString();
}

export function buildEnablePhotoMutation(token: string, request: ResolvedUploadRequest, atToken: string): string {
  return encodeMutation(ENABLE_PHOTO_RPC_ID, [[[token, request.name, request.timestamp]]], atToken);
}

export function buildMoveToAlbumMutation(mediaKey: string, albumId: string, atToken: string): string {
  return encodeMutation(ALBUM_RPC_ID, [[mediaKey], albumId], atToken);
}

export function buildCreateAlbumMutation(mediaKey: string, albumName: string, atToken: string): string {
  return encodeMutation(ALBUM_RPC_ID, [[mediaKey], null, albumName], atToken);
}

function findRpcPayload(value: unknown, key: string): unknown {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findRpcPayload(item, key);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }

  if (typeof value === 'object' && value !== null) {
    const own = Object.getOwnPropertyDescriptor(value, key);
    if (own !== undefined) {
      return own.value;
    }
    for (const item of Object.values(value)) {
      const found = findRpcPayload(item, key);
      if (found !== undefined) {
        return found;
      }
    }
  }

  return undefined;
}

/**
 * ミューテーション応答から指定した RPC ID のペイロードを取り出します。
 *
 * @throws {WireFormatError} 応答が JSON でない、またはペイロードが見つからない場合。
 */
export function readMutationPayload(body: unknown, rpcId: number): unknown {
  const payload = findRpcPayload(parseBody(body), String(rpcId));
  if (payload === undefined) {
    throw new WireFormatError(`payload of rpc ${rpcId} not found in the response`);
  }
  return payload;
}

/**
 * 有効化の応答から画像 URL と、あればアルバム操作用のメディアキーを取り出します。
 */
export function readEnabledPhoto(body: unknown): EnabledPhoto {
  const item = dig(readMutationPayload(body, ENABLE_PHOTO_RPC_ID), 0, 0);
  const imageUrl = requireString(dig(item, 1, 0), 'image url');
  const mediaKey = dig(item, 0);
  return {
    mediaKey: typeof mediaKey === 'string' && mediaKey.length > 0 ? mediaKey : null,
    imageUrl,
  };
}

/**
 * アルバム操作に必要なメディアキーを取り出します。
 *
 * @throws {WireFormatError} 有効化の応答にメディアキーがなかった場合。
 */
export function requireMediaKey(photo: EnabledPhoto): string {
  return requireString(photo.mediaKey, 'media key');
}

export function readCreatedAlbumId(body: unknown): string {
  return requireString(dig(readMutationPayload(body, ALBUM_RPC_ID), 0), 'album id');
}
