import type { AxiosInstance } from 'axios';
import { ALBUM_RPC_ID, MUTATE_URL, UPLOAD_SESSION_URL } from './constants.js';
import { PHOTOS_AUTH_USER } from './config.js';
import type { EnabledPhoto, ProgressCallback, ResolvedUploadRequest, SessionCredentials } from './types.js';
import {
  buildCreateAlbumMutation,
  buildEnablePhotoMutation,
  buildMoveToAlbumMutation,
  buildUploadSessionRequest,
  readCreatedAlbumId,
  readEnabledPhoto,
  readMutationPayload,
  readUploadToken,
  readUploadUrl,
} from './wire.js';

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded;charset=UTF-8';

async function postMutation(client: AxiosInstance, body: string): Promise<unknown> {
  const response = await client.post<string>(MUTATE_URL, body, {
    params: { authuser: PHOTOS_AUTH_USER },
    headers: { 'Content-Type': FORM_CONTENT_TYPE },
    responseType: 'text',
  });
  return response.data;
}

/**
 * アップロードセッションを作成し、バイト列の送信先 URL を受け取ります。
 */
export async function requestUploadUrl(client: AxiosInstance, request: ResolvedUploadRequest, credentials: SessionCredentials): Promise<string> {
  const response = await client.post<unknown>(UPLOAD_SESSION_URL, buildUploadSessionRequest(request, credentials.userId), {
    params: { authuser: PHOTOS_AUTH_USER },
    headers: {
      'X-GUploader-Client-Info': 'mechanism=scotty xhr resumable; clientVersion=156351954',
    },
  });
  return readUploadUrl(response.data);
}

/**
 * ストリームの内容を送信先 URL へ一度だけ流し込み、アップロードトークンを受け取ります。
 * ストリームは閉じません。
 */
export async function transferBytes(
  client: AxiosInstance,
  uploadUrl: string,
  request: ResolvedUploadRequest,
  onProgress?: ProgressCallback,
): Promise<string> {
  const response = await client.post<unknown>(uploadUrl, request.stream, {
    headers: {
      'Content-Type': 'application/octet-stream',
      'Content-Length': String(request.byteLength),
      'X-GUploader-No-308': 'yes',
    },
    onUploadProgress: event => {
      onProgress?.(event.loaded, event.total ?? request.byteLength);
    },
  });
  return readUploadToken(response.data);
}

/**
 * アップロードトークンで写真を有効化し、画像 URL とアルバム操作用の ID を受け取ります。
 */
export async function enablePhoto(
  client: AxiosInstance,
  token: string,
  request: ResolvedUploadRequest,
  credentials: SessionCredentials,
): Promise<EnabledPhoto> {
  const body = await postMutation(client, buildEnablePhotoMutation(token, request, credentials.atToken));
  return readEnabledPhoto(body);
}

/**
 * 写真を既存のアルバムへ移動します。応答にアルバム RPC のペイロードがなければ失敗とみなします。
 */
export async function moveToAlbum(client: AxiosInstance, mediaKey: string, albumId: string, credentials: SessionCredentials): Promise<void> {
  const body = await postMutation(client, buildMoveToAlbumMutation(mediaKey, albumId, credentials.atToken));
  readMutationPayload(body, ALBUM_RPC_ID);
}

/**
 * 新しいアルバムを作成して写真を追加します。
 *
 * @returns 作成されたアルバムの ID。
 */
export async function createAlbum(client: AxiosInstance, mediaKey: string, albumName: string, credentials: SessionCredentials): Promise<string> {
  const body = await postMutation(client, buildCreateAlbumMutation(mediaKey, albumName, credentials.atToken));
  return readCreatedAlbumId(body);
}
