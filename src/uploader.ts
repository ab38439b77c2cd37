import type { AxiosInstance } from 'axios';
import { UploadError } from './errors.js';
import { createHttpClient } from './http.js';
import { getImageIdFromUrl } from './image-url.js';
import { createAlbum, enablePhoto, moveToAlbum, requestUploadUrl, transferBytes } from './photos-api.js';
import { resolveUploadRequest } from './request.js';
import { requireMediaKey } from './wire.js';
import { UploadResult } from './result.js';
import type {
  EnabledPhoto,
  ProgressCallback,
  ResolvedUploadRequest,
  SessionCredentials,
  UploadOutcome,
  UploadRequest,
} from './types.js';
import { logWarn } from './utils/progress.js';

export type UploadWorkflowOptions = {
  /** 省略時は認証情報から {@link createHttpClient} で作ります。 */
  client?: AxiosInstance;
  onProgress?: ProgressCallback;
};

/**
 * 1 枚の写真のアップロード。インスタンスは使い捨てで、{@link UploadWorkflow.upload} は一度しか呼べません。
 */
export class UploadWorkflow {
  readonly request: ResolvedUploadRequest;
  private readonly credentials: SessionCredentials;
  private readonly client: AxiosInstance;
  private readonly onProgress: ProgressCallback | undefined;
  private started = false;

  /**
   * @throws {ValidationError} ストリームがない、またはサイズが正でない場合。通信は行いません。
   */
  constructor(request: UploadRequest, credentials: SessionCredentials, options: UploadWorkflowOptions = {}) {
    this.request = resolveUploadRequest(request);
    this.credentials = credentials;
    this.client = options.client ?? createHttpClient(credentials);
    this.onProgress = options.onProgress;
  }

  /**
   * アップロード URL の取得、バイト列の送信、写真の有効化、アルバム操作を順に行います。
   * 通信の失敗では reject せず、失敗した段階を {@link UploadError} として返します。
   * result.uploaded が true ならエラーがあってもファイルはサーバーに保存されています。
   */
  async upload(): Promise<UploadOutcome> {
    if (this.started) {
      throw new Error('UploadWorkflow.upload() can only be called once; create a new workflow for each upload');
    }
    this.started = true;

    const { client, credentials, request } = this;

    let uploadUrl: string;
    try {
      uploadUrl = await requestUploadUrl(client, request, credentials);
    } catch (error) {
      return { result: new UploadResult(false), error: new UploadError('request-upload-url', error) };
    }

    let token: string;
    try {
      token = await transferBytes(client, uploadUrl, request, this.onProgress);
    } catch (error) {
      return { result: new UploadResult(false), error: new UploadError('transfer-bytes', error) };
    }

    // ここから先はバイト列がサーバーに保存済み
    let photo: EnabledPhoto;
    try {
      photo = await enablePhoto(client, token, request, credentials);
    } catch (error) {
      logWarn('The file has been uploaded, but the image url in the reply was not found. The image may not appear.');
      return { result: new UploadResult(true), error: new UploadError('enable-photo', error) };
    }

    let imageId: string;
    try {
      imageId = getImageIdFromUrl(photo.imageUrl);
    } catch (error) {
      logWarn(`The file has been uploaded, but the image url does not contain its id: ${photo.imageUrl}`);
      return { result: new UploadResult(true, '', photo.imageUrl), error: new UploadError('parse-image-id', error) };
    }

    let moveError: UploadError | null = null;
    if (request.albumId !== null) {
      try {
        await moveToAlbum(client, requireMediaKey(photo), request.albumId, credentials);
      } catch (error) {
        moveError = new UploadError('move-to-album', error);
        logWarn(`The file has been uploaded, but it was not moved into album ${request.albumId}: ${moveError.message}`);
      }
    }

    let albumId = '';
    if (request.albumName !== null) {
      try {
        albumId = await createAlbum(client, requireMediaKey(photo), request.albumName, credentials);
      } catch (error) {
        logWarn(`The file has been uploaded, but the album "${request.albumName}" has not been created.`);
        return { result: new UploadResult(true, imageId, photo.imageUrl), error: new UploadError('create-album', error) };
      }
    }

    return { result: new UploadResult(true, imageId, photo.imageUrl, albumId), error: moveError };
  }
}

/**
 * ワークフローを作成して一度だけ実行します。
 *
 * @throws {ValidationError} アップロード要求が不正な場合。
 */
export async function uploadPhoto(request: UploadRequest, credentials: SessionCredentials, options: UploadWorkflowOptions = {}): Promise<UploadOutcome> {
  return new UploadWorkflow(request, credentials, options).upload();
}
