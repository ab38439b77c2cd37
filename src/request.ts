import path from 'path';
import type { FileHandle } from 'fs/promises';
import type { Readable } from 'stream';
import { ValidationError } from './errors.js';
import type { ResolvedUploadRequest, UploadRequest } from './types.js';
import { nowIso, nowMs } from './utils/time.js';

type UploadRequestExtras = Omit<UploadRequest, 'stream' | 'byteLength'>;

/**
 * 呼び出し側のストリームとサイズからアップロード要求を作ります。
 *
 * @param stream 画像のバイト列。
 * @param byteLength ストリームから読み出すバイト数。
 * @param extras 名前、撮影時刻、アルバム指定などの任意項目。
 */
export function createUploadRequest(stream: Readable, byteLength: number, extras: UploadRequestExtras = {}): UploadRequest {
  return { ...extras, stream, byteLength };
}

/**
 * 開いているファイルからアップロード要求を作ります。
 * サイズと更新時刻はファイルのメタデータから、名前はファイル名から取ります。
 * 作成したストリームはハンドルを閉じないため、ハンドルは呼び出し側で閉じてください。
 *
 * @param handle 読み取り用に開いたファイルハンドル。
 * @param filePath ハンドルを開いたパス。
 * @param extras アルバム指定などの任意項目。
 */
export async function uploadRequestFromFile(handle: FileHandle, filePath: string, extras: UploadRequestExtras = {}): Promise<UploadRequest> {
  const stat = await handle.stat();

  return {
    name: path.basename(filePath),
    timestamp: Math.floor(stat.mtimeMs),
    ...extras,
    stream: handle.createReadStream({ start: 0, autoClose: false }),
    byteLength: stat.size,
  };
}

/**
 * アップロード要求を検証し、未指定の項目を補完します。
 *
 * @throws {ValidationError} ストリームがない、またはサイズが正の整数でない場合。
 */
export function resolveUploadRequest(request: UploadRequest): ResolvedUploadRequest {
  const { stream, byteLength } = request;
  if (stream === null || stream === undefined) {
    throw new ValidationError('the stream of the upload request is missing');
  }
  if (!Number.isSafeInteger(byteLength) || byteLength <= 0) {
    throw new ValidationError(`the byte length of the upload request must be a positive integer: ${byteLength}`);
  }

  const timestamp = request.timestamp;
  return Object.freeze({
    stream,
    byteLength,
    name: request.name ? request.name : nowIso(),
    timestamp: timestamp !== undefined && Number.isFinite(timestamp) && timestamp >= 0 ? timestamp : nowMs(),
    albumId: request.albumId ? request.albumId : null,
    albumName: request.albumName ? request.albumName : null,
  });
}
