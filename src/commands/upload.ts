import fs from 'fs/promises';
import path from 'path';
import { PHOTOS_CREDENTIALS_PATH } from '../config.js';
import { loadCredentials } from '../credentials.js';
import { describeError } from '../errors.js';
import { isMediaFile, isVideoFile } from '../media.js';
import { uploadRequestFromFile } from '../request.js';
import type { UploadArgs, UploadOutcome, SessionCredentials } from '../types.js';
import { UploadWorkflow } from '../uploader.js';
import type { UploadWorkflowOptions } from '../uploader.js';
import { clearProgress, logError, logInfo, logWarn, renderProgress } from '../utils/progress.js';

const VALUE_OPTIONS = ['--album-id', '--album-name', '--name', '--credentials'] as const;
type ValueOption = typeof VALUE_OPTIONS[number];

function isValueOption(value: string): value is ValueOption {
  return VALUE_OPTIONS.some(option => option === value);
}

/**
 * upload コマンド用の CLI 引数をパースします。
 *
 * @param args コマンド名以降の生の CLI 引数。
 * @returns 正規化した upload コマンドオプション。
 */
export function parseUploadArgs(args: string[]): UploadArgs {
  let filePathArg: string | null = null;
  const values = new Map<ValueOption, string>();
  let quietSuccess = false;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];

    if (arg === '--quiet-success') {
      quietSuccess = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const optionName = eq >= 0 ? arg.slice(0, eq) : arg;
    if (isValueOption(optionName)) {
      let value: string | undefined;
      if (eq >= 0) {
        value = arg.slice(eq + 1);
      } else {
        value = args[index + 1];
        index += 1;
      }
      if (!value || value.startsWith('--')) {
        throw new Error(`${optionName} requires a value.`);
      }
      values.set(optionName, value);
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown option for upload: ${arg}`);
    }

    if (filePathArg !== null) {
      throw new Error('Too many arguments for upload command.');
    }
    filePathArg = arg;
  }

  if (filePathArg === null) {
    throw new Error('upload requires a file path.');
  }

  const credentialsArg = values.get('--credentials');
  return {
    filePath: path.resolve(filePathArg),
    credentialsPath: credentialsArg === undefined ? PHOTOS_CREDENTIALS_PATH : path.resolve(credentialsArg),
    name: values.get('--name') ?? null,
    albumId: values.get('--album-id') ?? null,
    albumName: values.get('--album-name') ?? null,
    quietSuccess,
  };
}

/**
 * 1 つのファイルをアップロードし、結果をログに出力します。ファイルは終了時に閉じます。
 *
 * @param args パース済みの upload コマンドオプション。
 * @param credentials 省略時は args.credentialsPath から読み込みます。
 * @param options HTTP クライアントの差し替えなど。
 * @returns ワークフローの結果。
 */
export async function runUpload(args: UploadArgs, credentials?: SessionCredentials, options: UploadWorkflowOptions = {}): Promise<UploadOutcome> {
  const session = credentials ?? await loadCredentials(args.credentialsPath);

  if (!isMediaFile(args.filePath)) {
    logWarn(`Not a known photo or video extension, uploading anyway: ${args.filePath}`);
  }

  const handle = await fs.open(args.filePath, 'r');
  try {
    const request = await uploadRequestFromFile(handle, args.filePath, {
      ...(args.name !== null ? { name: args.name } : {}),
      ...(args.albumId !== null ? { albumId: args.albumId } : {}),
      ...(args.albumName !== null ? { albumName: args.albumName } : {}),
    });
    const workflow = new UploadWorkflow(request, session, {
      onProgress: args.quietSuccess ? undefined : (loaded, total) => renderProgress('upload', loaded, total),
      ...options,
    });

    if (!args.quietSuccess) {
      logInfo(`Uploading ${isVideoFile(args.filePath) ? 'video' : 'photo'}: ${args.filePath} (${workflow.request.byteLength} bytes)`);
    }

    let outcome: UploadOutcome;
    try {
      outcome = await workflow.upload();
    } finally {
      clearProgress('upload');
    }
    const { result, error } = outcome;

    if (!result.uploaded) {
      logError(`Failed: ${args.filePath} -> ${error === null ? 'unknown error' : describeError(error)}`);
      return outcome;
    }

    if (error !== null) {
      logError(`Uploaded with errors: ${args.filePath} -> ${describeError(error)}`);
    } else if (!args.quietSuccess) {
      logInfo(`Uploaded: ${args.filePath} -> ${result.urlString()}`);
    }
    if (result.albumId !== '' && !args.quietSuccess) {
      logInfo(`Created album: ${args.albumName ?? ''} -> ${result.albumId}`);
    }
    return outcome;
  } finally {
    await handle.close();
  }
}

/**
 * アップロード結果から終了コードを決めます。0 は成功、1 は未アップロード、2 は一部失敗です。
 */
export function exitCodeFor(outcome: UploadOutcome): number {
  if (!outcome.result.uploaded) {
    return 1;
  }
  return outcome.error === null ? 0 : 2;
}
