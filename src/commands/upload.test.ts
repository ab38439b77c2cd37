import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { PHOTOS_CREDENTIALS_PATH } from '../config.js';
import { createCredentials } from '../credentials.js';
import { createHttpClient } from '../http.js';
import { createAlbumReply, createFakePhotosService } from '../testing/fake-photos-service.js';
import type { FakeReply, FakeStep } from '../testing/fake-photos-service.js';
import type { SessionCredentials, UploadArgs } from '../types.js';
import { exitCodeFor, parseUploadArgs, runUpload } from './upload.js';

describe('parseUploadArgs', () => {
  it('uses the configured credentials path by default', () => {
    expect(parseUploadArgs(['photo.jpg'])).toEqual({
      filePath: path.resolve('photo.jpg'),
      credentialsPath: PHOTOS_CREDENTIALS_PATH,
      name: null,
      albumId: null,
      albumName: null,
      quietSuccess: false,
    });
  });

  it('accepts options before and after the file, with or without =', () => {
    const args = parseUploadArgs(['--album-id', 'album-1', 'photo.jpg', '--album-name=Trip 2024', '--name', 'Beach', '--credentials=alt.json', '--quiet-success']);

    expect(args).toEqual({
      filePath: path.resolve('photo.jpg'),
      credentialsPath: path.resolve('alt.json'),
      name: 'Beach',
      albumId: 'album-1',
      albumName: 'Trip 2024',
      quietSuccess: true,
    });
  });

  it('rejects a missing file', () => {
    expect(() => parseUploadArgs(['--quiet-success'])).toThrow('upload requires a file path.');
  });

  it('rejects a second file', () => {
    expect(() => parseUploadArgs(['a.jpg', 'b.jpg'])).toThrow('Too many arguments for upload command.');
  });

  it('rejects an option without its value', () => {
    expect(() => parseUploadArgs(['a.jpg', '--album-id'])).toThrow('--album-id requires a value.');
    expect(() => parseUploadArgs(['a.jpg', '--album-name', '--quiet-success'])).toThrow('--album-name requires a value.');
  });

  it('rejects unknown options', () => {
    expect(() => parseUploadArgs(['a.jpg', '--retry'])).toThrow('Unknown option for upload: --retry');
  });
});

describe('runUpload', () => {
  let dir: string;
  let credentials: SessionCredentials;
  let stdout: MockInstance;
  let stderr: MockInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'photos-cli-'));
    credentials = await createCredentials([{ name: 'SID', value: 'test-sid' }], 'test-at-token', 'user-1');
    stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function upload(fileName: string, replies: Partial<Record<FakeStep, FakeReply | Error>> = {}, extra: Partial<UploadArgs> = {}) {
    const filePath = path.join(dir, fileName);
    await fs.writeFile(filePath, 'abcd');
    const service = createFakePhotosService(replies);
    const client = createHttpClient(credentials, { adapter: service.adapter });
    const args: UploadArgs = {
      filePath,
      credentialsPath: path.join(dir, 'unused.json'),
      name: null,
      albumId: null,
      albumName: null,
      quietSuccess: false,
      ...extra,
    };
    const outcome = await runUpload(args, credentials, { client });
    return { filePath, outcome, service };
  }

  it('uploads the file and prints its url', async () => {
    const { filePath, outcome, service } = await upload('pic.jpg');

    expect(outcome.error).toBeNull();
    expect(exitCodeFor(outcome)).toBe(0);
    expect(JSON.parse(String(service.calls[0].config.data)).createSessionRequest.fields[0]).toEqual({
      external: { name: 'file', filename: 'pic.jpg', put: {}, size: 4 },
    });
    expect(service.calls[1].body?.toString()).toBe('abcd');
    expect(stdout).toHaveBeenCalledWith(`Uploading photo: ${filePath} (4 bytes)\n`);
    expect(stdout).toHaveBeenCalledWith(`Uploaded: ${filePath} -> https://lh3.googleusercontent.com/default-image\n`);
    expect(stderr).not.toHaveBeenCalled();
  });

  it('uses the name option instead of the file name', async () => {
    const { service } = await upload('pic.jpg', {}, { name: 'Renamed' });

    expect(JSON.parse(String(service.calls[0].config.data)).createSessionRequest.fields[0].external.filename).toBe('Renamed');
  });

  it('warns about an unknown extension and still uploads', async () => {
    const { filePath, outcome } = await upload('notes.txt');

    expect(outcome.result.uploaded).toBe(true);
    expect(stderr).toHaveBeenCalledWith(`[WARNING] Not a known photo or video extension, uploading anyway: ${filePath}\n`);
  });

  it('exits with 1 when nothing was uploaded', async () => {
    const { filePath, outcome } = await upload('pic.jpg', { session: new Error('down') });

    expect(exitCodeFor(outcome)).toBe(1);
    expect(stderr).toHaveBeenCalledWith(`Failed: ${filePath} -> can't get an upload url: down\n`);
  });

  it('exits with 2 when the album could not be created', async () => {
    const { filePath, outcome } = await upload('pic.jpg', { create: new Error('nope') }, { albumName: 'Trip' });

    expect(exitCodeFor(outcome)).toBe(2);
    expect(stderr).toHaveBeenCalledWith(`Uploaded with errors: ${filePath} -> can't create the album: nope\n`);
  });

  it('stays quiet on success with --quiet-success', async () => {
    const { outcome } = await upload('clip.mp4', { create: createAlbumReply('ALBUM123') }, { albumName: 'Trip', quietSuccess: true });

    expect(outcome.result.albumId).toBe('ALBUM123');
    expect(stdout).not.toHaveBeenCalled();
  });
});
