import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ReadableStream } from 'stream/web';
import { CommandResult, CommandRunner } from '../src/utils/processRunner';
import { SessionStore, valueOf } from '../src/utils/SessionStore';
import { GoogleDriveHandler, parseDriveId } from '../src/download/handlers/GoogleDriveHandler';
import {
  CLIENT_SECRETS_FILENAME,
  CREDENTIALS_FILENAME,
  DriveCredentialsSchema,
  GoogleDriveApi,
  isTokenExpired,
} from '../src/download/handlers/GoogleDriveApi';
import { SourceId } from '../src/download/core/types';

const FILE_URL = 'https://drive.google.com/file/d/FILE1/view?usp=sharing';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function brokenBody(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('partial'));
      controller.error(new Error('socket hang up'));
    },
  });
}

describe('parseDriveId', () => {
  it('should recognise file links', () => {
    expect(parseDriveId('https://drive.google.com/file/d/1AbC_d-E/view?usp=sharing')).toEqual({
      id: '1AbC_d-E',
      kind: 'file',
    });
    expect(parseDriveId('https://drive.google.com/open?id=XYZ')).toEqual({ id: 'XYZ', kind: 'file' });
    expect(parseDriveId('https://drive.google.com/uc?export=download&id=XYZ')).toEqual({ id: 'XYZ', kind: 'file' });
  });

  it('should recognise folder links before file links', () => {
    expect(parseDriveId('https://drive.google.com/drive/folders/FOLD123?usp=sharing')).toEqual({
      id: 'FOLD123',
      kind: 'folder',
    });
    expect(parseDriveId('https://drive.google.com/folderview?id=FOLD123')).toEqual({ id: 'FOLD123', kind: 'folder' });
  });

  it('should return null for links without an id', () => {
    expect(parseDriveId('https://drive.google.com/drive/my-drive')).toBeNull();
  });
});

describe('isTokenExpired', () => {
  const now = Date.parse('2024-06-01T12:00:00.000Z');

  it('should treat missing tokens and expiries as expired', () => {
    expect(isTokenExpired({ refresh_token: 'test-refresh' }, now)).toBe(true);
    expect(isTokenExpired({ refresh_token: 'test-refresh', access_token: 'token' }, now)).toBe(true);
  });

  it('should refresh a minute before expiry', () => {
    const base = { refresh_token: 'test-refresh', access_token: 'token' };
    expect(isTokenExpired({ ...base, token_expiry: '2024-06-01T12:00:30.000Z' }, now)).toBe(true);
    expect(isTokenExpired({ ...base, token_expiry: '2024-06-01T14:00:00.000Z' }, now)).toBe(false);
    expect(isTokenExpired({ ...base, token_expiry: 'not a date' }, now)).toBe(true);
  });
});

describe('GoogleDriveHandler', () => {
  let root: string;
  let destination: string;
  let store: SessionStore;
  let runner: jest.Mock<Promise<CommandResult>, Parameters<CommandRunner>>;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'drive-'));
    destination = path.join(root, 'out');
    store = new SessionStore(path.join(root, 'sessions'));
    runner = jest.fn<Promise<CommandResult>, Parameters<CommandRunner>>(async () => ({ stdout: '', stderr: '' }));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  function createHandler(): GoogleDriveHandler {
    return new GoogleDriveHandler({
      store,
      runner,
      gdownPath: '/opt/bin/gdown',
      retry: { attempts: 2, delayMs: 0 },
      api: new GoogleDriveApi(store, path.join(root, CLIENT_SECRETS_FILENAME)),
    });
  }

  describe('public downloads', () => {
    it('should fetch a public file with gdown into the destination directory', async () => {
      const outcome = await createHandler().download(FILE_URL, destination, {});

      expect(outcome).toEqual({ sourceId: SourceId.GOOGLE_DRIVE, url: FILE_URL, location: destination });
      expect(runner).toHaveBeenCalledWith('/opt/bin/gdown', ['--fuzzy', FILE_URL, '-O', `${destination}/`], {
        timeoutMs: 0,
      });
    });

    it('should fetch a folder by its canonical URL', async () => {
      const url = 'https://drive.google.com/drive/u/0/folders/FOLD123?usp=sharing';

      await createHandler().download(url, destination, { method: 'authenticated' });

      expect(runner).toHaveBeenCalledWith(
        '/opt/bin/gdown',
        ['--folder', 'https://drive.google.com/drive/folders/FOLD123', '-O', destination],
        { timeoutMs: 0 },
      );
    });

    it('should reject links without an id', async () => {
      await expect(
        createHandler().download('https://drive.google.com/drive/my-drive', destination, {}),
      ).rejects.toMatchObject({
        kind: 'invalid_input',
        message: 'Invalid GoogleDrive link: no content id in https://drive.google.com/drive/my-drive',
      });
      expect(runner).not.toHaveBeenCalled();
    });
  });

  describe('authenticated downloads', () => {
    async function saveSecrets(): Promise<void> {
      await store.writeJson(SourceId.GOOGLE_DRIVE, CLIENT_SECRETS_FILENAME, {
        installed: { client_id: 'test-client', client_secret: 'test-secret' },
      });
    }

    async function saveCredentials(tokenExpiry: string): Promise<void> {
      await store.writeJson(SourceId.GOOGLE_DRIVE, CREDENTIALS_FILENAME, {
        access_token: 'old-token',
        refresh_token: 'test-refresh',
        token_expiry: tokenExpiry,
      });
    }

    it('should refresh an expired token and save the file under its Drive name', async () => {
      await saveSecrets();
      await saveCredentials('2000-01-01T00:00:00.000Z');
      const fetchSpy = jest
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(jsonResponse({ access_token: 'new-token', expires_in: 3600 }))
        .mockResolvedValueOnce(jsonResponse({ name: 'report.pdf' }))
        .mockResolvedValueOnce(new Response('file-bytes', { status: 200 }));

      const outcome = await createHandler().download(FILE_URL, destination, { method: 'authenticated' });

      const target = path.join(destination, 'report.pdf');
      expect(outcome.location).toBe(target);
      await expect(fs.readFile(target, 'utf-8')).resolves.toBe('file-bytes');

      expect(fetchSpy).toHaveBeenCalledTimes(3);
      expect(fetchSpy.mock.calls[0][0]).toBe('https://oauth2.googleapis.com/token');
      const form = new URLSearchParams(String(fetchSpy.mock.calls[0][1]?.body));
      expect(form.get('refresh_token')).toBe('test-refresh');
      expect(form.get('client_id')).toBe('test-client');
      expect(form.get('grant_type')).toBe('refresh_token');
      expect(fetchSpy.mock.calls[1][0]).toBe(
        'https://www.googleapis.com/drive/v3/files/FILE1?fields=name,originalFilename&supportsAllDrives=true',
      );
      expect(fetchSpy.mock.calls[1][1]?.headers).toEqual({ Authorization: 'Bearer new-token' });
      expect(fetchSpy.mock.calls[2][0]).toBe('https://www.googleapis.com/drive/v3/files/FILE1?alt=media&supportsAllDrives=true');

      const saved = valueOf(await store.readJson(SourceId.GOOGLE_DRIVE, CREDENTIALS_FILENAME, DriveCredentialsSchema));
      expect(saved?.access_token).toBe('new-token');
      expect(saved?.refresh_token).toBe('test-refresh');
    });

    it('should use a token that has not expired', async () => {
      await saveSecrets();
      await saveCredentials('2999-01-01T00:00:00.000Z');
      const fetchSpy = jest
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(jsonResponse({ originalFilename: 'notes.txt' }))
        .mockResolvedValueOnce(new Response('notes', { status: 200 }));

      const outcome = await createHandler().download(FILE_URL, destination, { method: 'authenticated' });

      expect(outcome.location).toBe(path.join(destination, 'notes.txt'));
      expect(fetchSpy).toHaveBeenCalledTimes(2);
      expect(fetchSpy.mock.calls[0][1]?.headers).toEqual({ Authorization: 'Bearer old-token' });
    });

    it('should read client secrets from the fallback path', async () => {
      await fs.writeFile(
        path.join(root, CLIENT_SECRETS_FILENAME),
        JSON.stringify({ web: { client_id: 'test-client', client_secret: 'test-secret' } }),
      );
      await saveCredentials('2999-01-01T00:00:00.000Z');
      jest
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(jsonResponse({ name: 'a.bin' }))
        .mockResolvedValueOnce(new Response('a', { status: 200 }));

      const outcome = await createHandler().download(FILE_URL, destination, { method: 'authenticated' });

      expect(outcome.location).toBe(path.join(destination, 'a.bin'));
    });

    it('should require client secrets', async () => {
      const fetchSpy = jest.spyOn(globalThis, 'fetch');

      await expect(createHandler().download(FILE_URL, destination, { method: 'authenticated' })).rejects.toMatchObject({
        kind: 'auth_required',
      });
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('should require saved credentials', async () => {
      await saveSecrets();
      const fetchSpy = jest.spyOn(globalThis, 'fetch');

      const error = await createHandler()
        .download(FILE_URL, destination, { method: 'authenticated' })
        .catch((e: unknown) => e);

      expect(error).toMatchObject({ kind: 'auth_required' });
      expect(error instanceof Error && error.message.startsWith('No saved Google Drive credentials.')).toBe(true);
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('should fail with auth_required when the refresh token is rejected', async () => {
      await saveSecrets();
      await saveCredentials('2000-01-01T00:00:00.000Z');
      jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(jsonResponse({ error: 'invalid_grant' }, 400));

      await expect(createHandler().download(FILE_URL, destination, { method: 'authenticated' })).rejects.toMatchObject({
        kind: 'auth_required',
        message: 'Stored Google Drive credentials are invalid (HTTP 400)',
      });
    });

    it('should report a file that is missing or not shared without retrying', async () => {
      await saveSecrets();
      await saveCredentials('2999-01-01T00:00:00.000Z');
      const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({}, 404));

      await expect(createHandler().download(FILE_URL, destination, { method: 'authenticated' })).rejects.toMatchObject({
        kind: 'invalid_input',
        message: 'Google Drive file FILE1 not found or not shared with this account',
      });
      expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it('should remove the partial file when the transfer breaks', async () => {
      await saveSecrets();
      await saveCredentials('2999-01-01T00:00:00.000Z');
      jest
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(jsonResponse({ name: 'big.bin' }))
        .mockResolvedValueOnce(new Response(brokenBody(), { status: 200 }))
        .mockResolvedValueOnce(jsonResponse({ name: 'big.bin' }))
        .mockResolvedValueOnce(new Response(brokenBody(), { status: 200 }));

      await expect(createHandler().download(FILE_URL, destination, { method: 'authenticated' })).rejects.toMatchObject({
        kind: 'transient_io',
      });
      await expect(fs.readdir(destination)).resolves.toEqual([]);
    });

    it('should retry server errors', async () => {
      await saveSecrets();
      await saveCredentials('2999-01-01T00:00:00.000Z');
      const fetchSpy = jest
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(new Response('unavailable', { status: 503, statusText: 'Service Unavailable' }))
        .mockResolvedValueOnce(jsonResponse({ name: 'b.bin' }))
        .mockResolvedValueOnce(new Response('b', { status: 200 }));

      const outcome = await createHandler().download(FILE_URL, destination, { method: 'authenticated' });

      expect(outcome.location).toBe(path.join(destination, 'b.bin'));
      expect(fetchSpy).toHaveBeenCalledTimes(3);
    });
  });
});
