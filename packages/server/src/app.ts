import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import busboy from 'busboy';
import * as fs from 'fs/promises';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import type {
  ApiResponse,
  MobileTokenPayload,
  PublicRecord,
  SaveResult,
  SettingsView,
} from '@lan-drop/shared';
import type { Gatekeeper, RequestInfo } from './auth.js';
import { normalizeDirectory } from './config.js';
import {
  DEFAULT_DOWNLOAD_DIR,
  LOG_TAGS,
  MAX_UPLOAD_LIMIT_BYTES,
  MIN_UPLOAD_LIMIT_BYTES,
  MULTIPART_OVERHEAD_BYTES,
  SESSION_COOKIE,
} from './constants.js';
import type { TransferCoordinator, TransferSettings } from './coordinator.js';
import {
  BadRequestError,
  IOFailureError,
  LimitExceededError,
  NotFoundError,
  TransferError,
} from './errors.js';
import { fileSize } from './files.js';
import type { PageRenderer, QrEncoder } from './page.js';
import type { TokenIssuer } from './pairing.js';
import type { TransferRecordStore } from './record-store.js';
import type { SessionStore } from './session-store.js';
import type { SettingsStore } from './settings.js';
import type { ShellOpener } from './shell.js';
import { logger } from './utils/logger.js';
import { normalizeIp } from './utils/network.js';
import type { Requester, TransferRecord } from './types.js';

const TAG = LOG_TAGS.HTTP;

export interface AppDeps {
  baseUrl: () => string;
  gatekeeper: Gatekeeper;
  sessions: SessionStore;
  tokens: TokenIssuer;
  records: TransferRecordStore;
  coordinator: TransferCoordinator;
  settings: TransferSettings;
  settingsStore: SettingsStore;
  shell: ShellOpener;
  renderer: PageRenderer;
  qrEncoder?: QrEncoder;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler by itself
function handle(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function requestInfo(req: Request): RequestInfo {
  const url = new URL(req.originalUrl, 'http://localhost');
  return {
    ip: req.socket.remoteAddress,
    headers: req.headers,
    query: url.searchParams,
  };
}

function ok<T>(res: Response<ApiResponse<T>>, data: T): void {
  res.json({ success: true, data });
}

function queryString(req: Request, name: string): string {
  const value = req.query[name];
  return typeof value === 'string' ? value : '';
}

function bodyField(req: Request, name: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const entry = Object.entries(body).find(([key]) => key === name);
  return entry?.[1];
}

function receiveUpload(
  req: Request,
  coordinator: TransferCoordinator,
  requester: Requester
): Promise<TransferRecord> {
  return new Promise((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers, limits: { files: 1 } });
    } catch {
      reject(new BadRequestError('Expected a multipart/form-data upload'));
      return;
    }

    let handled = false;
    const abort = (error: unknown) => {
      req.unpipe(parser);
      req.resume();
      reject(error);
    };

    parser.on('file', (fieldname, file, info) => {
      if (handled || fieldname !== 'file') {
        file.resume();
        return;
      }
      handled = true;
      coordinator.upload(requester, { fileName: info.filename ?? '', stream: file }).then(resolve, abort);
    });
    parser.on('close', () => {
      if (!handled) {
        reject(new BadRequestError('Missing file'));
      }
    });
    parser.on('error', abort);

    req.pipe(parser);
  });
}

export function createApp(deps: AppDeps): express.Express {
  const {
    gatekeeper,
    sessions,
    tokens,
    records,
    coordinator,
    settings,
    settingsStore,
    shell,
    renderer,
  } = deps;

  const app = express();
  app.disable('x-powered-by');
  app.use(express.json());

  app.use((req, _res, next) => {
    logger.debug(TAG, `${req.method} ${req.originalUrl} from ${normalizeIp(req.socket.remoteAddress)}`);
    next();
  });

  async function mobileTokenPayload(forceNew: boolean): Promise<MobileTokenPayload> {
    const issued = tokens.issue(forceNew);
    const mobileUrl = `${deps.baseUrl()}/?token=${encodeURIComponent(issued.token)}`;
    return {
      mobileUrl,
      mobileQrDataUrl: deps.qrEncoder ? await deps.qrEncoder(mobileUrl) : '',
      tokenExpiresAt: Math.floor(issued.expiresAt / 1000),
    };
  }

  function recordPath(id: string): string {
    const entry = records.getHistory(id);
    if (!entry) {
      throw new NotFoundError('Record does not exist');
    }
    const filePath = entry.filePath.trim();
    if (!filePath) {
      throw new BadRequestError('Record has no file path');
    }
    return filePath;
  }

  // Pairing page: exchanges the one-time token for a session cookie
  app.get('/', handle(async (req, res) => {
    const info = requestInfo(req);
    const ip = normalizeIp(info.ip);
    const token = queryString(req, 'token');
    const role = queryString(req, 'role');

    if (token) {
      const result = sessions.exchange(token, ip, gatekeeper.readSessionId(info));
      if (!result.success) {
        logger.warn(TAG, `Token exchange from ${ip} refused: ${result.error.reason}`);
        res.status(403).type('html').send(renderer.render({ role: 'denied', reason: result.error.message }));
        return;
      }
      res.cookie(SESSION_COOKIE, result.sessionId, { httpOnly: true, sameSite: 'lax' });
      res.type('html').send(renderer.render({ role: 'mobile', sessionId: result.sessionId }));
      return;
    }

    if (role === 'mobile') {
      const session = sessions.validate(gatekeeper.readSessionId(info), ip);
      if (!session) {
        res.status(403).type('html').send(renderer.render({
          role: 'denied',
          reason: 'Scan the QR code on the desktop again to get a new one-time token.',
        }));
        return;
      }
      res.type('html').send(renderer.render({ role: 'mobile', sessionId: session.id }));
      return;
    }

    if (!gatekeeper.isTrusted(info.ip)) {
      res.status(403).type('html').send(renderer.render({
        role: 'denied',
        reason: 'Unauthorized: scan the QR code shown on the desktop to sign in.',
      }));
      return;
    }

    const payload = await mobileTokenPayload(false);
    res.type('html').send(renderer.render({ role: 'desktop', ...payload }));
  }));

  app.get('/records', (req, res: Response<ApiResponse<{ records: PublicRecord[] }>>) => {
    const requester = gatekeeper.authenticate(requestInfo(req));
    const list = requester.isDesktop ? records.listPublic() : records.listPublic(requester.deviceId);
    ok(res, { records: list });
  });

  app.get('/settings', (req, res: Response<ApiResponse<SettingsView>>) => {
    gatekeeper.authenticate(requestInfo(req));
    ok(res, {
      maxUploadBytes: settings.maxUploadBytes,
      sessionTtlSeconds: sessions.ttlSeconds,
      downloadDir: settings.downloadDir,
      defaultDownloadDir: DEFAULT_DOWNLOAD_DIR,
    });
  });

  app.post('/settings/upload-limit', (req, res: Response<ApiResponse<{ maxUploadBytes: number }>>) => {
    gatekeeper.requireDesktop(requestInfo(req));

    const raw = bodyField(req, 'maxUploadBytes');
    const limit = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
    if (typeof limit !== 'number' || !Number.isInteger(limit)) {
      throw new BadRequestError('maxUploadBytes must be an integer');
    }
    if (limit < MIN_UPLOAD_LIMIT_BYTES || limit > MAX_UPLOAD_LIMIT_BYTES) {
      throw new BadRequestError('Upload limit must be between 1MB and 100GB');
    }

    settings.maxUploadBytes = limit;
    settingsStore.save({ maxUploadBytes: limit });
    logger.info(TAG, `Upload limit set to ${limit} bytes`);
    ok(res, { maxUploadBytes: limit });
  });

  app.post('/settings/download-dir', (req, res: Response<ApiResponse<{ downloadDir: string }>>) => {
    gatekeeper.requireDesktop(requestInfo(req));

    const raw = bodyField(req, 'downloadDir');
    const normalized = normalizeDirectory(typeof raw === 'string' ? raw : undefined);
    if (!normalized) {
      throw new BadRequestError('Download directory must be an absolute path');
    }

    settings.downloadDir = normalized;
    settingsStore.save({ downloadDir: normalized });
    logger.info(TAG, `Download directory set to ${normalized}`);
    ok(res, { downloadDir: normalized });
  });

  app.post('/settings/open-download-dir', handle(async (req, res: Response<ApiResponse<{ downloadDir: string }>>) => {
    gatekeeper.requireDesktop(requestInfo(req));

    const dir = path.resolve(settings.downloadDir);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new IOFailureError('Directory is unavailable', error);
    }
    try {
      await shell.openPath(dir);
    } catch (error) {
      throw new IOFailureError('Failed to open directory', error);
    }
    ok(res, { downloadDir: dir });
  }));

  app.post('/records/:id/open-folder', handle(async (req, res: Response<ApiResponse<{ folder: string }>>) => {
    gatekeeper.requireDesktop(requestInfo(req));

    const entryPath = recordPath(req.params.id);
    const isDirectory = await fs.stat(entryPath).then((s) => s.isDirectory(), () => false);
    const folder = isDirectory ? entryPath : path.dirname(entryPath);
    const folderExists = await fs.stat(folder).then((s) => s.isDirectory(), () => false);
    if (!folderExists) {
      throw new NotFoundError('Directory does not exist');
    }

    const isFile = (await fileSize(entryPath)) !== null;
    try {
      await (isFile ? shell.revealFile(entryPath) : shell.openPath(folder));
    } catch (error) {
      throw new IOFailureError('Failed to open directory', error);
    }
    ok(res, { folder });
  }));

  app.post('/records/:id/open-file', handle(async (req, res: Response<ApiResponse<{ file: string }>>) => {
    gatekeeper.requireDesktop(requestInfo(req));

    const entryPath = recordPath(req.params.id);
    if ((await fileSize(entryPath)) === null) {
      throw new NotFoundError('File does not exist');
    }
    try {
      await shell.openPath(entryPath);
    } catch (error) {
      throw new IOFailureError('Failed to open file', error);
    }
    ok(res, { file: entryPath });
  }));

  app.post('/upload-desktop-path', handle(async (req, res: Response<ApiResponse<{ record: PublicRecord }>>) => {
    const requester = gatekeeper.requireDesktop(requestInfo(req));

    const raw = bodyField(req, 'filePath');
    const record = await coordinator.uploadDesktopPath(requester, typeof raw === 'string' ? raw : '');
    ok(res, { record: records.toPublic(record, true) });
  }));

  app.post('/upload', handle(async (req, res: Response<ApiResponse<{ record: PublicRecord }>>) => {
    const requester = gatekeeper.authenticate(requestInfo(req));

    const declared = Number(req.headers['content-length']);
    if (Number.isFinite(declared) && declared > settings.maxUploadBytes + MULTIPART_OVERHEAD_BYTES) {
      throw new LimitExceededError(settings.maxUploadBytes);
    }

    const record = await receiveUpload(req, coordinator, requester);
    ok(res, { record: records.toPublic(record, requester.isDesktop) });
  }));

  app.get('/files/:id', handle(async (req, res) => {
    const requester = gatekeeper.authenticate(requestInfo(req));
    const ticket = await coordinator.download(requester, req.params.id);

    res.attachment(ticket.record.fileName);
    res.setHeader('Content-Length', String(ticket.size));
    await pipeline(ticket.open(), res);
    await ticket.complete();
  }));

  app.post('/files/:id/save', handle(async (req, res: Response<ApiResponse<SaveResult>>) => {
    const requester = gatekeeper.authenticate(requestInfo(req));
    const result = await coordinator.saveToFolder(requester, req.params.id);
    ok(res, result);
  }));

  app.get('/auth/mobile-token', handle(async (req, res: Response<ApiResponse<MobileTokenPayload>>) => {
    gatekeeper.requireDesktop(requestInfo(req));
    ok(res, await mobileTokenPayload(true));
  }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  app.use((req, res: Response<ApiResponse>) => {
    res.status(404).json({ success: false, error: `${req.method} ${req.path} does not exist` });
  });

  // Typed failures keep their status; anything else is a logged 500
  app.use((error: unknown, _req: Request, res: Response<ApiResponse>, _next: NextFunction) => {
    if (res.headersSent) {
      logger.warn(TAG, 'Response failed after headers were sent:', error);
      res.destroy();
      return;
    }
    if (error instanceof TransferError) {
      res.status(error.status).json({ success: false, error: error.message, code: error.code });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'Malformed JSON body', code: 'bad_request' });
      return;
    }
    logger.error(TAG, 'Unhandled error:', error);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
