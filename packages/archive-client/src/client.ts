import { randomUUID } from 'node:crypto';
import { createWriteStream, promises as fs } from 'node:fs';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import * as tar from 'tar';
import { z } from 'zod';

import {
  filtersToSearchParams,
  normalizeTimestamp,
  parseFlatRecord,
  parseRecordInput,
  toFlatRecord,
  type CalibrationQueryFilters,
  type CalibrationRecord,
  type CalibrationRecordInput,
  type RemoteAddResult,
  type RemoteArchive,
  type RemoteDownloadOptions
} from '@calvault/calibration-store';

import { ArchiveClientError, ArchiveFormatError } from './errors';
import type { ArchiveClientOptions } from './types';

type QueryParams = Record<string, string | undefined>;

interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
  accept?: string;
  idempotencyKey?: string;
}

const queryEnvelopeSchema = z.object({ data: z.array(z.record(z.unknown())) });
const lastUpdatedEnvelopeSchema = z.object({ data: z.object({ lastUpdated: z.string().nullable() }) });
const addEnvelopeSchema = z.object({ data: z.object({ added: z.number().int().nonnegative() }) });
const errorPayloadSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
    details: z.unknown().optional()
  })
});

async function resolveToken(token?: ArchiveClientOptions['token']): Promise<string | null> {
  if (!token) {
    return null;
  }
  if (typeof token === 'function') {
    const resolved = await token();
    return resolved ? resolved.trim() || null : null;
  }
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function invalidResponse(message: string, details: unknown): ArchiveClientError {
  return new ArchiveClientError(message, { statusCode: 0, code: 'INVALID_RESPONSE', details });
}

async function listArchiveMembers(root: string): Promise<{ files: string[]; others: string[] }> {
  const files: string[] = [];
  const others: string[] = [];
  const pending = [root];
  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) {
      break;
    }
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.isFile()) {
        files.push(entryPath);
      } else {
        others.push(entryPath);
      }
    }
  }
  return { files, others };
}

/**
 * HTTP client for the calibration archive. Every call is scoped to the
 * instrument given at construction.
 */
export class ArchiveClient implements RemoteArchive {
  readonly instrument: string;
  private readonly baseUrl: URL;
  private readonly token?: ArchiveClientOptions['token'];
  private readonly defaultHeaders: Record<string, string>;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;

  constructor(options: ArchiveClientOptions) {
    if (!options.baseUrl) {
      throw new Error('ArchiveClient requires a baseUrl');
    }
    if (!options.instrument) {
      throw new Error('ArchiveClient requires an instrument');
    }
    const baseUrl = new URL(options.baseUrl);
    if (!baseUrl.pathname.endsWith('/')) {
      baseUrl.pathname = `${baseUrl.pathname}/`;
    }
    this.baseUrl = baseUrl;
    this.instrument = options.instrument;
    this.token = options.token;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  async query(filters: CalibrationQueryFilters = {}): Promise<CalibrationRecord[]> {
    const payload = await this.requestJson('GET', 'query', { query: filtersToSearchParams(filters) });
    const envelope = queryEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw invalidResponse('Archive query returned an unexpected payload', envelope.error.format());
    }
    try {
      return envelope.data.data.map((row) => parseFlatRecord(row));
    } catch (error) {
      throw new ArchiveClientError('Archive query returned an invalid calibration record', {
        statusCode: 0,
        code: 'INVALID_RESPONSE',
        details: error instanceof Error ? error.message : error,
        cause: error
      });
    }
  }

  async getLastUpdated(): Promise<string | null> {
    const payload = await this.requestJson('GET', 'lastUpdated');
    const envelope = lastUpdatedEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw invalidResponse('Archive lastUpdated returned an unexpected payload', envelope.error.format());
    }
    const raw = envelope.data.data.lastUpdated;
    if (raw === null) {
      return null;
    }
    const normalized = normalizeTimestamp(raw);
    if (normalized === null) {
      throw invalidResponse(`Archive lastUpdated is not a timestamp: ${raw}`, raw);
    }
    return normalized;
  }

  async add(records: readonly CalibrationRecordInput[]): Promise<RemoteAddResult> {
    const flat = records.map((record) => toFlatRecord(parseRecordInput(record)));
    const payload = await this.requestJson('POST', 'add', {
      body: { instrument: this.instrument, records: flat },
      idempotencyKey: randomUUID()
    });
    const envelope = addEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw invalidResponse('Archive add returned an unexpected payload', envelope.error.format());
    }
    return { added: envelope.data.data.added };
  }

  /**
   * Downloads the archive holding calibration `calibrationId` and places its
   * single file in `outputDir`. Nothing is left behind when this rejects.
   */
  async download(calibrationId: string, outputDir: string, options: RemoteDownloadOptions = {}): Promise<string> {
    if (options.filename !== undefined && path.basename(options.filename) !== options.filename) {
      throw new ArchiveClientError(`Download filename ${options.filename} must be a bare file name`, {
        statusCode: 0,
        code: 'INVALID_FILENAME'
      });
    }

    const targetDir = path.resolve(outputDir);
    await fs.mkdir(targetDir, { recursive: true });
    const workspace = await fs.mkdtemp(path.join(targetDir, '.download-'));

    try {
      const archivePath = path.join(workspace, 'archive.tar');
      await this.send(
        'GET',
        'download',
        { query: { id: calibrationId }, accept: 'application/x-tar, application/gzip, application/octet-stream' },
        async (response) => {
          if (!response.body) {
            throw invalidResponse(`Archive download for calibration ${calibrationId} returned no body`, null);
          }
          await pipeline(Readable.fromWeb(response.body), createWriteStream(archivePath));
        }
      );

      const extractDir = path.join(workspace, 'contents');
      await fs.mkdir(extractDir);
      try {
        await tar.x({ file: archivePath, cwd: extractDir, strict: true, preservePaths: false });
      } catch (error) {
        throw new ArchiveFormatError(`Archive for calibration ${calibrationId} could not be extracted`, {
          details: error instanceof Error ? error.message : error,
          cause: error
        });
      }

      const { files, others } = await listArchiveMembers(extractDir);
      const [member] = files;
      if (member === undefined || files.length !== 1 || others.length > 0) {
        throw new ArchiveFormatError(
          `Archive for calibration ${calibrationId} must hold exactly one regular file`,
          { details: { files: files.map((file) => path.relative(extractDir, file)), others: others.length } }
        );
      }

      const destination = path.join(targetDir, options.filename ?? path.basename(member));
      await fs.rename(member, destination);
      return destination;
    } finally {
      await fs.rm(workspace, { recursive: true, force: true });
    }
  }

  private async requestJson(method: string, route: string, options: RequestOptions = {}): Promise<unknown> {
    return this.send(method, route, options, async (response) => {
      try {
        const payload: unknown = await response.json();
        return payload;
      } catch (error) {
        throw new ArchiveClientError(`Archive ${route} returned a body that is not JSON`, {
          statusCode: response.status,
          code: 'INVALID_RESPONSE',
          cause: error
        });
      }
    });
  }

  private async send<T>(
    method: string,
    route: string,
    options: RequestOptions,
    consume: (response: Response) => Promise<T>
  ): Promise<T> {
    const headers = await this.buildHeaders(options.accept ?? 'application/json');
    if (options.idempotencyKey) {
      headers.set('Idempotency-Key', options.idempotencyKey);
    }

    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers.set('Content-Type', 'application/json');
    }

    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    try {
      const response = await fetch(this.buildUrl(route, options.query), {
        method,
        headers,
        body,
        signal: controller.signal
      });
      if (!response.ok) {
        await this.handleErrorResponse(response);
      }
      return await consume(response);
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ArchiveClientError('Request aborted', {
          statusCode: 0,
          code: 'ABORTED',
          details: err instanceof Error ? err.message : err,
          cause: err
        });
      }
      throw err;
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private async buildHeaders(accept: string): Promise<Headers> {
    const headers = new Headers({ Accept: accept });
    for (const [key, value] of Object.entries(this.defaultHeaders)) {
      headers.set(key, value);
    }
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    const token = await resolveToken(this.token);
    if (token && !headers.has('Authorization')) {
      headers.set('Authorization', `Bearer ${token}`);
    }
    return headers;
  }

  private buildUrl(route: string, query: QueryParams = {}): URL {
    const url = new URL(route, this.baseUrl);
    url.searchParams.set('instrument', this.instrument);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }
    return url;
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text().catch(() => '');
    let payload: unknown = null;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
      }
    }

    const parsed = errorPayloadSchema.safeParse(payload);
    if (parsed.success) {
      throw new ArchiveClientError(parsed.data.error.message ?? 'Archive request failed', {
        statusCode: response.status,
        code: parsed.data.error.code ?? null,
        details: parsed.data.error.details
      });
    }

    throw new ArchiveClientError(response.statusText || 'Archive request failed', {
      statusCode: response.status,
      code: null,
      details: payload
    });
  }
}
