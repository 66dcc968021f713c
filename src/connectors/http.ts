import * as http from 'http';
import * as fs from 'fs';
import * as path from 'path';
import { MediaType } from '../media/media-type.js';
import { ContentRegistry } from '../codec/registry.js';
import { checkDecodedPayload, getGuardrailsFromEnv, type DecodedGuardrails } from '../codec/guards.js';
import type { ContentLogger, Transcoder } from '../codec/types.js';
import { HttpError, describeError } from '../util/errors.js';

interface HttpLogEntry {
  ts: string;
  event?: string;
  ip?: string;
  method?: string;
  path?: string;
  bytes?: number;
  durMs?: number;
  status?: number;
  error?: string;
  contentType?: string;
  reason?: string;
}

/** The request side the content layer reads: the two negotiation headers and the raw body. */
export interface ContentRequest {
  headers: http.IncomingHttpHeaders;
  body: Buffer;
}

/** The response side the content layer writes; `http.ServerResponse` satisfies it. */
export interface ResponseSink {
  statusCode: number;
  getHeader(name: string): number | string | string[] | undefined;
  setHeader(name: string, value: number | string | readonly string[]): unknown;
  end(data: Uint8Array): unknown;
}

export interface SendOptions {
  setContentType?: boolean;
  status?: number;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value.join(', ') : value;
}

function appendVary(current: number | string | string[] | undefined, field: string): string {
  const existing = (Array.isArray(current) ? current.join(', ') : String(current ?? ''))
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
  if (existing.some(item => item === '*' || item.toLowerCase() === field.toLowerCase())) return existing.join(', ');
  return [...existing, field].join(', ');
}

/**
 * Per-request content context. The decoded body and the negotiated response
 * type are computed on first use and reused for the rest of the request.
 */
export class RequestContent {
  private decoded?: { value: unknown };
  private negotiated?: { contentType: string } | { error: unknown };
  private readonly logger: ContentLogger;
  private readonly guardrails: DecodedGuardrails;

  constructor(
    readonly registry: ContentRegistry,
    readonly request: ContentRequest,
    options: { logger?: ContentLogger; guardrails?: DecodedGuardrails } = {}
  ) {
    this.logger = options.logger ?? console;
    this.guardrails = options.guardrails ?? getGuardrailsFromEnv();
  }

  get requestContentType(): string | undefined {
    return headerValue(this.request.headers['content-type']) || this.registry.defaultContentType;
  }

  getRequestBody(): unknown {
    if (this.decoded) return this.decoded.value;

    const raw = this.requestContentType;
    if (!raw) throw new HttpError(415, 'request has no content type', 'UnsupportedMediaType');
    const mediaType = this.parseRequestType(raw);
    const transcoder = this.resolveRequestTranscoder(mediaType);
    if (!transcoder) {
      throw new HttpError(415, `unsupported request content type ${mediaType.essence}`, 'UnsupportedMediaType');
    }

    let value: unknown;
    try {
      value = transcoder.fromBytes(this.request.body, mediaType.charset);
    } catch (error) {
      this.logger.error(`[Content] failed to decode ${mediaType.essence} body: ${describeError(error)}`);
      throw new HttpError(400, `could not decode ${mediaType.essence} body`, 'DecodeError', { cause: error });
    }

    const check = checkDecodedPayload(value, this.guardrails);
    if (!check.valid) {
      this.logger.warn(`[Content] decoded body rejected: ${check.reason} (limit ${check.limit}, actual ${check.actual})`);
      throw new HttpError(400, `decoded body exceeds limit: ${check.reason}`, check.reason);
    }

    this.decoded = { value };
    return value;
  }

  /** Negotiated once per request; a failed negotiation is remembered and rethrown. */
  getResponseContentType(): string {
    let negotiated = this.negotiated;
    if (!negotiated) {
      try {
        negotiated = { contentType: this.registry.negotiate(headerValue(this.request.headers.accept)) };
      } catch (error) {
        negotiated = { error };
      }
      this.negotiated = negotiated;
    }
    if ('error' in negotiated) throw negotiated.error;
    return negotiated.contentType;
  }

  sendResponse(res: ResponseSink, body: unknown, options: SendOptions = {}): void {
    const { setContentType = true, status = 200 } = options;
    const contentType = this.getResponseContentType();
    const transcoder = this.registry.get(contentType);
    if (!transcoder) {
      throw new HttpError(415, `no transcoder registered for ${contentType}`, 'UnsupportedMediaType');
    }
    const encoded = transcoder.toBytes(body);
    res.statusCode = status;
    if (setContentType) {
      res.setHeader('Content-Type', encoded.contentType);
      res.setHeader('Vary', appendVary(res.getHeader('Vary'), 'Accept'));
    }
    res.end(encoded.data);
  }

  private parseRequestType(raw: string): MediaType {
    try {
      return MediaType.parse(raw);
    } catch (error) {
      throw new HttpError(400, describeError(error), 'MalformedContentType', { cause: error });
    }
  }

  private resolveRequestTranscoder(mediaType: MediaType): Transcoder | undefined {
    return (
      this.registry.get(mediaType.withoutParameters('charset').toString()) ??
      this.registry.get(mediaType.essence)
    );
  }
}

/** Maps an error thrown while handling a request to the status sent back. */
export function statusForError(error: unknown): number {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') return error.status;
  return 500;
}

function isExternal(error: unknown): boolean {
  return error instanceof Error && 'isExternal' in error && error.isExternal === true;
}

function errorCode(error: unknown): string {
  if (error instanceof HttpError) return error.code;
  return error instanceof Error ? error.name : 'InternalError';
}

export type ContentHandler = (
  content: RequestContent,
  req: http.IncomingMessage,
  res: http.ServerResponse
) => unknown;

export interface HttpOptions {
  port?: number;
  bind?: string;
  maxBodyBytes?: number;
  logPath?: string;
  logger?: ContentLogger;
  guardrails?: DecodedGuardrails;
}

class PayloadTooLargeError extends HttpError {
  constructor(limit: number) {
    super(413, `request body exceeds ${limit} bytes`, 'PayloadTooLarge');
  }
}

// an oversized body is drained, not buffered, so the 413 can still be written
function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    req.on('data', (chunk: Buffer) => {
      received += chunk.length;
      if (received <= limit) chunks.push(chunk);
    });
    req.on('end', () => {
      if (received > limit) reject(new PayloadTooLargeError(limit));
      else resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
  });
}

function openLogStream(logPath: string | undefined, logger: ContentLogger): fs.WriteStream | undefined {
  if (!logPath) return undefined;
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  const stream = fs.createWriteStream(logPath, { flags: 'a' });
  stream.on('error', (err) => {
    logger.error(`[HTTP] Log stream error: ${err.message}`);
  });
  logger.log(`[HTTP] JSONL logging enabled: ${logPath}`);
  return stream;
}

function sendError(res: http.ServerResponse, status: number, error: string, code: string): void {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify({ error, code }));
}

/**
 * Runs an HTTP server that hands each buffered request to `handler` with a
 * ready content context. The handler writes its own response, normally via
 * `content.sendResponse`; errors it throws become JSON error bodies.
 */
export function startHttp(registry: ContentRegistry, handler: ContentHandler, options: HttpOptions = {}): http.Server {
  const logger = options.logger ?? console;
  const maxBodyBytes = options.maxBodyBytes ?? 1024 * 1024;
  const guardrails = options.guardrails ?? getGuardrailsFromEnv();
  const logStream = openLogStream(options.logPath ?? process.env.MEDIAKIT_HTTP_LOG, logger);

  const logJsonl = (entry: HttpLogEntry) => {
    logStream?.write(JSON.stringify(entry) + '\n');
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const startTime = process.hrtime.bigint();
    const url = new URL(req.url || '/', 'http://localhost');
    let bytes = 0;
    let failure: string | undefined;
    try {
      const body = await readBody(req, maxBodyBytes);
      bytes = body.length;
      const content = new RequestContent(registry, { headers: req.headers, body }, { logger, guardrails });
      await handler(content, req, res);
    } catch (error) {
      const status = statusForError(error);
      failure = errorCode(error);
      if (status >= 500) logger.error(`[HTTP] ${req.method} ${url.pathname} failed: ${describeError(error)}`);
      if (res.headersSent) {
        res.destroy();
      } else {
        const message = isExternal(error) && error instanceof Error ? error.message : http.STATUS_CODES[status] || 'error';
        sendError(res, status, message, failure);
      }
    }
    const contentType = res.getHeader('content-type');
    logJsonl({
      ts: new Date().toISOString(),
      event: 'http_request_complete',
      ip: req.socket.remoteAddress || 'unknown',
      method: req.method,
      path: url.pathname,
      bytes,
      durMs: Math.round(Number(process.hrtime.bigint() - startTime) / 1e6),
      status: res.statusCode,
      contentType: typeof contentType === 'string' ? contentType : undefined,
      error: failure
    });
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error(`[HTTP] unhandled request failure: ${describeError(error)}`);
    });
  });

  server.on('close', () => logStream?.end());
  server.listen(options.port ?? 8000, options.bind ?? '127.0.0.1', () => {
    const address = server.address();
    const where = address && typeof address === 'object' ? `${address.address}:${address.port}` : String(address);
    logger.log(`[HTTP] listening on ${where}`);
  });
  return server;
}
