import * as http from 'http';
import * as https from 'https';

import { IMediaResolver } from '../../core/repositories/IMediaResolver.js';
import { ILogger } from '../../core/repositories/ILogger.js';
import { getMimeType, normalizeContentType, toDataUri, DEFAULT_MIME_TYPE } from '../../utils/attachments.js';
import { MEDIA_TIMEOUT_MS, MAX_INLINE_MEDIA_BYTES } from '../../constants.js';

export interface MediaResolverOptions {
  timeoutMs?: number;
  maxBytes?: number;
  /** Resolved URLs kept in memory (avatars repeat on every message) */
  cacheSize?: number;
}

/**
 * HTTP Media Resolver
 * Downloads media referenced by a transcript and returns it as a data URI.
 * Any failure (status, size, timeout, network) falls back to the URL.
 */
export class HttpMediaResolver implements IMediaResolver {
  private readonly cache = new Map<string, string>();
  private readonly timeoutMs: number;
  private readonly maxBytes: number;
  private readonly cacheSize: number;

  constructor(
    private readonly logger: ILogger,
    options: MediaResolverOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? MEDIA_TIMEOUT_MS;
    this.maxBytes = options.maxBytes ?? MAX_INLINE_MEDIA_BYTES;
    this.cacheSize = options.cacheSize ?? 500;
  }

  async inline(url: string): Promise<string> {
    const cached = this.cache.get(url);
    if (cached) return cached;

    try {
      const { content, contentType } = await this.download(url);
      const dataUri = toDataUri(content, contentType ?? this.guessType(url));
      this.remember(url, dataUri);
      return dataUri;
    } catch (error) {
      this.logger.warn('Could not inline media, keeping link', {
        url,
        error: error instanceof Error ? error.message : String(error)
      });
      return url;
    }
  }

  private guessType(url: string): string {
    const guessed = getMimeType(url);
    return guessed === DEFAULT_MIME_TYPE ? 'image/png' : guessed;
  }

  private remember(url: string, dataUri: string): void {
    if (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(url, dataUri);
  }

  private download(url: string): Promise<{ content: Buffer; contentType?: string }> {
    return new Promise((resolve, reject) => {
      let parsedUrl: URL;
      try {
        parsedUrl = new URL(url);
      } catch {
        reject(new Error(`Invalid media URL: ${url}`));
        return;
      }

      const isHttps = parsedUrl.protocol === 'https:';
      if (!isHttps && parsedUrl.protocol !== 'http:') {
        reject(new Error(`Unsupported protocol: ${parsedUrl.protocol}`));
        return;
      }

      const onResponse = (res: http.IncomingMessage): void => {
        const statusCode = res.statusCode || 500;
        if (statusCode < 200 || statusCode >= 300) {
          res.resume();
          reject(new Error(`HTTP ${statusCode}`));
          return;
        }

        const chunks: Buffer[] = [];
        let size = 0;

        res.on('data', (chunk: Buffer) => {
          size += chunk.length;
          if (size > this.maxBytes) {
            res.destroy(new Error(`Media exceeds ${this.maxBytes} bytes`));
            return;
          }
          chunks.push(chunk);
        });

        res.on('end', () => {
          resolve({
            content: Buffer.concat(chunks),
            contentType: normalizeContentType(res.headers['content-type'])
          });
        });

        res.on('error', reject);
      };

      const req = isHttps ? https.get(parsedUrl, onResponse) : http.get(parsedUrl, onResponse);

      req.setTimeout(this.timeoutMs, () => {
        req.destroy(new Error(`Request timeout after ${this.timeoutMs}ms`));
      });

      req.on('error', (error) => {
        reject(new Error(`Request failed: ${error.message}`));
      });
    });
  }
}
