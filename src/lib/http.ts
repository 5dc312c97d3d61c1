/**
 * Minimal JSON HTTP client used by the CLI to talk to a running daemon.
 */

import type { IncomingMessage } from 'node:http';
import { request as httpRequestFn } from 'node:http';
import { request as httpsRequestFn } from 'node:https';

/** Status and parsed body of a response. */
export interface HttpResponse {
  statusCode: number;
  /** Parsed JSON, or the raw text when the body is not JSON. */
  body: unknown;
}

/** JSON when it parses, the raw text otherwise. */
function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Make an HTTP/HTTPS request without a body. Non-2xx statuses resolve normally. */
export function httpRequest(
  method: 'GET' | 'POST',
  url: string,
  timeoutMs = 10000,
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const parsedUrl = new URL(url);
    const requestFn =
      parsedUrl.protocol === 'https:' ? httpsRequestFn : httpRequestFn;

    const req = requestFn(
      {
        hostname: parsedUrl.hostname,
        port: parsedUrl.port,
        path: parsedUrl.pathname + parsedUrl.search,
        method,
        timeout: timeoutMs,
      },
      (res: IncomingMessage) => {
        let responseBody = '';
        res.on('data', (chunk: Buffer) => {
          responseBody += chunk.toString();
        });
        res.on('end', () => {
          resolve({ statusCode: res.statusCode ?? 0, body: parseBody(responseBody) });
        });
      },
    );

    req.on('error', reject);
    req.on('timeout', () => {
      req.destroy();
      reject(new Error('Request timed out'));
    });

    req.end();
  });
}
