import type { EventEmitter } from 'node:events';

export const MAX_JSON_BODY_BYTES = 1 * 1024 * 1024;

/** Response surface used by the JSON helpers; `ServerResponse` satisfies it. */
export interface JsonResponse {
  readonly writableEnded: boolean;
  writeHead(status: number, headers: Record<string, string>): unknown;
  end(data?: string): unknown;
  once(event: 'finish' | 'close', listener: () => void): unknown;
}

/** Request surface used by `readJsonBody`; `IncomingMessage` satisfies it. */
export interface JsonRequest extends EventEmitter {
  pause(): unknown;
  readonly socket?: { readonly destroyed: boolean; destroy(): unknown } | null;
}

export function sendJson(res: JsonResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Buffers and parses a JSON request body. Resolves `null` for an empty body;
 * on oversize (413) or malformed input (400) the error response has already
 * been written when it resolves `null`.
 */
export function readJsonBody(
  req: JsonRequest,
  res: JsonResponse,
  maxBytes: number = MAX_JSON_BODY_BYTES,
): Promise<unknown | null> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let settled = false;

    const cleanup = () => {
      req.off('data', onData);
      req.off('end', onEnd);
      req.off('error', onError);
      req.off('aborted', onAborted);
    };

    const done = (value: unknown | null) => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(value);
    };

    const closeSocket = () => {
      const socket = req.socket;
      if (socket && !socket.destroyed) {
        socket.destroy();
      }
    };

    const rejectTooLarge = () => {
      if (!res.writableEnded) {
        sendJson(res, 413, { error: 'payload-too-large' });
      }
      req.pause();
      res.once('finish', closeSocket);
      res.once('close', closeSocket);
      done(null);
    };

    const onData = (chunk: Buffer | string) => {
      if (settled) return;
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      totalBytes += buffer.length;
      if (totalBytes > maxBytes) {
        rejectTooLarge();
        return;
      }
      chunks.push(buffer);
    };

    const onEnd = () => {
      if (settled) return;
      if (totalBytes === 0) {
        done(null);
        return;
      }
      const raw = Buffer.concat(chunks).toString('utf8');
      try {
        done(JSON.parse(raw));
      } catch {
        if (!res.writableEnded) {
          sendJson(res, 400, { error: 'invalid-json' });
        }
        done(null);
      }
    };

    const onError = () => {
      if (!res.writableEnded) {
        sendJson(res, 400, { error: 'invalid-json' });
      }
      done(null);
    };

    const onAborted = () => {
      done(null);
    };

    req.on('data', onData);
    req.once('end', onEnd);
    req.once('error', onError);
    req.once('aborted', onAborted);
  });
}
