/**
 * Unix socket transport for the player's JSON IPC protocol
 *
 * Opens one connection per exchange, writes a single newline-terminated request and
 * waits for the reply line. The player also pushes `{"event": ...}` lines on the
 * same socket; those are skipped.
 */

import { Socket, createConnection } from 'net';
import { IpcTransport } from '../../domain/player/interfaces';

/**
 * True for lines that answer a command (they carry an `error` field), as opposed to events
 */
export function isReplyLine(line: string): boolean {
  try {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === 'object' && parsed !== null && 'error' in parsed;
  } catch {
    return false;
  }
}

export class UnixSocketTransport implements IpcTransport {
  exchange(socketPath: string, message: string, timeoutMs: number): Promise<string> {
    return new Promise((resolve, reject) => {
      let settled = false;
      let buffer = '';
      let lastReply: string | null = null;
      const socket: Socket = createConnection(socketPath);

      const finish = (error: Error | null, reply?: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        if (error) {
          reject(error);
        } else if (reply !== undefined) {
          resolve(reply);
        }
      };

      const timer = setTimeout(() => {
        finish(new Error(`IPC timeout after ${timeoutMs}ms on ${socketPath}`));
      }, timeoutMs);

      socket.setEncoding('utf8');

      socket.on('connect', () => {
        socket.write(message.endsWith('\n') ? message : `${message}\n`);
      });

      socket.on('data', (chunk: string) => {
        buffer += chunk;
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const raw of lines) {
          const line = raw.trim();
          if (line && isReplyLine(line)) {
            lastReply = line;
          }
        }

        // One request per connection, so the first reply line is also the last one
        if (lastReply !== null) {
          finish(null, lastReply);
        }
      });

      socket.on('error', (error) => {
        finish(error);
      });

      socket.on('close', () => {
        const tail = buffer.trim();
        if (tail && isReplyLine(tail)) {
          lastReply = tail;
        }
        if (lastReply !== null) {
          finish(null, lastReply);
        } else {
          finish(new Error(`IPC socket ${socketPath} closed without a reply`));
        }
      });
    });
  }
}
