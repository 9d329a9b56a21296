import { mkdtempSync, mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import net from 'node:net';
import type { MessageDocument } from '@message-relay/protocol';
import type { SaveMessage } from '../messages/store.js';

export const HOME_PAGE = '<h1>home</h1>';
export const MESSAGE_PAGE = '<form action="/message" method="POST"></form>';
export const ERROR_PAGE = '<h1>error</h1>';
export const STYLESHEET = 'body { color: red; }';

/** Create a pages directory with all three pages and a static/ folder. */
export function createPagesDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'relay-pages-test-'));
  writeFileSync(join(dir, 'index.html'), HOME_PAGE);
  writeFileSync(join(dir, 'message.html'), MESSAGE_PAGE);
  writeFileSync(join(dir, 'error.html'), ERROR_PAGE);
  mkdirSync(join(dir, 'static'));
  writeFileSync(join(dir, 'static', 'style.css'), STYLESHEET);
  writeFileSync(join(dir, 'static', 'blob.zzqx'), 'opaque');
  return dir;
}

export interface MemoryStore {
  docs: MessageDocument[];
  saveMessage: SaveMessage;
  /** Resolves once at least `count` documents are stored; rejects after `timeoutMs`. */
  waitForCount(count: number, timeoutMs?: number): Promise<void>;
}

/** In-memory stand-in for the MongoDB collection. */
export function createMemoryStore(): MemoryStore {
  const docs: MessageDocument[] = [];
  let waiters: { count: number; resolve: () => void }[] = [];

  return {
    docs,
    saveMessage: async (doc) => {
      docs.push(doc);
      const ready = waiters.filter((w) => docs.length >= w.count);
      waiters = waiters.filter((w) => docs.length < w.count);
      for (const waiter of ready) waiter.resolve();
      return `doc-${docs.length}`;
    },
    waitForCount(count, timeoutMs = 2000) {
      if (docs.length >= count) return Promise.resolve();
      return new Promise<void>((resolve, reject) => {
        const timer = setTimeout(() => {
          reject(new Error(`Expected ${count} stored documents, have ${docs.length}`));
        }, timeoutMs);
        waiters.push({
          count,
          resolve: () => {
            clearTimeout(timer);
            resolve();
          },
        });
      });
    },
  };
}

/** A loopback port that was free a moment ago; nothing listens on it. */
export async function freePort(): Promise<number> {
  const scratch = net.createServer();
  await new Promise<void>((resolve) => scratch.listen(0, '127.0.0.1', () => resolve()));
  const address = scratch.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Scratch server has no TCP address');
  }
  await new Promise<void>((resolve) => scratch.close(() => resolve()));
  return address.port;
}
