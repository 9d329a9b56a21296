/**
 * MongoDB wrapper without a server: the startup health check fails fast
 * against a loopback port nobody listens on.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../config.js';
import { closeDb, getMessagesCollection, initDb } from '../db/database.js';
import { saveMessage } from '../messages/store.js';
import { createSocketUnit, StorageUnavailableError } from '../units.js';
import { sendMessage } from '../socket/client.js';
import { configureLogging } from '../log.js';
import { freePort } from './helpers.js';

configureLogging('silent');

const NOT_INITIALIZED = { message: 'Database not initialized. Call initDb() first.' };

async function unreachableConfig() {
  const mongoPort = await freePort();
  const socketPort = await freePort();
  return loadConfig({
    MONGO_URI: `mongodb://127.0.0.1:${mongoPort}/?directConnection=true`,
    MONGO_TIMEOUT_MS: '200',
    SOCKET_HOST: '127.0.0.1',
    SOCKET_PORT: String(socketPort),
  });
}

describe('storage', () => {
  it('refuses to hand out the collection before initDb', async () => {
    assert.throws(() => getMessagesCollection(), NOT_INITIALIZED);
    await assert.rejects(
      saveMessage({ username: 'alice', message: 'hello', date: new Date() }),
      NOT_INITIALIZED
    );
  });

  it('rejects initDb when the server cannot be reached, leaving nothing connected', async () => {
    const config = await unreachableConfig();

    await assert.rejects(initDb(config), { name: 'MongoServerSelectionError' });

    assert.throws(() => getMessagesCollection(), NOT_INITIALIZED);
    await closeDb();
  });

  it('stops the socket unit before it listens', async () => {
    const config = await unreachableConfig();

    await assert.rejects(createSocketUnit(config).run(), (err: unknown) => {
      assert.ok(err instanceof StorageUnavailableError);
      assert.match(err.message, /^Storage relay\.messages is unreachable: /);
      assert.equal(err.cause instanceof Error && err.cause.name, 'MongoServerSelectionError');
      return true;
    });
    await assert.rejects(
      sendMessage({ host: '127.0.0.1', port: config.socketPort }, { username: 'a', message: 'b' }),
      { code: 'ECONNREFUSED' }
    );
  });
});
