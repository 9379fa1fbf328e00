/**
 * Test suite for MpvIpcChannel against an in-process socket server speaking the player's protocol.
 * Run with: node --import tsx --test src/test/MpvIpcChannel.test.ts
 */
import { describe, it, before, after, afterEach } from 'node:test';
import assert from 'node:assert';
import net from 'node:net';
import os from 'node:os';
import { ControlChannelUnavailable, PlayerRequestRejected } from '../shared/errors';
import { isRecord } from '../shared/guards';
import { resolveChannelAddress } from '../shared/ipc';
import { MpvIpcChannel } from '../main/services/player/MpvIpcChannel';

function reply(socket: net.Socket, requestId: unknown, error: string, data?: unknown): void {
  socket.write(`${JSON.stringify({ request_id: requestId, error, data })}\n`);
}

/**
 * Answers the handful of commands the tests send, the way the player would.
 */
function handleLine(socket: net.Socket, line: string): void {
  const message: unknown = JSON.parse(line);
  if (!isRecord(message) || !Array.isArray(message.command)) {
    return;
  }
  const command: unknown[] = message.command;
  const [name, argument] = command;
  const requestId = message.request_id;
  if (name === 'loadfile') {
    socket.write('{"event":"start-file"}\nnot json at all\n');
    const text = `${JSON.stringify({ request_id: requestId, error: 'success', data: null })}\n`;
    socket.write(text.slice(0, 10));
    setImmediate(() => socket.write(text.slice(10)));
  } else if (name === 'get_property' && argument === 'path') {
    reply(socket, requestId, 'success', '/media/a.mkv');
  } else if (name === 'get_property' && argument === 'volume') {
    reply(socket, requestId, 'property unavailable');
  } else if (name === 'quit') {
    socket.destroy();
  }
}

describe('MpvIpcChannel', () => {
  const address = resolveChannelAddress(`player-sync-test-${process.pid}-${Date.now()}`, process.platform, os.tmpdir());
  const sockets: net.Socket[] = [];
  let server: net.Server;
  let channel: MpvIpcChannel | null = null;

  before(async () => {
    server = net.createServer((socket) => {
      sockets.push(socket);
      let buffer = '';
      socket.setEncoding('utf8');
      socket.on('data', (chunk: string) => {
        buffer += chunk;
        let newline = buffer.indexOf('\n');
        while (newline >= 0) {
          handleLine(socket, buffer.slice(0, newline));
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf('\n');
        }
      });
    });
    await new Promise<void>((resolve) => server.listen(address, resolve));
  });

  afterEach(() => {
    channel?.close();
    channel = null;
  });

  after(async () => {
    for (const socket of sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should match replies to requests and skip event lines', async () => {
    channel = await MpvIpcChannel.connect(address);
    assert.strictEqual(await channel.request(['loadfile', '/media/a.mkv', 'replace']), null);
    assert.strictEqual(await channel.request(['get_property', 'path']), '/media/a.mkv');
  });

  it('should reject requests the player refuses', async () => {
    channel = await MpvIpcChannel.connect(address);
    await assert.rejects(channel.request(['get_property', 'volume']), PlayerRequestRejected);
    await assert.rejects(channel.request(['get_property', 'volume']), /property unavailable/);
  });

  it('should time out when no reply arrives', async () => {
    channel = await MpvIpcChannel.connect(address);
    await assert.rejects(channel.request(['get_property', 'speed'], 20), /No reply to "get_property" within 20ms/);
  });

  it('should reject pending requests when the player goes away', async () => {
    channel = await MpvIpcChannel.connect(address);
    await assert.rejects(channel.request(['quit']), ControlChannelUnavailable);
    assert.strictEqual(channel.closed, true);
    await assert.rejects(channel.request(['get_property', 'path']), /Control channel is closed/);
  });

  it('should fail to connect when nobody listens', async () => {
    await assert.rejects(MpvIpcChannel.connect(`${address}-missing`), ControlChannelUnavailable);
  });
});
