import * as net from 'net';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TeleinfoMode } from '../src/constants/constants.js';
import { TeleinfoEndOfStreamError, TeleinfoTimeoutError } from '../src/errors.js';
import { TeleinfoReader } from '../src/reader.js';
import { NodeTcpTransport } from '../src/transport/node-transports/node-tcp-transport.js';
import type { NodeTcpTransportOptions } from '../src/types/teleinfo-types.js';
import { LEGACY_FRAME } from './fixtures/frames.js';

describe('NodeTcpTransport', () => {
  let server: net.Server;
  let port: number;
  let onClient: (socket: net.Socket) => void;
  const clients: net.Socket[] = [];
  const transports: NodeTcpTransport[] = [];

  beforeEach(async () => {
    onClient = () => {};
    server = net.createServer(socket => {
      clients.push(socket);
      onClient(socket);
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    port = typeof address === 'object' && address ? address.port : 0;
  });

  afterEach(async () => {
    for (const transport of transports.splice(0)) await transport.disconnect();
    for (const socket of clients.splice(0)) socket.destroy();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  function open(options: NodeTcpTransportOptions = {}): NodeTcpTransport {
    const transport = new NodeTcpTransport('127.0.0.1', port, options);
    transports.push(transport);
    return transport;
  }

  it('honours an explicit zero read timeout', async () => {
    const transport = open({ readTimeout: 0 });
    await transport.connect();
    expect(transport.isOpen).toBe(true);

    const start = Date.now();
    await expect(transport.read(10)).rejects.toBeInstanceOf(TeleinfoTimeoutError);
    expect(Date.now() - start).toBeLessThan(1000);
  });

  it('delivers the bridge output and reports the end of the stream', async () => {
    onClient = socket => socket.end(LEGACY_FRAME);
    const reader = new TeleinfoReader(open({ reconnectInterval: 60_000 }));
    await reader.connect();

    const record = await reader.readRecord();
    expect(record.mode).toBe(TeleinfoMode.Legacy);
    expect(record.valid).toBe(true);

    await expect(reader.readRecord()).rejects.toBeInstanceOf(TeleinfoEndOfStreamError);
  });
});
