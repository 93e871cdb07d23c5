import { describe, expect, it } from 'vitest';
import { TeleinfoConfigError, TeleinfoNotConnectedError } from '../src/errors.js';
import { createTransport } from '../src/transport/factory.js';
import { NodeTcpTransport } from '../src/transport/node-transports/node-tcp-transport.js';

describe('createTransport', () => {
  it('requires a device path for serial transports', async () => {
    await expect(createTransport('node-serial', { path: '' })).rejects.toThrow(
      new TeleinfoConfigError('Missing "path" option for node-serial transport')
    );
  });

  it('requires a host and an integer port for TCP transports', async () => {
    await expect(createTransport('node-tcp', { host: '', port: 502 })).rejects.toBeInstanceOf(
      TeleinfoConfigError
    );
    await expect(createTransport('node-tcp', { host: 'localhost', port: 1.5 })).rejects.toThrow(
      'Missing "host" or "port" option for node-tcp transport'
    );
  });

  it('builds a closed TCP transport', async () => {
    const transport = await createTransport('node-tcp', { host: 'localhost', port: 2000 });
    expect(transport).toBeInstanceOf(NodeTcpTransport);
    expect(transport.isOpen).toBe(false);
    await expect(transport.read(10, 0)).rejects.toBeInstanceOf(TeleinfoNotConnectedError);
  });
});
