// src/transport/factory.ts

import { rootLogger } from '../logger.js';
import { TeleinfoConfigError } from '../errors.js';
import type {
  NodeSerialTransportOptions,
  NodeTcpTransportOptions,
  Transport,
} from '../types/teleinfo-types.js';

const logger = rootLogger.createLogger('TransportFactory');

export interface NodeSerialFactoryOptions extends NodeSerialTransportOptions {
  /** Device path, e.g. /dev/ttyAMA0 */
  path: string;
}

export interface NodeTcpFactoryOptions extends NodeTcpTransportOptions {
  host: string;
  port: number;
}

export type TransportType = 'node-serial' | 'node-tcp';

/**
 * Creates a transport for the given type.
 *
 * @param type - `'node-serial'` uses serialport, `'node-tcp'` a serial-to-TCP bridge.
 * @throws TeleinfoConfigError on unknown type or missing address
 */
export async function createTransport(
  type: 'node-serial',
  options: NodeSerialFactoryOptions
): Promise<Transport>;
export async function createTransport(
  type: 'node-tcp',
  options: NodeTcpFactoryOptions
): Promise<Transport>;
export async function createTransport(
  type: TransportType,
  options: NodeSerialFactoryOptions | NodeTcpFactoryOptions
): Promise<Transport> {
  try {
    switch (type) {
      case 'node-serial': {
        if (!('path' in options) || !options.path) {
          throw new TeleinfoConfigError('Missing "path" option for node-serial transport');
        }
        const { path, ...rest } = options;
        const { NodeSerialTransport } = await import('./node-transports/node-serialport.js');
        logger.debug(`Creating NodeSerialTransport on ${path}`);
        return new NodeSerialTransport(path, rest);
      }

      case 'node-tcp': {
        if (!('host' in options) || !options.host || !Number.isInteger(options.port)) {
          throw new TeleinfoConfigError('Missing "host" or "port" option for node-tcp transport');
        }
        const { host, port, ...rest } = options;
        const { NodeTcpTransport } = await import('./node-transports/node-tcp-transport.js');
        logger.debug(`Creating NodeTcpTransport for ${host}:${port}`);
        return new NodeTcpTransport(host, port, rest);
      }

      default:
        throw new TeleinfoConfigError(`Unknown transport type: ${String(type)}`);
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Failed to create transport of type "${type}": ${message}`);
    throw err;
  }
}
