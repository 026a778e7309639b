import type { TransportConfig } from '../config/cli';
import type { Logger } from '../observability/types';
import { MockCompanionTransport } from './drivers/mock-companion';
import { SerialTransport } from './drivers/serial';
import { TcpTransport } from './drivers/tcp';
import type { ByteTransport } from './drivers/types';

/**
 * Builds the transport for the configured link. Only the transport knows
 * which variant it is; everything above talks to ByteTransport.
 */
export function createTransport(config: TransportConfig, logger?: Logger): ByteTransport {
  switch (config.kind) {
    case 'serial':
      return new SerialTransport(config.path, config.baudRate);
    case 'tcp':
      return new TcpTransport(config.host, config.port);
    case 'mock':
      logger?.warn('Using the simulated companion device');
      return new MockCompanionTransport({ logger });
  }
}
