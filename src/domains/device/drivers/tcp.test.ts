import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Server, type Socket } from 'net';
import { TcpTransport } from './tcp';
import { ClosedError, ConnectionError } from '../../companion/errors';

describe('TcpTransport', () => {
  let server: Server;
  let port: number;
  let peers: Socket[];
  let received: Buffer[];

  beforeEach(async () => {
    peers = [];
    received = [];
    server = createServer((socket) => {
      peers.push(socket);
      socket.on('data', (data) => received.push(data));
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    port = typeof address === 'object' && address !== null ? address.port : 0;
  });

  afterEach(async () => {
    for (const peer of peers) peer.destroy();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function connectedPeer(transport: TcpTransport): Promise<Socket> {
    await transport.open();
    while (peers.length === 0) {
      await new Promise((resolve) => setTimeout(resolve, 1));
    }
    return peers[0];
  }

  it('writes bytes to the peer and reads its replies', async () => {
    const transport = new TcpTransport('127.0.0.1', port);
    const peer = await connectedPeer(transport);

    await transport.write(Uint8Array.from([0x3c, 0x01, 0x00, 0x38]));
    peer.write(Buffer.from([0x3e, 0x01, 0x00, 0x00]));

    const chunk = await transport.readTimeout(256, 1000);
    expect(chunk.toString('hex')).toBe('3e010000');

    while (received.length === 0) {
      await new Promise((resolve) => setTimeout(resolve, 1));
    }
    expect(Buffer.concat(received).toString('hex')).toBe('3c010038');
    await transport.close();
  });

  it('returns at most maxBytes and keeps the rest buffered', async () => {
    const transport = new TcpTransport('127.0.0.1', port);
    const peer = await connectedPeer(transport);

    peer.write(Buffer.from([1, 2, 3, 4, 5]));
    const first = await transport.readTimeout(2, 1000);
    expect([...first]).toEqual([1, 2]);

    // The remainder may arrive in one or more chunks.
    const rest: number[] = [];
    while (rest.length < 3) {
      rest.push(...(await transport.readTimeout(256, 1000)));
    }
    expect(rest).toEqual([3, 4, 5]);
    await transport.close();
  });

  it('returns an empty buffer when nothing arrives in time', async () => {
    const transport = new TcpTransport('127.0.0.1', port);
    await connectedPeer(transport);

    const chunk = await transport.readTimeout(256, 20);
    expect(chunk.length).toBe(0);
    await transport.close();
  });

  it('reports a peer hang-up as a lost connection', async () => {
    const transport = new TcpTransport('127.0.0.1', port);
    const peer = await connectedPeer(transport);

    peer.destroy();
    await expect(transport.readTimeout(256, 1000)).rejects.toThrow(ConnectionError);
    await expect(transport.write(Uint8Array.from([1]))).rejects.toThrow(ConnectionError);
    await transport.close();
  });

  it('fails to open when nothing listens', async () => {
    const closed = createServer();
    await new Promise<void>((resolve) => closed.listen(0, '127.0.0.1', resolve));
    const address = closed.address();
    const unusedPort = typeof address === 'object' && address !== null ? address.port : 0;
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    const transport = new TcpTransport('127.0.0.1', unusedPort, 1000);
    await expect(transport.open()).rejects.toThrow(ConnectionError);
    expect(transport.isOpen).toBe(false);
  });

  it('closes idempotently and refuses further use', async () => {
    const transport = new TcpTransport('127.0.0.1', port);
    await connectedPeer(transport);

    await transport.close();
    await transport.close();

    expect(transport.isOpen).toBe(false);
    await expect(transport.readTimeout(256, 10)).rejects.toThrow(ClosedError);
    await expect(transport.write(Uint8Array.from([1]))).rejects.toThrow(ClosedError);
  });

  it('wakes a pending read when closed', async () => {
    const transport = new TcpTransport('127.0.0.1', port);
    await connectedPeer(transport);

    const pending = transport.readTimeout(256, 5000);
    await transport.close();

    expect((await pending).length).toBe(0);
  });
});
