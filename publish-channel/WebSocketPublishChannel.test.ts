import { WebSocket, RawData } from 'ws';
import { OutgoingHttpHeaders } from 'http';
import { WebSocketPublishChannel, PublishChannelConfig } from './WebSocketPublishChannel';
import { TelemetryFrameProtocol } from '../frame-protocol/TelemetryFrameProtocol';
import { BRIDGE_ERROR_CODES } from '../shared/BridgeErrors';
import { Logger } from '../shared/Logger';

function createMockLogger(): jest.Mocked<Logger> {
  return { error: jest.fn(), warn: jest.fn(), info: jest.fn(), debug: jest.fn() };
}

function openClient(port: number, headers: OutgoingHttpHeaders = {}): Promise<WebSocket> {
  const client = new WebSocket(`ws://127.0.0.1:${port}`, { headers });
  return new Promise<WebSocket>((resolve, reject) => {
    client.once('open', () => resolve(client));
    client.once('error', reject);
  });
}

function nextMessage(client: WebSocket): Promise<RawData> {
  return new Promise<RawData>((resolve) => {
    client.once('message', (data: RawData) => resolve(data));
  });
}

function closeCode(client: WebSocket): Promise<number> {
  return new Promise<number>((resolve) => {
    client.once('close', (code: number) => resolve(code));
  });
}

function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

describe('WebSocketPublishChannel', () => {
  test('should ignore frames before bind', () => {
    const channel = new WebSocketPublishChannel({}, createMockLogger());

    channel.send(Buffer.alloc(16));

    expect(channel.getStats()).toEqual({
      subscribers: 0,
      framesOffered: 0,
      framesSent: 0,
      framesDropped: 0,
      sendErrors: 0,
    });
    expect(channel.getBoundPort()).toBeNull();
  });

  test('should close an unbound channel idempotently', async () => {
    const channel = new WebSocketPublishChannel({}, createMockLogger());

    const first = channel.close();
    const second = channel.close();

    expect(second).toBe(first);
    await expect(first).resolves.toBeUndefined();
  });

  test('should refuse to bind after close', async () => {
    const channel = new WebSocketPublishChannel({}, createMockLogger());
    await channel.close();

    await expect(channel.bind('tcp://*:5559')).rejects.toMatchObject({
      code: BRIDGE_ERROR_CODES.BIND_FAILURE,
      message: 'Channel is closed',
    });
  });

  test('should reject an unparseable address before opening a socket', async () => {
    const channel = new WebSocketPublishChannel({}, createMockLogger());

    await expect(channel.bind('tcp://*')).rejects.toMatchObject({
      code: BRIDGE_ERROR_CODES.INVALID_CONFIG,
    });
    expect(channel.getBoundPort()).toBeNull();
  });

  describe('bound to a local port', () => {
    const channels: WebSocketPublishChannel[] = [];
    const clients: WebSocket[] = [];

    async function bindChannel(config: Partial<PublishChannelConfig> = {}): Promise<number> {
      const channel = new WebSocketPublishChannel(config, createMockLogger());
      channels.push(channel);
      await channel.bind('127.0.0.1:0');

      const port = channel.getBoundPort();
      if (port === null) throw new Error('Channel did not bind');
      return port;
    }

    async function connect(port: number, headers?: OutgoingHttpHeaders): Promise<WebSocket> {
      const client = await openClient(port, headers);
      clients.push(client);
      return client;
    }

    afterEach(async () => {
      clients.splice(0).forEach((client) => client.terminate());
      await Promise.all(channels.splice(0).map((channel) => channel.close()));
    });

    test('should report an address already in use as a bind failure', async () => {
      const port = await bindChannel();
      const second = new WebSocketPublishChannel({}, createMockLogger());
      channels.push(second);

      await expect(second.bind(`127.0.0.1:${port}`)).rejects.toMatchObject({
        code: BRIDGE_ERROR_CODES.BIND_FAILURE,
        message: `Cannot bind 127.0.0.1:${port}: address already in use`,
      });
      expect(second.getBoundPort()).toBeNull();
    });

    test('should refuse a second bind on the same channel', async () => {
      await bindChannel();

      await expect(channels[0].bind('127.0.0.1:0')).rejects.toMatchObject({
        code: BRIDGE_ERROR_CODES.BIND_FAILURE,
        message: 'Channel is already bound',
      });
    });

    test('should deliver a sent frame to a subscriber as one binary message', async () => {
      const port = await bindChannel();
      const client = await connect(port);
      const frame = TelemetryFrameProtocol.encode({ ts: 1700000000000, distance: 1234, velocity: -56 });

      const received = nextMessage(client);
      channels[0].send(frame);
      const data = await received;

      expect(Buffer.isBuffer(data)).toBe(true);
      expect(data).toEqual(frame);
      expect(channels[0].getStats()).toMatchObject({ subscribers: 1, framesOffered: 1 });
    });

    test('should reject a subscriber without credentials with 401', async () => {
      const port = await bindChannel({ credentials: { username: 'subscriber', password: 'test-secret' } });

      await expect(openClient(port)).rejects.toThrow('Unexpected server response: 401');
      await expect(
        openClient(port, { Authorization: basicAuth('subscriber', 'wrong-secret') })
      ).rejects.toThrow('Unexpected server response: 401');
      expect(channels[0].getStats().subscribers).toBe(0);
    });

    test('should accept a subscriber with matching credentials', async () => {
      const port = await bindChannel({ credentials: { username: 'subscriber', password: 'test-secret' } });

      const client = await connect(port, { Authorization: basicAuth('subscriber', 'test-secret') });

      expect(client.readyState).toBe(WebSocket.OPEN);
      expect(channels[0].getStats().subscribers).toBe(1);
    });

    test('should close subscribers beyond capacity with 1008', async () => {
      const port = await bindChannel({ maxSubscribers: 1 });
      await connect(port);

      const extra = new WebSocket(`ws://127.0.0.1:${port}`);
      clients.push(extra);
      const code = await closeCode(extra);

      expect(code).toBe(1008);
      expect(channels[0].getStats().subscribers).toBe(1);
    });

    test('should disconnect subscribers and release the port on close', async () => {
      const port = await bindChannel();
      const client = await connect(port);
      const closed = closeCode(client);

      await channels[0].close();
      await closed;

      expect(channels[0].getBoundPort()).toBeNull();
      expect(channels[0].getStats().subscribers).toBe(0);
      const next = new WebSocketPublishChannel({}, createMockLogger());
      channels.push(next);
      await expect(next.bind(`127.0.0.1:${port}`)).resolves.toBeUndefined();
    });

    test('should release the socket when closed while binding', async () => {
      const channel = new WebSocketPublishChannel({}, createMockLogger());
      channels.push(channel);

      const binding = channel.bind('127.0.0.1:0');
      const closing = channel.close();

      await expect(binding).rejects.toMatchObject({
        code: BRIDGE_ERROR_CODES.BIND_FAILURE,
        message: 'Channel closed while binding',
      });
      await closing;
      expect(channel.getBoundPort()).toBeNull();
    });
  });
});
