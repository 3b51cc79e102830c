import { describe, expect, it, vi } from 'vitest';
import { StreamConnectError, StreamSendError } from '../../errors';
import type { Fixture, FixtureColor, RGB, StreamSessionState } from '../../types';
import { StreamSessionManager } from '../StreamSessionManager';
import type { StreamTransport } from '../types';

const fixtures: Fixture[] = [
  { name: 'left', channelId: 0, zones: [0] },
  { name: 'right', channelId: 4, zones: [1] },
];

const colors: FixtureColor[] = [
  { fixture: 'left', color: [255, 0, 0] },
  { fixture: 'right', color: [0, 0, 255] },
];

function fakeTransport() {
  return {
    open: vi.fn(async () => undefined),
    sendFrame: vi.fn(async (_channels: ReadonlyMap<number, RGB>) => undefined),
    close: vi.fn(async () => undefined),
  } satisfies StreamTransport;
}

function manager(transport: StreamTransport, maxConsecutiveSendErrors = 3): StreamSessionManager {
  return new StreamSessionManager(transport, { fixtures, maxConsecutiveSendErrors });
}

describe('StreamSessionManager', () => {
  it('walks Closed -> Opening -> Open -> Closing -> Closed', async () => {
    const session = manager(fakeTransport());
    const states: StreamSessionState[] = [];
    session.on('stateChange', (state: StreamSessionState) => states.push(state));

    const handle = await session.open();
    await session.close(handle);

    expect(states).toEqual(['Opening', 'Open', 'Closing', 'Closed']);
  });

  it('shares one attempt between concurrent opens', async () => {
    const transport = fakeTransport();
    const session = manager(transport);

    const [a, b] = await Promise.all([session.open(), session.open()]);

    expect(a).toBe(b);
    expect(transport.open).toHaveBeenCalledTimes(1);
  });

  it('returns the current handle when already open', async () => {
    const session = manager(fakeTransport());
    const handle = await session.open();

    await expect(session.open()).resolves.toBe(handle);
  });

  it('wraps connect failures and stays closed', async () => {
    const transport = fakeTransport();
    transport.open.mockRejectedValueOnce(new Error('bridge refused'));
    const session = manager(transport);

    await expect(session.open()).rejects.toThrow(StreamConnectError);
    expect(session.state).toBe('Closed');
  });

  it('maps fixtures onto their channels', async () => {
    const transport = fakeTransport();
    const session = manager(transport);
    const handle = await session.open();

    await session.send(handle, colors);

    const [channels] = transport.sendFrame.mock.calls[0];
    expect([...channels.entries()]).toEqual([
      [0, [255, 0, 0]],
      [4, [0, 0, 255]],
    ]);
    expect(session.getStats().frameCount).toBe(1);
  });

  it('rejects a color for an unknown fixture', async () => {
    const session = manager(fakeTransport());
    const handle = await session.open();

    await expect(session.send(handle, [{ fixture: 'ceiling', color: [0, 0, 0] }])).rejects.toThrow(
      'Unknown fixture "ceiling"'
    );
  });

  it('fails fast when sending on a closed session', async () => {
    const transport = fakeTransport();
    const session = manager(transport);
    const handle = await session.open();
    await session.close();

    const failure = await session.send(handle, colors).then(
      () => null,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(StreamSendError);
    expect(failure instanceof StreamSendError && failure.kind).toBe('closed');
    expect(transport.sendFrame).not.toHaveBeenCalled();
  });

  it('treats a handle from an earlier session as stale', async () => {
    const session = manager(fakeTransport());
    const first = await session.open();
    await session.close();
    await session.open();

    await expect(session.send(first, colors)).rejects.toMatchObject({ kind: 'closed' });
  });

  it('closes the session after repeated send failures', async () => {
    const transport = fakeTransport();
    transport.sendFrame.mockRejectedValue(new Error('send timed out'));
    const session = manager(transport, 3);
    const handle = await session.open();

    for (let attempt = 1; attempt <= 3; attempt++) {
      await expect(session.send(handle, colors)).rejects.toMatchObject({ kind: 'transient' });
      expect(session.state).toBe(attempt < 3 ? 'Open' : 'Closed');
    }

    expect(transport.close).toHaveBeenCalledTimes(1);
    await expect(session.send(handle, colors)).rejects.toMatchObject({ kind: 'closed' });
  });

  it('resets the failure count after a successful send', async () => {
    const transport = fakeTransport();
    const session = manager(transport, 2);
    const handle = await session.open();

    transport.sendFrame.mockRejectedValueOnce(new Error('lost datagram'));
    await expect(session.send(handle, colors)).rejects.toThrow(StreamSendError);
    await session.send(handle, colors);
    transport.sendFrame.mockRejectedValueOnce(new Error('lost datagram'));
    await expect(session.send(handle, colors)).rejects.toThrow(StreamSendError);

    expect(session.state).toBe('Open');
  });

  it('closes idempotently', async () => {
    const transport = fakeTransport();
    const session = manager(transport);
    await session.open();

    await Promise.all([session.close(), session.close()]);
    await session.close();

    expect(transport.close).toHaveBeenCalledTimes(1);
    expect(session.state).toBe('Closed');
  });

  it('ends up closed even when the transport fails to close', async () => {
    const transport = fakeTransport();
    transport.close.mockRejectedValueOnce(new Error('socket already gone'));
    const session = manager(transport);
    await session.open();

    await expect(session.close()).resolves.toBeUndefined();
    expect(session.state).toBe('Closed');
  });

  it('waits for an in-flight open before closing', async () => {
    const transport = fakeTransport();
    const session = manager(transport);

    const opening = session.open();
    const closing = session.close();
    await opening;
    await closing;

    expect(transport.open).toHaveBeenCalledTimes(1);
    expect(transport.close).toHaveBeenCalledTimes(1);
    expect(session.state).toBe('Closed');
  });
});
