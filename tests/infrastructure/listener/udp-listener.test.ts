import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createSocket } from 'node:dgram';
import { UdpLogListener } from '../../../src/infrastructure/listener/udp-listener.js';
import type { EventAcceptor } from '../../../src/application/router.js';
import { fakeLogger } from '../../helpers.js';

describe('UdpLogListener', () => {
  let router: { accept: ReturnType<typeof vi.fn> } & EventAcceptor;
  let listener: UdpLogListener;

  beforeEach(() => {
    const accept = vi.fn();
    router = { accept };
    listener = new UdpLogListener({
      host: '127.0.0.1',
      port: 0,
      router,
      log: fakeLogger(),
      now: () => 1700000000.25,
    });
  });

  it('stamps events without a timestamp and hands them to the router', () => {
    listener.handleDatagram(Buffer.from('metrics: {"value": 1}'));

    expect(router.accept).toHaveBeenCalledOnce();
    expect(router.accept).toHaveBeenCalledWith({
      category: 'metrics',
      fields: { value: 1 },
      timestamp: 1700000000.25,
    });
  });

  it('keeps a timestamp carried by the event', () => {
    listener.handleDatagram(Buffer.from('metrics: {"timestamp": 42, "value": 1}'));

    expect(router.accept).toHaveBeenCalledWith({ category: 'metrics', fields: { value: 1 }, timestamp: 42 });
  });

  it('counts and drops a datagram with an invalid category', () => {
    listener.handleDatagram(Buffer.from('bad-cat: {}'));

    expect(router.accept).not.toHaveBeenCalled();
    expect(listener.stats()).toEqual({
      name: 'udplog',
      address: null,
      received: 1,
      accepted: 0,
      dropped: { InvalidCategory: 1, InvalidPayload: 0 },
    });
  });

  it('counts and drops a datagram whose payload is not an object', () => {
    listener.handleDatagram(Buffer.from('metrics: [1]'));
    listener.handleDatagram(Buffer.from('metrics: {broken'));
    listener.handleDatagram(Buffer.from('metrics: {"ok": true}'));

    expect(listener.stats()).toEqual(expect.objectContaining({
      received: 3,
      accepted: 1,
      dropped: { InvalidCategory: 0, InvalidPayload: 2 },
    }));
  });

  it('has no address before it is started', async () => {
    expect(listener.address()).toBeNull();
    await expect(listener.stop()).resolves.toBeUndefined();
  });

  describe('on a bound socket', () => {
    const started: UdpLogListener[] = [];

    afterEach(async () => {
      await Promise.all(started.map((bound) => bound.stop()));
      started.length = 0;
    });

    async function bind(target: UdpLogListener): Promise<number> {
      await target.start();
      started.push(target);
      return Number(target.address()?.split(':').pop());
    }

    it('routes a datagram received on its port', async () => {
      const port = await bind(listener);
      const client = createSocket('udp4');

      await new Promise<void>((resolve, reject) => {
        client.send(Buffer.from('metrics: {"value": 1}'), port, '127.0.0.1', (err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      client.close();

      await vi.waitFor(() => {
        expect(router.accept).toHaveBeenCalledOnce();
      });
      expect(router.accept).toHaveBeenCalledWith({
        category: 'metrics',
        fields: { value: 1 },
        timestamp: 1700000000.25,
      });
      expect(listener.stats()).toEqual(expect.objectContaining({
        address: `127.0.0.1:${port}`,
        received: 1,
        accepted: 1,
      }));
    });

    it('rejects start when the port is already bound', async () => {
      const port = await bind(listener);
      const rival = new UdpLogListener({ host: '127.0.0.1', port, router, log: fakeLogger() });

      await expect(rival.start()).rejects.toMatchObject({ code: 'EADDRINUSE' });
      expect(rival.address()).toBeNull();
    });
  });
});
