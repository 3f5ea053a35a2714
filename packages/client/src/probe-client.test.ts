/**
 * Tests for ProbeClient against an in-process mtr-packet
 */

import {
  createSilentLogger,
  HostResolveError,
  type IpVersion,
  InvalidArgumentError,
  StateError,
  type WireSyntax
} from '@probewire/core';
import type { LookupFn } from '@probewire/runtime';
import { type FakeHandler, FakeMtrPacket, type FakeReply, waitFor } from '@probewire/test-utils';
import { describe, expect, it, vi } from 'vitest';
import { ProbeClient } from './probe-client.js';

const addresses: Record<string, Partial<Record<IpVersion, string>>> = {
  'router.test': { 4: '192.0.2.10' },
  'dual.test': { 4: '192.0.2.20', 6: '2001:db8::20' }
};

/** Scripted mtr-packet behaviour keyed by probe target */
const handler: FakeHandler = (command): FakeReply | undefined => {
  const target = command.fields.get('ip-4') ?? command.fields.get('ip-6');
  switch (target) {
    case '127.0.0.1':
      return { keyword: 'reply', fields: { 'ip-4': '127.0.0.1', 'round-trip-time': 250 } };
    case '192.0.2.10':
      return {
        keyword: 'ttl-expired',
        fields: {
          'ip-4': '198.51.100.1',
          'round-trip-time': 1500,
          mpls: '100,0,0,1,200,0,0,1,300,0,1,1'
        }
      };
    default:
      return { keyword: 'no-reply' };
  }
};

function setup(options: { syntax?: WireSyntax; features?: readonly string[] } = {}) {
  const fake = new FakeMtrPacket({ handler, syntax: options.syntax, features: options.features });
  const lookup = vi.fn<Parameters<LookupFn>, ReturnType<LookupFn>>(async (hostname, family) => {
    const address = addresses[hostname]?.[family];
    if (!address) throw new Error(`getaddrinfo ENOTFOUND ${hostname}`);
    return address;
  });
  const client = new ProbeClient({
    syntax: options.syntax,
    channelFactory: () => fake,
    lookup,
    logger: createSilentLogger()
  });
  return { client, fake, lookup };
}

describe('ProbeClient', () => {
  describe('lifecycle', () => {
    it('should open and close the session', async () => {
      const { client, fake } = setup();

      await client.open();
      expect(client.isOpen).toBe(true);
      expect(fake.running).toBe(true);

      await client.close();
      expect(client.isOpen).toBe(false);
      expect(client.state).toBe('closed');
      expect(fake.running).toBe(false);
    });

    it('should not accept probes before the capability check passes', async () => {
      const { client, fake } = setup();

      const opening = client.open();
      fake.holdReplies = true;
      await waitFor(() => fake.heldCount === 1);

      expect(client.isOpen).toBe(false);
      await expect(client.probe('127.0.0.1')).rejects.toThrow(
        new StateError('Cannot probe while the session is opening')
      );

      fake.releaseHeld();
      await opening;
      expect(client.isOpen).toBe(true);
      expect(fake.probes).toEqual([]);
    });

    it('should reject invalid client options', () => {
      expect(() => new ProbeClient({ commandPrefix: [''] })).toThrow(InvalidArgumentError);
    });
  });

  describe('probe', () => {
    it('should report a reply from the loopback address', async () => {
      const { client, fake, lookup } = setup();
      await client.open();

      const result = await client.probe('127.0.0.1');

      expect(result).toEqual({
        success: true,
        result: 'reply',
        timeMs: 0.25,
        responder: '127.0.0.1',
        mpls: []
      });
      expect(fake.probes.map((command) => command.line)).toEqual([
        '2 send-probe ip-4=127.0.0.1 ttl=32 protocol=icmp timeout=10'
      ]);
      expect(lookup).not.toHaveBeenCalled();
    });

    it('should report the hop where the ttl expired with its label stack', async () => {
      const { client, fake } = setup();
      await client.open();

      const result = await client.probe('router.test', { ttl: 2 });

      expect(result.success).toBe(false);
      expect(result.result).toBe('ttl-expired');
      expect(result.responder).toBe('198.51.100.1');
      expect(result.timeMs).toBe(1.5);
      expect(result.mpls).toEqual([
        { label: 100, trafficClass: 0, bottomOfStack: false, ttl: 1 },
        { label: 200, trafficClass: 0, bottomOfStack: false, ttl: 1 },
        { label: 300, trafficClass: 0, bottomOfStack: true, ttl: 1 }
      ]);
      expect(fake.probes[0]?.line).toBe(
        '2 send-probe ip-4=192.0.2.10 ttl=2 protocol=icmp timeout=10'
      );
    });

    it('should leave time and responder empty when nothing answers', async () => {
      const { client } = setup();
      await client.open();

      await expect(client.probe('192.0.2.99')).resolves.toEqual({
        success: false,
        result: 'no-reply',
        timeMs: null,
        responder: null,
        mpls: []
      });
    });

    it('should write every recognised option', async () => {
      const { client, fake } = setup();
      await client.open();

      await client.probe('192.0.2.50', {
        ttl: 5,
        protocol: 'udp',
        port: 33434,
        localIp: '192.0.2.1',
        localPort: 40000,
        timeout: 2,
        size: 64,
        bitPattern: 170,
        tos: 16,
        mark: 7
      });

      expect(fake.probes[0]?.line).toBe(
        '2 send-probe ip-4=192.0.2.50 ttl=5 protocol=udp port=33434 local-ip-4=192.0.2.1 ' +
          'local-port=40000 timeout=2 size=64 bit-pattern=170 tos=16 mark=7'
      );
    });

    it('should resolve with the IP version of the local address', async () => {
      const { client, fake, lookup } = setup();
      await client.open();

      await client.probe('dual.test', { localIp: '2001:db8::1' });

      expect(lookup.mock.calls).toEqual([['dual.test', 6]]);
      expect(fake.probes[0]?.line).toBe(
        '2 send-probe ip-6=2001:db8::20 ttl=32 protocol=icmp local-ip-6=2001:db8::1 timeout=10'
      );
    });

    it('should honour an explicit IP version', async () => {
      const { client, fake } = setup();
      await client.open();

      await client.probe('dual.test', { ipVersion: 6 });

      expect(fake.probes[0]?.line).toBe(
        '2 send-probe ip-6=2001:db8::20 ttl=32 protocol=icmp timeout=10'
      );
    });

    it('should raise HostResolveError without writing a probe', async () => {
      const { client, fake } = setup();
      await client.open();

      await expect(client.probe('missing.test')).rejects.toThrow(HostResolveError);
      expect(fake.probes).toEqual([]);
      expect(client.isOpen).toBe(true);
    });

    it('should reuse cached resolutions until the cache is cleared', async () => {
      const { client, lookup } = setup();
      await client.open();

      await client.probe('router.test');
      await client.probe('router.test');
      expect(lookup).toHaveBeenCalledTimes(1);

      client.clearResolutionCache();
      await client.probe('router.test');
      expect(lookup).toHaveBeenCalledTimes(2);
    });

    it('should run probes concurrently and match replies to callers', async () => {
      const { client, fake } = setup();
      await client.open();
      fake.holdReplies = true;

      const results = Promise.all([
        client.probe('127.0.0.1'),
        client.probe('192.0.2.10'),
        client.probe('192.0.2.99')
      ]);
      await waitFor(() => fake.heldCount === 3);
      fake.releaseHeld((lines) => [...lines].reverse());

      const [loopback, hop, silent] = await results;
      expect(loopback.result).toBe('reply');
      expect(hop.result).toBe('ttl-expired');
      expect(silent.result).toBe('no-reply');
    });

    it('should speak the native field syntax when configured', async () => {
      const { client, fake } = setup({ syntax: 'pairs' });
      await client.open();

      const result = await client.probe('127.0.0.1', { ttl: 4 });

      expect(result.responder).toBe('127.0.0.1');
      expect(fake.received.map((command) => command.line)).toEqual([
        '1 check-support feature send-probe',
        '2 send-probe ip-4 127.0.0.1 ttl 4 protocol icmp timeout 10'
      ]);
    });

    it('should reject a port for ICMP probes before touching the session', async () => {
      const { client, fake } = setup();
      await client.open();

      await expect(client.probe('127.0.0.1', { port: 80 })).rejects.toThrow(
        new InvalidArgumentError(
          'Invalid probe options: port: port is only meaningful for udp, tcp and sctp probes'
        )
      );
      expect(fake.probes).toEqual([]);
    });

    it('should reject out-of-range values', async () => {
      const { client } = setup();
      await client.open();

      await expect(client.probe('127.0.0.1', { ttl: 0 })).rejects.toThrow(InvalidArgumentError);
      await expect(client.probe('127.0.0.1', { bitPattern: 256 })).rejects.toThrow(
        InvalidArgumentError
      );
      await expect(client.probe('127.0.0.1', { localIp: 'not-an-ip' })).rejects.toThrow(
        InvalidArgumentError
      );
    });

    it('should reject a local address of the other IP version', async () => {
      const { client } = setup();
      await client.open();

      await expect(
        client.probe('dual.test', { ipVersion: 4, localIp: '2001:db8::1' })
      ).rejects.toThrow(new InvalidArgumentError('localIp 2001:db8::1 is not an IPv4 address'));
      await expect(client.probe('127.0.0.1', { localIp: '::1' })).rejects.toThrow(
        new InvalidArgumentError('localIp ::1 and target 127.0.0.1 use different IP versions')
      );
    });

    it('should require an open session', async () => {
      const { client, lookup } = setup();

      await expect(client.probe('router.test')).rejects.toThrow(
        new StateError('Cannot probe while the session is closed')
      );
      expect(lookup).not.toHaveBeenCalled();
    });
  });

  describe('checkSupport', () => {
    it('should report feature support', async () => {
      const { client, fake } = setup({ features: ['send-probe', 'udp'] });
      await client.open();

      await expect(client.checkSupport('udp')).resolves.toBe(true);
      await expect(client.checkSupport('sctp')).resolves.toBe(false);
      expect(fake.received.map((command) => command.line)).toEqual([
        '1 check-support feature=send-probe',
        '2 check-support feature=udp',
        '3 check-support feature=sctp'
      ]);
    });
  });
});
