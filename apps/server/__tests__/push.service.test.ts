import { BadRequestException, NotFoundException } from '@nestjs/common';
import { LocalSigner, RotatingSigner } from '@relaypush/web-push';
import { beforeEach, describe, expect, it } from 'vitest';

import { PushService } from '../src/modules/push/push.service';
import { MemorySubscriptionRepository } from '../src/modules/subscriptions/memory-subscription.repository';
import { createSubscriber, fakeTransport, readNotification, vapidKeyOf } from './support';

const SUBJECT = 'mailto:ops@example.com';

describe('PushService', () => {
  let oldKey: LocalSigner;
  let signer: RotatingSigner;
  let subscriptions: MemorySubscriptionRepository;

  function createService(transport = fakeTransport(), allowedPushServiceHosts: string[] = []) {
    return new PushService(signer, subscriptions, { subject: SUBJECT }, { allowedPushServiceHosts }, transport);
  }

  beforeEach(() => {
    oldKey = LocalSigner.generate();
    signer = new RotatingSigner(oldKey);
    subscriptions = new MemorySubscriptionRepository();
  });

  describe('subscribe', () => {
    it('stores the subscription with the current key', async () => {
      const service = createService();
      const subscriber = createSubscriber('https://push.example.com/a');

      const result = await service.subscribe({ ...subscriber.json, userId: 'user-1' });

      expect(result.message).toBe('Subscribed successfully');
      const stored = await subscriptions.get(result.id);
      expect(stored.userId).toBe('user-1');
      expect(stored.vapidKey).toBe(oldKey.publicKeyBase64());
      expect(stored.subscription).toEqual(subscriber.json);
    });

    it('returns the existing record for a known endpoint', async () => {
      const service = createService();
      const subscriber = createSubscriber('https://push.example.com/a');
      const first = await service.subscribe(subscriber.json);

      const second = await service.subscribe(subscriber.json);

      expect(second).toEqual({ id: first.id, message: 'Already subscribed' });
      expect(await subscriptions.list(10, 0)).toHaveLength(1);
    });

    it('rejects malformed keys', async () => {
      const service = createService();
      const subscriber = createSubscriber('https://push.example.com/a');

      await expect(
        service.subscribe({ ...subscriber.json, keys: { ...subscriber.json.keys, auth: 'AAAA' } }),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(await subscriptions.list(10, 0)).toEqual([]);
    });

    it('only accepts endpoints on allowed push services', async () => {
      const service = createService(fakeTransport(), ['*.push.example.com', 'fcm.googleapis.com']);

      await expect(
        service.subscribe(createSubscriber('https://evil.example.net/a').json),
      ).rejects.toThrow('Push service is not allowed');
      await expect(
        service.subscribe(createSubscriber('https://eu.push.example.com/a').json),
      ).resolves.toMatchObject({ message: 'Subscribed successfully' });
      await expect(
        service.subscribe(createSubscriber('https://fcm.googleapis.com/fcm/send/a').json),
      ).resolves.toMatchObject({ message: 'Subscribed successfully' });
    });
  });

  describe('isAllowedPushService', () => {
    it('allows every host when no hosts are configured', () => {
      expect(createService().isAllowedPushService('https://anything.example.org/x')).toBe(true);
    });

    it('matches exact hosts and subdomain patterns', () => {
      const service = createService(fakeTransport(), ['*.example.com', 'push.example.org']);

      expect(service.isAllowedPushService('https://a.example.com/x')).toBe(true);
      expect(service.isAllowedPushService('https://example.com/x')).toBe(false);
      expect(service.isAllowedPushService('https://push.example.org/x')).toBe(true);
      expect(service.isAllowedPushService('https://eu.push.example.org/x')).toBe(false);
      expect(service.isAllowedPushService('not a url')).toBe(false);
    });
  });

  describe('unsubscribe', () => {
    it('deletes the subscription for an endpoint', async () => {
      const service = createService();
      const subscriber = createSubscriber('https://push.example.com/a');
      await service.subscribe(subscriber.json);

      await expect(service.unsubscribe(subscriber.json.endpoint)).resolves.toEqual({
        message: 'Unsubscribed successfully',
      });
      expect(await subscriptions.list(10, 0)).toEqual([]);
    });

    it('reports unknown endpoints as not found', async () => {
      await expect(createService().unsubscribe('https://push.example.com/missing')).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });
  });

  describe('ping', () => {
    it('returns zero counts when nobody is subscribed', async () => {
      const transport = fakeTransport();

      await expect(createService(transport).ping({})).resolves.toEqual({ sent: 0, failed: 0, pruned: 0 });
      expect(transport).not.toHaveBeenCalled();
    });

    it('signs each message with the key its subscriber subscribed under', async () => {
      const transport = fakeTransport();
      const service = createService(transport);
      const early = createSubscriber('https://push.example.com/early');
      const late = createSubscriber('https://push.example.com/late');

      await service.subscribe(early.json);
      const newKey = LocalSigner.generate();
      await signer.rotate(newKey);
      await service.subscribe(late.json);

      const result = await service.ping({ title: 'Hello', body: 'World' });

      expect(result).toEqual({ sent: 2, failed: 0, pruned: 0 });
      const [[earlyEndpoint, earlyRequest], [lateEndpoint, lateRequest]] = transport.mock.calls;
      expect(earlyEndpoint).toBe(early.json.endpoint);
      expect(vapidKeyOf(earlyRequest)).toBe(oldKey.publicKeyBase64());
      expect(lateEndpoint).toBe(late.json.endpoint);
      expect(vapidKeyOf(lateRequest)).toBe(newKey.publicKeyBase64());
      expect(lateRequest.headers.TTL).toBe('3600');
      expect(lateRequest.headers.Urgency).toBe('normal');
      await expect(readNotification(late, lateRequest)).resolves.toEqual({ title: 'Hello', body: 'World' });
    });

    it('falls back to the current key when the subscription key was removed', async () => {
      const transport = fakeTransport();
      const service = createService(transport);
      await service.subscribe(createSubscriber('https://push.example.com/a').json);
      const newKey = LocalSigner.generate();
      await signer.rotate(newKey);
      await signer.removeKey(oldKey.publicKeyBase64());

      await service.ping({});

      expect(vapidKeyOf(transport.mock.calls[0][1])).toBe(newKey.publicKeyBase64());
    });

    it('fills in a default title and body', async () => {
      const transport = fakeTransport();
      const service = createService(transport);
      const subscriber = createSubscriber('https://push.example.com/a');
      await service.subscribe(subscriber.json);

      await service.ping({}, new Date('2024-05-01T12:00:00.000Z'));

      await expect(readNotification(subscriber, transport.mock.calls[0][1])).resolves.toEqual({
        title: 'Ping!',
        body: 'Someone pinged the server at 2024-05-01T12:00:00.000Z',
      });
    });

    it('counts failures and prunes subscriptions that are gone', async () => {
      const transport = fakeTransport({
        'https://push.example.com/gone': 410,
        'https://push.example.com/missing': 404,
        'https://push.example.com/broken': 500,
      });
      const service = createService(transport);
      for (const name of ['ok', 'gone', 'missing', 'broken']) {
        await service.subscribe(createSubscriber(`https://push.example.com/${name}`).json);
      }

      const result = await service.ping({});

      expect(result).toEqual({ sent: 1, failed: 3, pruned: 2 });
      expect((await subscriptions.list(10, 0)).map((r) => r.subscription.endpoint)).toEqual([
        'https://push.example.com/ok',
        'https://push.example.com/broken',
      ]);
    });

    it('keeps going when the transport throws', async () => {
      const transport = fakeTransport();
      transport.mockRejectedValueOnce(new Error('connection reset'));
      const service = createService(transport);
      await service.subscribe(createSubscriber('https://push.example.com/a').json);
      await service.subscribe(createSubscriber('https://push.example.com/b').json);

      await expect(service.ping({})).resolves.toEqual({ sent: 1, failed: 1, pruned: 0 });
      expect(await subscriptions.list(10, 0)).toHaveLength(2);
    });
  });
});
