import { beforeEach, describe, expect, it } from 'vitest';

import { StatefulCache } from '@/infrastructure/cache/StatefulCache';

import {
  createMockLogger,
  makeDmChannel,
  makeMember,
  makeMessage,
  makeUser,
} from '@tests/helpers/fixtures';

describe('DmChannelStore', () => {
  let cache: StatefulCache;

  beforeEach(() => {
    cache = new StatefulCache({ logger: createMockLogger(), dmChannelCapacity: 2, messageCapacity: 2 });
  });

  it('finds a DM channel by recipient and by channel id', () => {
    const recipient = makeUser(2342344n);
    cache.users.set(recipient);
    cache.dmChannels.set(makeDmChannel(5642134n, recipient));

    const channel = cache.dmChannels.get(2342344n);

    expect(channel?.id).toBe(5642134n);
    expect(channel?.recipient).toEqual(recipient);
    expect(cache.dmChannels.getByChannelId(5642134n)?.recipient.id).toBe(2342344n);
    expect(cache.getChannel(5642134n)?.id).toBe(5642134n);
  });

  it('deleting the only holder evicts the recipient', () => {
    const recipient = makeUser(2342344n);
    cache.dmChannels.set(makeDmChannel(5642134n, recipient));

    expect(cache.dmChannels.delete(2342344n)?.id).toBe(5642134n);
    expect(cache.users.get(2342344n)).toBeUndefined();
    expect(cache.dmChannels.getByChannelId(5642134n)).toBeUndefined();
  });

  it('keeps the recipient while a member still references it', () => {
    const recipient = makeUser(7n);
    cache.members.set(makeMember(100n, recipient));
    cache.dmChannels.set(makeDmChannel(70n, recipient));

    cache.dmChannels.delete(7n);

    expect(cache.users.get(7n)).toEqual(recipient);
  });

  it('evicts the least recently used channel and releases its recipient', () => {
    cache.dmChannels.set(makeDmChannel(10n, makeUser(1n)));
    cache.dmChannels.set(makeDmChannel(20n, makeUser(2n)));
    cache.dmChannels.get(1n);
    cache.dmChannels.set(makeDmChannel(30n, makeUser(3n)));

    expect(cache.dmChannels.size).toBe(2);
    expect(cache.dmChannels.get(2n)).toBeUndefined();
    expect(cache.users.get(2n)).toBeUndefined();
    expect(cache.dmChannels.getByChannelId(20n)).toBeUndefined();
    expect(cache.users.get(1n)?.id).toBe(1n);
  });

  it('refreshes the last message id of a cached channel', () => {
    cache.dmChannels.set(makeDmChannel(10n, makeUser(1n)));

    expect(cache.dmChannels.setLastMessageId(10n, 99n)).toBe(true);
    expect(cache.dmChannels.setLastMessageId(11n, 99n)).toBe(false);
    expect(cache.dmChannels.get(1n)?.lastMessageId).toBe(99n);
    expect(cache.users.referenceCount(1n)).toBe(1);
  });

  it('clear returns channels oldest first and releases every recipient', () => {
    cache.dmChannels.set(makeDmChannel(10n, makeUser(1n)));
    cache.dmChannels.set(makeDmChannel(20n, makeUser(2n)));

    const cleared = cache.dmChannels.clear();

    expect(Array.from(cleared.keys())).toEqual([1n, 2n]);
    expect(cache.users.size).toBe(0);
    expect(cache.dmChannels.size).toBe(0);
  });
});

describe('MessageStore', () => {
  let cache: StatefulCache;

  beforeEach(() => {
    cache = new StatefulCache({ logger: createMockLogger(), dmChannelCapacity: 2, messageCapacity: 2 });
  });

  it('rebuilds messages with their author', () => {
    const message = makeMessage(1n, 10n, makeUser(5n), { userMentionIds: [6n] });
    cache.messages.set(message);

    expect(cache.messages.get(1n)).toEqual(message);
    expect(cache.users.referenceCount(5n)).toBe(1);
  });

  it('evicting a message releases its author exactly once', () => {
    const author = makeUser(5n);
    cache.messages.set(makeMessage(1n, 10n, author));
    cache.messages.set(makeMessage(2n, 10n, author));
    cache.messages.set(makeMessage(3n, 10n, makeUser(6n)));

    expect(cache.messages.get(1n)).toBeUndefined();
    expect(cache.users.referenceCount(5n)).toBe(1);

    cache.messages.set(makeMessage(4n, 10n, makeUser(6n)));
    expect(cache.users.get(5n)).toBeUndefined();
  });

  it('deleteMany returns only the messages that were cached', () => {
    cache.messages.set(makeMessage(1n, 10n, makeUser(5n)));
    cache.messages.set(makeMessage(2n, 10n, makeUser(5n)));

    const deleted = cache.messages.deleteMany([1n, 3n]);

    expect(Array.from(deleted.keys())).toEqual([1n]);
    expect(cache.users.referenceCount(5n)).toBe(1);
  });

  it('update keeps one author reference for the edited message', () => {
    cache.messages.set(makeMessage(1n, 10n, makeUser(5n)));

    const [old, current] = cache.messages.update(makeMessage(1n, 10n, makeUser(5n), { content: 'edited' }));

    expect(old?.content).toBe('message 1');
    expect(current?.content).toBe('edited');
    expect(cache.users.referenceCount(5n)).toBe(1);
  });

  it('clear releases every author', () => {
    cache.messages.set(makeMessage(1n, 10n, makeUser(5n)));
    cache.messages.set(makeMessage(2n, 10n, makeUser(6n)));

    expect(cache.messages.clear().size).toBe(2);
    expect(cache.users.size).toBe(0);
  });
});
