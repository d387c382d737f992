import { describe, expect, it } from 'vitest';

import type { OwnUser } from '@/domain/entities/User';
import { StatefulCache } from '@/infrastructure/cache/StatefulCache';
import { ValidationFailedError } from '@/shared/errors/domain.errors';

import {
  createMockLogger,
  makeDmChannel,
  makeGuild,
  makeMember,
  makeMessage,
  makeTextChannel,
  makeUser,
} from '@tests/helpers/fixtures';

const makeMe = (overrides: Partial<OwnUser> = {}): OwnUser => ({
  ...makeUser(1n, { isBot: true }),
  isMfaEnabled: false,
  locale: 'es-ES',
  isVerified: true,
  email: null,
  premiumType: null,
  ...overrides,
});

describe('StatefulCache', () => {
  it('uses the environment capacities by default', () => {
    const cache = new StatefulCache({ logger: createMockLogger() });

    expect(cache.messages.capacity).toBe(1000);
    expect(cache.dmChannels.capacity).toBe(100);
  });

  it('rejects invalid capacities with a validation error', () => {
    const build = () => new StatefulCache({ logger: createMockLogger(), messageCapacity: 0 });

    expect(build).toThrow(ValidationFailedError);

    let caught: unknown;
    try {
      build();
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      code: 'VALIDATION_FAILED',
      metadata: { messageCapacity: ['messageCapacity debe ser al menos 1'] },
    });
  });

  it('holds the current user without reference counting', () => {
    const cache = new StatefulCache({ logger: createMockLogger() });
    const me = makeMe();

    expect(cache.getMe()).toBeUndefined();
    cache.setMe(me);
    expect(cache.getMe()).toEqual(me);
    expect(cache.users.get(1n)).toBeUndefined();

    const [old, current] = cache.updateMe(makeMe({ locale: 'en-GB' }));
    expect(old?.locale).toBe('es-ES');
    expect(current?.locale).toBe('en-GB');

    expect(cache.deleteMe()?.locale).toBe('en-GB');
    expect(cache.getMe()).toBeUndefined();
  });

  it('resolves channels from guilds first and then from direct messages', () => {
    const cache = new StatefulCache({ logger: createMockLogger() });
    cache.guildChannels.set(makeTextChannel(40n, 100n));
    cache.dmChannels.set(makeDmChannel(50n, makeUser(2n)));

    expect(cache.getChannel(40n)?.id).toBe(40n);
    expect(cache.getChannel(50n)?.id).toBe(50n);
    expect(cache.getChannel(60n)).toBeUndefined();
  });

  it('refreshes the last message id wherever the channel is cached', () => {
    const cache = new StatefulCache({ logger: createMockLogger() });
    cache.guildChannels.set(makeTextChannel(40n, 100n));
    cache.dmChannels.set(makeDmChannel(50n, makeUser(2n)));

    expect(cache.setLastMessageId(40n, 401n)).toBe(true);
    expect(cache.setLastMessageId(50n, 501n)).toBe(true);
    expect(cache.setLastMessageId(60n, 601n)).toBe(false);
    expect(cache.getChannel(40n)).toMatchObject({ lastMessageId: 401n });
    expect(cache.getChannel(50n)).toMatchObject({ lastMessageId: 501n });
  });

  it('clearAll tears every store down', () => {
    const cache = new StatefulCache({ logger: createMockLogger() });
    const user = makeUser(2n);
    cache.setMe(makeMe());
    cache.guilds.set(makeGuild(100n));
    cache.guilds.setInitialUnavailable([200n]);
    cache.members.set(makeMember(100n, user));
    cache.dmChannels.set(makeDmChannel(50n, user));
    cache.messages.set(makeMessage(1n, 50n, user));
    cache.users.set(makeUser(3n));

    cache.clearAll();

    expect(cache.getMe()).toBeUndefined();
    expect(cache.guilds.size).toBe(0);
    expect(cache.users.size).toBe(0);
    expect(cache.users.referenceCount(2n)).toBe(0);
    expect(cache.dmChannels.size).toBe(0);
    expect(cache.messages.size).toBe(0);
  });
});
