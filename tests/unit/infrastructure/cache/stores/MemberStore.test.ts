import { beforeEach, describe, expect, it } from 'vitest';

import { StatefulCache } from '@/infrastructure/cache/StatefulCache';

import { createMockLogger, makeMember, makeUser, makeVoiceState } from '@tests/helpers/fixtures';

describe('MemberStore', () => {
  let cache: StatefulCache;

  beforeEach(() => {
    cache = new StatefulCache({ logger: createMockLogger() });
  });

  it('rebuilds the member it stored', () => {
    const member = makeMember(100n, makeUser(1n), { nickname: 'uno', roleIds: [20n, 21n] });

    cache.members.set(member);

    expect(cache.members.get(100n, 1n)).toEqual(member);
    expect(cache.users.get(1n)).toEqual(member.user);
  });

  it('evicts the user when its only member is deleted', () => {
    cache.members.set(makeMember(100n, makeUser(1n)));

    expect(cache.members.delete(100n, 1n)?.user.id).toBe(1n);
    expect(cache.users.get(1n)).toBeUndefined();
    expect(cache.guilds.getRecord(100n)).toBeUndefined();
  });

  it('keeps the user while another guild still references it', () => {
    const user = makeUser(1n);
    cache.members.set(makeMember(100n, user));
    cache.members.set(makeMember(200n, user));

    cache.members.delete(100n, 1n);

    expect(cache.users.get(1n)).toEqual(user);
    expect(cache.users.referenceCount(1n)).toBe(1);
  });

  it('replacing a member keeps a single reference to the same user', () => {
    cache.members.set(makeMember(100n, makeUser(1n)));
    cache.members.set(makeMember(100n, makeUser(1n, { username: 'new-name' }), { nickname: 'nick' }));

    expect(cache.users.referenceCount(1n)).toBe(1);
    expect(cache.members.get(100n, 1n)?.user.username).toBe('new-name');
    expect(cache.guilds.getRecord(100n)?.userReferences).toBe(1);
  });

  it('update returns undefined as the old value for an uncached member', () => {
    const [old, current] = cache.members.update(makeMember(100n, makeUser(1n)));

    expect(old).toBeUndefined();
    expect(current?.user.id).toBe(1n);

    const [previous, next] = cache.members.update(makeMember(100n, makeUser(1n), { nickname: 'later' }));
    expect(previous?.nickname).toBeNull();
    expect(next?.nickname).toBe('later');
  });

  it('view skips members whose user no longer resolves', () => {
    cache.members.set(makeMember(100n, makeUser(1n)));
    cache.members.set(makeMember(100n, makeUser(2n)));
    cache.users.delete(2n);

    const view = cache.members.view(100n);

    expect(Array.from(view.keys())).toEqual([1n]);
    expect(cache.members.get(100n, 2n)).toBeUndefined();
  });

  it('clear removes every member of the guild and releases their users', () => {
    cache.members.set(makeMember(100n, makeUser(1n)));
    cache.members.set(makeMember(100n, makeUser(2n)));

    const cleared = cache.members.clear(100n);

    expect(cleared.size).toBe(2);
    expect(cache.users.size).toBe(0);
    expect(cache.guilds.getRecord(100n)).toBeUndefined();
  });
});

describe('VoiceStateStore', () => {
  let cache: StatefulCache;

  beforeEach(() => {
    cache = new StatefulCache({ logger: createMockLogger() });
  });

  it('stores voice states with their member', () => {
    const voiceState = makeVoiceState(makeMember(100n, makeUser(1n)));

    cache.voiceStates.set(voiceState);

    expect(cache.voiceStates.get(100n, 1n)).toEqual(voiceState);
    expect(cache.users.referenceCount(1n)).toBe(1);
  });

  it('filters voice states by channel', () => {
    cache.voiceStates.set(makeVoiceState(makeMember(100n, makeUser(1n)), 900n));
    cache.voiceStates.set(makeVoiceState(makeMember(100n, makeUser(2n)), 901n));
    cache.voiceStates.set(makeVoiceState(makeMember(100n, makeUser(3n)), 900n));

    expect(Array.from(cache.voiceStates.viewForChannel(100n, 900n).keys())).toEqual([1n, 3n]);
    expect(cache.voiceStates.view(100n).size).toBe(3);
  });

  it('shares the user reference count with members', () => {
    const member = makeMember(100n, makeUser(1n));
    cache.members.set(member);
    cache.voiceStates.set(makeVoiceState(member));

    expect(cache.users.referenceCount(1n)).toBe(2);

    expect(cache.voiceStates.delete(100n, 1n)?.userId).toBe(1n);
    expect(cache.users.get(1n)).toBeDefined();

    cache.members.delete(100n, 1n);
    expect(cache.users.get(1n)).toBeUndefined();
    expect(cache.guilds.getRecord(100n)).toBeUndefined();
  });

  it('clear releases every voice state user', () => {
    cache.voiceStates.set(makeVoiceState(makeMember(100n, makeUser(1n))));
    cache.voiceStates.set(makeVoiceState(makeMember(100n, makeUser(2n))));

    expect(cache.voiceStates.clear(100n).size).toBe(2);
    expect(cache.users.size).toBe(0);
  });
});
