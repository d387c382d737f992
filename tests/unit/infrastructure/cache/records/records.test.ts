import { describe, expect, it } from 'vitest';

import { buildDmChannel, toDmChannelRecord } from '@/infrastructure/cache/records/DmChannelRecord';
import { buildEmoji, toEmojiRecord } from '@/infrastructure/cache/records/EmojiRecord';
import { buildMember, toMemberRecord } from '@/infrastructure/cache/records/MemberRecord';
import { buildMessage, toMessageRecord } from '@/infrastructure/cache/records/MessageRecord';
import { buildVoiceState, toVoiceStateRecord } from '@/infrastructure/cache/records/VoiceStateRecord';

import {
  makeDmChannel,
  makeEmoji,
  makeMember,
  makeMessage,
  makeUser,
  makeVoiceState,
} from '@tests/helpers/fixtures';

describe('cache records', () => {
  const user = makeUser(1n, { globalName: 'Uno' });

  it('member records drop the user and rebuild with it', () => {
    const member = makeMember(100n, user, { nickname: 'n', roleIds: [5n, 6n], premiumSince: new Date(0) });
    const record = toMemberRecord(member);

    expect(record).not.toHaveProperty('user');
    expect(record.id).toBe(1n);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.roleIds)).toBe(true);
    expect(buildMember(record, user)).toEqual(member);
  });

  it('voice state records embed the member record', () => {
    const voiceState = makeVoiceState(makeMember(100n, user), 900n);
    const record = toVoiceStateRecord(voiceState);

    expect(record.member.id).toBe(1n);
    expect(buildVoiceState(record, user)).toEqual(voiceState);
  });

  it('DM channel records keep only the recipient id', () => {
    const channel = makeDmChannel(5642134n, makeUser(2342344n));
    const record = toDmChannelRecord(channel);

    expect(record).toEqual({ id: 5642134n, name: null, lastMessageId: null, recipientId: 2342344n });
    expect(buildDmChannel(record, channel.recipient)).toEqual(channel);
  });

  it('emoji records keep a nullable creator id', () => {
    const withCreator = makeEmoji(30n, 100n, user);
    const withoutCreator = makeEmoji(31n, 100n, null);

    expect(toEmojiRecord(withCreator).userId).toBe(1n);
    expect(toEmojiRecord(withoutCreator).userId).toBeNull();
    expect(buildEmoji(toEmojiRecord(withCreator), user)).toEqual(withCreator);
  });

  it('message records replace the author with its id', () => {
    const message = makeMessage(1n, 10n, user, {
      attachments: [
        { id: 2n, filename: 'a.txt', size: 3, url: 'https://cdn.example/a', proxyUrl: 'https://media.example/a', height: null, width: null },
      ],
    });
    const record = toMessageRecord(message);

    expect(record.authorId).toBe(1n);
    expect(record).not.toHaveProperty('author');
    expect(Object.isFrozen(record.attachments[0])).toBe(true);
    expect(buildMessage(record, user)).toEqual(message);
  });
});
