import { describe, expect, it } from 'vitest';
import { LinkIdPolicy, MAX_LINK_ID_LENGTH } from '../src/strategies/grid/linkIdPolicy';

const STARTED_AT = 1_700_000_000_123;

describe('LinkIdPolicy', () => {
  it('stamps ladder ids with session, build and index', () => {
    const policy = new LinkIdPolicy(STARTED_AT);
    expect(policy.sessionId).toBe(1_700_000_000);
    expect(policy.nextBuild(STARTED_AT)).toBe(1_700_000_000_124);
    expect(policy.ladderLinkId('buy', 3)).toBe('buy_1700000000_1700000000124_3');
    expect(policy.ladderLinkId('sell', 0)).toBe('sell_1700000000_1700000000124_0');
  });

  it('never repeats a build stamp within a session', () => {
    const policy = new LinkIdPolicy(STARTED_AT);
    const first = policy.nextBuild(STARTED_AT + 10);
    const second = policy.nextBuild(STARTED_AT + 10);
    const third = policy.nextBuild(STARTED_AT + 5);
    expect([first, second, third]).toEqual([STARTED_AT + 10, STARTED_AT + 11, STARTED_AT + 12]);
  });

  it('numbers counter ids across the session', () => {
    const policy = new LinkIdPolicy(STARTED_AT);
    policy.nextBuild(STARTED_AT);
    expect(policy.counterLinkId('sell')).toBe('sell_1700000000_1700000000124_c1');
    policy.nextBuild(STARTED_AT + 1000);
    expect(policy.counterLinkId('buy')).toBe('buy_1700000000_1700000001123_c2');
  });

  it('differs across restarts even for the same ladder position', () => {
    const before = new LinkIdPolicy(STARTED_AT);
    const after = new LinkIdPolicy(STARTED_AT + 1000);
    before.nextBuild(STARTED_AT);
    after.nextBuild(STARTED_AT + 1000);
    expect(before.ladderLinkId('buy', 0)).not.toBe(after.ladderLinkId('buy', 0));
  });

  it('stays inside the id charset and length of the supported venues', () => {
    const policy = new LinkIdPolicy(STARTED_AT);
    policy.nextBuild(STARTED_AT);
    const ids: string[] = [];
    for (let index = 0; index < 100; index++) {
      ids.push(policy.ladderLinkId('sell', index), policy.ladderLinkId('buy', index));
    }
    for (let seq = 1; seq <= 9_999; seq++) {
      ids.push(policy.counterLinkId(seq % 2 ? 'sell' : 'buy'));
    }
    expect(ids.at(-1)).toBe('sell_1700000000_1700000000124_c9999');
    for (const id of ids) {
      expect(id).toMatch(/^[a-z0-9_]{1,36}$/);
    }
  });

  it('refuses ids the exchange would reject', () => {
    const policy = new LinkIdPolicy(STARTED_AT);
    expect(policy.ladderLinkId('sell', 123456)).toHaveLength(MAX_LINK_ID_LENGTH);
    expect(() => policy.ladderLinkId('sell', 1234567)).toThrow('link_id_too_long');
  });
});
