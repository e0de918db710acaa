import { describe, it, expect, beforeEach } from '@jest/globals';

import { ChallengeRegistry } from '../../src/lib/registry/challenge-registry.js';

describe('ChallengeRegistry', () => {
  let registry: ChallengeRegistry;

  beforeEach(() => {
    registry = new ChallengeRegistry();
  });

  it('reports a miss for unknown names', () => {
    expect(registry.get('example.test')).toEqual({ keyAuthorization: '', found: false });
  });

  it('returns what was added', () => {
    registry.add('example.test', 'token123.thumb');
    expect(registry.get('example.test')).toEqual({ keyAuthorization: 'token123.thumb', found: true });
  });

  it('overwrites on repeated add', () => {
    registry.add('example.test', 'first.thumb');
    registry.add('example.test', 'second.thumb');

    expect(registry.get('example.test').keyAuthorization).toBe('second.thumb');
    expect(registry.size).toBe(1);
  });

  it('forgets deleted names', () => {
    registry.add('example.test', 'token123.thumb');
    registry.delete('example.test');

    expect(registry.get('example.test')).toEqual({ keyAuthorization: '', found: false });
  });

  it('ignores deletes of absent names', () => {
    registry.add('a.test', 'a');
    registry.delete('b.test');
    expect(registry.size).toBe(1);
    expect(registry.get('a.test').found).toBe(true);
  });

  it('matches names exactly', () => {
    registry.add('Example.Test', 'k');
    expect(registry.get('example.test').found).toBe(false);
  });

  it('stores an empty key authorization as a registration', () => {
    registry.add('empty.test', '');
    expect(registry.get('empty.test')).toEqual({ keyAuthorization: '', found: true });
  });

  it('counts and clears registrations', () => {
    registry.add('a.test', 'a');
    registry.add('b.test', 'b');
    expect(registry.size).toBe(2);

    registry.clear();
    expect(registry.size).toBe(0);
    expect(registry.get('a.test').found).toBe(false);
  });

  it('keeps values intact under interleaved async writers and readers', async () => {
    const hosts = Array.from({ length: 20 }, (_, i) => `host${i}.test`);
    const seen: string[] = [];

    await Promise.all(
      hosts.flatMap((host, i) => [
        (async () => {
          for (let round = 0; round < 25; round++) {
            registry.add(host, `${host}.${round}`);
            await Promise.resolve();
            if (round % 5 === 4) registry.delete(host);
          }
        })(),
        (async () => {
          for (let round = 0; round < 25; round++) {
            const { keyAuthorization, found } = registry.get(hosts[(i + round) % hosts.length]);
            if (found) seen.push(keyAuthorization);
            await Promise.resolve();
          }
        })(),
      ]),
    );

    expect(seen.length).toBeGreaterThan(0);
    for (const value of seen) {
      expect(value).toMatch(/^host\d+\.test\.\d+$/);
    }
  });
});
