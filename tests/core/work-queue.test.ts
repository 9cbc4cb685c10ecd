import { describe, it, expect } from 'vitest';
import { InMemoryCandidateQueue } from '../../src/core/work-queue.js';
import { partitionForDomain } from '../../src/utils/domain.js';
import type { ExtractionAttempt } from '../../src/types/index.js';

const ATTEMPT: ExtractionAttempt = {
  url: 'https://a.example/1',
  domain: 'a.example',
  methodsTried: ['structured'],
  finalMethod: null,
  outcome: 'failed',
  elapsedMs: 3,
  httpStatus: 500,
  protectionKind: null,
  proxyUsed: false,
};

describe('InMemoryCandidateQueue', () => {
  it('adds candidates once and derives the domain', async () => {
    const queue = new InMemoryCandidateQueue();

    expect(queue.add({ url: 'https://www.a.example/1' }, { url: 'https://www.a.example/1' })).toBe(1);
    expect(await queue.fetchCandidates(10)).toEqual([
      { url: 'https://www.a.example/1', domain: 'a.example', sourceId: 'default', status: 'candidate' },
    ]);
  });

  it('keeps candidates until an outcome is recorded', async () => {
    const queue = new InMemoryCandidateQueue();
    queue.add({ url: 'https://a.example/1', sourceId: 'feed-1' }, { url: 'https://a.example/2' });

    const [first] = await queue.fetchCandidates(1);
    expect(first.url).toBe('https://a.example/1');
    expect(await queue.fetchCandidates(10)).toHaveLength(2);

    await queue.record({ class: 'failed', candidate: first, attempt: ATTEMPT, reason: 'HTTP 500' });

    expect(queue.size()).toBe(1);
    expect((await queue.fetchCandidates(10)).map((c) => c.url)).toEqual(['https://a.example/2']);
  });

  it('holds pending candidates back until their retry time', async () => {
    let clock = 1000;
    const queue = new InMemoryCandidateQueue({ now: () => clock });
    queue.add({ url: 'https://a.example/1' });
    const [candidate] = await queue.fetchCandidates(1);

    await queue.record({ class: 'pending', candidate, attempt: null, retryAfterMs: 500 });

    expect(queue.size()).toBe(1);
    expect(await queue.fetchCandidates(10)).toEqual([]);
    clock = 1500;
    expect(await queue.fetchCandidates(10)).toHaveLength(1);
  });

  it('filters by partition', async () => {
    const queue = new InMemoryCandidateQueue();
    const domains = ['a.example', 'b.example', 'c.example', 'd.example', 'e.example'];
    queue.add(...domains.map((domain) => ({ url: `https://${domain}/1` })));

    const seen: string[] = [];
    for (let index = 0; index < 2; index++) {
      const batch = await queue.fetchCandidates(10, { index, count: 2 });
      for (const candidate of batch) {
        expect(partitionForDomain(candidate.domain, 2)).toBe(index);
        seen.push(candidate.domain);
      }
    }
    expect(seen.sort()).toEqual(domains);
  });

  it('lists recorded outcomes by class', async () => {
    const queue = new InMemoryCandidateQueue();
    queue.add({ url: 'https://a.example/1' }, { url: 'https://a.example/2' });
    const [one, two] = await queue.fetchCandidates(2);

    await queue.record({ class: 'not_found', candidate: one, attempt: { ...ATTEMPT, outcome: 'not_found' } });
    await queue.record({ class: 'failed', candidate: two, attempt: ATTEMPT, reason: 'HTTP 500' });

    expect(queue.outcomesOf('not_found').map((o) => o.candidate.url)).toEqual(['https://a.example/1']);
    expect(queue.outcomesOf('failed')[0].reason).toBe('HTTP 500');
    expect(queue.size()).toBe(0);
  });
});
