import { describe, it, expect } from 'vitest';
import { HeaderPool } from '../headers.js';

const store = {
  userAgents: ['agent-one', 'agent-two'],
  accept: ['text/html', 'application/xhtml+xml'],
  acceptLanguage: ['en', 'fr', 'de']
};

describe('HeaderPool', () => {
  it('should cycle user agents in order', () => {
    const pool = new HeaderPool(store, () => 0);

    expect([pool.next(), pool.next(), pool.next()].map(h => h['User-Agent']))
      .toEqual(['agent-one', 'agent-two', 'agent-one']);
  });

  it('should draw the other headers from the random source', () => {
    const pool = new HeaderPool(store, () => 0.99);

    expect(pool.next()).toEqual({
      'User-Agent': 'agent-one',
      'Accept': 'application/xhtml+xml',
      'Accept-Language': 'de',
      'Upgrade-Insecure-Requests': '1'
    });
  });
});
