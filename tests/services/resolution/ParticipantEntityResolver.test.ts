/**
 * Participant Resolution Tests
 */

import { describe, expect, it } from 'vitest';
import { InMemoryDirectoryAdapter } from '../../../src/services/adapters/InMemoryDirectoryAdapter.js';
import {
  classifyNameMatch,
  needsDisambiguation,
  ParticipantEntityResolver,
} from '../../../src/services/resolution/ParticipantEntityResolver.js';
import type { ParticipantIdentity } from '../../../src/types/index.js';
import type { DirectoryProvider } from '../../../src/types/providers.js';
import { JOHN, JOHN_BROWN, JOHN_SMITH, person, SARAH } from '../../support/fixtures.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

const SARAH_LEE = person('Sarah Lee', 'sarah.lee@example.com');

function resolverFor(participants: ParticipantIdentity[]): ParticipantEntityResolver {
  return new ParticipantEntityResolver(new InMemoryDirectoryAdapter(participants));
}

const failingDirectory: DirectoryProvider = {
  listParticipants: () => Promise.reject(new Error('directory offline')),
  getByEmail: () => Promise.reject(new Error('directory offline')),
  search: () => Promise.reject(new Error('directory offline')),
};

// ============================================================================
// NAME QUERIES
// ============================================================================

describe('ParticipantEntityResolver name queries', () => {
  it('should resolve unique exact names without disambiguation', async () => {
    const matches = await resolverFor([JOHN, SARAH]).resolve(['John', 'Sarah'], []);

    expect(matches).toEqual([
      { query: 'John', candidates: [JOHN], confidence: 1, isExact: true, isEmailQuery: false },
      { query: 'Sarah', candidates: [SARAH], confidence: 1, isExact: true, isEmailQuery: false },
    ]);
    expect(needsDisambiguation(matches)).toBe(false);
  });

  it('should flag a shared first name as ambiguous', async () => {
    const matches = await resolverFor([JOHN_SMITH, JOHN_BROWN, SARAH]).resolve(['John', 'Sarah'], []);

    expect(matches[0].candidates).toEqual([JOHN_SMITH, JOHN_BROWN]);
    expect(matches[0].confidence).toBe(0.7);
    expect(matches[0].isExact).toBe(false);
    expect(needsDisambiguation(matches)).toBe(true);
  });

  it('should not treat a single first-name hit as exact', async () => {
    const [match] = await resolverFor([JOHN_SMITH, SARAH_LEE]).resolve(['Sarah'], []);

    expect(match.candidates).toEqual([SARAH_LEE]);
    expect(match.confidence).toBe(0.9);
    expect(match.isExact).toBe(false);
  });

  it('should score last-name and substring hits', async () => {
    const resolver = resolverFor([JOHN_SMITH, JOHN_BROWN, SARAH_LEE]);
    const [lastName, substring] = await resolver.resolve(['Brown', 'Jo'], []);

    expect(lastName.candidates).toEqual([JOHN_BROWN]);
    expect(lastName.confidence).toBe(0.8);
    expect(substring.candidates).toEqual([JOHN_SMITH, JOHN_BROWN]);
    expect(substring.confidence).toBe(0.5);
  });

  it('should score token overlap by whole shared words', async () => {
    const resolver = resolverFor([JOHN_SMITH, JOHN_BROWN, SARAH_LEE]);
    const [partial, whole] = await resolver.resolve(['Johnny Smithers', 'Pat Smith Jones'], []);

    expect(partial.candidates).toEqual([JOHN_SMITH, JOHN_BROWN]);
    expect(partial.confidence).toBeCloseTo(0.3);
    expect(whole.candidates).toEqual([JOHN_SMITH]);
    expect(whole.confidence).toBeCloseTo(0.4);
  });

  it('should put exact hits ahead of weaker ones', async () => {
    const [match] = await resolverFor([JOHN_SMITH, JOHN]).resolve(['John'], []);

    expect(match.candidates).toEqual([JOHN, JOHN_SMITH]);
    expect(match.confidence).toBe(1);
    expect(match.isExact).toBe(false);
  });

  it('should return no candidates for unknown names', async () => {
    const [match] = await resolverFor([JOHN_SMITH, SARAH_LEE]).resolve(['Zed'], []);

    expect(match).toEqual({ query: 'Zed', candidates: [], confidence: 0, isExact: false, isEmailQuery: false });
  });

  it('should skip one-letter names', async () => {
    expect(await resolverFor([JOHN]).resolve(['J', ' '], [])).toEqual([]);
  });

  it('should cap candidates at ten', async () => {
    const many = Array.from({ length: 12 }, (_, i) => person(`Alex Member${i}`, `alex${i}@example.com`));
    const [match] = await resolverFor(many).resolve(['Alex'], []);

    expect(match.candidates).toHaveLength(10);
    expect(match.candidates[0].email).toBe('alex0@example.com');
  });

  it('should treat a failed directory listing as no data', async () => {
    const [match] = await new ParticipantEntityResolver(failingDirectory).resolve(['John'], []);

    expect(match.candidates).toEqual([]);
    expect(match.confidence).toBe(0);
  });
});

// ============================================================================
// EMAIL QUERIES
// ============================================================================

describe('ParticipantEntityResolver email queries', () => {
  it('should resolve directory emails exactly', async () => {
    const [match] = await resolverFor([SARAH_LEE]).resolve([], ['Sarah.Lee@Example.com']);

    expect(match).toEqual({
      query: 'Sarah.Lee@Example.com',
      candidates: [SARAH_LEE],
      confidence: 1,
      isExact: true,
      isEmailQuery: true,
    });
  });

  it('should synthesize an identity for unknown addresses', async () => {
    const [match] = await resolverFor([SARAH_LEE]).resolve([], ['guest@partner.org']);

    expect(match.candidates).toEqual([
      { email: 'guest@partner.org', displayName: 'Guest', availabilityStatus: 'unknown' },
    ]);
    expect(match.confidence).toBe(0.8);
    expect(match.isExact).toBe(false);
  });

  it('should skip malformed addresses', async () => {
    expect(await resolverFor([SARAH_LEE]).resolve([], ['not-an-email'])).toEqual([]);
  });

  it('should resolve emails before names', async () => {
    const matches = await resolverFor([JOHN, SARAH_LEE]).resolve(['John'], ['sarah.lee@example.com']);

    expect(matches.map(m => m.query)).toEqual(['sarah.lee@example.com', 'John']);
  });

  it('should resolve the same email identically every time', async () => {
    const resolver = resolverFor([JOHN_SMITH, SARAH_LEE]);
    const first = await resolver.resolve([], ['john.smith@example.com']);
    const second = await resolver.resolve([], ['john.smith@example.com']);

    expect(second).toEqual(first);
  });
});

// ============================================================================
// SUGGESTIONS & VALIDATION
// ============================================================================

describe('ParticipantEntityResolver suggestions', () => {
  it('should suggest directory entries containing the partial name', async () => {
    const suggestions = await resolverFor([JOHN_SMITH, SARAH_LEE, JOHN_BROWN]).suggest('john', 2);

    expect(suggestions).toEqual([JOHN_SMITH, JOHN_BROWN]);
  });

  it('should return nothing for blank input or a failing directory', async () => {
    expect(await resolverFor([JOHN]).suggest('  ')).toEqual([]);
    expect(await new ParticipantEntityResolver(failingDirectory).suggest('john')).toEqual([]);
  });

  it('should report invalid, duplicate and unnamed participants', () => {
    const issues = resolverFor([]).validateParticipants([
      JOHN,
      person('John Again', 'JOHN@example.com'),
      person('', 'nobody@example.com'),
      person('Broken', 'broken@'),
    ]);

    expect(issues).toEqual({
      invalidEmails: ['broken@'],
      duplicates: ['JOHN@example.com'],
      missingInfo: ['Missing name for nobody@example.com'],
    });
  });
});

describe('classifyNameMatch', () => {
  it('should classify by the strongest rule', () => {
    expect(classifyNameMatch('john smith', 'John Smith')).toBe('exact');
    expect(classifyNameMatch('John', 'John Smith')).toBe('first_name');
    expect(classifyNameMatch('Smith', 'John Smith')).toBe('last_name');
    expect(classifyNameMatch('Smi', 'John Smith')).toBe('substring');
    expect(classifyNameMatch('Johnny Smithers', 'John Smith')).toBe('token');
    expect(classifyNameMatch('Zed', 'John Smith')).toBeNull();
  });
});
