/**
 * In-process participant directory.
 * Backs local runs and tests; production wires a real DirectoryProvider.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ParticipantIdentity } from '../../types/index.js';
import type { DirectoryProvider } from '../../types/providers.js';
import { FuzzyMatcher } from '../../utils/fuzzy.js';
import { logger } from '../../utils/logger.js';

export const ParticipantIdentitySchema = z.object({
  email: z.string().email(),
  displayName: z.string().min(1),
  department: z.string().optional(),
  title: z.string().optional(),
  availabilityStatus: z.enum(['available', 'busy', 'unknown']).default('unknown'),
});

const DirectoryFileSchema = z.object({
  participants: z.array(ParticipantIdentitySchema),
});

export class InMemoryDirectoryAdapter implements DirectoryProvider {
  private readonly participants: ParticipantIdentity[] = [];

  constructor(participants: readonly ParticipantIdentity[] = []) {
    const seen = new Set<string>();
    for (const participant of participants) {
      const key = participant.email.toLowerCase();
      if (seen.has(key)) {
        logger.warn(`⚠️ [Directory] Duplicate directory entry ignored: ${participant.email}`);
        continue;
      }
      seen.add(key);
      this.participants.push({ ...participant });
    }
  }

  async listParticipants(): Promise<ParticipantIdentity[]> {
    return this.participants.map(p => ({ ...p }));
  }

  async getByEmail(email: string): Promise<ParticipantIdentity | null> {
    const key = email.trim().toLowerCase();
    const found = this.participants.find(p => p.email.toLowerCase() === key);
    return found ? { ...found } : null;
  }

  /**
   * Exact email first, then substring hits on name or email,
   * then fuzzy hits for misspellings
   */
  async search(query: string, limit: number): Promise<ParticipantIdentity[]> {
    const needle = query.trim().toLowerCase();
    if (!needle || limit <= 0) return [];

    const results: ParticipantIdentity[] = [];
    const add = (participant: ParticipantIdentity) => {
      if (!results.some(r => r.email === participant.email)) {
        results.push({ ...participant });
      }
    };

    const exact = this.participants.find(p => p.email.toLowerCase() === needle);
    if (exact) add(exact);

    for (const participant of this.participants) {
      if (participant.displayName.toLowerCase().includes(needle) || participant.email.toLowerCase().includes(needle)) {
        add(participant);
      }
    }

    for (const match of FuzzyMatcher.search(needle, this.participants, ['displayName', 'email'])) {
      add(match.item);
    }

    return results.slice(0, limit);
  }
}

/**
 * Load a directory from a JSON file shaped `{ "participants": [...] }`
 */
export async function loadDirectoryFromFile(path: string): Promise<InMemoryDirectoryAdapter> {
  const raw = await readFile(path, 'utf8');
  const parsed = DirectoryFileSchema.parse(JSON.parse(raw));
  logger.info(`📇 [Directory] Loaded ${parsed.participants.length} participants from ${path}`);
  return new InMemoryDirectoryAdapter(parsed.participants);
}
