// src/registry.ts

export type ClaimResult = 'claimed' | 'in-flight' | 'cooling-down';

export type ProcessingRegistry = {
  claim: (key: string) => ClaimResult;
  release: (key: string) => void;
  isInFlight: (key: string) => boolean;
  inFlightCount: () => number;
  historySize: () => number;
  reserveName: (destination: string) => boolean;
  releaseName: (destination: string) => void;
};

export type RegistryOptions = {
  cooldownMs?: number;
  maxHistory?: number;
  evictBatch?: number;
  now?: () => number;
};

/**
 * Claim bookkeeping shared by every worker.
 *
 * All methods are synchronous: each call runs to completion on the event
 * loop before any other worker resumes, which is the whole of the locking.
 * Callers must never await between a check and the claim that depends on it;
 * `claim` does both in one step.
 *
 * `reserveName` holds an archive path from the moment a worker picks it until
 * its rename has landed, so two workers never choose the same free name.
 */
export const createRegistry = ({
  cooldownMs = 5 * 60_000,
  maxHistory = 1_000,
  evictBatch = 100,
  now = Date.now,
}: RegistryOptions = {}): ProcessingRegistry => {
  const inFlight = new Set<string>();
  const reserved = new Set<string>();
  // Insertion order is claim order: re-claims are deleted and re-inserted.
  const history = new Map<string, number>();

  const evictOldest = (): void => {
    let dropped = 0;
    for (const key of history.keys()) {
      if (dropped >= evictBatch) break;
      if (inFlight.has(key)) continue;
      history.delete(key);
      dropped += 1;
    }
  };

  return {
    claim: (key) => {
      if (inFlight.has(key)) return 'in-flight';

      const current = now();
      const last = history.get(key);
      if (last !== undefined && current - last < cooldownMs) return 'cooling-down';

      inFlight.add(key);
      history.delete(key);
      history.set(key, current);
      if (history.size > maxHistory) evictOldest();
      return 'claimed';
    },
    release: (key) => {
      inFlight.delete(key);
    },
    isInFlight: (key) => inFlight.has(key),
    inFlightCount: () => inFlight.size,
    historySize: () => history.size,
    reserveName: (destination) => {
      if (reserved.has(destination)) return false;
      reserved.add(destination);
      return true;
    },
    releaseName: (destination) => {
      reserved.delete(destination);
    },
  };
};
