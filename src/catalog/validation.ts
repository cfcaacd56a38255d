import { distance } from "fastest-levenshtein";

import { RegistryInconsistencyError } from "../errors.js";
import { normalisePhrase, type ActionDescriptor } from "./descriptor.js";

/** Pair of usage phrases from different actions that are one edit apart. */
export interface NearDuplicatePhrase {
  readonly left: { readonly action: string; readonly phrase: string };
  readonly right: { readonly action: string; readonly phrase: string };
}

/** Phrases shorter than this are too short for an edit distance to mean anything. */
const NEAR_DUPLICATE_MIN_LENGTH = 6;

/**
 * Validates a complete catalog (the registry's next state). Throws
 * {@link RegistryInconsistencyError} on the first duplicate name or on a usage
 * phrase claimed by two different actions.
 */
export function validateCatalog(descriptors: Iterable<ActionDescriptor>): void {
  const names = new Set<string>();
  const phraseOwners = new Map<string, string>();

  for (const descriptor of descriptors) {
    if (names.has(descriptor.name)) {
      throw new RegistryInconsistencyError("duplicate_name", `action "${descriptor.name}" is declared twice`, {
        action: descriptor.name,
      });
    }
    names.add(descriptor.name);

    for (const phrase of descriptor.usagePhrases) {
      const key = normalisePhrase(phrase);
      const owner = phraseOwners.get(key);
      if (owner !== undefined && owner !== descriptor.name) {
        throw new RegistryInconsistencyError(
          "duplicate_usage_phrase",
          `usage phrase "${phrase}" is declared by both "${owner}" and "${descriptor.name}"`,
          { phrase, actions: [owner, descriptor.name] },
        );
      }
      phraseOwners.set(key, descriptor.name);
    }
  }
}

/**
 * Lists usage phrases of different actions within one edit of each other.
 * They are legal but usually point at a catalog mistake, so the registry logs
 * them as warnings.
 */
export function findNearDuplicatePhrases(descriptors: Iterable<ActionDescriptor>): NearDuplicatePhrase[] {
  const phrases: Array<{ action: string; phrase: string; key: string }> = [];
  for (const descriptor of descriptors) {
    for (const phrase of descriptor.usagePhrases) {
      const key = normalisePhrase(phrase);
      if (key.length >= NEAR_DUPLICATE_MIN_LENGTH) {
        phrases.push({ action: descriptor.name, phrase, key });
      }
    }
  }

  const pairs: NearDuplicatePhrase[] = [];
  for (let i = 0; i < phrases.length; i += 1) {
    for (let j = i + 1; j < phrases.length; j += 1) {
      const left = phrases[i];
      const right = phrases[j];
      if (left.action === right.action || Math.abs(left.key.length - right.key.length) > 1) {
        continue;
      }
      if (distance(left.key, right.key) === 1) {
        pairs.push({
          left: { action: left.action, phrase: left.phrase },
          right: { action: right.action, phrase: right.phrase },
        });
      }
    }
  }
  return pairs;
}

/** Returns the registered name closest to {@link name} (edit distance ≤ 3), if any. */
export function suggestActionName(name: string, candidates: Iterable<string>): string | null {
  let best: string | null = null;
  let bestDistance = 4;
  for (const candidate of candidates) {
    const current = distance(name, candidate);
    if (current < bestDistance) {
      best = candidate;
      bestDistance = current;
    }
  }
  return best;
}
