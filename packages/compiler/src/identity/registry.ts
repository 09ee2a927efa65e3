/**
 * DedupRegistry - one generated name per distinct schema within a run.
 *
 * Lookup and insert happen in the same synchronous call, so compilations
 * interleaved on the event loop cannot register the same identity twice.
 * A hash shared by two different signatures is widened (16, then 64 hex
 * chars) until the entries separate.
 */

import { Identity } from "../types.js";
import { digestSignature } from "./hasher.js";

const WIDENED_LENGTHS = [16, 64] as const;

export type RegistryEntry = {
  readonly name: string;
  readonly signature: string;
};

export type Registration = {
  readonly name: string;
  /** The identity the name was registered under (wider after a collision) */
  readonly identity: Identity;
  readonly collided: boolean;
};

export type DedupRegistry = {
  /**
   * Return the name registered for this identity, registering
   * `candidateName` when the identity is new. Idempotent.
   */
  readonly resolveOrRegister: (
    identity: Identity,
    candidateName: string
  ) => Registration;
  readonly lookup: (hash: string) => RegistryEntry | undefined;
  readonly entries: () => ReadonlyMap<string, RegistryEntry>;
};

/**
 * Swap the hash suffix of a candidate name for a wider one.
 */
const renameForHash = (
  candidateName: string,
  previousHash: string,
  hash: string
): string =>
  candidateName.endsWith(previousHash)
    ? `${candidateName.slice(0, -previousHash.length)}${hash}`
    : `${candidateName}_${hash}`;

export const createDedupRegistry = (): DedupRegistry => {
  const byHash = new Map<string, RegistryEntry>();

  const resolveOrRegister = (
    identity: Identity,
    candidateName: string
  ): Registration => {
    const existing = byHash.get(identity.hash);
    if (!existing) {
      byHash.set(identity.hash, {
        name: candidateName,
        signature: identity.signature,
      });
      return { name: candidateName, identity, collided: false };
    }
    if (existing.signature === identity.signature) {
      return { name: existing.name, identity, collided: false };
    }

    const digest = digestSignature(identity.signature);
    for (const length of WIDENED_LENGTHS) {
      const hash = digest.slice(0, length);
      const widened: Identity = { hash, signature: identity.signature };
      const entry = byHash.get(hash);
      if (entry && entry.signature === identity.signature) {
        return { name: entry.name, identity: widened, collided: true };
      }
      if (!entry) {
        const name = renameForHash(candidateName, identity.hash, hash);
        byHash.set(hash, { name, signature: identity.signature });
        return { name, identity: widened, collided: true };
      }
    }

    throw new Error(
      `ICE: SHA-256 collision between '${existing.signature}' and '${identity.signature}'`
    );
  };

  return {
    resolveOrRegister,
    lookup: (hash) => byHash.get(hash),
    entries: () => byHash,
  };
};
