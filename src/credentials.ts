/**
 * Credential pool.
 * Draws requester credentials uniformly at random from an immutable set.
 */

import { ConfigError } from "./errors.js";
import type { Credential } from "./types.js";

/** Anything that can hand out a credential for the next request. */
export interface CredentialSource {
  next(): Credential;
}

/** Matches the configuration default */
export const DEFAULT_ROTATE_EVERY = 3;

export type CredentialSelection = "per-request" | "per-subject";

export interface CredentialPoolOptions {
  /** How credentials are assigned to work (default: per-request) */
  selection?: CredentialSelection;
  /** In per-subject mode, redraw after this many subjects (default: 3) */
  rotateEvery?: number;
  /** Source of randomness in [0, 1) */
  random?: () => number;
}

function copyCredential(credential: Credential): Credential {
  return { email: credential.email, apiKey: credential.apiKey };
}

/** A source that always returns the same credential. */
class PinnedCredential implements CredentialSource {
  private readonly credential: Credential;

  constructor(credential: Credential) {
    this.credential = copyCredential(credential);
  }

  next(): Credential {
    return copyCredential(this.credential);
  }
}

export class CredentialPool implements CredentialSource {
  private readonly credentials: readonly Credential[];
  private readonly selection: CredentialSelection;
  private readonly rotateEvery: number;
  private readonly random: () => number;

  /** Per-subject rotation state; local to this pool */
  private subjectsServed = 0;
  private current: Credential | undefined;

  constructor(credentials: readonly Credential[], options: CredentialPoolOptions = {}) {
    if (credentials.length === 0) {
      throw new ConfigError("Credential pool requires at least one credential");
    }
    const rotateEvery = options.rotateEvery ?? DEFAULT_ROTATE_EVERY;
    if (!Number.isInteger(rotateEvery) || rotateEvery < 1) {
      throw new ConfigError(`rotateEvery must be a positive integer, got ${rotateEvery}`);
    }

    this.credentials = Object.freeze(credentials.map(copyCredential));
    this.selection = options.selection ?? "per-request";
    this.rotateEvery = rotateEvery;
    this.random = options.random ?? Math.random;
  }

  get size(): number {
    return this.credentials.length;
  }

  /** Uniform random draw. Consecutive draws may repeat. */
  next(): Credential {
    const index = Math.min(Math.floor(this.random() * this.credentials.length), this.credentials.length - 1);
    const credential = this.credentials[index];
    if (!credential) {
      throw new ConfigError("Credential pool is empty");
    }
    return copyCredential(credential);
  }

  /**
   * Credential source for one subject's pipeline.
   * per-request: the pool itself, so every request draws afresh.
   * per-subject: one credential for the whole subject, redrawn every `rotateEvery` subjects.
   */
  forSubject(): CredentialSource {
    if (this.selection === "per-request") return this;

    if (!this.current || this.subjectsServed % this.rotateEvery === 0) {
      this.current = this.next();
    }
    this.subjectsServed++;
    return new PinnedCredential(this.current);
  }
}
