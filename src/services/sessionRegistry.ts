// src/services/sessionRegistry.ts
import crypto from "crypto";
import { NotFoundError } from "../utils/errors";

type Entry<T> = { value: T; touchedAt: number };

export const DEFAULT_SESSION_TTL_MS = 2 * 60 * 60 * 1000;

/**
 * In-process session store keyed by random UUIDs. Entries idle for longer
 * than `ttlMs` are dropped on the next access.
 */
export class SessionRegistry<T> {
  private readonly entries = new Map<string, Entry<T>>();

  constructor(
    private readonly label: string,
    private readonly ttlMs: number = DEFAULT_SESSION_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  create(value: T): string {
    this.sweep();
    const id = crypto.randomUUID();
    this.entries.set(id, { value, touchedAt: this.now() });
    return id;
  }

  get(id: string): T {
    this.sweep();
    const entry = this.entries.get(id);
    if (!entry) throw new NotFoundError(this.label);
    entry.touchedAt = this.now();
    return entry.value;
  }

  delete(id: string): boolean {
    return this.entries.delete(id);
  }

  get size(): number {
    this.sweep();
    return this.entries.size;
  }

  private sweep(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, entry] of this.entries) {
      if (entry.touchedAt < cutoff) this.entries.delete(id);
    }
  }
}
