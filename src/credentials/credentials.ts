/**
 * Resolved credential set. Values are reachable only through `get()`;
 * every serialization shows key names and provenance.
 */

import type { CredentialEntry, CredentialProvenance } from "../types.js";

export class Credentials {
  private readonly entries: ReadonlyMap<string, CredentialEntry>;

  constructor(entries: Iterable<CredentialEntry>) {
    const map = new Map<string, CredentialEntry>();
    for (const entry of entries) map.set(entry.key, Object.freeze({ ...entry }));
    this.entries = map;
  }

  /** Value for a key, `""` when absent or unset. */
  get(key: string): string {
    return this.entries.get(key)?.value ?? "";
  }

  /** True when the key resolved to a non-empty value. */
  has(key: string): boolean {
    return this.get(key).length > 0;
  }

  provenanceOf(key: string): CredentialProvenance | undefined {
    return this.entries.get(key)?.provenance;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Subset holding only the given keys (unknown keys are ignored). */
  pick(keys: Iterable<string>): Credentials {
    const picked: CredentialEntry[] = [];
    for (const key of keys) {
      const entry = this.entries.get(key);
      if (entry) picked.push(entry);
    }
    return new Credentials(picked);
  }

  /** Non-empty values of secure entries, for log redaction. */
  secretValues(): string[] {
    return [...this.entries.values()]
      .filter((entry) => entry.secure && entry.value.length > 0)
      .map((entry) => entry.value);
  }

  /** One `key (provenance)` line per entry. */
  describe(): string[] {
    return [...this.entries.values()].map((entry) => `${entry.key} (${entry.provenance})`);
  }

  toJSON(): Record<string, CredentialProvenance> {
    const out: Record<string, CredentialProvenance> = {};
    for (const entry of this.entries.values()) out[entry.key] = entry.provenance;
    return out;
  }

  toString(): string {
    return `[Credentials: ${this.entries.size} keys]`;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): Record<string, CredentialProvenance> {
    return this.toJSON();
  }
}
