import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { getDefaultStatePath } from "./config/path.js";
import { atomicWriteFileSync } from "./fs-utils.js";

export const FALLBACK_PROFILE_KEY = "unknown-app";

export const ProfileRecordSchema = z.object({
  name: z.string(),
  desktop_id: z.string(),
  output_dir: z.string(),
  source_image: z.string(),
  end4_json_path: z.string().optional(),
});

export type ProfileRecord = z.infer<typeof ProfileRecordSchema>;

const StateDocumentSchema = z.looseObject({
  profiles: z.unknown(),
});

/** The document as stored, with records left unvalidated. */
export interface StateDocument {
  profiles: Record<string, unknown>;
  [key: string]: unknown;
}

export interface PersistedState {
  profiles: Record<string, ProfileRecord>;
  [key: string]: unknown;
}

/**
 * Lowercase, collapse every run of non-alphanumerics to one hyphen and trim
 * hyphens from both ends. Idempotent.
 */
export function normalizeProfileKey(raw: string): string {
  const key = raw
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
  return key || FALLBACK_PROFILE_KEY;
}

function emptyDocument(): StateDocument {
  return { profiles: {} };
}

function asEntryMap(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

function parseProfiles(raw: Record<string, unknown>): Record<string, ProfileRecord> {
  const profiles: Record<string, ProfileRecord> = {};
  for (const [key, candidate] of Object.entries(raw)) {
    const parsed = ProfileRecordSchema.safeParse(candidate);
    if (parsed.success) {
      profiles[key] = parsed.data;
    }
  }
  return profiles;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value !== "object" || value === null) return value;
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries.map(([key, item]) => [key, sortKeys(item)]));
}

/**
 * Profile bookkeeping in a single JSON document. Every mutation reloads the
 * file, applies the change and atomically replaces it. Concurrent writers
 * are not coordinated: the last rename wins.
 *
 * Records that fail validation are hidden from queries but written back
 * unchanged, as are fields this version does not know.
 */
export class ProfileStore {
  readonly path: string;

  constructor(statePath?: string) {
    this.path = statePath ?? getDefaultStatePath();
  }

  /** A missing, unreadable or corrupt file reads as an empty document. */
  readDocument(): StateDocument {
    if (!existsSync(this.path)) {
      return emptyDocument();
    }
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch {
      return emptyDocument();
    }
    const parsed = StateDocumentSchema.safeParse(data);
    if (!parsed.success) {
      return emptyDocument();
    }
    return { ...parsed.data, profiles: asEntryMap(parsed.data.profiles) };
  }

  /** The document with only valid records under `profiles`. */
  load(): PersistedState {
    const document = this.readDocument();
    return { ...document, profiles: parseProfiles(document.profiles) };
  }

  save(state: StateDocument): void {
    atomicWriteFileSync(this.path, `${JSON.stringify(sortKeys(state), null, 2)}\n`);
  }

  recordProfile(key: string, record: ProfileRecord): void {
    const document = this.readDocument();
    document.profiles[key] = { ...record };
    this.save(document);
  }

  /** Remove a valid record. Absent keys and invalid records are left alone. */
  removeProfile(key: string): ProfileRecord | undefined {
    const document = this.readDocument();
    if (!Object.hasOwn(document.profiles, key)) {
      return undefined;
    }
    const parsed = ProfileRecordSchema.safeParse(document.profiles[key]);
    if (!parsed.success) {
      return undefined;
    }
    delete document.profiles[key];
    this.save(document);
    return parsed.data;
  }

  allProfiles(): Record<string, ProfileRecord> {
    return { ...this.load().profiles };
  }

  getProfile(key: string): ProfileRecord | undefined {
    const profiles = this.load().profiles;
    return Object.hasOwn(profiles, key) ? { ...profiles[key] } : undefined;
  }

  /**
   * Resolve a human query to a stored key: the query as a key, its
   * normalized form, then the first record whose name or identity equals
   * or contains the query.
   */
  findProfileKey(query: string): string | undefined {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return undefined;
    }
    const profiles = this.allProfiles();
    if (Object.hasOwn(profiles, needle)) {
      return needle;
    }
    const normalized = normalizeProfileKey(needle);
    if (Object.hasOwn(profiles, normalized)) {
      return normalized;
    }
    for (const [key, profile] of Object.entries(profiles)) {
      const name = profile.name.toLowerCase();
      const identity = profile.desktop_id.toLowerCase();
      if (name.includes(needle) || identity.includes(needle)) {
        return key;
      }
    }
    return undefined;
  }
}
