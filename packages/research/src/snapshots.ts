/**
 * SnapshotStore: bounded in-memory ledger of fetched pages, kept so a
 * research run can show which page content it was built from.
 */

import { createHash } from "node:crypto";
import { type Clock, systemClock } from "@sift/core";
import { ConfigInvalidError } from "@sift/errors";
import { collapseWhitespace } from "@sift/web-search";

export const DEFAULT_MAX_SNAPSHOTS = 200;
const PREVIEW_LENGTH = 240;

export interface Snapshot {
  /** `snap-<createdAt>-<first 8 hex chars of contentHash>` */
  readonly id: string;
  readonly url: string;
  /** Wall-clock milliseconds at capture */
  readonly createdAt: number;
  /** sha256 of the raw content, hex */
  readonly contentHash: string;
  /** Whitespace-collapsed start of the content */
  readonly preview: string;
  readonly metadata: Readonly<Record<string, string>>;
}

export interface SnapshotInput {
  readonly url: string;
  readonly content: string;
  readonly metadata?: Readonly<Record<string, string>>;
}

export interface SnapshotStoreOptions {
  readonly maxEntries?: number;
  readonly clock?: Clock;
}

export function previewOf(content: string): string {
  const collapsed = collapseWhitespace(content);
  return collapsed.length <= PREVIEW_LENGTH
    ? collapsed
    : `${collapsed.slice(0, PREVIEW_LENGTH - 1)}…`;
}

export class SnapshotStore {
  private readonly entries: Snapshot[] = [];
  private readonly clock: Clock;
  readonly maxEntries: number;

  /**
   * @throws ConfigInvalidError when maxEntries is not a positive integer
   */
  constructor(options: SnapshotStoreOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_SNAPSHOTS;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new ConfigInvalidError("snapshots", [
        {
          field: "maxEntries",
          message: "maxEntries must be a positive integer",
          code: "invalid_value",
          value: maxEntries,
        },
      ]);
    }
    this.maxEntries = maxEntries;
    this.clock = options.clock ?? systemClock;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Record a capture, dropping the oldest captures beyond `maxEntries`. */
  record(input: SnapshotInput): Snapshot {
    const createdAt = this.clock.now();
    const contentHash = createHash("sha256").update(input.content, "utf8").digest("hex");
    const snapshot: Snapshot = Object.freeze({
      id: `snap-${Math.trunc(createdAt)}-${contentHash.slice(0, 8)}`,
      url: input.url,
      createdAt,
      contentHash,
      preview: previewOf(input.content),
      metadata: Object.freeze({ ...(input.metadata ?? {}) }),
    });

    this.entries.push(snapshot);
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) this.entries.splice(0, overflow);
    return snapshot;
  }

  /** Captures, oldest first */
  list(): Snapshot[] {
    return [...this.entries];
  }

  /** The most recent capture with this id */
  get(id: string): Snapshot | undefined {
    for (let index = this.entries.length - 1; index >= 0; index--) {
      const entry = this.entries[index];
      if (entry?.id === id) return entry;
    }
    return undefined;
  }

  clear(): void {
    this.entries.length = 0;
  }
}
