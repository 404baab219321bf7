/**
 * Disk-backed extraction checkpoints
 *
 * Two JSON files per organization slug:
 *   <slug>_checkpoint.json       delegates, proposals, completed vote sets
 *   <slug>_vote_checkpoint.json  in-flight vote cursors with partial votes
 *
 * The checkpoint is the only input to resume decisions. A non-null cursor
 * means the collection is incomplete.
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import {
  checkpointStateSchema,
  voteCheckpointSchema,
  type CheckpointState,
  type VoteProgress,
} from "../../schemas/checkpoint.schemas";
import type { Vote } from "../../types/governance.types";
import { errorMessage } from "./utils";

export type { CheckpointState, VoteProgress };

export type CheckpointUpdate = Partial<Omit<CheckpointState, "updatedAt">>;

export interface CheckpointStoreOptions {
  directory: string;
  slug: string;
  now?: () => Date;
}

export const emptyCheckpointState = (): CheckpointState => ({
  delegates: [],
  proposals: [],
  lastDelegateCursor: null,
  votesCache: {},
  processedProposals: [],
  updatedAt: null,
});

export function isDelegateCollectionComplete(state: CheckpointState): boolean {
  return state.lastDelegateCursor === null && state.delegates.length > 0;
}

function safeSlug(slug: string): string {
  return slug.trim().toLowerCase().replace(/[^a-z0-9_-]+/g, "-") || "organization";
}

export class CheckpointStore {
  readonly checkpointPath: string;
  readonly voteCheckpointPath: string;

  private readonly now: () => Date;
  private current: CheckpointState | null = null;
  private voteProgress: Map<string, VoteProgress> | null = null;

  constructor(options: CheckpointStoreOptions) {
    const slug = safeSlug(options.slug);
    this.checkpointPath = path.join(options.directory, `${slug}_checkpoint.json`);
    this.voteCheckpointPath = path.join(options.directory, `${slug}_vote_checkpoint.json`);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reads the main checkpoint. Missing, unreadable or invalid files give the
   * empty state.
   */
  async load(): Promise<CheckpointState> {
    const parsed = await this.readJson(this.checkpointPath, checkpointStateSchema);
    this.current = parsed ?? emptyCheckpointState();
    return this.current;
  }

  /**
   * Last loaded or saved state, without touching the disk.
   */
  state(): CheckpointState {
    return this.current ?? emptyCheckpointState();
  }

  /**
   * Shallow-merges the update and rewrites the whole file.
   */
  async save(update: CheckpointUpdate): Promise<CheckpointState> {
    const base = this.current ?? (await this.load());
    const next: CheckpointState = {
      ...base,
      ...update,
      updatedAt: this.now().toISOString(),
    };
    await this.writeJson(this.checkpointPath, next);
    this.current = next;
    return next;
  }

  /**
   * Stores a completed vote set and marks the proposal processed.
   */
  async saveProposalVotes(proposalId: string, votes: readonly Vote[]): Promise<CheckpointState> {
    const base = this.current ?? (await this.load());
    const processed = base.processedProposals.includes(proposalId)
      ? base.processedProposals
      : [...base.processedProposals, proposalId];
    return this.save({
      votesCache: { ...base.votesCache, [proposalId]: [...votes] },
      processedProposals: processed,
    });
  }

  getCachedVotes(proposalId: string): Vote[] | null {
    const cache = this.state().votesCache;
    return Object.hasOwn(cache, proposalId) ? cache[proposalId] : null;
  }

  async loadVoteProgress(proposalId: string): Promise<VoteProgress | null> {
    const progress = await this.loadVoteMap();
    return progress.get(proposalId) ?? null;
  }

  async loadVoteCursor(proposalId: string): Promise<string | null> {
    const progress = await this.loadVoteProgress(proposalId);
    return progress?.afterCursor ?? null;
  }

  /**
   * Records where vote pagination for a proposal stopped. `null` removes the
   * entry once the proposal's votes are safely in the main checkpoint.
   */
  async saveVoteCursor(
    proposalId: string,
    cursor: string | null,
    votes?: readonly Vote[]
  ): Promise<void> {
    const progress = await this.loadVoteMap();
    if (cursor === null) {
      if (!progress.delete(proposalId)) return;
    } else {
      const previous = progress.get(proposalId);
      progress.set(proposalId, {
        afterCursor: cursor,
        votes: votes ? [...votes] : previous?.votes ?? [],
        updatedAt: this.now().toISOString(),
      });
    }
    await this.writeJson(this.voteCheckpointPath, Object.fromEntries(progress));
  }

  async clear(): Promise<void> {
    await Promise.all([
      fs.rm(this.checkpointPath, { force: true }),
      fs.rm(this.voteCheckpointPath, { force: true }),
    ]);
    this.current = emptyCheckpointState();
    this.voteProgress = new Map();
    console.log(`[Checkpoint] Cleared checkpoints at ${this.checkpointPath}`);
  }

  private async loadVoteMap(): Promise<Map<string, VoteProgress>> {
    if (this.voteProgress) return this.voteProgress;
    const parsed = await this.readJson(this.voteCheckpointPath, voteCheckpointSchema);
    this.voteProgress = new Map(Object.entries(parsed ?? {}));
    return this.voteProgress;
  }

  private async readJson<T>(
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) return null;
      console.warn(`[Checkpoint] Could not read ${filePath}: ${errorMessage(error)}. Starting fresh`);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.warn(`[Checkpoint] Corrupt checkpoint ${filePath}: ${errorMessage(error)}. Starting fresh`);
      return null;
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      console.warn(
        `[Checkpoint] Invalid checkpoint ${filePath} at ${issue?.path.join(".") || "root"}: ` +
          `${issue?.message ?? "invalid"}. Starting fresh`
      );
      return null;
    }
    return result.data;
  }

  // Full compact overwrite through a temp file and rename
  private async writeJson(filePath: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(value), "utf8");
    await fs.rename(tmpPath, filePath);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
