/**
 * Job domain model.
 *
 * A job is the logical grouping of runs submitted by one owner. Jobs are
 * immutable once created.
 */

export interface Job {
  readonly id: string;
  readonly ownerId: string;
  /** Deduplicated and sorted. */
  readonly tags: readonly string[];
  readonly createdAt: string;
}

/** Input for creating a new job. */
export interface CreateJobInput {
  ownerId: string;
  tags?: readonly string[];
  /** Optional caller-supplied id; generated when omitted. */
  id?: string;
}

/** Normalize a tag list into the stored set representation. */
export function normalizeTags(tags: readonly string[] = []): string[] {
  const cleaned = tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
  return [...new Set(cleaned)].sort();
}
