/**
 * Forge Actions wire types shared by the Gitea and GitHub clients.
 *
 * Both platforms return snake_case JSON with slightly different envelopes, so
 * the schemas accept unknown keys and only validate what the client reads.
 */

import { z } from 'zod';

/**
 * Workflow run status values. Gitea reports `success`/`failure` directly in
 * `status` on some versions; GitHub always uses `completed` + conclusion.
 */
export const WorkflowRunStatus = {
  QUEUED: 'queued',
  IN_PROGRESS: 'in_progress',
  WAITING: 'waiting',
  PENDING: 'pending',
  COMPLETED: 'completed',
  SUCCESS: 'success',
  FAILURE: 'failure',
} as const;

export type WorkflowRunStatus = (typeof WorkflowRunStatus)[keyof typeof WorkflowRunStatus];

/**
 * Statuses after which a run never changes again.
 */
export const TERMINAL_RUN_STATUSES: readonly string[] = [
  WorkflowRunStatus.COMPLETED,
  WorkflowRunStatus.SUCCESS,
  WorkflowRunStatus.FAILURE,
];

export function isTerminalRunStatus(status: string | null | undefined): boolean {
  return status != null && TERMINAL_RUN_STATUSES.includes(status);
}

export const WorkflowRunConclusion = {
  SUCCESS: 'success',
  FAILURE: 'failure',
  CANCELLED: 'cancelled',
  SKIPPED: 'skipped',
  TIMED_OUT: 'timed_out',
} as const;

export type WorkflowRunConclusion =
  (typeof WorkflowRunConclusion)[keyof typeof WorkflowRunConclusion];

export const workflowRunSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    status: z.string().nullish(),
    conclusion: z.string().nullish(),
    html_url: z.string().nullish(),
    event_payload: z.string().nullish(),
    created_at: z.string().nullish(),
  })
  .passthrough();

export type WorkflowRun = z.infer<typeof workflowRunSchema>;

/**
 * Gitea returns `workflow_runs` (newer) or `runs`; totals are spelled three
 * different ways depending on the release.
 */
export const workflowRunListSchema = z
  .object({
    workflow_runs: z.array(workflowRunSchema).optional(),
    runs: z.array(workflowRunSchema).optional(),
    total_count: z.number().optional(),
    total: z.number().optional(),
    count: z.number().optional(),
  })
  .passthrough();

export type WorkflowRunList = z.infer<typeof workflowRunListSchema>;

export const artifactSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    name: z.string(),
    expired: z.boolean().optional(),
    size_in_bytes: z.number().optional(),
  })
  .passthrough();

export type Artifact = z.infer<typeof artifactSchema>;

export const artifactListSchema = z
  .object({
    artifacts: z.array(artifactSchema).default([]),
    total_count: z.number().optional(),
  })
  .passthrough();

export type ArtifactList = z.infer<typeof artifactListSchema>;

/**
 * Outcome of waiting on a run. `conclusion` falls back to `status` when the
 * platform does not report one.
 */
export interface RunResult {
  status: string;
  conclusion: string;
  runId: string;
  htmlUrl: string;
}

/**
 * Workflow dispatch inputs are always strings on the wire.
 */
export type WorkflowInputs = Record<string, string>;
