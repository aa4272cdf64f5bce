import { performance } from 'node:perf_hooks';
import type { ProblemRecord } from './paginator.js';
import type { SyncWindow } from './window.js';

export const STAGES = ['types', 'nomenclature', 'clients', 'purchases', 'sales'] as const;
export type StageName = (typeof STAGES)[number];

export interface StageSummary {
  stage: StageName;
  pages: number;
  fetched: number; // remote records received
  inWindow?: number; // documents left after the local date check
  rows: number; // rows computed for the store
  saved: number;
  problems: number;
  skippedReplace?: boolean; // nothing fetched; previous contents kept
  danglingParents?: number;
  ms: number;
}

export interface SyncSummary {
  start: string; // ISO
  end: string; // ISO
  durationMs: number;
  success: boolean;
  window?: SyncWindow;
  failedStage?: StageName | 'connect';
  error?: string;
  stages: StageSummary[];
  problems: ProblemRecord[];
  lookups?: { cached: number; lookups: number; failures: number };
}

let lastSummary: SyncSummary | null = null;
let inProgress = false;
let progressStart = 0;

export function markSyncStart() {
  inProgress = true;
  progressStart = performance.now();
}

export function setLastSummary(summary: SyncSummary) {
  lastSummary = summary;
  inProgress = false;
}

export function getLastSummary() {
  return { lastSummary, inProgress, startedAt: progressStart };
}
