/**
 * Work lifecycle states
 */
export enum WorkState {
  CREATED = 'created',
  ACTIVE = 'active',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * A unit of submitted work with its scheduling metadata
 */
export interface WorkInfo {
  name: string;
  priority: number; // higher runs first
  data: Record<string, unknown>;
  state: WorkState;
  retryLimit: number;
  retryDelay: number; // seconds
  retryBackoff: boolean;
  startAfter: Date;
  expireInSeconds: number; // 0 = no deadline
  keepUntil: Date;
  onComplete: boolean;
  executor?: string;
  endpoint?: string;
}

/**
 * A WorkInfo as persisted by a WorkStore
 */
export interface JobRecord extends WorkInfo {
  id: string;
  retryCount: number;
  attempts: number;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
  result?: unknown;
  dedupeKey?: string;
}

/**
 * Fields that may change together with a state transition
 */
export type JobPatch = Partial<
  Pick<
    JobRecord,
    'retryCount' | 'attempts' | 'startAfter' | 'keepUntil' | 'startedAt' | 'completedAt' | 'error' | 'result'
  >
>;

const TRANSITIONS: Record<WorkState, readonly WorkState[]> = {
  [WorkState.CREATED]: [WorkState.ACTIVE, WorkState.CANCELLED],
  // ACTIVE -> CREATED re-defers a job that found no capacity
  [WorkState.ACTIVE]: [WorkState.COMPLETED, WorkState.FAILED, WorkState.CANCELLED, WorkState.CREATED],
  [WorkState.FAILED]: [WorkState.CREATED],
  [WorkState.COMPLETED]: [],
  [WorkState.CANCELLED]: [],
};

export function canTransition(from: WorkState, to: WorkState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Whether a record will never move again on its own
 */
export function isTerminal(job: Pick<JobRecord, 'state' | 'retryCount' | 'retryLimit'>): boolean {
  if (job.state === WorkState.COMPLETED || job.state === WorkState.CANCELLED) {
    return true;
  }
  return job.state === WorkState.FAILED && job.retryCount >= job.retryLimit;
}

export function applyPatch(job: JobRecord, state: WorkState, patch: JobPatch = {}): JobRecord {
  const next: JobRecord = { ...job, state };
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      Object.assign(next, { [key]: value });
    }
  }
  // Explicitly cleared fields
  if ('startedAt' in patch && patch.startedAt === undefined) delete next.startedAt;
  if ('completedAt' in patch && patch.completedAt === undefined) delete next.completedAt;
  if ('error' in patch && patch.error === undefined) delete next.error;
  return next;
}
