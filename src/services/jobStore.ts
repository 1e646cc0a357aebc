import type { OptimizationResult } from './optimizer';

export interface JobRecord {
  jobId: string;
  createdAt: string;
  result: OptimizationResult;
}

const MAX_JOBS = 50;

const jobs = new Map<string, JobRecord>();

/** Keeps the result of an optimization run; the oldest job is evicted past the store's capacity. */
export function saveJob(result: OptimizationResult, createdAt: Date = new Date()): JobRecord {
  const record: JobRecord = { jobId: result.jobId, createdAt: createdAt.toISOString(), result };
  jobs.delete(result.jobId);
  jobs.set(result.jobId, record);

  while (jobs.size > MAX_JOBS) {
    const oldest = jobs.keys().next();
    if (oldest.done) {
      break;
    }
    jobs.delete(oldest.value);
  }

  return record;
}

export function getJob(jobId: string): JobRecord | undefined {
  return jobs.get(jobId);
}

export function deleteJob(jobId: string): boolean {
  return jobs.delete(jobId);
}

export function listJobs(): JobRecord[] {
  return [...jobs.values()];
}

export function clearJobs(): void {
  jobs.clear();
}
