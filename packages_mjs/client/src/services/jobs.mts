/**
 * Crawl and extraction job history
 */
import type { CallOptions, RequestExecutor } from '../types.mjs';
import {
  JobListSchema,
  JobSchema,
  decodeWith,
  type Job,
  type JobList,
} from '../schemas.mjs';

export interface ListJobsOptions extends CallOptions {
  limit?: number;
  offset?: number;
}

export interface JobResultsOptions extends CallOptions {
  /** Ask the server to merge per-page results into one object */
  merge?: boolean;
}

const decodeJobList = decodeWith(JobListSchema);
const decodeJob = decodeWith(JobSchema);
const decodeRaw = (payload: unknown): unknown => payload;

export class JobsService {
  constructor(private readonly client: RequestExecutor) {}

  /**
   * List jobs, newest first. Non-positive limit/offset are not sent.
   */
  async list(options: ListJobsOptions = {}): Promise<JobList> {
    const { limit, offset, ...call } = options;
    return this.client.execute('GET', '/api/v1/jobs', {
      ...call,
      query: {
        limit: limit && limit > 0 ? limit : undefined,
        offset: offset && offset > 0 ? offset : undefined,
      },
      decode: decodeJobList,
    });
  }

  async get(id: string, options: CallOptions = {}): Promise<Job> {
    return this.client.execute('GET', `/api/v1/jobs/${encodeURIComponent(id)}`, {
      ...options,
      decode: decodeJob,
    });
  }

  /**
   * Fetch job results as returned by the server.
   * The shape depends on the job's schema, so it is not validated.
   */
  async getResults(id: string, options: JobResultsOptions = {}): Promise<unknown> {
    const { merge, ...call } = options;
    return this.client.execute('GET', `/api/v1/jobs/${encodeURIComponent(id)}/results`, {
      ...call,
      query: { merge: merge ? true : undefined },
      decode: decodeRaw,
    });
  }
}
