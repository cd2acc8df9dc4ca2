import { z } from 'zod';
import { getDefaultRecipeBook, listJobTypes, scaleBom, type BomEstimate, type RecipeBook } from '../domains/pricing';
import { BomServiceError, errorMessage } from '../lib/errors';
import { fetchWithTimeout, type FetchLike } from '../lib/integrationClient';
import { logQuoteEvent, QUOTE_EVENT } from '../observability/quote.events';

export const FALLBACK_JOB_TYPES = ['cupcakes', 'cake', 'pastry_box'];

export type JobTypeList = {
  source: 'live' | 'fallback';
  jobTypes: string[];
  reason?: string;
};

/**
 * Where scaled BOMs come from: the built-in recipe table or the remote
 * estimate service.
 */
export interface BomSource {
  listJobTypes(): Promise<JobTypeList>;
  estimate(jobType: string, quantity: number): Promise<BomEstimate>;
}

export class LocalBomSource implements BomSource {
  constructor(private readonly book: RecipeBook = getDefaultRecipeBook()) {}

  async listJobTypes(): Promise<JobTypeList> {
    return { source: 'live', jobTypes: listJobTypes(this.book) };
  }

  async estimate(jobType: string, quantity: number): Promise<BomEstimate> {
    return scaleBom(this.book, jobType, quantity);
  }
}

const jobTypesResponseSchema = z.array(z.string().min(1));

const estimateResponseSchema = z.object({
  job_type: z.string(),
  quantity: z.number().int(),
  materials: z.array(
    z.object({
      name: z.string().min(1),
      unit: z.string().min(1),
      qty: z.coerce.number()
    })
  ),
  labor_hours: z.coerce.number()
});

export type RemoteBomSourceOptions = {
  fetchImpl?: FetchLike;
  jobTypesTimeoutMs?: number;
  estimateTimeoutMs?: number;
};

export class RemoteBomSource implements BomSource {
  private readonly baseUrl: string;

  constructor(
    apiUrl: string,
    private readonly options: RemoteBomSourceOptions = {}
  ) {
    this.baseUrl = apiUrl.replace(/\/+$/, '');
  }

  /**
   * Used for input validation only; an unreachable service falls back to the
   * known job types rather than failing.
   */
  async listJobTypes(): Promise<JobTypeList> {
    const url = `${this.baseUrl}/job-types`;
    try {
      const response = await fetchWithTimeout(url, { method: 'GET' }, {
        timeoutMs: this.options.jobTypesTimeoutMs ?? 5000,
        fetchImpl: this.options.fetchImpl
      });
      if (!response.ok) {
        return this.fallback(`BOM API responded with status ${response.status}`);
      }
      const parsed = jobTypesResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return this.fallback('BOM API returned a malformed job type list');
      }
      return { source: 'live', jobTypes: parsed.data };
    } catch (error) {
      return this.fallback(errorMessage(error));
    }
  }

  async estimate(jobType: string, quantity: number): Promise<BomEstimate> {
    const url = `${this.baseUrl}/estimate`;
    let response: Response;
    try {
      response = await fetchWithTimeout(
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ job_type: jobType, quantity })
        },
        {
          timeoutMs: this.options.estimateTimeoutMs ?? 10000,
          fetchImpl: this.options.fetchImpl
        }
      );
    } catch (error) {
      throw new BomServiceError(`Cannot reach BOM API at ${url}: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new BomServiceError(`BOM API error ${response.status}: ${detail}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new BomServiceError(`BOM API returned invalid JSON: ${errorMessage(error)}`);
    }
    const parsed = estimateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new BomServiceError(`BOM API returned a malformed estimate for ${jobType}`);
    }
    return {
      jobType: parsed.data.job_type,
      quantity: parsed.data.quantity,
      materials: parsed.data.materials,
      laborHours: parsed.data.labor_hours
    };
  }

  private fallback(reason: string): JobTypeList {
    logQuoteEvent(QUOTE_EVENT.JOB_TYPES_FALLBACK, { reason });
    return { source: 'fallback', jobTypes: [...FALLBACK_JOB_TYPES], reason };
  }
}
