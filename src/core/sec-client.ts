import { z } from 'zod';
import { RateLimiter, type Sleeper } from './rate-limiter.js';
import { getCache, type ResponseCache } from './cache.js';
import { getConfig } from './config.js';
import { createLogger } from './logger.js';
import { SecApiError, NotFoundError, RateLimitError, DataParseError } from './errors.js';
import type { CikLookup, CompanyFacts } from './types.js';

/**
 * SEC EDGAR API client.
 *
 * Uses the free EDGAR APIs:
 * - data.sec.gov/api/xbrl/companyfacts/ for XBRL data
 * - www.sec.gov/files/company_tickers.json for ticker -> CIK
 *
 * Rate limited per SEC fair access policy.
 * Implements exponential backoff for 429 and 5xx responses.
 */

const BASE_URL = 'https://data.sec.gov';
export const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';
const MAX_RETRIES = 3;

const log = createLogger('sec-client');

const nullableString = z.string().nullable().optional().transform(v => v ?? null);

const secFactSchema = z.object({
  end: z.string(),
  val: z.number(),
  accn: z.string(),
  fy: z.number().nullable().optional().transform(v => v ?? null),
  fp: nullableString,
  form: z.string(),
  filed: z.string(),
  start: z.string().optional(),
  frame: z.string().optional(),
});

const companyFactsSchema = z.object({
  cik: z.coerce.number(),
  entityName: z.string(),
  facts: z.record(z.record(z.object({
    label: nullableString,
    description: nullableString,
    units: z.record(z.array(secFactSchema)),
  }))).default({}),
});

const tickersSchema = z.record(z.object({
  cik_str: z.coerce.number(),
  ticker: z.string(),
  title: z.string(),
}));

export interface SecClientOptions {
  userAgent: string;
  cache: ResponseCache | null;
  rateLimiter: RateLimiter;
  fetchImpl?: typeof fetch;
  sleep?: Sleeper;
  maxRetries?: number;
}

export class SecClient {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleeper;
  private readonly maxRetries: number;

  constructor(private readonly options: SecClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
  }

  /** GET a URL as text, going through the cache, the rate limiter and retries */
  async getText(url: string, cacheTtlHours: number = 24): Promise<string> {
    const cached = this.readCache(url);
    if (cached !== null) {
      log.debug(`cache hit ${url}`);
      return cached;
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      await this.options.rateLimiter.acquire();

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: {
            'User-Agent': this.options.userAgent,
            'Accept': 'application/json',
          },
        });
      } catch (err) {
        lastError = new SecApiError(
          `Network error fetching ${url}: ${err instanceof Error ? err.message : String(err)}`,
          0,
          url
        );
        log.warn(`${lastError.message} (attempt ${attempt + 1}/${this.maxRetries})`);
        await this.sleep(backoffMs(attempt));
        continue;
      }

      if (response.ok) {
        const body = await response.text();
        this.writeCache(url, body, cacheTtlHours);
        return body;
      }

      if (response.status === 404) {
        throw new NotFoundError(url);
      }

      if (response.status === 429) {
        lastError = new RateLimitError(url);
        log.warn(`rate limited by SEC (attempt ${attempt + 1}/${this.maxRetries})`);
        await this.sleep(backoffMs(attempt));
        continue;
      }

      if (response.status === 403) {
        throw new SecApiError(
          'SEC API rejected request (403 Forbidden). Set SEC_USER_AGENT to a User-Agent with contact info, as SEC requires.',
          403,
          url
        );
      }

      if (response.status >= 500) {
        lastError = new SecApiError(`SEC server error: ${response.status}`, response.status, url);
        log.warn(`${lastError.message} (attempt ${attempt + 1}/${this.maxRetries})`);
        await this.sleep(backoffMs(attempt));
        continue;
      }

      throw new SecApiError(
        `SEC API error: ${response.status} ${response.statusText}`,
        response.status,
        url
      );
    }

    throw lastError ?? new SecApiError(`Failed after ${this.maxRetries} retries`, 0, url);
  }

  /**
   * Fetch all XBRL facts for a company.
   * CIK is zero-padded to 10 digits.
   */
  async getCompanyFacts(cik: string): Promise<CompanyFacts> {
    const url = `${BASE_URL}/api/xbrl/companyfacts/CIK${cik.padStart(10, '0')}.json`;
    const body = await this.getText(url, 168); // 7 days
    const parsed = companyFactsSchema.safeParse(parseJson(body, url));
    if (!parsed.success) {
      throw new DataParseError(
        `Unexpected companyfacts payload for CIK ${cik}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        url
      );
    }
    return parsed.data;
  }

  /** Every registrant ticker known to SEC, upper-cased */
  async getCompanyTickers(): Promise<CikLookup[]> {
    const body = await this.getText(TICKERS_URL, 168);
    const parsed = tickersSchema.safeParse(parseJson(body, TICKERS_URL));
    if (!parsed.success) {
      throw new DataParseError('Unexpected company tickers payload from SEC.', TICKERS_URL);
    }
    return Object.values(parsed.data).map(entry => ({
      cik: String(entry.cik_str),
      ticker: entry.ticker.toUpperCase(),
      name: entry.title,
    }));
  }

  private readCache(url: string): string | null {
    if (!this.options.cache) return null;
    try {
      return this.options.cache.get(url);
    } catch (err) {
      log.debug(`cache read failed, continuing without cache: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  private writeCache(url: string, body: string, ttlHours: number): void {
    if (!this.options.cache) return;
    try {
      this.options.cache.set(url, body, ttlHours);
    } catch (err) {
      log.debug(`cache write failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

function parseJson(body: string, url: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new DataParseError(
      'Failed to parse SEC response. The data may be corrupted or the API format may have changed.',
      url
    );
  }
}

/** Exponential backoff with jitter: 1s, 2s, 4s */
function backoffMs(attempt: number): number {
  return 1000 * Math.pow(2, attempt) + Math.random() * 500;
}

let shared: SecClient | null = null;

export function getSecClient(): SecClient {
  if (!shared) {
    const config = getConfig();
    shared = new SecClient({
      userAgent: config.userAgent,
      cache: getCache(),
      rateLimiter: new RateLimiter(config.requestsPerSecond),
    });
  }
  return shared;
}
