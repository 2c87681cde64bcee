import * as cheerio from "cheerio";
import { logger } from "../logger";
import { sleep } from "../concurrency";
import { TransientCheckError } from "../errors";
import { fetchWithRetry, type FetchResult } from "./base";
import type { SearchConfig } from "../config";
import type { ActivityChecker, ActivityStatus } from "../lifecycle/recheck";
import type { Job, RawPosting } from "../types";

export const PROVIDER = "linkedin";

const SEARCH_ENDPOINT =
  "https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search";
const DETAIL_ENDPOINT = "https://www.linkedin.com/jobs-guest/jobs/api/jobPosting";

const CLOSED_MARKERS = [
  "this job is no longer available",
  "job is closed",
  "no longer accepting applications",
];

export interface SearchFilters {
  geoId: number | null;
  jobType: string;
  postedWithin: string;
  /** Ids already tracked; their detail pages are not fetched again */
  skipJobIds?: ReadonlySet<string>;
}

export type LinkedInSettings = Pick<
  SearchConfig,
  | "maxStart"
  | "pageSize"
  | "requestTimeoutMs"
  | "maxRetries"
  | "backoffStartMs"
  | "delayBetweenRequestsMs"
>;

// URL Building

export function buildSearchUrl(
  query: string,
  location: string,
  filters: Pick<SearchFilters, "geoId" | "jobType" | "postedWithin">,
  start: number,
): string {
  const params = new URLSearchParams({ keywords: query, location });
  if (filters.geoId !== null) params.set("geoId", String(filters.geoId));
  if (filters.postedWithin) params.set("f_TPR", filters.postedWithin);
  if (filters.jobType) params.set("f_JT", filters.jobType);
  params.set("start", String(start));
  return `${SEARCH_ENDPOINT}?${params.toString()}`;
}

export function buildDetailUrl(jobId: string): string {
  return `${DETAIL_ENDPOINT}/${encodeURIComponent(jobId)}`;
}

// HTML Parsing

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function cleanMultiline(text: string): string {
  return text
    .split("\n")
    .map((line) => cleanText(line))
    .filter((line) => line.length > 0)
    .join("\n");
}

/** Job ids from one page of search results, in page order. */
export function parseJobIds(html: string): string[] {
  const $ = cheerio.load(html);
  const ids: string[] = [];

  $("li .base-card[data-entity-urn]").each((_, el) => {
    // urn:li:jobPosting:<id>
    const urn = $(el).attr("data-entity-urn") ?? "";
    const id = urn.split(":")[3];
    if (id && !ids.includes(id)) {
      ids.push(id);
    }
  });

  return ids;
}

/**
 * Parses a guest job-posting page. Returns null when the page lacks the
 * title or company, which usually means LinkedIn served a login wall.
 */
export function parseJobDetail(html: string, jobId: string): RawPosting | null {
  const $ = cheerio.load(html);

  const company =
    cleanText($(".top-card-layout__card a img").first().attr("alt") ?? "") ||
    cleanText($("a.topcard__org-name-link").first().text()) ||
    cleanText($("span.topcard__flavor").first().text());

  const title =
    cleanText($(".top-card-layout__entity-info a").first().text()) ||
    cleanText($("h2.top-card-layout__title").first().text());

  if (!company || !title) {
    return null;
  }

  const level = cleanText(
    $("ul.description__job-criteria-list li")
      .first()
      .text()
      .replace("Seniority level", ""),
  );
  const location = cleanText(
    $("span.topcard__flavor.topcard__flavor--bullet").first().text(),
  );

  const markup = $(".show-more-less-html__markup").first();
  markup.find("br").replaceWith("\n");
  markup.find("li").each((_, el) => {
    $(el).prepend("- ").append("\n");
  });
  markup.find("p").append("\n");
  const description = cleanMultiline(markup.text());

  const postedAt = $("time[datetime]").first().attr("datetime") ?? null;

  return {
    jobId,
    provider: PROVIDER,
    company,
    title,
    level: level || null,
    location: location || null,
    description: description || null,
    postedAt,
  };
}

export function isClosedPosting(html: string): boolean {
  const lower = html.toLowerCase();
  return CLOSED_MARKERS.some((marker) => lower.includes(marker));
}

// Search

/**
 * Guest-API job source. Pages through search results and yields one
 * posting per detail page, lazily.
 */
export class LinkedInSource {
  private requestCount = 0;

  constructor(
    private readonly settings: LinkedInSettings,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  private async get(url: string): Promise<FetchResult> {
    if (this.requestCount > 0 && this.settings.delayBetweenRequestsMs > 0) {
      await this.wait(this.settings.delayBetweenRequestsMs);
    }
    this.requestCount++;

    return fetchWithRetry({
      url,
      timeoutMs: this.settings.requestTimeoutMs,
      maxRetries: this.settings.maxRetries,
      backoffStartMs: this.settings.backoffStartMs,
      sleep: this.wait,
    });
  }

  async *fetchCandidates(
    query: string,
    location: string,
    filters: SearchFilters,
  ): AsyncGenerator<RawPosting> {
    const seen = new Set<string>();

    for (
      let start = 0;
      start <= this.settings.maxStart;
      start += this.settings.pageSize
    ) {
      const url = buildSearchUrl(query, location, filters, start);
      const page = await this.get(url);

      if (!page.success || page.body === null) {
        logger.warn(
          `LinkedIn: search page start=${start} for "${query}" failed (${page.error ?? "no body"}), stopping`,
        );
        return;
      }

      const ids = parseJobIds(page.body);
      if (ids.length === 0) {
        logger.info(`LinkedIn: "${query}" exhausted at start=${start}`);
        return;
      }

      logger.debug(`LinkedIn: "${query}" start=${start} → ${ids.length} ids`);

      for (const jobId of ids) {
        if (seen.has(jobId)) continue;
        seen.add(jobId);

        if (filters.skipJobIds?.has(jobId)) {
          logger.debug(`LinkedIn: ${jobId} already tracked, skipping detail fetch`);
          continue;
        }

        const detail = await this.get(buildDetailUrl(jobId));
        if (!detail.success || detail.body === null) {
          logger.warn(`LinkedIn: detail fetch for ${jobId} failed: ${detail.error ?? "no body"}`);
          continue;
        }

        const posting = parseJobDetail(detail.body, jobId);
        if (!posting) {
          logger.warn(`LinkedIn: could not parse detail page for ${jobId}`);
          continue;
        }

        yield posting;
      }
    }
  }
}

// Activity

export function classifyActivity(result: FetchResult): ActivityStatus {
  if (result.success && result.body !== null) {
    return isClosedPosting(result.body) ? "gone" : "active";
  }
  if (result.statusCode === 404 || result.statusCode === 410) {
    return "gone";
  }
  throw new TransientCheckError(
    result.error ?? "Activity check failed",
    result.statusCode,
  );
}

/**
 * Checks a posting's detail page once per call. Retries belong to the
 * caller, so the fetch itself does not retry.
 */
export class LinkedInActivityChecker implements ActivityChecker {
  constructor(private readonly timeoutMs: number) {}

  async check(job: Job): Promise<ActivityStatus> {
    const result = await fetchWithRetry({
      url: buildDetailUrl(job.jobId),
      timeoutMs: this.timeoutMs,
      maxRetries: 0,
      backoffStartMs: 0,
    });
    return classifyActivity(result);
  }
}
