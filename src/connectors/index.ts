import type { SearchConfig } from "../config";
import type { ActivityChecker } from "../lifecycle/recheck";
import type { RawPosting } from "../types";
import {
  LinkedInActivityChecker,
  LinkedInSource,
  PROVIDER as LINKEDIN,
  type SearchFilters,
} from "./linkedin";

/** A job board that yields postings for a query, one pass, lazily. */
export interface CandidateSource {
  readonly provider: string;
  fetchCandidates(
    query: string,
    location: string,
    filters: SearchFilters,
  ): AsyncIterable<RawPosting>;
}

// ─── Source Registry ─────────────────────────────────────────────────────────

export function createSource(search: SearchConfig): CandidateSource {
  switch (search.provider) {
    case LINKEDIN: {
      const source = new LinkedInSource(search);
      return {
        provider: LINKEDIN,
        fetchCandidates: (query, location, filters) =>
          source.fetchCandidates(query, location, filters),
      };
    }
    default:
      throw new Error(`Unsupported job source: ${search.provider}`);
  }
}

export function createActivityChecker(provider: string, timeoutMs: number): ActivityChecker {
  switch (provider) {
    case LINKEDIN:
      return new LinkedInActivityChecker(timeoutMs);
    default:
      throw new Error(`No activity checker for source: ${provider}`);
  }
}

export type { SearchFilters } from "./linkedin";
