/**
 * Permission-aware nearest-neighbour search with adaptive candidate expansion.
 *
 * A plain KNN query of size K can come back with only a handful of documents
 * the caller may see. Instead of scanning the corpus, the engine asks the
 * similarity index for K × multiplier candidates, filters them through the
 * authorization predicate in distance order, and grows the multiplier
 * geometrically until one of these holds:
 * - K authorized documents were found ("satisfied"),
 * - the index returned fewer candidates than asked for ("exhausted"),
 * - the attempt ceiling was reached ("attempt-limit").
 *
 * Fewer than K results is a valid answer, not an error. The engine is
 * stateless; each attempt is one joined read from the store's snapshot reader.
 */
import type {
  DocumentRecord,
  ScoredDocument,
} from "@domain/documents/document";
import type {
  DocumentPredicate,
  SnapshotReader,
} from "@domain/documents/ports";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { AuthorizationCheckError, isAppError } from "@typesLocal/AppError";

/**
 * "Can the current caller see this document." Called once per candidate
 * examined, possibly several times per document across attempts; it must be
 * repeatable for the duration of one search. Errors fail the search.
 */
export type AuthorizationPredicate = DocumentPredicate;

export interface FilteredSearchOptions {
  initialMultiplier?: number;
  growthFactor?: number;
  maxAttempts?: number;
}

export type FilteredSearchOutcome =
  | "satisfied"
  | "exhausted"
  | "attempt-limit"
  | "empty";

export interface FilteredSearchMeta {
  requestedK: number;
  /** Number of KNN queries issued against the index. */
  attempts: number;
  /** Size of the candidate pool returned by the last index query. */
  candidatesFetched: number;
  predicateCalls: number;
  outcome: FilteredSearchOutcome;
}

export interface FilteredSearchResult {
  documents: ScoredDocument[];
  meta: FilteredSearchMeta;
}

export const DEFAULT_INITIAL_MULTIPLIER = 2;
export const DEFAULT_GROWTH_FACTOR = 2.0;
export const DEFAULT_MAX_ATTEMPTS = 10;

interface FilterPass {
  matches: ScoredDocument[];
  predicateCalls: number;
}

export class FilteredSearchEngine {
  private readonly initialMultiplier: number;
  private readonly growthFactor: number;
  private readonly maxAttempts: number;

  constructor(
    private readonly reader: SnapshotReader,
    options: FilteredSearchOptions = {}
  ) {
    this.initialMultiplier =
      options.initialMultiplier ?? DEFAULT_INITIAL_MULTIPLIER;
    this.growthFactor = options.growthFactor ?? DEFAULT_GROWTH_FACTOR;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;

    if (!Number.isInteger(this.initialMultiplier) || this.initialMultiplier < 1) {
      throw new RangeError("initialMultiplier must be an integer >= 1");
    }
    if (!Number.isFinite(this.growthFactor) || this.growthFactor <= 1) {
      throw new RangeError("growthFactor must be greater than 1");
    }
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be an integer >= 1");
    }
  }

  async search(
    queryEmbedding: readonly number[],
    k: number,
    predicate: AuthorizationPredicate
  ): Promise<ScoredDocument[]> {
    const result = await this.searchWithMeta(queryEmbedding, k, predicate);
    return result.documents;
  }

  async searchWithMeta(
    queryEmbedding: readonly number[],
    k: number,
    predicate: AuthorizationPredicate
  ): Promise<FilteredSearchResult> {
    const topK = Number.isFinite(k) ? Math.floor(k) : 0;

    if (topK <= 0) {
      return emptyResult(Math.max(topK, 0));
    }

    if ((await this.reader.count()) === 0) {
      return emptyResult(topK);
    }

    let multiplier = this.initialMultiplier;
    let predicateCalls = 0;

    for (let attempt = 1; ; attempt++) {
      const requested = topK * multiplier;
      const candidates = await this.reader.nearest(queryEmbedding, requested);
      const pass = await this.applyPredicate(candidates, topK, predicate);
      predicateCalls += pass.predicateCalls;

      const finish = (outcome: FilteredSearchOutcome): FilteredSearchResult => {
        const meta: FilteredSearchMeta = {
          requestedK: topK,
          attempts: attempt,
          candidatesFetched: candidates.length,
          predicateCalls,
          outcome,
        };
        logEvent("FILTERED_SEARCH_DONE", {
          ...meta,
          returned: pass.matches.length,
        });
        return { documents: pass.matches, meta };
      };

      if (pass.matches.length >= topK) {
        return finish("satisfied");
      }

      if (candidates.length < requested) {
        return finish("exhausted");
      }

      if (attempt >= this.maxAttempts) {
        logger.log("warn", "Filtered search reached its attempt ceiling", {
          maxAttempts: this.maxAttempts,
          found: pass.matches.length,
          requestedK: topK,
          candidates: requested,
        });
        return finish("attempt-limit");
      }

      const nextMultiplier = Math.max(
        multiplier + 1,
        Math.floor(multiplier * this.growthFactor)
      );

      logEvent("FILTERED_SEARCH_EXPAND", {
        found: pass.matches.length,
        requestedK: topK,
        fromCandidates: requested,
        toCandidates: topK * nextMultiplier,
        attempt,
        maxAttempts: this.maxAttempts,
      });

      multiplier = nextMultiplier;
    }
  }

  /** Walks candidates nearest-first, keeping authorized ones until `topK` are collected. */
  private async applyPredicate(
    candidates: readonly ScoredDocument[],
    topK: number,
    predicate: AuthorizationPredicate
  ): Promise<FilterPass> {
    const matches: ScoredDocument[] = [];
    let predicateCalls = 0;

    for (const candidate of candidates) {
      predicateCalls++;
      if (await evaluate(predicate, candidate)) {
        matches.push(candidate);
        if (matches.length >= topK) {
          break;
        }
      }
    }

    return { matches, predicateCalls };
  }
}

async function evaluate(
  predicate: AuthorizationPredicate,
  record: DocumentRecord
): Promise<boolean> {
  try {
    return (await predicate(record)) === true;
  } catch (error: unknown) {
    const caught = error instanceof Error ? error : new Error(String(error));

    logEvent("FILTERED_SEARCH_PREDICATE_FAILURE", {
      documentId: record.id,
      message: caught.message,
      name: caught.name,
    });

    if (isAppError(error)) {
      throw error;
    }

    throw new AuthorizationCheckError(
      "Authorization check failed during search",
      { documentId: record.id },
      { cause: error }
    );
  }
}

function emptyResult(requestedK: number): FilteredSearchResult {
  return {
    documents: [],
    meta: {
      requestedK,
      attempts: 0,
      candidatesFetched: 0,
      predicateCalls: 0,
      outcome: "empty",
    },
  };
}
