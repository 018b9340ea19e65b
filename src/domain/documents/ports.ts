/**
 * Storage ports for documents and their vectors.
 *
 * The similarity index and the metadata store are separate components with a
 * 1:1 relationship between their entries. Reads go straight to either side;
 * writes only happen through a DocumentStore transaction, which applies the
 * metadata and vector changes together or not at all.
 */
import type {
  DocumentRecord,
  ScoredDocument,
} from "@domain/documents/document";

/** One KNN hit: a document id and its distance to the query (lower = closer). */
export interface Candidate {
  id: string;
  distance: number;
}

export type DocumentPredicate = (
  document: DocumentRecord
) => boolean | Promise<boolean>;

export interface SimilarityIndex {
  count(): Promise<number>;

  /** Dimensionality fixed by the first accepted vector, or null before that. */
  dimensions(): Promise<number | null>;

  /**
   * Up to `k` stored vectors nearest to `query`, by ascending distance and then
   * ascending id. Returns everything when fewer than `k` exist.
   * Throws DimensionMismatchError when `query` has the wrong length.
   */
  knn(query: readonly number[], k: number): Promise<Candidate[]>;
}

export interface SimilarityIndexWriter {
  /** Adds a vector under an unused id. Throws DimensionMismatchError. */
  insert(id: string, embedding: readonly number[]): Promise<void>;

  /** Removes any vector under `id` and inserts the new one. */
  replace(id: string, embedding: readonly number[]): Promise<void>;

  remove(id: string): Promise<boolean>;
}

export interface DocumentMetadataStore {
  get(id: string): Promise<DocumentRecord | null>;

  /** Records for the ids that exist; missing ids are absent from the map. */
  getMany(ids: readonly string[]): Promise<Map<string, DocumentRecord>>;

  /** All documents ordered by id, without embeddings. */
  getAll(): Promise<DocumentRecord[]>;

  getFiltered(predicate: DocumentPredicate): Promise<DocumentRecord[]>;
}

/**
 * Joined KNN read used by the search engine. Distances and records in one
 * result always come from the same committed state.
 */
export interface SnapshotReader {
  count(): Promise<number>;

  /** Same ordering, limits and dimension checks as `SimilarityIndex.knn`. */
  nearest(query: readonly number[], k: number): Promise<ScoredDocument[]>;
}

export interface DocumentMetadataWriter {
  /** Inserts a new record. Throws DocumentAlreadyExistsError on a taken id. */
  put(record: DocumentRecord): Promise<void>;

  upsert(record: DocumentRecord): Promise<void>;

  remove(id: string): Promise<boolean>;
}

export interface StoreTransaction {
  readonly index: SimilarityIndexWriter;
  readonly metadata: DocumentMetadataWriter;
}

export interface DocumentStore {
  readonly index: SimilarityIndex;
  readonly metadata: DocumentMetadataStore;
  readonly snapshot: SnapshotReader;

  /**
   * Runs `work` in a single transaction spanning both stores. If `work`
   * throws, nothing it wrote is visible and the error is rethrown.
   */
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

/** Ascending distance, then ascending id, so equal distances rank the same way every time. */
export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.distance !== b.distance) {
    return a.distance - b.distance;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

/** Shared by getFiltered implementations: keeps input order, evaluates sequentially. */
export async function filterRecords(
  records: readonly DocumentRecord[],
  predicate: DocumentPredicate
): Promise<DocumentRecord[]> {
  const kept: DocumentRecord[] = [];
  for (const record of records) {
    if (await predicate(record)) {
      kept.push(record);
    }
  }
  return kept;
}
