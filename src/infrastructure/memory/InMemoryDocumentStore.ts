/**
 * In-process DocumentStore.
 *
 * Brute-force KNN over a Map of vectors, with the same metric and tie-breaking
 * as the pgvector adapter. Used when STORE_DRIVER=memory and throughout the
 * test suite.
 *
 * Transactions stage their writes and apply them synchronously on commit, so
 * readers only ever see committed state. Transactions run one at a time.
 */
import {
  assertValidEmbedding,
  type DocumentRecord,
  type ScoredDocument,
} from "@domain/documents/document";
import {
  compareCandidates,
  filterRecords,
  type Candidate,
  type DocumentMetadataStore,
  type DocumentMetadataWriter,
  type DocumentPredicate,
  type DocumentStore,
  type SimilarityIndex,
  type SimilarityIndexWriter,
  type SnapshotReader,
  type StoreTransaction,
} from "@domain/documents/ports";
import {
  DimensionMismatchError,
  DocumentAlreadyExistsError,
} from "@typesLocal/AppError";
import { distanceFunction, type DistanceMetric } from "@utils/vector";

export interface InMemoryStoreOptions {
  distanceMetric?: DistanceMetric;
}

function copyRecord(record: DocumentRecord): DocumentRecord {
  return {
    id: record.id,
    title: record.title,
    content: record.content,
    metadata: { ...record.metadata },
  };
}

class InMemorySimilarityIndex implements SimilarityIndex {
  readonly vectors = new Map<string, number[]>();
  established: number | null = null;

  private readonly distance: (a: readonly number[], b: readonly number[]) => number;

  constructor(metric: DistanceMetric) {
    this.distance = distanceFunction(metric);
  }

  async count(): Promise<number> {
    return this.vectors.size;
  }

  async dimensions(): Promise<number | null> {
    return this.established;
  }

  async knn(query: readonly number[], k: number): Promise<Candidate[]> {
    return this.rank(query, k);
  }

  rank(query: readonly number[], k: number): Candidate[] {
    if (this.vectors.size === 0 || k <= 0) {
      return [];
    }

    assertValidEmbedding(query);
    if (this.established !== null && query.length !== this.established) {
      throw new DimensionMismatchError(this.established, query.length);
    }

    const scored: Candidate[] = [];
    for (const [id, vector] of this.vectors) {
      scored.push({ id, distance: this.distance(query, vector) });
    }

    scored.sort(compareCandidates);
    return scored.slice(0, k);
  }
}

class InMemoryMetadataStore implements DocumentMetadataStore {
  readonly records = new Map<string, DocumentRecord>();

  async get(id: string): Promise<DocumentRecord | null> {
    const record = this.records.get(id);
    return record ? copyRecord(record) : null;
  }

  async getMany(ids: readonly string[]): Promise<Map<string, DocumentRecord>> {
    const found = new Map<string, DocumentRecord>();
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) {
        found.set(id, copyRecord(record));
      }
    }
    return found;
  }

  async getAll(): Promise<DocumentRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map(copyRecord);
  }

  async getFiltered(predicate: DocumentPredicate): Promise<DocumentRecord[]> {
    return filterRecords(await this.getAll(), predicate);
  }
}

/** Ranks and joins in one synchronous step, so no commit can land in between. */
class InMemorySnapshotReader implements SnapshotReader {
  constructor(
    private readonly vectorIndex: InMemorySimilarityIndex,
    private readonly metadataStore: InMemoryMetadataStore
  ) {}

  async count(): Promise<number> {
    return this.vectorIndex.vectors.size;
  }

  async nearest(query: readonly number[], k: number): Promise<ScoredDocument[]> {
    const documents: ScoredDocument[] = [];
    for (const candidate of this.vectorIndex.rank(query, k)) {
      const record = this.metadataStore.records.get(candidate.id);
      if (record) {
        documents.push({ ...copyRecord(record), distance: candidate.distance });
      }
    }
    return documents;
  }
}

/** Staged writes; `null` marks a deletion. */
class InMemoryTransaction implements StoreTransaction {
  private readonly stagedRecords = new Map<string, DocumentRecord | null>();
  private readonly stagedVectors = new Map<string, number[] | null>();
  private stagedDimensions: number | null = null;

  readonly index: SimilarityIndexWriter;
  readonly metadata: DocumentMetadataWriter;

  constructor(
    private readonly committedIndex: InMemorySimilarityIndex,
    private readonly committedMetadata: InMemoryMetadataStore
  ) {
    this.metadata = {
      put: async (record) => {
        if (this.hasRecord(record.id)) {
          throw new DocumentAlreadyExistsError(record.id);
        }
        this.stagedRecords.set(record.id, copyRecord(record));
      },
      upsert: async (record) => {
        this.stagedRecords.set(record.id, copyRecord(record));
      },
      remove: async (id) => {
        const existed = this.hasRecord(id);
        this.stagedRecords.set(id, null);
        return existed;
      },
    };

    this.index = {
      insert: async (id, embedding) => {
        this.checkDimensions(embedding);
        if (this.hasVector(id)) {
          throw new DocumentAlreadyExistsError(id);
        }
        this.stagedVectors.set(id, [...embedding]);
      },
      replace: async (id, embedding) => {
        this.checkDimensions(embedding);
        this.stagedVectors.set(id, [...embedding]);
      },
      remove: async (id) => {
        const existed = this.hasVector(id);
        this.stagedVectors.set(id, null);
        return existed;
      },
    };
  }

  commit(): void {
    if (this.committedIndex.established === null && this.stagedDimensions !== null) {
      this.committedIndex.established = this.stagedDimensions;
    }

    for (const [id, record] of this.stagedRecords) {
      if (record) {
        this.committedMetadata.records.set(id, record);
      } else {
        this.committedMetadata.records.delete(id);
      }
    }

    for (const [id, vector] of this.stagedVectors) {
      if (vector) {
        this.committedIndex.vectors.set(id, vector);
      } else {
        this.committedIndex.vectors.delete(id);
      }
    }
  }

  private checkDimensions(embedding: readonly number[]): void {
    assertValidEmbedding(embedding);

    const expected = this.committedIndex.established ?? this.stagedDimensions;
    if (expected === null) {
      this.stagedDimensions = embedding.length;
      return;
    }

    if (embedding.length !== expected) {
      throw new DimensionMismatchError(expected, embedding.length);
    }
  }

  private hasRecord(id: string): boolean {
    const staged = this.stagedRecords.get(id);
    if (staged !== undefined) {
      return staged !== null;
    }
    return this.committedMetadata.records.has(id);
  }

  private hasVector(id: string): boolean {
    const staged = this.stagedVectors.get(id);
    if (staged !== undefined) {
      return staged !== null;
    }
    return this.committedIndex.vectors.has(id);
  }
}

class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

export class InMemoryDocumentStore implements DocumentStore {
  private readonly vectorIndex: InMemorySimilarityIndex;
  private readonly metadataStore = new InMemoryMetadataStore();
  private readonly writeLock = new WriteLock();

  readonly snapshot: SnapshotReader;

  constructor(options: InMemoryStoreOptions = {}) {
    this.vectorIndex = new InMemorySimilarityIndex(
      options.distanceMetric ?? "cosine"
    );
    this.snapshot = new InMemorySnapshotReader(
      this.vectorIndex,
      this.metadataStore
    );
  }

  get index(): SimilarityIndex {
    return this.vectorIndex;
  }

  get metadata(): DocumentMetadataStore {
    return this.metadataStore;
  }

  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.writeLock.run(async () => {
      const tx = new InMemoryTransaction(this.vectorIndex, this.metadataStore);
      const result = await work(tx);
      tx.commit();
      return result;
    });
  }

  async close(): Promise<void> {
    // Nothing to release.
  }
}
