// lib/rag/store.ts
import { promises as fs } from "fs";
import path from "path";
import { log } from "@/lib/logging/logger";
import { dot, normalize } from "./similarity";
import type { ChunkMetadata, IndexFile, SearchResult, StoredChunk } from "./schema";

export class VectorStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VectorStoreError";
  }
}

export type VectorStoreStats = {
  total_documents: number;
  embedding_dimension: number;
  index_path: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isIndexFile(value: unknown, dims: number): value is IndexFile {
  if (!isRecord(value) || value.dims !== dims || !Array.isArray(value.documents)) return false;
  return value.documents.every(
    (doc: unknown) =>
      isRecord(doc) &&
      typeof doc.text === "string" &&
      isRecord(doc.metadata) &&
      Array.isArray(doc.embedding) &&
      doc.embedding.length === dims
  );
}

/**
 * Flat inner-product index over unit vectors, persisted as one JSON file at
 * `${indexPath}.json`. Scores are cosine similarities.
 */
export class VectorStore {
  readonly indexPath: string;
  readonly dimension: number;
  private documents: StoredChunk[] = [];
  private writes: Promise<void> = Promise.resolve();

  constructor(opts: { indexPath: string; dimension: number }) {
    this.indexPath = opts.indexPath;
    this.dimension = opts.dimension;
  }

  get filePath(): string {
    return `${this.indexPath}.json`;
  }

  get size(): number {
    return this.documents.length;
  }

  async load(): Promise<void> {
    try {
      const json: unknown = JSON.parse(await fs.readFile(this.filePath, "utf8"));
      if (!isIndexFile(json, this.dimension)) {
        throw new Error(`Bad index file shape (expected dims=${this.dimension})`);
      }
      this.documents = json.documents;
      log.info("store.loaded", { indexPath: this.indexPath, documents: this.documents.length });
    } catch (err) {
      this.documents = [];
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        log.info("store.created", { indexPath: this.indexPath, dimension: this.dimension });
        return;
      }
      // unreadable or malformed: start empty, the next write replaces the file
      log.warn("store.load_failed", {
        indexPath: this.indexPath,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async addDocuments(texts: string[], embeddings: number[][], metadata?: ChunkMetadata[]): Promise<void> {
    if (texts.length !== embeddings.length) {
      throw new VectorStoreError("Number of documents must match number of embeddings");
    }
    if (metadata && metadata.length !== texts.length) {
      throw new VectorStoreError("Number of metadata items must match number of documents");
    }
    const badDim = embeddings.find((e) => e.length !== this.dimension);
    if (badDim) {
      throw new VectorStoreError(`Embedding dim mismatch. index=${this.dimension}, got=${badDim.length}`);
    }

    const chunks: StoredChunk[] = texts.map((text, i) => ({
      text,
      metadata: metadata?.[i] ?? { source: `doc_${i}` },
      embedding: normalize(embeddings[i]),
    }));

    await this.serialized(async () => {
      const next = [...this.documents, ...chunks];
      await this.save(next);
      this.documents = next;
    });
    log.info("store.added", { count: chunks.length, total: this.documents.length });
  }

  search(queryEmbedding: number[], k: number): SearchResult[] {
    if (this.documents.length === 0) return [];

    const q = normalize(queryEmbedding);
    return this.documents
      .map((doc, index) => ({ index, score: dot(q, doc.embedding) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, Math.min(k, this.documents.length))
      .map(({ index, score }) => ({
        text: this.documents[index].text,
        metadata: this.documents[index].metadata,
        score,
        index,
      }));
  }

  stats(): VectorStoreStats {
    return {
      total_documents: this.documents.length,
      embedding_dimension: this.dimension,
      index_path: this.indexPath,
    };
  }

  async clear(): Promise<void> {
    await this.serialized(async () => {
      await this.save([]);
      this.documents = [];
    });
    log.info("store.cleared", { indexPath: this.indexPath });
  }

  private serialized(task: () => Promise<void>): Promise<void> {
    const next = this.writes.then(task);
    // keep the chain alive after a failed write; the caller still sees the rejection
    this.writes = next.catch(() => undefined);
    return next;
  }

  private async save(documents: StoredChunk[]): Promise<void> {
    const body: IndexFile = { dims: this.dimension, documents };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(body), "utf8");
  }
}
