// lib/rag/schema.ts

export type ChunkMetadata = {
  source?: string;
  page?: number;
  chunk_index?: number;
  title?: string;
  // allow extra metadata keys if needed
  [k: string]: unknown;
};

export type StoredChunk = {
  text: string;
  metadata: ChunkMetadata;
  embedding: number[]; // all vectors must share identical length
};

export type IndexFile = {
  dims: number;
  documents: StoredChunk[];
};

export type SearchResult = {
  text: string;
  metadata: ChunkMetadata;
  score: number;
  index: number;
};

export type EmbedRequest = {
  texts: string[];
  metadata?: ChunkMetadata[];
};

export type EmbedResponse = {
  message: string;
  count: number;
};

export type SearchRequest = {
  query: string;
  top_k: number;
};

export type SearchResponse = {
  results: SearchResult[];
  query: string;
};

export type AnswerRequest = {
  question: string;
  context: string[];
  search_results?: SearchResult[];
};

export type AnswerResponse = {
  answer: string;
  sources: string[];
  question: string;
};

export type ErrorBody = {
  detail: string;
};
