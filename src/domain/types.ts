export interface ChunkMetadata {
  source: string;
  index: number;
  start: number;
  end: number;
}

export interface Chunk {
  text: string;
  metadata: ChunkMetadata;
}

export interface ChunkSet {
  documentKey: string;
  chunks: Chunk[];
  /** First chunk's metadata, or null when the document produced no chunks. */
  metadata: ChunkMetadata | null;
  chunkSize: number;
  chunkOverlap: number;
  createdAt: string | null;
}

export type PipelineResult =
  | {
      ok: true;
      answer: string;
      chunkCount: number;
      cacheKey: string;
      cacheHit: boolean;
      question: string;
    }
  | {
      ok: false;
      error: string;
    };
