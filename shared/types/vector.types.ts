/**
 * Types for embedding records and their storage in Chroma collections.
 */
import type {
  CertificationLevel,
  ContentMetadata,
  ContentType,
  DifficultyLevel,
  FoundationPart,
  PractitionerGuide,
  SourceDirectory,
} from './metadata.types';

/** Logical collection names; the physical Chroma collection is `togaf_<key>`. */
export const COLLECTION_KEYS = ['foundation', 'practitioner', 'assessments'] as const;
export type CollectionKey = typeof COLLECTION_KEYS[number];

/**
 * One embedded chunk, ready to be written to the vector store.
 */
export interface EmbeddingRecord {
  // === Identity ===
  chunkId: string;
  contentHash: string;                 // md5 of embeddingText, also the cache key

  // === Content ===
  text: string;
  embeddingText: string;               // text plus curriculum context annotations
  vector: number[];

  // === Chunk shape ===
  chunkType: string;
  wordCount: number;
  charCount: number;
  startPage: number;
  endPage: number;

  // === Classification ===
  metadata: ContentMetadata;
  searchTags: string[];
  hasImages: boolean;
  hasTables: boolean;
  imageCount: number;
  tableCount: number;

  // === Embedding provenance ===
  embeddingModel: string;
  embeddingDimensions: number;

  // === Quality ===
  contentQualityScore: number;
  extractionConfidence: number;
}

/**
 * Metadata as stored in Chroma. Chroma only takes scalar values, so lists are
 * comma-joined and left out entirely when empty.
 */
export interface FlatChunkMetadata {
  [key: string]: string | number | boolean;
  chunk_id: string;
  content_hash: string;
  chunk_type: string;
  word_count: number;
  char_count: number;
  start_page: number;
  end_page: number;
  has_images: boolean;
  has_tables: boolean;
  image_count: number;
  table_count: number;
  certification_level: CertificationLevel;
  content_type: ContentType;
  difficulty_level: DifficultyLevel;
  document_title: string;
  source_file: string;
  source_directory: SourceDirectory;
  page_number: number;
  chapter_title: string;
  chapter_number: string;
  section_title: string;
  foundation_part: string;
  practitioner_guide: string;
  content_quality_score: number;
  extraction_confidence: number;
  embedding_model: string;
  embedding_dimensions: number;
}

/** Scalar metadata read back from a query; fields may be missing on foreign rows. */
export type StoredMetadata = Record<string, string | number | boolean | null | undefined>;

/**
 * Equality and range filters accepted by the vector store.
 * Each key present becomes one condition in the Chroma `where` clause.
 */
export interface VectorFilters {
  certification_level?: CertificationLevel;
  content_type?: ContentType;
  difficulty_level?: DifficultyLevel;
  has_images?: boolean;
  has_tables?: boolean;
  source_directory?: SourceDirectory;
  foundation_part?: FoundationPart;
  practitioner_guide?: PractitionerGuide;
  min_word_count?: number;
  max_word_count?: number;
}

export interface VectorSearchOptions {
  nResults?: number;
  collections?: CollectionKey[];
  filters?: VectorFilters;
}

export interface VectorSearchResult {
  chunkId: string;
  collection: CollectionKey;
  document: string;
  metadata: StoredMetadata;
  distance: number;
  relevanceScore: number;              // 1 - distance
}

export type CollectionCounts = Record<CollectionKey, number>;

export interface CollectionStats {
  name: string;
  documentCount: number;
  error?: string;
}
