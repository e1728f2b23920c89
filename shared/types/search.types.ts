import type { CertificationLevel, ContentType, DifficultyLevel, FoundationPart, PractitionerGuide } from './metadata.types';
import type { CollectionKey, CollectionStats, StoredMetadata, VectorFilters } from './vector.types';

/** A semantic query with optional metadata filters. */
export interface SearchQuery {
  text: string;
  filters?: VectorFilters;
  certificationLevel?: CertificationLevel;
  contentType?: ContentType;
  difficultyLevel?: DifficultyLevel;
  /** Defaults to 10. */
  nResults?: number;
  includeImages?: boolean;
  includeTables?: boolean;
  collections?: CollectionKey[];
}

/** A vector hit enriched with curriculum context for prompting and display. */
export interface EnhancedSearchResult {
  chunkId: string;
  content: string;
  relevanceScore: number;
  metadata: StoredMetadata;
  collection: CollectionKey;
  /** e.g. "TOGAF Foundation - Part 1 Architecture Development Method" */
  certificationContext: string;
  /** e.g. "Definition with tables (120 words)" */
  contentSummary: string;
  keyConcepts: string[];
  chapterContext: string | null;
  admPhases: string[];
}

export interface FoundationSearchOptions {
  part?: FoundationPart;
  difficulty?: DifficultyLevel;
  nResults?: number;
}

export interface PractitionerSearchOptions {
  guide?: PractitionerGuide;
  difficulty?: DifficultyLevel;
  nResults?: number;
}

/** The subset of a learner's profile that shapes retrieval. */
export interface SearchUserContext {
  userLevel?: string;
  /** 'foundation', 'practitioner' or 'both' */
  certificationGoal?: string;
  nResults?: number;
}

export interface SearchSystemStats {
  collections: Record<CollectionKey, CollectionStats>;
  embeddingModel: string;
  chromaUrl: string;
  totalDocuments: number;
}
