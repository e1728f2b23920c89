import * as path from 'path';
import { ZodError } from 'zod';
import { ValidationError } from '../base/ServiceError';
import { TogafContentMap } from './TogafContentMap';
import { ContentMetadataSchema } from '../../shared/schemas/metadataSchemas';
import { countWords, titleCase } from '../../utils/text';
import {
  SOURCE_DIRECTORIES,
  type CertificationLevel,
  type ContentMetadata,
  type ContentType,
  type DifficultyLevel,
  type DocumentInfo,
  type FoundationPart,
  type PractitionerGuide,
  type SourceDirectory,
  type TogafPhase,
} from '../../shared/types/metadata.types';
import type { SectionInfo } from '../../shared/types/ingestion.types';

const SERIES_TITLE = 'TOGAF® Series Guide';

/** Structural cue, all-keywords or any-keyword rule. Evaluated top to bottom. */
export type ContentTypeRule =
  | { contentType: ContentType; when: 'has_images' | 'has_tables' }
  | { contentType: ContentType; allOf: string[] }
  | { contentType: ContentType; anyOf: string[] };

export const CONTENT_TYPE_RULES: readonly ContentTypeRule[] = [
  { contentType: 'diagram', when: 'has_images' },
  { contentType: 'table', when: 'has_tables' },
  { contentType: 'readiness_assessment', allOf: ['assessment', 'readiness'] },
  { contentType: 'maturity_model', allOf: ['maturity', 'model'] },
  { contentType: 'reference_model', anyOf: ['reference model'] },
  { contentType: 'definition', anyOf: ['definition', 'means'] },
  { contentType: 'checklist', anyOf: ['checklist', 'check list'] },
  { contentType: 'example', anyOf: ['example', 'for example'] },
  { contentType: 'deliverable', anyOf: ['deliverable'] },
  { contentType: 'technique', anyOf: ['technique', 'method'] },
  { contentType: 'pattern', anyOf: ['pattern'] },
  { contentType: 'framework', anyOf: ['framework'] },
  { contentType: 'metamodel', anyOf: ['metamodel'] },
];

const DEFAULT_CONTENT_TYPE: ContentType = 'concept';

export interface ContentClassificationInput {
  text: string;
  imageCount: number;
  tableCount: number;
}

export function determineContentType(
  input: ContentClassificationInput,
  rules: readonly ContentTypeRule[] = CONTENT_TYPE_RULES
): ContentType {
  const lower = input.text.toLowerCase();
  for (const rule of rules) {
    if ('when' in rule) {
      const hit = rule.when === 'has_images' ? input.imageCount > 0 : input.tableCount > 0;
      if (hit) return rule.contentType;
    } else if ('allOf' in rule) {
      if (rule.allOf.every(term => lower.includes(term))) return rule.contentType;
    } else if (rule.anyOf.some(term => lower.includes(term))) {
      return rule.contentType;
    }
  }
  return DEFAULT_CONTENT_TYPE;
}

export function isSourceDirectory(value: string): value is SourceDirectory {
  return (SOURCE_DIRECTORIES as readonly string[]).includes(value);
}

export interface ChunkMetadataInput {
  sourcePath: string;
  text: string;
  imageCount: number;
  tableCount: number;
  section: SectionInfo | null;
  pageNumber: number;
  totalPages: number;
  processingMethod: string;
  extractionConfidence?: number;
  contentQualityScore?: number;
}

type DocumentIdentity =
  | { certificationLevel: 'foundation'; foundationPart: FoundationPart | null; practitionerGuide: null }
  | { certificationLevel: 'practitioner'; foundationPart: null; practitionerGuide: PractitionerGuide | null };

/**
 * Validating factory for metadata records.
 * Rejects scores outside [0,1] and level/part/guide combinations that contradict each other.
 */
export function createContentMetadata(raw: unknown): ContentMetadata {
  try {
    return ContentMetadataSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError('Invalid content metadata', error.issues);
    }
    throw error;
  }
}

/**
 * Deterministic classifier turning a chunk and its source file into a ContentMetadata record.
 */
export class MetadataBuilder {
  resolveIdentity(sourceDirectory: SourceDirectory, fileName: string): DocumentIdentity {
    if (sourceDirectory === 'extended_topics') {
      const guide = TogafContentMap.practitionerGuideForFile(fileName);
      return { certificationLevel: 'practitioner', foundationPart: null, practitionerGuide: guide?.id ?? null };
    }
    const part = sourceDirectory === 'core_topics' ? TogafContentMap.foundationPartForFile(fileName) : null;
    return { certificationLevel: 'foundation', foundationPart: part?.id ?? null, practitionerGuide: null };
  }

  determineDifficulty(
    sourceDirectory: SourceDirectory,
    part: FoundationPart | null,
    chapterTitle: string | undefined
  ): DifficultyLevel {
    if (sourceDirectory === 'extended_topics') {
      return 'intermediate';
    }
    if (sourceDirectory === 'core_topics' && part && chapterTitle !== undefined) {
      return TogafContentMap.difficultyForChapter(part, chapterTitle);
    }
    return 'basic';
  }

  build(input: ChunkMetadataInput): ContentMetadata {
    const directoryName = path.basename(path.dirname(input.sourcePath));
    if (!isSourceDirectory(directoryName)) {
      throw new ValidationError(`Unsupported source directory '${directoryName}'`, { sourcePath: input.sourcePath });
    }
    const fileName = path.basename(input.sourcePath);
    const identity = this.resolveIdentity(directoryName, fileName);
    const chapterTitle = input.section?.title;

    const admPhases: TogafPhase[] = [];
    const phase = chapterTitle ? TogafContentMap.chapterToAdmPhase(chapterTitle) : null;
    if (phase) admPhases.push(phase);

    const keyConcepts = identity.foundationPart ? TogafContentMap.keyConcepts(identity.foundationPart) : [];
    const prerequisites = identity.foundationPart
      ? TogafContentMap.prerequisites(identity.foundationPart)
      : identity.practitionerGuide
        ? TogafContentMap.practitionerPrerequisites(identity.practitionerGuide)
        : [];

    return createContentMetadata({
      ...identity,
      contentType: determineContentType(input),
      difficultyLevel: this.determineDifficulty(directoryName, identity.foundationPart, chapterTitle),
      documentInfo: this.documentInfo(directoryName, fileName, input),
      structuralInfo: {
        pageNumber: input.pageNumber,
        chapterTitle,
        chapterNumber: input.section?.number,
        wordCount: countWords(input.text),
      },
      semanticInfo: {
        keyConcepts,
        relatedTopics: [],
        admPhases,
        architectureDomains: [],
      },
      learningObjectives: [],
      prerequisites,
      extractionConfidence: input.extractionConfidence ?? 1.0,
      contentQualityScore: input.contentQualityScore ?? 1.0,
      createdAt: new Date().toISOString(),
    });
  }

  private documentInfo(directory: SourceDirectory, fileName: string, input: ChunkMetadataInput): DocumentInfo {
    const info: DocumentInfo = {
      sourceFile: input.sourcePath,
      documentTitle: path.basename(fileName, path.extname(fileName)),
      totalPages: Math.max(1, input.totalPages),
      processingMethod: input.processingMethod,
      sourceDirectory: directory,
    };
    if (directory === 'core_topics') {
      const part = TogafContentMap.foundationPartForFile(fileName);
      if (part) {
        info.officialTitle = part.officialTitle;
        info.partTitle = part.partTitle;
        info.partNumber = part.partNumber;
      }
    } else if (directory === 'extended_topics') {
      info.guideId = fileName.replace('.pdf', '');
      info.seriesTitle = SERIES_TITLE;
    }
    return info;
  }
}

/** Tags used for filtering and display, in a fixed order. */
export function getSearchTags(metadata: ContentMetadata): string[] {
  const slug = (value: string) => value.toLowerCase().replace(/ /g, '_');
  const tags: string[] = [metadata.certificationLevel, metadata.contentType, metadata.difficultyLevel];

  if (metadata.foundationPart) tags.push(`foundation_part:${metadata.foundationPart}`);
  if (metadata.practitionerGuide) tags.push(`practitioner_guide:${metadata.practitionerGuide}`);
  if (metadata.structuralInfo.chapterTitle) tags.push(`chapter:${slug(metadata.structuralInfo.chapterTitle)}`);
  if (metadata.structuralInfo.sectionTitle) tags.push(`section:${slug(metadata.structuralInfo.sectionTitle)}`);

  tags.push(...metadata.semanticInfo.keyConcepts.map(concept => `concept:${slug(concept)}`));
  tags.push(...metadata.semanticInfo.admPhases.map(phase => `phase:${phase}`));
  tags.push(...metadata.semanticInfo.architectureDomains.map(domain => `domain:${domain}`));
  tags.push(...metadata.learningObjectives.map(objective => `objective:${objective}`));
  return tags;
}

const DIFFICULTIES_FOR_USER_LEVEL: Record<string, DifficultyLevel[]> = {
  beginner: ['basic'],
  intermediate: ['basic', 'intermediate'],
  advanced: ['basic', 'intermediate', 'advanced'],
};

export function isRelevantForUser(metadata: ContentMetadata, userLevel: string, certificationGoal: CertificationLevel | string): boolean {
  if (certificationGoal === 'foundation' && metadata.certificationLevel === 'practitioner') {
    return false;
  }
  const allowed = DIFFICULTIES_FOR_USER_LEVEL[userLevel] ?? ['basic'];
  return allowed.includes(metadata.difficultyLevel);
}

export function getCertificationContext(metadata: ContentMetadata): string {
  if (metadata.certificationLevel === 'foundation') {
    return `TOGAF Foundation - ${metadata.foundationPart ? titleCase(metadata.foundationPart) : ''}`;
  }
  return `TOGAF Practitioner - ${metadata.practitionerGuide ? titleCase(metadata.practitionerGuide) : ''}`;
}
