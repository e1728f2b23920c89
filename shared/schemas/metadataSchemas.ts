import { z } from 'zod';
import {
  ARCHITECTURE_DOMAINS,
  CONTENT_TYPES,
  DIFFICULTY_LEVELS,
  FOUNDATION_PARTS,
  LEARNING_OBJECTIVES,
  PRACTITIONER_GUIDES,
  SOURCE_DIRECTORIES,
  TOGAF_PHASES,
} from '../types/metadata.types';

export const FoundationPartSchema = z.enum(FOUNDATION_PARTS);
export const PractitionerGuideSchema = z.enum(PRACTITIONER_GUIDES);

/**
 * Schema for the static content map in shared/data/togafContentMap.json
 */
export const TogafContentMapSchema = z.object({
  foundationParts: z.array(z.object({
    id: FoundationPartSchema,
    file: z.string(),
    officialTitle: z.string(),
    partTitle: z.string(),
    partNumber: z.string(),
    chapters: z.array(z.string()),
    keyConcepts: z.array(z.string()),
    prerequisites: z.array(FoundationPartSchema),
  })),
  practitionerGuides: z.array(z.object({
    id: PractitionerGuideSchema,
    file: z.string(),
    title: z.string(),
    extraPrerequisites: z.array(FoundationPartSchema),
  })),
  commonPractitionerPrerequisites: z.array(FoundationPartSchema),
});

const ScoreSchema = z.number().min(0).max(1);

const DocumentInfoSchema = z.object({
  sourceFile: z.string().min(1),
  documentTitle: z.string(),
  totalPages: z.number().int().min(1),
  processingMethod: z.string(),
  sourceDirectory: z.enum(SOURCE_DIRECTORIES),
  officialTitle: z.string().optional(),
  partTitle: z.string().optional(),
  partNumber: z.string().optional(),
  seriesTitle: z.string().optional(),
  guideId: z.string().optional(),
});

const StructuralInfoSchema = z.object({
  pageNumber: z.number().int().min(1),
  chapterTitle: z.string().optional(),
  chapterNumber: z.string().optional(),
  sectionTitle: z.string().optional(),
  sectionNumber: z.string().optional(),
  subsectionTitle: z.string().optional(),
  wordCount: z.number().int().min(0),
});

const SemanticInfoSchema = z.object({
  keyConcepts: z.array(z.string()),
  relatedTopics: z.array(z.string()),
  admPhases: z.array(z.enum(TOGAF_PHASES)),
  architectureDomains: z.array(z.enum(ARCHITECTURE_DOMAINS)),
});

const MetadataBaseSchema = z.object({
  contentType: z.enum(CONTENT_TYPES),
  difficultyLevel: z.enum(DIFFICULTY_LEVELS),
  documentInfo: DocumentInfoSchema,
  structuralInfo: StructuralInfoSchema,
  semanticInfo: SemanticInfoSchema,
  learningObjectives: z.array(z.enum(LEARNING_OBJECTIVES)),
  prerequisites: z.array(z.string()),
  extractionConfidence: ScoreSchema,
  contentQualityScore: ScoreSchema,
  createdAt: z.string(),
});

/**
 * Level and part/guide are validated together: foundation metadata can only
 * name a FoundationPart, practitioner metadata only a PractitionerGuide.
 */
export const ContentMetadataSchema = z.discriminatedUnion('certificationLevel', [
  MetadataBaseSchema.extend({
    certificationLevel: z.literal('foundation'),
    foundationPart: FoundationPartSchema.nullable(),
    practitionerGuide: z.null(),
  }),
  MetadataBaseSchema.extend({
    certificationLevel: z.literal('practitioner'),
    foundationPart: z.null(),
    practitionerGuide: PractitionerGuideSchema.nullable(),
  }),
]).superRefine((metadata, ctx) => {
  const directory = metadata.documentInfo.sourceDirectory;
  if (directory === 'core_topics' && metadata.certificationLevel !== 'foundation') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'core_topics content must be foundation level' });
  }
  if (directory === 'extended_topics' && metadata.certificationLevel !== 'practitioner') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'extended_topics content must be practitioner level' });
  }
});

export type TogafContentMapData = z.infer<typeof TogafContentMapSchema>;

/** A cached embedding vector. */
export const EmbeddingVectorSchema = z.array(z.number());
