/** Certification tiers the content is partitioned into. */
export const CERTIFICATION_LEVELS = ['foundation', 'practitioner'] as const;
export type CertificationLevel = typeof CERTIFICATION_LEVELS[number];

export const FOUNDATION_PARTS = [
  'part_0_introduction_core_concepts',
  'part_1_architecture_development_method',
  'part_2_adm_techniques',
  'part_3_applying_adm',
  'part_4_architecture_content',
  'part_5_enterprise_capability_governance',
] as const;
export type FoundationPart = typeof FOUNDATION_PARTS[number];

export const PRACTITIONER_GUIDES = [
  'risk_security_integration',
  'information_mapping',
  'practitioners_approach_adm',
  'digital_enterprise',
  'enterprise_agility',
  'business_models',
  'adm_agile_sprints',
  'value_streams',
  'organization_mapping',
  'soa_guide',
  'trm_guide',
  'iii_rm_guide',
  'business_capabilities',
  'digital_technology_adoption',
  'microservices_architecture',
  'business_scenarios',
  'government_reference_model',
  'architecture_skills_framework',
  'business_capability_planning',
  'digital_business_reference_model',
  'information_arch_metadata',
  'bi_analytics',
  'ea_capability_guide',
  'sustainable_is',
  'architecture_maturity_models',
  'customer_mdm',
  'architecture_project_management',
] as const;
export type PractitionerGuide = typeof PRACTITIONER_GUIDES[number];

export const CONTENT_TYPES = [
  'concept',
  'process',
  'diagram',
  'example',
  'checklist',
  'deliverable',
  'question',
  'assessment',
  'table',
  'definition',
  'guideline',
  'procedure',
  'template',
  'technique',
  'pattern',
  'reference_model',
  'methodology',
  'framework',
  'metamodel',
  'readiness_assessment',
  'maturity_model',
] as const;
export type ContentType = typeof CONTENT_TYPES[number];

export const DIFFICULTY_LEVELS = ['basic', 'intermediate', 'advanced'] as const;
export type DifficultyLevel = typeof DIFFICULTY_LEVELS[number];

export const TOGAF_PHASES = [
  'preliminary',
  'phase_a',
  'phase_b',
  'phase_c',
  'phase_d',
  'phase_e',
  'phase_f',
  'phase_g',
  'phase_h',
  'requirements_management',
] as const;
export type TogafPhase = typeof TOGAF_PHASES[number];

export const ARCHITECTURE_DOMAINS = ['business', 'data', 'application', 'technology'] as const;
export type ArchitectureDomain = typeof ARCHITECTURE_DOMAINS[number];

export const LEARNING_OBJECTIVES = [
  'understand_concepts',
  'apply_methods',
  'analyze_scenarios',
  'evaluate_solutions',
  'create_artifacts',
] as const;
export type LearningObjective = typeof LEARNING_OBJECTIVES[number];

export const SOURCE_DIRECTORIES = [
  'core_topics',
  'extended_topics',
  'sample_questions_answers',
  'certification',
] as const;
export type SourceDirectory = typeof SOURCE_DIRECTORIES[number];

export interface DocumentInfo {
  sourceFile: string;
  documentTitle: string;
  totalPages: number;
  processingMethod: string;
  sourceDirectory: SourceDirectory;
  officialTitle?: string;
  partTitle?: string;
  partNumber?: string;
  seriesTitle?: string;
  guideId?: string;
}

export interface StructuralInfo {
  pageNumber: number;
  chapterTitle?: string;
  chapterNumber?: string;
  sectionTitle?: string;
  sectionNumber?: string;
  subsectionTitle?: string;
  wordCount: number;
}

export interface SemanticInfo {
  keyConcepts: string[];
  relatedTopics: string[];
  admPhases: TogafPhase[];
  architectureDomains: ArchitectureDomain[];
}

/**
 * Classification record attached to every chunk.
 * The level and the part/guide fields are a discriminated pair:
 * foundation content never carries a guide and practitioner content never carries a part.
 */
interface ContentMetadataBase {
  contentType: ContentType;
  difficultyLevel: DifficultyLevel;
  documentInfo: DocumentInfo;
  structuralInfo: StructuralInfo;
  semanticInfo: SemanticInfo;
  learningObjectives: LearningObjective[];
  prerequisites: string[];
  extractionConfidence: number;
  contentQualityScore: number;
  createdAt: string;
}

export interface FoundationContentMetadata extends ContentMetadataBase {
  certificationLevel: 'foundation';
  foundationPart: FoundationPart | null;
  practitionerGuide: null;
}

export interface PractitionerContentMetadata extends ContentMetadataBase {
  certificationLevel: 'practitioner';
  foundationPart: null;
  practitionerGuide: PractitionerGuide | null;
}

export type ContentMetadata = FoundationContentMetadata | PractitionerContentMetadata;

/** Official naming of a Foundation part document. */
export interface FoundationPartInfo {
  id: FoundationPart;
  file: string;
  officialTitle: string;
  partTitle: string;
  partNumber: string;
  chapters: string[];
  keyConcepts: string[];
  prerequisites: FoundationPart[];
}

/** Official naming of a Practitioner series guide. */
export interface PractitionerGuideInfo {
  id: PractitionerGuide;
  file: string;
  title: string;
  extraPrerequisites: FoundationPart[];
}
