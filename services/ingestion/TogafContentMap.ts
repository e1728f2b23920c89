import contentMapJson from '../../shared/data/togafContentMap.json';
import { TogafContentMapSchema } from '../../shared/schemas/metadataSchemas';
import type {
  DifficultyLevel,
  FoundationPart,
  FoundationPartInfo,
  PractitionerGuide,
  PractitionerGuideInfo,
  TogafPhase,
} from '../../shared/types/metadata.types';

const contentMap = TogafContentMapSchema.parse(contentMapJson);

const partsById = new Map<FoundationPart, FoundationPartInfo>(
  contentMap.foundationParts.map(part => [part.id, part])
);
const partsByFile = new Map<string, FoundationPartInfo>(
  contentMap.foundationParts.map(part => [part.file, part])
);
const guidesById = new Map<PractitionerGuide, PractitionerGuideInfo>(
  contentMap.practitionerGuides.map(guide => [guide.id, guide])
);
const guidesByFile = new Map<string, PractitionerGuideInfo>(
  contentMap.practitionerGuides.map(guide => [guide.file, guide])
);

// First substring match wins, so more specific phrases come first within a phase.
const CHAPTER_PHASE_RULES: ReadonlyArray<readonly [string, TogafPhase]> = [
  ['preliminary phase', 'preliminary'],
  ['phase a', 'phase_a'],
  ['architecture vision', 'phase_a'],
  ['phase b', 'phase_b'],
  ['business architecture', 'phase_b'],
  ['phase c', 'phase_c'],
  ['information systems', 'phase_c'],
  ['data architecture', 'phase_c'],
  ['application architecture', 'phase_c'],
  ['phase d', 'phase_d'],
  ['technology architecture', 'phase_d'],
  ['phase e', 'phase_e'],
  ['opportunities', 'phase_e'],
  ['solutions', 'phase_e'],
  ['phase f', 'phase_f'],
  ['migration planning', 'phase_f'],
  ['phase g', 'phase_g'],
  ['implementation governance', 'phase_g'],
  ['phase h', 'phase_h'],
  ['architecture change management', 'phase_h'],
  ['requirements management', 'requirements_management'],
];

const TECHNIQUE_PARTS: ReadonlySet<FoundationPart> = new Set(['part_2_adm_techniques', 'part_3_applying_adm']);
const CONTENT_GOVERNANCE_PARTS: ReadonlySet<FoundationPart> = new Set([
  'part_4_architecture_content',
  'part_5_enterprise_capability_governance',
]);
const TECHNIQUE_ADVANCED_TERMS = ['advanced', 'complex', 'enterprise', 'governance'];
const CONTENT_ADVANCED_TERMS = ['compliance', 'governance', 'metamodel'];

/**
 * Static knowledge about the TOGAF document set: which file is which part or guide,
 * their chapters, key concepts and prerequisite relationships.
 */
export const TogafContentMap = {
  foundationPartForFile(fileName: string): FoundationPartInfo | null {
    return partsByFile.get(fileName) ?? null;
  },

  practitionerGuideForFile(fileName: string): PractitionerGuideInfo | null {
    return guidesByFile.get(fileName) ?? null;
  },

  foundationPart(part: FoundationPart): FoundationPartInfo | null {
    return partsById.get(part) ?? null;
  },

  practitionerGuide(guide: PractitionerGuide): PractitionerGuideInfo | null {
    return guidesById.get(guide) ?? null;
  },

  chapterList(part: FoundationPart): string[] {
    return partsById.get(part)?.chapters ?? [];
  },

  keyConcepts(part: FoundationPart): string[] {
    return partsById.get(part)?.keyConcepts ?? [];
  },

  prerequisites(part: FoundationPart): FoundationPart[] {
    return partsById.get(part)?.prerequisites ?? [];
  },

  practitionerPrerequisites(guide: PractitionerGuide): FoundationPart[] {
    const extra = guidesById.get(guide)?.extraPrerequisites ?? [];
    return [...contentMap.commonPractitionerPrerequisites, ...extra];
  },

  chapterToAdmPhase(chapterTitle: string): TogafPhase | null {
    const lower = chapterTitle.toLowerCase();
    const rule = CHAPTER_PHASE_RULES.find(([phrase]) => lower.includes(phrase));
    return rule ? rule[1] : null;
  },

  difficultyForChapter(part: FoundationPart, chapterTitle: string): DifficultyLevel {
    const lower = chapterTitle.toLowerCase();
    if (part === 'part_0_introduction_core_concepts' || lower.includes('introduction')) {
      return 'basic';
    }
    if (TECHNIQUE_PARTS.has(part)) {
      return TECHNIQUE_ADVANCED_TERMS.some(term => lower.includes(term)) ? 'advanced' : 'intermediate';
    }
    if (CONTENT_GOVERNANCE_PARTS.has(part)) {
      return CONTENT_ADVANCED_TERMS.some(term => lower.includes(term)) ? 'advanced' : 'intermediate';
    }
    return 'basic';
  },
};
