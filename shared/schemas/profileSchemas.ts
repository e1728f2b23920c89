import { z } from 'zod';
import { CERTIFICATION_LEVELS } from '../types/metadata.types';
import {
  EXPERIENCE_LEVELS,
  EXPLANATION_DEPTHS,
  LEARNING_APPROACHES,
  LEARNING_STYLES,
  PLAN_TYPES,
  QUESTION_DIFFICULTIES,
  RESPONSE_LENGTHS,
  SESSION_INTENSITIES,
  TOPIC_STATUSES,
} from '../types/profile.types';
import { LEARNING_PATH_TYPES } from '../types/progress.types';
import { logger } from '../../utils/logger';

const IsoDateSchema = z.string().datetime({ offset: true });
const ScoreSchema = z.number().min(0).max(1);
const PercentageSchema = z.number().min(0).max(100);
const CertificationLevelSchema = z.enum(CERTIFICATION_LEVELS);
const TopicStatusSchema = z.enum(TOPIC_STATUSES);

export const LearningPlanTopicSchema = z.object({
  topicId: z.string().min(1),
  title: z.string(),
  description: z.string(),
  certificationLevel: CertificationLevelSchema,
  estimatedDurationMinutes: z.number().int().min(0),
  prerequisites: z.array(z.string()),
  isOptional: z.boolean(),
  orderIndex: z.number().int().min(0),
  status: TopicStatusSchema,
  completionDate: IsoDateSchema.nullable(),
  userMarkedComplete: z.boolean(),
});

export const StructuredLearningPlanSchema = z.object({
  planId: z.string().min(1),
  planName: z.string(),
  planType: z.enum(PLAN_TYPES),
  description: z.string(),
  targetCertification: CertificationLevelSchema,
  createdDate: IsoDateSchema,
  estimatedTotalDurationMinutes: z.number().int().min(0),
  topics: z.array(LearningPlanTopicSchema),
  currentTopicIndex: z.number().int().min(0),
  isActive: z.boolean(),
  completionPercentage: PercentageSchema,
  topicsCompleted: z.number().int().min(0),
  totalTimeSpentMinutes: z.number().int().min(0),
  allowTopicSkipping: z.boolean(),
  enforcePrerequisites: z.boolean(),
});

/**
 * Schema for the plan templates in shared/data/learningPlanTemplates.json
 */
export const LearningPlanTemplateSchema = z.object({
  planType: z.enum(PLAN_TYPES),
  planName: z.string(),
  description: z.string(),
  targetCertification: CertificationLevelSchema,
  allowTopicSkipping: z.boolean(),
  enforcePrerequisites: z.boolean(),
  topics: z.array(z.object({
    topicId: z.string().min(1),
    title: z.string(),
    description: z.string(),
    certificationLevel: CertificationLevelSchema,
    estimatedDurationMinutes: z.number().int().min(0),
    prerequisites: z.array(z.string()).default([]),
    isOptional: z.boolean().default(false),
  })),
});

export const LearningGoalSchema = z.object({
  id: z.string().min(1),
  certificationLevel: CertificationLevelSchema,
  targetCompletionDate: IsoDateSchema.nullable(),
  priority: z.number().int().min(1).max(5),
  description: z.string(),
  createdAt: IsoDateSchema,
  isActive: z.boolean(),
  associatedPlanId: z.string().nullable(),
});

export const TopicProgressSchema = z.object({
  topicId: z.string().min(1),
  certificationLevel: CertificationLevelSchema,
  experienceLevel: z.enum(EXPERIENCE_LEVELS),
  completionPercentage: PercentageSchema,
  proficiencyScore: ScoreSchema,
  timeSpentMinutes: z.number().int().min(0),
  lastAccessed: IsoDateSchema.nullable(),
  quizScores: z.array(z.number()),
  masteryIndicators: z.record(z.string(), z.boolean()),
  notes: z.string(),
  isPartOfPlan: z.boolean(),
  planId: z.string().nullable(),
  status: TopicStatusSchema,
  markedCompleteByUser: z.boolean(),
  completionDate: IsoDateSchema.nullable(),
});

export const ConversationPreferencesSchema = z.object({
  learningStyle: z.enum(LEARNING_STYLES),
  explanationDepth: z.enum(EXPLANATION_DEPTHS),
  useExamples: z.boolean(),
  useDiagrams: z.boolean(),
  interactiveMode: z.boolean(),
  questionDifficulty: z.enum(QUESTION_DIFFICULTIES),
  preferredResponseLength: z.enum(RESPONSE_LENGTHS),
});

export const SessionPreferencesSchema = z.object({
  preferredDurationMinutes: z.number().int().min(15).max(120),
  sessionIntensity: z.enum(SESSION_INTENSITIES),
  breakFrequencyMinutes: z.number().int().min(10).max(60),
  reminderNotifications: z.boolean(),
  progressTracking: z.boolean(),
});

export const AssessmentRecordSchema = z.object({
  timestamp: IsoDateSchema,
  topicId: z.string(),
  score: z.number(),
  assessmentType: z.string(),
  overallProficiency: ScoreSchema,
});

export const UserProfileSchema = z.object({
  userId: z.string().min(1),
  username: z.string().min(1),
  email: z.string().nullable(),
  createdAt: IsoDateSchema,
  lastActive: IsoDateSchema,

  experienceLevel: z.enum(EXPERIENCE_LEVELS),
  proficiencyScores: z.record(z.string(), ScoreSchema),
  overallProficiency: ScoreSchema,

  learningApproach: z.enum(LEARNING_APPROACHES),
  structuredWeight: ScoreSchema,

  examPreparationMode: z.boolean(),
  targetCertification: CertificationLevelSchema.nullable(),
  examReadinessScore: ScoreSchema,
  certificationDeadline: IsoDateSchema.nullable(),

  learningPlans: z.record(z.string(), StructuredLearningPlanSchema),
  activePlanId: z.string().nullable(),

  learningGoals: z.array(LearningGoalSchema),
  topicProgress: z.record(z.string(), TopicProgressSchema),
  conversationPreferences: ConversationPreferencesSchema,
  sessionPreferences: SessionPreferencesSchema,

  totalStudyTimeMinutes: z.number().int().min(0),
  sessionsCompleted: z.number().int().min(0),
  averageSessionDurationMinutes: z.number().min(0),
  streakDays: z.number().int().min(0),
  lastStudyDate: IsoDateSchema.nullable(),

  strengths: z.array(z.string()),
  areasForImprovement: z.array(z.string()),
  learningVelocity: z.number().min(0.1).max(5),
  retentionScore: ScoreSchema,
  preferredLearningTimes: z.array(z.string()),

  knowledgeGaps: z.record(z.string(), ScoreSchema),
  lastAssessmentDate: IsoDateSchema.nullable(),
  assessmentHistory: z.array(AssessmentRecordSchema),

  currentSessionId: z.string().nullable(),
  currentTopicFocus: z.string().nullable(),

  profileVersion: z.string(),
  onboardingCompleted: z.boolean(),
});

export const LearningSessionSchema = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  sessionType: z.string(),
  startTime: IsoDateSchema,
  endTime: IsoDateSchema.nullable(),
  durationMinutes: z.number().int().min(0),
  topicsCovered: z.array(z.string()),
  questionsAsked: z.number().int().min(0),
  questionsAnsweredCorrectly: z.number().int().min(0),
  conceptsExplained: z.array(z.string()),
  engagementScore: ScoreSchema,
  comprehensionScore: ScoreSchema,
  satisfactionScore: z.number().min(0).max(5).nullable(),
});

export const ProgressAnalyticsSchema = z.object({
  userId: z.string().min(1),
  analysisDate: IsoDateSchema,
  overallCompletion: PercentageSchema,
  studyConsistency: ScoreSchema,
  learningVelocity: z.number().min(0.1).max(5),
  retentionRate: ScoreSchema,
  foundationReadiness: ScoreSchema,
  practitionerReadiness: ScoreSchema,
  peakPerformanceTimes: z.array(z.string()),
  optimalSessionLengthMinutes: z.number().int().min(0),
  suggestedNextTopics: z.array(z.string()),
  knowledgeGaps: z.record(z.string(), ScoreSchema),
  improvementFocus: z.array(z.string()),
});

export const AdaptiveLearningPathSchema = z.object({
  pathId: z.string().min(1),
  userId: z.string().min(1),
  pathType: z.enum(LEARNING_PATH_TYPES),
  createdDate: IsoDateSchema,
  lastUpdated: IsoDateSchema,
  targetCertification: CertificationLevelSchema,
  estimatedCompletionWeeks: z.number().int().min(1),
  currentTopics: z.array(z.string()),
  completedTopics: z.array(z.string()),
  priorityTopics: z.array(z.string()),
  performanceThreshold: ScoreSchema,
  adaptationSensitivity: ScoreSchema,
  reviewFrequency: z.number().int().min(1),
});

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text.trim());
  } catch {
    return undefined;
  }
}

/**
 * Parse JSON response from LLM with markdown code block support.
 * Falls back to the outermost `{...}` span when the model wraps the object in prose.
 */
export function parseLLMResponse<T>(
  response: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: string
): T | null {
  const candidates = [response];

  const codeBlockMatch = response.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch) {
    candidates.push(codeBlockMatch[1]);
  }

  const objectMatch = response.match(/\{[\s\S]*\}/);
  if (objectMatch) {
    candidates.push(objectMatch[0]);
  }

  for (const candidate of candidates) {
    const parsed = tryParseJson(candidate);
    if (parsed === undefined) {
      continue;
    }
    const result = schema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }
  }

  logger.debug(`[parseLLMResponse] No valid ${context} payload in response`);
  return null;
}
