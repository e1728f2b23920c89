import type { z } from 'zod';
import type {
  AssessmentRecordSchema,
  ConversationPreferencesSchema,
  LearningGoalSchema,
  LearningPlanTemplateSchema,
  LearningPlanTopicSchema,
  SessionPreferencesSchema,
  StructuredLearningPlanSchema,
  TopicProgressSchema,
  UserProfileSchema,
} from '../schemas/profileSchemas';
import type { CertificationLevel } from './metadata.types';

export const EXPERIENCE_LEVELS = ['beginner', 'intermediate', 'advanced', 'expert'] as const;
export type ExperienceLevel = typeof EXPERIENCE_LEVELS[number];

export const LEARNING_APPROACHES = ['structured', 'adhoc', 'hybrid'] as const;
export type LearningApproach = typeof LEARNING_APPROACHES[number];

export const SESSION_INTENSITIES = ['light', 'moderate', 'intensive'] as const;
export type SessionIntensity = typeof SESSION_INTENSITIES[number];

export const LEARNING_STYLES = ['visual', 'reading_writing'] as const;
export type LearningStyle = typeof LEARNING_STYLES[number];

export const TOPIC_STATUSES = ['not_started', 'in_progress', 'completed', 'skipped'] as const;
export type TopicStatus = typeof TOPIC_STATUSES[number];

export const PLAN_TYPES = [
  'foundation_beginner',
  'foundation_review',
  'practitioner_prep',
  'extended_practitioner',
  'custom_topics',
  'exam_focused',
] as const;
export type PlanType = typeof PLAN_TYPES[number];

export const EXPLANATION_DEPTHS = ['brief', 'moderate', 'detailed'] as const;
export type ExplanationDepth = typeof EXPLANATION_DEPTHS[number];

export const QUESTION_DIFFICULTIES = ['easy', 'moderate', 'hard', 'adaptive'] as const;
export type QuestionDifficulty = typeof QUESTION_DIFFICULTIES[number];

export const RESPONSE_LENGTHS = ['concise', 'moderate', 'detailed'] as const;
export type ResponseLength = typeof RESPONSE_LENGTHS[number];

export const RESET_TYPES = ['progress_only', 'learning_plans', 'full_reset', 'refresh_current_plan'] as const;
export type ResetType = typeof RESET_TYPES[number];

// Persisted records. Dates are ISO-8601 strings.
export type LearningPlanTopic = z.infer<typeof LearningPlanTopicSchema>;
export type StructuredLearningPlan = z.infer<typeof StructuredLearningPlanSchema>;
export type LearningPlanTemplate = z.infer<typeof LearningPlanTemplateSchema>;
export type LearningGoal = z.infer<typeof LearningGoalSchema>;
export type TopicProgress = z.infer<typeof TopicProgressSchema>;
export type ConversationPreferences = z.infer<typeof ConversationPreferencesSchema>;
export type SessionPreferences = z.infer<typeof SessionPreferencesSchema>;
export type AssessmentRecord = z.infer<typeof AssessmentRecordSchema>;
export type UserProfile = z.infer<typeof UserProfileSchema>;

/** A custom plan entry: a bare topic id, or an id with a title and prerequisites. */
export type CustomTopicSpec = string | { topicId: string; title?: string; prerequisites?: string[] };

export interface CreatePlanOptions {
  customTopics?: CustomTopicSpec[];
  planName?: string;
  /** Custom plans only; template plans carry their own setting. */
  enforcePrerequisites?: boolean;
}

/** Outcome of a plan transition. Refusals leave the plan untouched. */
export interface TopicTransitionResult {
  success: boolean;
  message: string;
  unmetPrerequisites?: string[];
}

export interface CurrentTopicView {
  topic: LearningPlanTopic;
  planProgress: {
    currentIndex: number;
    totalTopics: number;
    completionPercentage: number;
  };
  canProceed: boolean;
  nextAvailableTopics: LearningPlanTopic[];
}

export interface TopicsByStatus {
  completed: LearningPlanTopic[];
  inProgress: LearningPlanTopic[];
  available: LearningPlanTopic[];
  locked: LearningPlanTopic[];
  skipped: LearningPlanTopic[];
}

export interface PlanOverview {
  plan: StructuredLearningPlan;
  topicsByStatus: TopicsByStatus;
  progressSummary: {
    completionPercentage: number;
    topicsCompleted: number;
    totalTopics: number;
    estimatedTimeRemainingMinutes: number;
    currentTopicIndex: number;
  };
}

export interface TopicProgressUpdate {
  status?: TopicStatus;
  completionPercentage?: number;
  proficiencyScore?: number;
  /** Added to the time already spent. */
  timeSpentMinutes?: number;
  /** Replaces the stored quiz scores. */
  quizScores?: number[];
  masteryIndicators?: Record<string, boolean>;
  notes?: string;
}

export interface UserStatistics {
  profile: {
    userId: string;
    username: string;
    experienceLevel: ExperienceLevel;
    overallProficiency: number;
    targetCertification: CertificationLevel | null;
    onboardingCompleted: boolean;
  };
  activity: {
    totalSessions: number;
    totalStudyTimeMinutes: number;
    averageSessionDurationMinutes: number;
    currentStreak: number;
    lastStudyDate: string | null;
    lastActive: string;
  };
  progress: {
    topicsStudied: number;
    activePlanId: string | null;
    activePlanName: string | null;
    activePlanCompletion: number;
    learningPlansCount: number;
    learningGoalsCount: number;
    topicProgressCount: number;
    assessmentHistoryCount: number;
  };
  preferences: {
    learningApproach: LearningApproach;
    examPreparationMode: boolean;
    preferredSessionDurationMinutes: number;
    learningStyle: LearningStyle;
  };
}
