import type { z } from 'zod';
import type {
  AdaptiveLearningPathSchema,
  LearningSessionSchema,
  ProgressAnalyticsSchema,
} from '../schemas/profileSchemas';

export const LEARNING_PATH_TYPES = ['linear', 'adaptive', 'personalized', 'exam_focused'] as const;
export type LearningPathType = typeof LEARNING_PATH_TYPES[number];

export type LearningSession = z.infer<typeof LearningSessionSchema>;
export type ProgressAnalytics = z.infer<typeof ProgressAnalyticsSchema>;
export type AdaptiveLearningPath = z.infer<typeof AdaptiveLearningPathSchema>;

export type InteractionType = 'question' | 'concept_explained' | 'exam_question' | 'review';

export interface TopicPerformance {
  /** Proficiency observed for the topic, 0-1. */
  score: number;
  type?: string;
  quizScore?: number;
  /** Earlier quiz scores the new `quizScore` is appended to. */
  quizScores?: number[];
  masteryIndicators?: Record<string, boolean>;
  interactions?: string[];
}

export type RecommendationReason = 'knowledge_gap' | 'structured_plan' | 'adaptive_suggestion';
export type RecommendationDifficulty = 'review' | 'moderate' | 'planned' | 'adaptive';

export interface TopicRecommendation {
  topicId: string;
  reason: RecommendationReason;
  priority: number;
  estimatedDurationMinutes: number;
  difficulty: RecommendationDifficulty;
}

export interface LearningInsights {
  performanceSummary: {
    overallProgress: string;
    learningVelocity: string;
    consistency: string;
    retention: string;
  };
  certificationReadiness: {
    foundation: {
      score: string;
      status: string;
      recommendation: string;
    };
  };
  learningOptimization: {
    optimalSessionLength: string;
    bestStudyTimes: string[];
    recommendedApproach: string;
  };
  focusAreas: {
    strengths: string[];
    improvementNeeded: string[];
    nextPriorities: string[];
  };
}
