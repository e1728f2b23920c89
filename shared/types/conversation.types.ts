import type { z } from 'zod';
import type {
  ConversationContextSchema,
  ConversationMessageSchema,
  ConversationSessionSchema,
} from '../schemas/conversationSchemas';
import type { CertificationLevel } from './metadata.types';
import type { ExperienceLevel, LearningApproach, LearningStyle, ExplanationDepth } from './profile.types';

export const SESSION_STATES = ['active', 'paused', 'completed', 'expired'] as const;
export type SessionState = typeof SESSION_STATES[number];

export const CONVERSATION_MODES = ['learning', 'exam_prep', 'q_and_a', 'assessment', 'review'] as const;
export type ConversationMode = typeof CONVERSATION_MODES[number];

export const MESSAGE_TYPES = ['user_question', 'agent_response', 'system_notification', 'progress_update'] as const;
export type MessageType = typeof MESSAGE_TYPES[number];

/** Difficulty a conversation is pitched at, seeded from the learner's experience level. */
export const SESSION_DIFFICULTIES = ['basic', 'moderate', 'challenging', 'advanced'] as const;
export type SessionDifficulty = typeof SESSION_DIFFICULTIES[number];

export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;
export type ConversationContext = z.infer<typeof ConversationContextSchema>;
export type ConversationSession = z.infer<typeof ConversationSessionSchema>;

/** Fields a caller may set on a session's context. Enum values are validated before anything changes. */
export interface ContextUpdate {
  currentTopic?: string;
  currentCertificationLevel?: string;
  learningObjective?: string;
  conversationMode?: string;
  difficultyLevel?: string;
  comprehensionSignals?: Record<string, number>;
  conceptsExplained?: string[];
}

export type InitialContext = Partial<Pick<
  ConversationContext,
  'currentTopic' | 'currentCertificationLevel' | 'learningObjective' | 'currentDifficultyLevel' | 'explanationDepth' | 'useExamples' | 'visualAidsRequested'
>>;

export interface HistoryOptions {
  /** Defaults to the session mode's context window. 0 returns everything. */
  limit?: number;
  messageTypes?: MessageType[];
}

export interface SessionContextView {
  sessionInfo: {
    sessionId: string;
    userId: string;
    conversationMode: ConversationMode;
    topicsCovered: number;
    totalMessages: number;
    sessionDurationMinutes: number;
  };
  userProfile: {
    experienceLevel: ExperienceLevel;
    learningApproach: LearningApproach;
    targetCertification: CertificationLevel | null;
    examPreparationMode: boolean;
    overallProficiency: number;
  };
  conversationContext: ConversationContext;
  learningPreferences: {
    learningStyle: LearningStyle;
    explanationDepth: ExplanationDepth;
    useExamples: boolean;
    useDiagrams: boolean;
    interactiveMode: boolean;
  };
  recentMessages: Array<{
    type: MessageType;
    content: string;
    timestamp: string;
    topicContext: string | null;
  }>;
}

export interface SessionStatistics {
  totalSessions: number;
  totalMessages: number;
  averageMessagesPerSession: number;
  totalTopicsCovered: number;
  averageTopicsPerSession: number;
  averageSatisfaction: number | null;
  conversationModeDistribution: Partial<Record<ConversationMode, number>>;
  mostUsedMode: ConversationMode | null;
}
