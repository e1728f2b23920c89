import { z } from 'zod';
import { CERTIFICATION_LEVELS } from '../types/metadata.types';
import { EXPLANATION_DEPTHS } from '../types/profile.types';
import {
  CONVERSATION_MODES,
  MESSAGE_TYPES,
  SESSION_DIFFICULTIES,
  SESSION_STATES,
} from '../types/conversation.types';

const IsoDateSchema = z.string().datetime({ offset: true });

export const ConversationModeSchema = z.enum(CONVERSATION_MODES);

export const ConversationMessageSchema = z.object({
  messageId: z.string().min(1),
  timestamp: IsoDateSchema,
  messageType: z.enum(MESSAGE_TYPES),
  content: z.string(),
  metadata: z.record(z.string(), z.unknown()),
  topicContext: z.string().nullable(),
  certificationLevel: z.enum(CERTIFICATION_LEVELS).nullable(),
  difficultyLevel: z.enum(SESSION_DIFFICULTIES),
});

export const ConversationContextSchema = z.object({
  currentTopic: z.string().nullable(),
  currentCertificationLevel: z.enum(CERTIFICATION_LEVELS).nullable(),
  learningObjective: z.string().nullable(),
  topicsDiscussed: z.array(z.string()),
  conceptsExplained: z.array(z.string()),
  questionsAsked: z.array(z.string()),
  comprehensionSignals: z.record(z.string(), z.number().min(0).max(1)),
  confusionIndicators: z.array(z.string()),
  conversationMode: ConversationModeSchema,
  currentDifficultyLevel: z.enum(SESSION_DIFFICULTIES),
  explanationDepth: z.enum(EXPLANATION_DEPTHS),
  useExamples: z.boolean(),
  visualAidsRequested: z.boolean(),
});

export const ConversationSessionSchema = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  createdAt: IsoDateSchema,
  lastActivity: IsoDateSchema,
  expiresAt: IsoDateSchema,
  state: z.enum(SESSION_STATES),
  conversationMode: ConversationModeSchema,
  messages: z.array(ConversationMessageSchema),
  context: ConversationContextSchema,
  totalMessages: z.number().int().min(0),
  userQuestions: z.number().int().min(0),
  agentResponses: z.number().int().min(0),
  topicsCovered: z.number().int().min(0),
  sessionSatisfaction: z.number().min(0).max(5).nullable(),
  conceptsLearned: z.array(z.string()),
  assessmentScores: z.record(z.string(), z.number()),
});
