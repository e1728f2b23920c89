import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base/BaseService';
import { NotFoundError, ValidationError } from './base/ServiceError';
import type { IRecordStore } from './interfaces';
import type { ProfileService } from './ProfileService';
import { CERTIFICATION_LEVELS, type CertificationLevel } from '../shared/types/metadata.types';
import type { ExperienceLevel } from '../shared/types/profile.types';
import {
  CONVERSATION_MODES,
  SESSION_DIFFICULTIES,
  type ContextUpdate,
  type ConversationContext,
  type ConversationMessage,
  type ConversationMode,
  type ConversationSession,
  type HistoryOptions,
  type InitialContext,
  type MessageType,
  type SessionContextView,
  type SessionDifficulty,
  type SessionStatistics,
} from '../shared/types/conversation.types';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const DEFAULT_EXPIRY_HOURS = 4;
const RECENT_MESSAGES_IN_CONTEXT = 10;

/** Messages returned by history queries when no limit is given. */
export const CONTEXT_WINDOWS: Record<ConversationMode, number> = {
  learning: 20,
  exam_prep: 15,
  q_and_a: 10,
  assessment: 5,
  review: 25,
};

const DIFFICULTY_FOR_EXPERIENCE: Record<ExperienceLevel, SessionDifficulty> = {
  beginner: 'basic',
  intermediate: 'moderate',
  advanced: 'challenging',
  expert: 'advanced',
};

const TOPIC_KEYWORDS = [
  'adm',
  'preliminary',
  'architecture',
  'business',
  'data',
  'application',
  'technology',
  'governance',
  'implementation',
  'migration',
];

const CONFUSION_KEYWORDS = ['confused', "don't understand", 'unclear', 'complicated', 'difficult'];

interface SessionManagerServiceDeps {
  profileService: ProfileService;
  sessions: IRecordStore<ConversationSession>;
  expiryHours?: number;
}

export function isConversationMode(value: string): value is ConversationMode {
  return (CONVERSATION_MODES as readonly string[]).includes(value);
}

function isCertificationLevel(value: string): value is CertificationLevel {
  return (CERTIFICATION_LEVELS as readonly string[]).includes(value);
}

function isSessionDifficulty(value: string): value is SessionDifficulty {
  return (SESSION_DIFFICULTIES as readonly string[]).includes(value);
}

function isOpen(session: ConversationSession): boolean {
  return session.state === 'active' || session.state === 'paused';
}

/**
 * Keyword topic detection on every message; confusion phrases in a question
 * flag the topic the conversation was on.
 */
export function updateContextFromMessage(context: ConversationContext, message: ConversationMessage): void {
  const lower = message.content.toLowerCase();
  for (const keyword of TOPIC_KEYWORDS) {
    if (lower.includes(keyword) && !context.topicsDiscussed.includes(keyword)) {
      context.topicsDiscussed.push(keyword);
    }
  }

  if (message.messageType === 'user_question') {
    context.questionsAsked.push(message.content);
    const confused = CONFUSION_KEYWORDS.some(keyword => lower.includes(keyword));
    if (confused && message.topicContext && !context.confusionIndicators.includes(message.topicContext)) {
      context.confusionIndicators.push(message.topicContext);
    }
  }
}

/**
 * Conversation sessions with a fixed wall-clock lifetime. Every lookup checks
 * expiry; an open session past its deadline is marked expired and is no
 * longer returned.
 *
 * active -> paused -> active, and active|paused -> completed. Expired and
 * completed are terminal.
 */
export class SessionManagerService extends BaseService<SessionManagerServiceDeps> {
  private readonly expiryMs: number;

  constructor(deps: SessionManagerServiceDeps) {
    super('SessionManagerService', deps);
    this.expiryMs = (deps.expiryHours ?? DEFAULT_EXPIRY_HOURS) * HOUR_MS;
  }

  async createSession(userId: string, mode: string = 'learning', initialContext: InitialContext = {}): Promise<ConversationSession> {
    return this.execute('createSession', async () => {
      if (!isConversationMode(mode)) {
        throw new ValidationError(`Unknown conversation mode '${mode}'`, { allowed: CONVERSATION_MODES });
      }
      const { profileService, sessions } = this.deps;
      const profile = await profileService.getProfile(userId);
      if (!profile) {
        throw new NotFoundError('User', userId);
      }

      const now = new Date();
      const current = await profileService.getCurrentTopic(userId);
      const preferences = profile.conversationPreferences;
      const session: ConversationSession = {
        sessionId: uuidv4(),
        userId,
        createdAt: now.toISOString(),
        lastActivity: now.toISOString(),
        expiresAt: new Date(now.getTime() + this.expiryMs).toISOString(),
        state: 'active',
        conversationMode: mode,
        messages: [],
        context: {
          currentTopic: current?.topic.topicId ?? null,
          currentCertificationLevel: profile.targetCertification ?? 'foundation',
          learningObjective: current?.topic.description ?? null,
          topicsDiscussed: [],
          conceptsExplained: [],
          questionsAsked: [],
          comprehensionSignals: {},
          confusionIndicators: [],
          conversationMode: mode,
          currentDifficultyLevel: DIFFICULTY_FOR_EXPERIENCE[profile.experienceLevel],
          explanationDepth: preferences.explanationDepth,
          useExamples: preferences.useExamples,
          visualAidsRequested: preferences.useDiagrams,
          ...initialContext,
        },
        totalMessages: 0,
        userQuestions: 0,
        agentResponses: 0,
        topicsCovered: 0,
        sessionSatisfaction: null,
        conceptsLearned: [],
        assessmentScores: {},
      };
      await sessions.put(session.sessionId, session);

      profile.currentSessionId = session.sessionId;
      await profileService.saveProfile(profile);
      this.logInfo(`Created ${mode} session ${session.sessionId} for ${userId}`);
      return session;
    }, { userId, mode });
  }

  /** @returns null when the session is unknown or has expired */
  async getSession(sessionId: string): Promise<ConversationSession | null> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session || session.state === 'expired') {
      return null;
    }
    if (isOpen(session) && Date.now() > Date.parse(session.expiresAt)) {
      session.state = 'expired';
      await this.deps.sessions.put(sessionId, session);
      this.logDebug(`Session ${sessionId} expired`);
      return null;
    }
    return session;
  }

  /**
   * Appends a message to an active session and updates its counters and
   * context. Returns null when the session is not active.
   */
  async addMessage(
    sessionId: string,
    messageType: MessageType,
    content: string,
    metadata: Record<string, unknown> = {}
  ): Promise<ConversationMessage | null> {
    const session = await this.getSession(sessionId);
    if (!session || session.state !== 'active') {
      return null;
    }

    const { context } = session;
    const message: ConversationMessage = {
      messageId: uuidv4(),
      timestamp: new Date().toISOString(),
      messageType,
      content,
      metadata,
      topicContext: context.currentTopic,
      certificationLevel: context.currentCertificationLevel,
      difficultyLevel: context.currentDifficultyLevel,
    };

    session.messages.push(message);
    session.totalMessages += 1;
    session.lastActivity = message.timestamp;
    if (messageType === 'user_question') {
      session.userQuestions += 1;
    } else if (messageType === 'agent_response') {
      session.agentResponses += 1;
    }
    updateContextFromMessage(context, message);

    await this.deps.sessions.put(sessionId, session);
    return message;
  }

  /** @returns false when the session is unknown or expired */
  async updateContext(sessionId: string, updates: ContextUpdate): Promise<boolean> {
    const { conversationMode, currentCertificationLevel, difficultyLevel } = updates;
    if (conversationMode !== undefined && !isConversationMode(conversationMode)) {
      throw new ValidationError(`Unknown conversation mode '${conversationMode}'`, { allowed: CONVERSATION_MODES });
    }
    if (currentCertificationLevel !== undefined && !isCertificationLevel(currentCertificationLevel)) {
      throw new ValidationError(`Unknown certification level '${currentCertificationLevel}'`);
    }
    if (difficultyLevel !== undefined && !isSessionDifficulty(difficultyLevel)) {
      throw new ValidationError(`Unknown difficulty level '${difficultyLevel}'`);
    }

    const session = await this.getSession(sessionId);
    if (!session) {
      return false;
    }
    const { context } = session;

    if (updates.currentTopic !== undefined) {
      context.currentTopic = updates.currentTopic;
      if (!context.topicsDiscussed.includes(updates.currentTopic)) {
        context.topicsDiscussed.push(updates.currentTopic);
        session.topicsCovered += 1;
      }
    }
    if (currentCertificationLevel !== undefined) {
      context.currentCertificationLevel = currentCertificationLevel;
    }
    if (updates.learningObjective !== undefined) {
      context.learningObjective = updates.learningObjective;
    }
    if (conversationMode !== undefined) {
      session.conversationMode = conversationMode;
      context.conversationMode = conversationMode;
    }
    if (difficultyLevel !== undefined) {
      context.currentDifficultyLevel = difficultyLevel;
    }
    if (updates.comprehensionSignals) {
      context.comprehensionSignals = { ...context.comprehensionSignals, ...updates.comprehensionSignals };
    }
    for (const concept of updates.conceptsExplained ?? []) {
      if (!context.conceptsExplained.includes(concept)) {
        context.conceptsExplained.push(concept);
        session.conceptsLearned.push(concept);
      }
    }

    session.lastActivity = new Date().toISOString();
    await this.deps.sessions.put(sessionId, session);
    return true;
  }

  async getConversationHistory(sessionId: string, options: HistoryOptions = {}): Promise<ConversationMessage[]> {
    const session = await this.getSession(sessionId);
    if (!session) {
      return [];
    }
    const { messageTypes } = options;
    const messages = messageTypes && messageTypes.length > 0
      ? session.messages.filter(message => messageTypes.includes(message.messageType))
      : session.messages;
    const limit = options.limit ?? CONTEXT_WINDOWS[session.conversationMode];
    return limit > 0 ? messages.slice(-limit) : messages;
  }

  /** Session, learner and preference context handed to the tutoring agent. */
  async getSessionContext(sessionId: string): Promise<SessionContextView | null> {
    const session = await this.getSession(sessionId);
    if (!session) return null;
    const profile = await this.deps.profileService.getProfile(session.userId);
    if (!profile) return null;

    const preferences = profile.conversationPreferences;
    const recent = await this.getConversationHistory(sessionId, { limit: RECENT_MESSAGES_IN_CONTEXT });
    return {
      sessionInfo: {
        sessionId,
        userId: session.userId,
        conversationMode: session.conversationMode,
        topicsCovered: session.topicsCovered,
        totalMessages: session.totalMessages,
        sessionDurationMinutes: Math.floor((Date.parse(session.lastActivity) - Date.parse(session.createdAt)) / 60000),
      },
      userProfile: {
        experienceLevel: profile.experienceLevel,
        learningApproach: profile.learningApproach,
        targetCertification: profile.targetCertification,
        examPreparationMode: profile.examPreparationMode,
        overallProficiency: profile.overallProficiency,
      },
      conversationContext: session.context,
      learningPreferences: {
        learningStyle: preferences.learningStyle,
        explanationDepth: preferences.explanationDepth,
        useExamples: preferences.useExamples,
        useDiagrams: preferences.useDiagrams,
        interactiveMode: preferences.interactiveMode,
      },
      recentMessages: recent.map(message => ({
        type: message.messageType,
        content: message.content,
        timestamp: message.timestamp,
        topicContext: message.topicContext,
      })),
    };
  }

  async pauseSession(sessionId: string): Promise<boolean> {
    const session = await this.getSession(sessionId);
    if (!session || session.state !== 'active') {
      return false;
    }
    session.state = 'paused';
    session.lastActivity = new Date().toISOString();
    await this.deps.sessions.put(sessionId, session);
    return true;
  }

  async resumeSession(sessionId: string): Promise<boolean> {
    // getSession has already expired a paused session past its deadline.
    const session = await this.getSession(sessionId);
    if (!session || session.state !== 'paused') {
      return false;
    }
    session.state = 'active';
    session.lastActivity = new Date().toISOString();
    await this.deps.sessions.put(sessionId, session);
    return true;
  }

  /**
   * Completes an open session. Concepts learned in it are added to the
   * learner's strengths.
   */
  async endSession(sessionId: string, satisfactionScore?: number): Promise<boolean> {
    return this.execute('endSession', async () => {
      const session = await this.getSession(sessionId);
      if (!session || !isOpen(session)) {
        return false;
      }
      session.state = 'completed';
      session.lastActivity = new Date().toISOString();
      if (satisfactionScore !== undefined) {
        session.sessionSatisfaction = Math.min(5, Math.max(0, satisfactionScore));
      }

      const { profileService } = this.deps;
      const profile = await profileService.getProfile(session.userId);
      if (profile) {
        if (profile.currentSessionId === sessionId) {
          profile.currentSessionId = null;
        }
        for (const concept of session.conceptsLearned) {
          if (!profile.strengths.includes(concept)) profile.strengths.push(concept);
        }
        await profileService.saveProfile(profile);
      }

      await this.deps.sessions.put(sessionId, session);
      this.logInfo(`Ended session ${sessionId} after ${session.totalMessages} messages`);
      return true;
    }, { sessionId });
  }

  async getUserActiveSession(userId: string): Promise<string | null> {
    const profile = await this.deps.profileService.getProfile(userId);
    if (!profile?.currentSessionId) return null;
    const session = await this.getSession(profile.currentSessionId);
    return session?.state === 'active' ? session.sessionId : null;
  }

  /**
   * Deletes sessions past their deadline that never completed.
   * @returns how many were removed
   */
  async cleanupExpiredSessions(): Promise<number> {
    return this.execute('cleanupExpiredSessions', async () => {
      const now = Date.now();
      const all = await this.deps.sessions.list();
      const stale = all.filter(session =>
        session.state === 'expired' || (isOpen(session) && now > Date.parse(session.expiresAt)));
      for (const session of stale) {
        await this.deps.sessions.delete(session.sessionId);
      }
      if (stale.length > 0) {
        this.logInfo(`Removed ${stale.length} expired sessions`);
      }
      return stale.length;
    });
  }

  /** @returns null when the user has no sessions in the window */
  async getSessionStatistics(userId: string, days = 30): Promise<SessionStatistics | null> {
    const cutoff = Date.now() - days * DAY_MS;
    const all = await this.deps.sessions.list();
    const sessions = all.filter(session => session.userId === userId && Date.parse(session.createdAt) >= cutoff);
    if (sessions.length === 0) {
      return null;
    }

    const totalMessages = sessions.reduce((sum, session) => sum + session.totalMessages, 0);
    const totalTopics = sessions.reduce((sum, session) => sum + session.topicsCovered, 0);
    const satisfaction = sessions
      .map(session => session.sessionSatisfaction)
      .filter((score): score is number => score !== null);

    const distribution: Partial<Record<ConversationMode, number>> = {};
    let mostUsedMode: ConversationMode | null = null;
    for (const session of sessions) {
      const count = (distribution[session.conversationMode] ?? 0) + 1;
      distribution[session.conversationMode] = count;
      if (mostUsedMode === null || count > (distribution[mostUsedMode] ?? 0)) {
        mostUsedMode = session.conversationMode;
      }
    }

    return {
      totalSessions: sessions.length,
      totalMessages,
      averageMessagesPerSession: totalMessages / sessions.length,
      totalTopicsCovered: totalTopics,
      averageTopicsPerSession: totalTopics / sessions.length,
      averageSatisfaction: satisfaction.length > 0
        ? satisfaction.reduce((sum, score) => sum + score, 0) / satisfaction.length
        : null,
      conversationModeDistribution: distribution,
      mostUsedMode,
    };
  }
}
