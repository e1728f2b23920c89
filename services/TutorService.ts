import { BaseService } from './base/BaseService';
import { ConflictError, NotFoundError } from './base/ServiceError';
import type { AdaptiveAgentService } from './AdaptiveAgentService';
import type { ProfileService } from './ProfileService';
import type { ProgressTrackerService } from './ProgressTrackerService';
import type { SemanticSearchService } from './SemanticSearchService';
import type { SessionManagerService } from './SessionManagerService';
import type { IService, ServiceHealthResult } from './interfaces';
import type { AgentResponse, ExamQuestion, ExamQuestionOptions, ExplanationDetail } from '../shared/types/agent.types';
import type { ConversationSession, InitialContext } from '../shared/types/conversation.types';
import type { CreatePlanOptions, UserProfile } from '../shared/types/profile.types';
import type { TopicPerformance } from '../shared/types/progress.types';
import type {
  CreatedPlan,
  EndedSession,
  KnowledgeBaseSearchOptions,
  KnowledgeBaseSearchResult,
  LearningPlanStatus,
  ProgressUpdateResult,
  StartedSession,
  SystemStatus,
  TutorReply,
  UserDashboard,
} from '../shared/types/tutor.types';
import { titleCase } from '../utils/text';

interface TutorServiceDeps {
  profileService: ProfileService;
  progressTracker: ProgressTrackerService;
  sessionManager: SessionManagerService;
  search: SemanticSearchService;
  agent: AdaptiveAgentService;
}

const CHAT_SEARCH_RESULTS = 5;
const DASHBOARD_RECOMMENDATIONS = 3;
const PLAN_STATUS_RECOMMENDATIONS = 5;
const DEFAULT_SEARCH_LIMIT = 5;

export function welcomeMessage(profile: UserProfile, currentTopic: string | null): string {
  const lines = [
    `Welcome back, ${profile.username}!`,
    '',
    `Experience Level: ${titleCase(profile.experienceLevel)}`,
    `Target Certification: ${titleCase(profile.targetCertification ?? 'foundation')}`,
  ];
  if (currentTopic) {
    lines.push(`Current Focus: ${titleCase(currentTopic)}`);
  }
  lines.push('', "I'm here to help you master TOGAF! What would you like to explore today?");
  return lines.join('\n');
}

/**
 * Entry point for the serving side. Routes a learner's turn through retrieval,
 * the adaptive agent, the conversation transcript and progress tracking.
 */
export class TutorService extends BaseService<TutorServiceDeps> {
  constructor(deps: TutorServiceDeps) {
    super('TutorService', deps);
  }

  async createUser(username: string, email: string | null = null): Promise<UserProfile> {
    return this.deps.profileService.createProfile(username, email);
  }

  async getUserDashboard(userId: string): Promise<UserDashboard | null> {
    return this.execute('getUserDashboard', async () => {
      const { profileService, progressTracker } = this.deps;
      const profile = await profileService.getProfile(userId);
      if (!profile) {
        return null;
      }

      const analytics = await progressTracker.generateProgressAnalytics(userId);
      const insights = await progressTracker.getLearningInsights(userId);
      const statistics = await profileService.getUserStatistics(userId);
      const currentTopic = await profileService.getCurrentTopic(userId);
      const recommendations = await progressTracker.getNextRecommendedTopics(userId, DASHBOARD_RECOMMENDATIONS);

      return {
        userProfile: {
          userId: profile.userId,
          username: profile.username,
          experienceLevel: profile.experienceLevel,
          overallProficiency: profile.overallProficiency,
          targetCertification: profile.targetCertification,
          examPreparationMode: profile.examPreparationMode,
        },
        analytics,
        insights,
        statistics,
        currentTopic,
        recommendations,
      };
    }, { userId });
  }

  /**
   * Opens a conversation session and the learning session that tracks it,
   * both under one id.
   */
  async startLearningSession(userId: string, mode = 'learning', initialContext: InitialContext = {}): Promise<StartedSession> {
    return this.execute('startLearningSession', async () => {
      const { profileService, progressTracker, sessionManager } = this.deps;
      const session = await sessionManager.createSession(userId, mode, initialContext);
      const learningSession = await progressTracker.startLearningSession(userId, mode, { sessionId: session.sessionId });

      const profile = await profileService.getProfile(userId);
      if (!profile) {
        throw new NotFoundError('User', userId);
      }

      return {
        sessionId: session.sessionId,
        session,
        learningSession,
        welcomeMessage: welcomeMessage(profile, session.context.currentTopic),
      };
    }, { userId, mode });
  }

  /**
   * One conversational turn: retrieve content, generate an adapted answer,
   * append both messages to the transcript and log topic interactions.
   */
  async chat(userId: string, sessionId: string, message: string): Promise<TutorReply> {
    return this.execute('chat', async () => {
      const { agent, progressTracker, search, sessionManager } = this.deps;
      const session = await this.requireUserSession(userId, sessionId);
      const profile = await this.requireProfile(userId);

      const userMessage = await sessionManager.addMessage(sessionId, 'user_question', message);
      if (!userMessage) {
        throw new ConflictError('Session', `session ${sessionId} is ${session.state}`);
      }

      const topic = session.context.currentTopic;
      const results = await search.searchWithContext(topic ? `${topic} ${message}` : message, {
        userLevel: profile.experienceLevel,
        certificationGoal: profile.targetCertification ?? 'foundation',
        nResults: CHAT_SEARCH_RESULTS,
      });

      const response = await agent.generateResponse(sessionId, message, results);
      const agentMessage = await this.recordResponse(sessionId, response);

      for (const topicId of response.topicsAddressed) {
        await progressTracker.logTopicInteraction(sessionId, topicId, 'question', true);
      }

      this.logInfo(`Answered ${userId} in ${sessionId} (${results.length} passages, ${response.topicsAddressed.length} topics)`);
      return {
        response,
        userMessageId: userMessage.messageId,
        agentMessageId: agentMessage,
        searchResultCount: results.length,
      };
    }, { userId, sessionId });
  }

  async explainConcept(userId: string, sessionId: string, concept: string, detail: ExplanationDetail = 'adaptive'): Promise<AgentResponse> {
    return this.execute('explainConcept', async () => {
      const { agent, progressTracker, sessionManager } = this.deps;
      await this.requireUserSession(userId, sessionId);

      await sessionManager.addMessage(sessionId, 'user_question', `Explain ${concept}`, { concept, detail });
      const response = await agent.provideExplanation(sessionId, concept, detail);
      await this.recordResponse(sessionId, response);
      await progressTracker.logTopicInteraction(sessionId, concept, 'concept_explained', true);
      return response;
    }, { userId, sessionId, concept });
  }

  async generateExamQuestion(userId: string, sessionId: string, options: ExamQuestionOptions = {}): Promise<ExamQuestion> {
    return this.execute('generateExamQuestion', async () => {
      await this.requireUserSession(userId, sessionId);
      const question = await this.deps.agent.generateExamQuestion(sessionId, options);
      await this.deps.progressTracker.logTopicInteraction(sessionId, question.topicId, 'exam_question', true);
      return question;
    }, { userId, sessionId });
  }

  async endLearningSession(userId: string, sessionId: string, satisfactionScore?: number): Promise<EndedSession> {
    return this.execute('endLearningSession', async () => {
      const { progressTracker, sessionManager } = this.deps;
      const session = await sessionManager.getSession(sessionId);
      if (session && session.userId !== userId) {
        throw new NotFoundError('Session', sessionId);
      }
      const conversationEnded = await sessionManager.endSession(sessionId, satisfactionScore);
      const learningSession = await progressTracker.endLearningSession(sessionId, satisfactionScore);
      return { conversationEnded, learningSession };
    }, { userId, sessionId });
  }

  async updateLearningProgress(userId: string, topicId: string, performance: TopicPerformance): Promise<ProgressUpdateResult> {
    return this.execute('updateLearningProgress', async () => {
      const { progressTracker } = this.deps;
      const topicProgress = await progressTracker.updateTopicProficiency(userId, topicId, performance);
      const analytics = await progressTracker.generateProgressAnalytics(userId, true);
      const recommendations = await progressTracker.getNextRecommendedTopics(userId, DASHBOARD_RECOMMENDATIONS);
      return { topicProgress, analytics, recommendations };
    }, { userId, topicId });
  }

  async createLearningPlan(userId: string, planType: string, options: CreatePlanOptions = {}): Promise<CreatedPlan> {
    const { profileService } = this.deps;
    const plan = await profileService.createLearningPlan(userId, planType, options);
    const overview = await profileService.getPlanOverview(userId, plan.planId);
    return { plan, overview };
  }

  async getLearningPlanStatus(userId: string, planId?: string): Promise<LearningPlanStatus | null> {
    const { profileService, progressTracker } = this.deps;
    const overview = await profileService.getPlanOverview(userId, planId);
    if (!overview) {
      return null;
    }
    return {
      overview,
      currentTopic: await profileService.getCurrentTopic(userId),
      recommendations: await progressTracker.getNextRecommendedTopics(userId, PLAN_STATUS_RECOMMENDATIONS),
    };
  }

  /**
   * Searches the knowledge base. The certification level comes from the
   * options, then the user's target; without either every collection is searched.
   */
  async searchKnowledgeBase(query: string, options: KnowledgeBaseSearchOptions = {}): Promise<KnowledgeBaseSearchResult> {
    return this.execute('searchKnowledgeBase', async () => {
      const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
      const profile = options.userId ? await this.deps.profileService.getProfile(options.userId) : null;
      const level = options.certificationLevel ?? profile?.targetCertification ?? null;

      const results = level
        ? await this.deps.search.searchWithContext(query, {
          userLevel: profile?.experienceLevel ?? 'intermediate',
          certificationGoal: level,
          nResults: limit,
        })
        : await this.deps.search.search({ text: query, nResults: limit });

      return { query, results, resultCount: results.length };
    }, { query });
  }

  async getSystemStatus(): Promise<SystemStatus> {
    const { profileService, progressTracker, sessionManager, search, agent } = this.deps;
    const components: Array<[string, IService]> = [
      ['ProfileService', profileService],
      ['ProgressTrackerService', progressTracker],
      ['SessionManagerService', sessionManager],
      ['SemanticSearchService', search],
      ['AdaptiveAgentService', agent],
    ];

    const health: ServiceHealthResult[] = [];
    for (const [service, component] of components) {
      try {
        health.push({ service, healthy: await component.healthCheck(), timestamp: new Date() });
      } catch (error) {
        health.push({
          service,
          healthy: false,
          message: error instanceof Error ? error.message : String(error),
          timestamp: new Date(),
        });
      }
    }

    const profiles = await profileService.listProfiles();
    return {
      timestamp: new Date().toISOString(),
      components: health,
      users: {
        total: profiles.length,
        onboarded: profiles.filter(profile => profile.onboardingCompleted).length,
      },
    };
  }

  async cleanupSystem(): Promise<{ expiredSessions: number }> {
    return { expiredSessions: await this.deps.sessionManager.cleanupExpiredSessions() };
  }

  private async requireUserSession(userId: string, sessionId: string): Promise<ConversationSession> {
    const session = await this.deps.sessionManager.getSession(sessionId);
    if (!session || session.userId !== userId) {
      throw new NotFoundError('Session', sessionId);
    }
    return session;
  }

  private async requireProfile(userId: string): Promise<UserProfile> {
    const profile = await this.deps.profileService.getProfile(userId);
    if (!profile) {
      throw new NotFoundError('User', userId);
    }
    return profile;
  }

  /** Appends the agent's answer to the transcript and records any concepts it defined. */
  private async recordResponse(sessionId: string, response: AgentResponse): Promise<string | null> {
    const { sessionManager } = this.deps;
    const message = await sessionManager.addMessage(sessionId, 'agent_response', response.content, {
      responseId: response.responseId,
      responseStyle: response.responseStyle,
      topicsAddressed: response.topicsAddressed,
      conceptsExplained: response.conceptsExplained,
    });
    if (response.conceptsExplained.length > 0) {
      await sessionManager.updateContext(sessionId, { conceptsExplained: response.conceptsExplained });
    }
    return message?.messageId ?? null;
  }
}
