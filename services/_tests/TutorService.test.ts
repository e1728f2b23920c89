import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TutorService, welcomeMessage } from '../TutorService';
import { AdaptiveAgentService } from '../AdaptiveAgentService';
import { ProfileService, createDefaultProfile } from '../ProfileService';
import { ProgressTrackerService } from '../ProgressTrackerService';
import { SessionManagerService } from '../SessionManagerService';
import { SemanticSearchService } from '../SemanticSearchService';
import { ConflictError, NotFoundError } from '../base/ServiceError';
import { MemoryRecordStore } from '../../test-utils/MemoryRecordStore';
import { FakeChatProvider, FakeEmbeddingProvider, FakeVectorStore, vectorHit } from '../../test-utils/fakes';
import type { ConversationSession } from '../../shared/types/conversation.types';
import type { UserProfile } from '../../shared/types/profile.types';
import type { AdaptiveLearningPath, LearningSession, ProgressAnalytics } from '../../shared/types/progress.types';

vi.mock('../../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const EXAM_JSON = JSON.stringify({
  question: 'What does Phase A produce?',
  options: { A: 'Architecture Vision', B: 'Migration Plan', C: 'Gap report', D: 'Roadmap' },
  correct_answer: 'A',
  explanation: 'Phase A produces the Architecture Vision.',
});

describe('welcomeMessage', () => {
  it('should greet with level, target and focus', () => {
    const profile = createDefaultProfile('alice');

    expect(welcomeMessage(profile, 'phase_a_vision')).toBe([
      'Welcome back, alice!',
      '',
      'Experience Level: Beginner',
      'Target Certification: Foundation',
      'Current Focus: Phase A Vision',
      '',
      "I'm here to help you master TOGAF! What would you like to explore today?",
    ].join('\n'));
  });

  it('should leave out the focus line without a current topic', () => {
    const profile = createDefaultProfile('bob');
    profile.targetCertification = 'practitioner';

    expect(welcomeMessage(profile, null).split('\n').slice(2, 5)).toEqual([
      'Experience Level: Beginner',
      'Target Certification: Practitioner',
      '',
    ]);
  });
});

describe('TutorService', () => {
  let profileService: ProfileService;
  let progressTracker: ProgressTrackerService;
  let sessionManager: SessionManagerService;
  let learningSessions: MemoryRecordStore<LearningSession>;
  let embeddings: FakeEmbeddingProvider;
  let vectorStore: FakeVectorStore;
  let chat: FakeChatProvider;
  let tutor: TutorService;
  let userId: string;

  beforeEach(async () => {
    profileService = new ProfileService({ profiles: new MemoryRecordStore<UserProfile>() });
    learningSessions = new MemoryRecordStore<LearningSession>();
    progressTracker = new ProgressTrackerService({
      profileService,
      sessions: learningSessions,
      analytics: new MemoryRecordStore<ProgressAnalytics>(),
      paths: new MemoryRecordStore<AdaptiveLearningPath>(),
    });
    sessionManager = new SessionManagerService({ profileService, sessions: new MemoryRecordStore<ConversationSession>() });
    embeddings = new FakeEmbeddingProvider();
    vectorStore = new FakeVectorStore();
    const search = new SemanticSearchService({ vectorStore, embeddings, chromaUrl: 'http://localhost:8000' });
    chat = new FakeChatProvider({
      tutor_response: 'Gap Analysis means comparing states. It drives the ADM.',
      follow_up_questions: 'What is a baseline?',
      explanation: 'Gap Analysis compares baseline and target.',
      exam_question: EXAM_JSON,
    });
    const agent = new AdaptiveAgentService({ chat, search, progressTracker, sessionManager });
    tutor = new TutorService({ profileService, progressTracker, sessionManager, search, agent });

    ({ userId } = await tutor.createUser('alice'));
    await tutor.createLearningPlan(userId, 'foundation_beginner');
  });

  describe('startLearningSession', () => {
    it('should open both sessions under one id and greet the learner', async () => {
      const started = await tutor.startLearningSession(userId);

      expect(started.learningSession.sessionId).toBe(started.sessionId);
      expect(started.session.sessionId).toBe(started.sessionId);
      expect(started.welcomeMessage).toContain('Current Focus: Togaf Introduction');
      expect(learningSessions.records.has(started.sessionId)).toBe(true);
    });
  });

  describe('chat', () => {
    it('should run one turn through retrieval, the agent and the transcript', async () => {
      vectorStore.results = [vectorHit('c1', 'Gap analysis compares the baseline with the target.')];
      const { sessionId } = await tutor.startLearningSession(userId);

      const reply = await tutor.chat(userId, sessionId, 'What is gap analysis?');

      expect(embeddings.queries).toEqual(['togaf_introduction What is gap analysis?']);
      expect(reply.searchResultCount).toBe(1);
      expect(reply.response.topicsAddressed).toEqual(['ADM']);
      expect(reply.response.conceptsExplained).toEqual(['Gap Analysis']);
      expect(reply.response.suggestedNextQuestions).toEqual(['What is a baseline?']);
      expect(reply.agentMessageId).not.toBeNull();

      const history = await sessionManager.getConversationHistory(sessionId);
      expect(history.map(message => message.messageType)).toEqual(['user_question', 'agent_response']);
      expect(history[1].metadata).toMatchObject({ responseStyle: 'socratic', topicsAddressed: ['ADM'] });

      const session = await sessionManager.getSession(sessionId);
      expect(session?.context.conceptsExplained).toEqual(['Gap Analysis']);

      const learning = await progressTracker.getLearningSession(sessionId);
      expect(learning?.topicsCovered).toEqual(['ADM']);
      expect(learning?.questionsAsked).toBe(1);
    });

    it('should reject a session that belongs to someone else', async () => {
      const { userId: otherId } = await tutor.createUser('bob');
      const { sessionId } = await tutor.startLearningSession(userId);

      await expect(tutor.chat(otherId, sessionId, 'Hello')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject an unknown session', async () => {
      await expect(tutor.chat(userId, 'missing', 'Hello')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should refuse a turn on a paused session', async () => {
      const { sessionId } = await tutor.startLearningSession(userId);
      await sessionManager.pauseSession(sessionId);

      await expect(tutor.chat(userId, sessionId, 'Hello')).rejects.toBeInstanceOf(ConflictError);
      expect(chat.calls).toHaveLength(0);
    });
  });

  describe('explainConcept', () => {
    it('should record the request and log the concept', async () => {
      const { sessionId } = await tutor.startLearningSession(userId);

      const response = await tutor.explainConcept(userId, sessionId, 'Gap Analysis', 'concise');

      expect(response.content).toBe('Gap Analysis compares baseline and target.');
      const history = await sessionManager.getConversationHistory(sessionId);
      expect(history.map(message => message.content)).toEqual([
        'Explain Gap Analysis',
        'Gap Analysis compares baseline and target.',
      ]);
      const learning = await progressTracker.getLearningSession(sessionId);
      expect(learning?.conceptsExplained).toEqual(['Gap Analysis']);
    });
  });

  describe('generateExamQuestion', () => {
    it('should log the question topic on the learning session', async () => {
      const { sessionId } = await tutor.startLearningSession(userId);

      const question = await tutor.generateExamQuestion(userId, sessionId, { topicId: 'phase_a_vision' });

      expect(question.generated).toBe(true);
      expect(question.correctAnswer).toBe('A');
      const learning = await progressTracker.getLearningSession(sessionId);
      expect(learning?.topicsCovered).toEqual(['phase_a_vision']);
    });
  });

  describe('endLearningSession', () => {
    it('should close both sessions and update the profile', async () => {
      const { sessionId } = await tutor.startLearningSession(userId);

      const ended = await tutor.endLearningSession(userId, sessionId, 4);

      expect(ended.conversationEnded).toBe(true);
      expect(ended.learningSession?.satisfactionScore).toBe(4);
      expect((await profileService.getProfile(userId))?.sessionsCompleted).toBe(1);
    });

    it('should refuse to end another user\'s session', async () => {
      const { userId: otherId } = await tutor.createUser('bob');
      const { sessionId } = await tutor.startLearningSession(userId);

      await expect(tutor.endLearningSession(otherId, sessionId)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('dashboards and plans', () => {
    it('should return null for an unknown user', async () => {
      expect(await tutor.getUserDashboard('missing')).toBeNull();
      expect(await tutor.getLearningPlanStatus('missing')).toBeNull();
    });

    it('should assemble the dashboard', async () => {
      const dashboard = await tutor.getUserDashboard(userId);

      expect(dashboard?.userProfile).toEqual({
        userId,
        username: 'alice',
        experienceLevel: 'beginner',
        overallProficiency: 0,
        targetCertification: null,
        examPreparationMode: false,
      });
      expect(dashboard?.currentTopic?.topic.topicId).toBe('togaf_introduction');
      expect(dashboard?.recommendations[0]).toMatchObject({ topicId: 'togaf_introduction', reason: 'structured_plan' });
    });

    it('should report plan status with the overview', async () => {
      const status = await tutor.getLearningPlanStatus(userId);

      expect(status?.overview.progressSummary.totalTopics).toBe(5);
      expect(status?.currentTopic?.topic.topicId).toBe('togaf_introduction');
    });

    it('should return the overview of a created plan', async () => {
      const created = await tutor.createLearningPlan(userId, 'custom_topics', { customTopics: ['zachman'] });

      expect(created.overview?.plan.planId).toBe(created.plan.planId);
      expect(created.plan.topics[0].title).toBe('Zachman');
    });

    it('should refresh analytics and recommendations after progress', async () => {
      const result = await tutor.updateLearningProgress(userId, 'adm_overview', { score: 0.2 });

      expect(result.topicProgress.proficiencyScore).toBe(0.2);
      expect(result.analytics?.improvementFocus).toEqual(['adm_overview']);
      expect(result.recommendations.map(recommendation => recommendation.topicId)).toEqual(['togaf_introduction', 'adm_overview']);
    });
  });

  describe('searchKnowledgeBase', () => {
    it('should search every collection without a certification level', async () => {
      vectorStore.results = [vectorHit('c1', 'one'), vectorHit('c2', 'two')];

      const result = await tutor.searchKnowledgeBase('stakeholders');

      expect(result.resultCount).toBe(2);
      expect(vectorStore.searches[0].options).toEqual({ nResults: 5, collections: undefined, filters: {} });
    });

    it('should scope the search to a requested certification level', async () => {
      await tutor.searchKnowledgeBase('value streams', { certificationLevel: 'practitioner', limit: 2 });

      expect(vectorStore.searches[0].options).toEqual({
        nResults: 2,
        collections: ['practitioner'],
        filters: { certification_level: 'practitioner', difficulty_level: 'intermediate' },
      });
    });
  });

  describe('system', () => {
    it('should report component health and user counts', async () => {
      vectorStore.ready = false;

      const status = await tutor.getSystemStatus();

      expect(status.components.map(component => [component.service, component.healthy])).toEqual([
        ['ProfileService', true],
        ['ProgressTrackerService', true],
        ['SessionManagerService', true],
        ['SemanticSearchService', false],
        ['AdaptiveAgentService', true],
      ]);
      expect(status.users).toEqual({ total: 1, onboarded: 0 });
    });

    it('should report expired sessions removed', async () => {
      expect(await tutor.cleanupSystem()).toEqual({ expiredSessions: 0 });
    });
  });
});
