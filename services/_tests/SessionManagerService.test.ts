import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionManagerService } from '../SessionManagerService';
import { ProfileService } from '../ProfileService';
import { NotFoundError, ValidationError } from '../base/ServiceError';
import { MemoryRecordStore } from '../../test-utils/MemoryRecordStore';
import type { UserProfile } from '../../shared/types/profile.types';
import type { ConversationSession } from '../../shared/types/conversation.types';

vi.mock('../../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const START = new Date('2026-03-01T09:00:00Z');
const HOUR_MS = 60 * 60 * 1000;

describe('SessionManagerService', () => {
  let profileService: ProfileService;
  let sessions: MemoryRecordStore<ConversationSession>;
  let sessionManager: SessionManagerService;
  let userId: string;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    profileService = new ProfileService({ profiles: new MemoryRecordStore<UserProfile>() });
    sessions = new MemoryRecordStore<ConversationSession>();
    sessionManager = new SessionManagerService({ profileService, sessions });
    ({ userId } = await profileService.createProfile('alice'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('createSession', () => {
    it('should seed the context from the active plan and preferences', async () => {
      await profileService.createLearningPlan(userId, 'foundation_beginner');

      const session = await sessionManager.createSession(userId);

      expect(session.state).toBe('active');
      expect(session.expiresAt).toBe('2026-03-01T13:00:00.000Z');
      expect(session.context).toMatchObject({
        currentTopic: 'togaf_introduction',
        learningObjective: 'Overview of enterprise architecture and TOGAF framework',
        currentCertificationLevel: 'foundation',
        currentDifficultyLevel: 'basic',
        explanationDepth: 'moderate',
        visualAidsRequested: true,
      });
      expect((await profileService.getProfile(userId))?.currentSessionId).toBe(session.sessionId);
    });

    it('should let the initial context override the defaults', async () => {
      const session = await sessionManager.createSession(userId, 'exam_prep', {
        currentTopic: 'adm_overview',
        currentDifficultyLevel: 'challenging',
      });

      expect(session.conversationMode).toBe('exam_prep');
      expect(session.context.currentTopic).toBe('adm_overview');
      expect(session.context.currentDifficultyLevel).toBe('challenging');
    });

    it('should reject an unknown mode', async () => {
      await expect(sessionManager.createSession(userId, 'lecture')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject an unknown user', async () => {
      await expect(sessionManager.createSession('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('addMessage', () => {
    it('should update counters and detect topics', async () => {
      const { sessionId } = await sessionManager.createSession(userId);

      await sessionManager.addMessage(sessionId, 'user_question', 'How does the ADM relate to business architecture?');
      await sessionManager.addMessage(sessionId, 'agent_response', 'It frames every phase.');

      const session = await sessionManager.getSession(sessionId);
      expect(session?.totalMessages).toBe(2);
      expect(session?.userQuestions).toBe(1);
      expect(session?.agentResponses).toBe(1);
      expect(session?.context.topicsDiscussed).toEqual(['adm', 'architecture', 'business']);
      expect(session?.context.questionsAsked).toEqual(['How does the ADM relate to business architecture?']);
    });

    it('should flag confusion against the current topic', async () => {
      const { sessionId } = await sessionManager.createSession(userId, 'learning', { currentTopic: 'adm_overview' });

      const message = await sessionManager.addMessage(sessionId, 'user_question', "I'm confused about the phases");

      expect(message?.topicContext).toBe('adm_overview');
      expect((await sessionManager.getSession(sessionId))?.context.confusionIndicators).toEqual(['adm_overview']);
    });

    it('should refuse messages on a paused session', async () => {
      const { sessionId } = await sessionManager.createSession(userId);
      await sessionManager.pauseSession(sessionId);

      expect(await sessionManager.addMessage(sessionId, 'user_question', 'hello')).toBeNull();
    });
  });

  describe('getConversationHistory', () => {
    it('should default to the mode context window', async () => {
      const { sessionId } = await sessionManager.createSession(userId, 'assessment');
      for (let i = 1; i <= 7; i++) {
        await sessionManager.addMessage(sessionId, i % 2 === 0 ? 'agent_response' : 'user_question', `m${i}`);
      }

      const history = await sessionManager.getConversationHistory(sessionId);
      expect(history.map(message => message.content)).toEqual(['m3', 'm4', 'm5', 'm6', 'm7']);

      const all = await sessionManager.getConversationHistory(sessionId, { limit: 0 });
      expect(all).toHaveLength(7);

      const answers = await sessionManager.getConversationHistory(sessionId, { messageTypes: ['agent_response'] });
      expect(answers.map(message => message.content)).toEqual(['m2', 'm4', 'm6']);
    });

    it('should return nothing for an unknown session', async () => {
      expect(await sessionManager.getConversationHistory('missing')).toEqual([]);
    });
  });

  describe('expiry', () => {
    it('should expire an open session past its deadline', async () => {
      const { sessionId } = await sessionManager.createSession(userId);

      vi.setSystemTime(new Date(START.getTime() + 4 * HOUR_MS + 1000));

      expect(await sessionManager.getSession(sessionId)).toBeNull();
      expect(sessions.records.get(sessionId)?.state).toBe('expired');
      expect(await sessionManager.addMessage(sessionId, 'user_question', 'still there?')).toBeNull();
      expect(await sessionManager.resumeSession(sessionId)).toBe(false);
    });

    it('should honour a configured lifetime', async () => {
      sessionManager = new SessionManagerService({ profileService, sessions, expiryHours: 1 });
      const session = await sessionManager.createSession(userId);

      expect(session.expiresAt).toBe('2026-03-01T10:00:00.000Z');
    });

    it('should delete overdue sessions that never completed', async () => {
      const completed = await sessionManager.createSession(userId);
      const abandoned = await sessionManager.createSession(userId);
      await sessionManager.endSession(completed.sessionId);
      vi.setSystemTime(new Date(START.getTime() + 3 * HOUR_MS));
      const fresh = await sessionManager.createSession(userId);

      vi.setSystemTime(new Date(START.getTime() + 5 * HOUR_MS));
      const removed = await sessionManager.cleanupExpiredSessions();

      expect(removed).toBe(1);
      expect(sessions.records.has(abandoned.sessionId)).toBe(false);
      expect(sessions.records.has(completed.sessionId)).toBe(true);
      expect(sessions.records.has(fresh.sessionId)).toBe(true);
    });
  });

  describe('state transitions', () => {
    it('should move between active and paused until completed', async () => {
      const { sessionId } = await sessionManager.createSession(userId);

      expect(await sessionManager.resumeSession(sessionId)).toBe(false);
      expect(await sessionManager.pauseSession(sessionId)).toBe(true);
      expect(await sessionManager.pauseSession(sessionId)).toBe(false);
      expect(await sessionManager.getUserActiveSession(userId)).toBeNull();
      expect(await sessionManager.resumeSession(sessionId)).toBe(true);
      expect(await sessionManager.getUserActiveSession(userId)).toBe(sessionId);

      expect(await sessionManager.endSession(sessionId, 9)).toBe(true);
      expect(await sessionManager.endSession(sessionId)).toBe(false);
      expect(await sessionManager.resumeSession(sessionId)).toBe(false);
      expect((await sessionManager.getSession(sessionId))?.sessionSatisfaction).toBe(5);
    });

    it('should add concepts learned to the profile strengths on completion', async () => {
      const { sessionId } = await sessionManager.createSession(userId);
      await sessionManager.updateContext(sessionId, { conceptsExplained: ['Architecture Vision', 'Architecture Vision'] });

      await sessionManager.endSession(sessionId);

      const profile = await profileService.getProfile(userId);
      expect(profile?.strengths).toEqual(['Architecture Vision']);
      expect(profile?.currentSessionId).toBeNull();
    });
  });

  describe('updateContext', () => {
    it('should track a new topic once', async () => {
      const { sessionId } = await sessionManager.createSession(userId);

      await sessionManager.updateContext(sessionId, { currentTopic: 'phase_b' });
      await sessionManager.updateContext(sessionId, { currentTopic: 'phase_b', conversationMode: 'review' });

      const session = await sessionManager.getSession(sessionId);
      expect(session?.topicsCovered).toBe(1);
      expect(session?.context.currentTopic).toBe('phase_b');
      expect(session?.conversationMode).toBe('review');
    });

    it('should validate enum values before changing anything', async () => {
      const { sessionId } = await sessionManager.createSession(userId);

      await expect(sessionManager.updateContext(sessionId, { currentTopic: 'x', difficultyLevel: 'impossible' }))
        .rejects.toBeInstanceOf(ValidationError);
      expect((await sessionManager.getSession(sessionId))?.context.currentTopic).toBeNull();
    });

    it('should return false for an unknown session', async () => {
      expect(await sessionManager.updateContext('missing', { currentTopic: 'x' })).toBe(false);
    });
  });

  describe('getSessionContext', () => {
    it('should assemble the learner view of a session', async () => {
      const { sessionId } = await sessionManager.createSession(userId);
      vi.setSystemTime(new Date(START.getTime() + 12 * 60 * 1000));
      await sessionManager.addMessage(sessionId, 'user_question', 'What is a building block?');

      const view = await sessionManager.getSessionContext(sessionId);

      expect(view?.sessionInfo).toEqual({
        sessionId,
        userId,
        conversationMode: 'learning',
        topicsCovered: 0,
        totalMessages: 1,
        sessionDurationMinutes: 12,
      });
      expect(view?.userProfile.experienceLevel).toBe('beginner');
      expect(view?.learningPreferences.interactiveMode).toBe(true);
      expect(view?.recentMessages).toEqual([{
        type: 'user_question',
        content: 'What is a building block?',
        timestamp: '2026-03-01T09:12:00.000Z',
        topicContext: null,
      }]);
    });
  });

  describe('getSessionStatistics', () => {
    it('should aggregate sessions in the window', async () => {
      const learning = await sessionManager.createSession(userId);
      await sessionManager.addMessage(learning.sessionId, 'user_question', 'one');
      await sessionManager.addMessage(learning.sessionId, 'agent_response', 'two');
      await sessionManager.endSession(learning.sessionId, 4);
      await sessionManager.createSession(userId, 'q_and_a');

      const stats = await sessionManager.getSessionStatistics(userId);

      expect(stats).toEqual({
        totalSessions: 2,
        totalMessages: 2,
        averageMessagesPerSession: 1,
        totalTopicsCovered: 0,
        averageTopicsPerSession: 0,
        averageSatisfaction: 4,
        conversationModeDistribution: { learning: 1, q_and_a: 1 },
        mostUsedMode: 'learning',
      });
    });

    it('should return null without sessions', async () => {
      expect(await sessionManager.getSessionStatistics(userId)).toBeNull();
    });
  });
});
