import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ProgressTrackerService,
  calculateProgressAnalytics,
  comprehensionScore,
  engagementScore,
  estimateTopicDuration,
} from '../ProgressTrackerService';
import { ProfileService, createDefaultProfile } from '../ProfileService';
import { NotFoundError } from '../base/ServiceError';
import { MemoryRecordStore } from '../../test-utils/MemoryRecordStore';
import type { TopicProgress, UserProfile } from '../../shared/types/profile.types';
import type { AdaptiveLearningPath, LearningSession, ProgressAnalytics } from '../../shared/types/progress.types';

vi.mock('../../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function topicProgress(topicId: string, overrides: Partial<TopicProgress> = {}): TopicProgress {
  return {
    topicId,
    certificationLevel: 'foundation',
    experienceLevel: 'beginner',
    completionPercentage: 0,
    proficiencyScore: 0,
    timeSpentMinutes: 0,
    lastAccessed: null,
    quizScores: [],
    masteryIndicators: {},
    notes: '',
    isPartOfPlan: false,
    planId: null,
    status: 'not_started',
    markedCompleteByUser: false,
    completionDate: null,
    ...overrides,
  };
}

describe('session scoring', () => {
  it('should add question and topic bonuses to the engagement baseline', () => {
    expect(engagementScore({ questionsAsked: 0, topicsCovered: [] })).toBe(0.5);
    expect(engagementScore({ questionsAsked: 2, topicsCovered: ['adm'] })).toBeCloseTo(0.75);
    expect(engagementScore({ questionsAsked: 9, topicsCovered: ['a', 'b', 'c', 'd', 'e', 'f'] })).toBe(1);
  });

  it('should score comprehension as answer accuracy', () => {
    expect(comprehensionScore({ questionsAsked: 0, questionsAnsweredCorrectly: 0 })).toBe(0.7);
    expect(comprehensionScore({ questionsAsked: 4, questionsAnsweredCorrectly: 3 })).toBe(0.75);
  });

  it('should scale topic duration by experience', () => {
    expect(estimateTopicDuration('beginner')).toBe(58);
    expect(estimateTopicDuration('intermediate')).toBe(45);
    expect(estimateTopicDuration('expert')).toBe(27);
  });
});

describe('calculateProgressAnalytics', () => {
  let profile: UserProfile;

  beforeEach(() => {
    profile = createDefaultProfile('alice');
    profile.totalStudyTimeMinutes = 120;
    profile.streakDays = 15;
    profile.topicProgress = {
      a: topicProgress('a', { proficiencyScore: 0.4, completionPercentage: 50, quizScores: [80, 60] }),
      b: topicProgress('b', { proficiencyScore: 0.9, completionPercentage: 100, quizScores: [100], status: 'completed' }),
      c: topicProgress('c', { proficiencyScore: 0.2, certificationLevel: 'practitioner' }),
    };
  });

  it('should derive the analytics snapshot from the profile', () => {
    const analytics = calculateProgressAnalytics(profile, new Date('2026-03-01T00:00:00Z'));

    expect(analytics.analysisDate).toBe('2026-03-01T00:00:00.000Z');
    expect(analytics.overallCompletion).toBe(50);
    expect(analytics.studyConsistency).toBe(0.5);
    expect(analytics.learningVelocity).toBe(1.5);
    expect(analytics.retentionRate).toBe(0.8);
    expect(analytics.foundationReadiness).toBeCloseTo(0.65);
    expect(analytics.practitionerReadiness).toBeCloseTo(0.2);
    expect(Object.keys(analytics.knowledgeGaps)).toEqual(['a', 'c']);
    expect(analytics.knowledgeGaps.c).toBeCloseTo(0.8);
    expect(analytics.improvementFocus).toEqual(['c', 'a']);
    expect(analytics.peakPerformanceTimes).toEqual(['morning']);
    expect(analytics.optimalSessionLengthMinutes).toBe(30);
    expect(analytics.suggestedNextTopics).toEqual(['c', 'a']);
  });

  it('should add uncompleted core topics for Foundation candidates', () => {
    profile.targetCertification = 'foundation';
    profile.topicProgress.adm_overview = topicProgress('adm_overview', { proficiencyScore: 1, status: 'completed' });

    const analytics = calculateProgressAnalytics(profile);

    expect(analytics.suggestedNextTopics).toEqual(['c', 'a', 'preliminary_phase', 'phase_a_vision', 'business_architecture']);
  });

  it('should clamp velocity and default it without study time', () => {
    profile.totalStudyTimeMinutes = 0;
    expect(calculateProgressAnalytics(profile).learningVelocity).toBe(1);

    profile.totalStudyTimeMinutes = 600;
    profile.topicProgress = {};
    expect(calculateProgressAnalytics(profile).learningVelocity).toBe(0.1);
  });
});

describe('ProgressTrackerService', () => {
  let profileService: ProfileService;
  let sessions: MemoryRecordStore<LearningSession>;
  let analytics: MemoryRecordStore<ProgressAnalytics>;
  let paths: MemoryRecordStore<AdaptiveLearningPath>;
  let tracker: ProgressTrackerService;
  let userId: string;

  beforeEach(async () => {
    profileService = new ProfileService({ profiles: new MemoryRecordStore<UserProfile>() });
    sessions = new MemoryRecordStore<LearningSession>();
    analytics = new MemoryRecordStore<ProgressAnalytics>();
    paths = new MemoryRecordStore<AdaptiveLearningPath>();
    tracker = new ProgressTrackerService({ profileService, sessions, analytics, paths });
    ({ userId } = await profileService.createProfile('alice'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('learning sessions', () => {
    it('should reuse a supplied session id', async () => {
      const session = await tracker.startLearningSession(userId, 'learning', { sessionId: 'shared-id' });

      expect(session.sessionId).toBe('shared-id');
      expect((await profileService.getProfile(userId))?.currentSessionId).toBe('shared-id');
    });

    it('should reject an unknown user', async () => {
      await expect(tracker.startLearningSession('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should score and close a session', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));
      const { sessionId } = await tracker.startLearningSession(userId);

      await tracker.logTopicInteraction(sessionId, 'adm_overview', 'question');
      await tracker.logTopicInteraction(sessionId, 'adm_overview', 'question', false);
      await tracker.logTopicInteraction(sessionId, 'preliminary_phase', 'concept_explained');

      vi.setSystemTime(new Date('2026-03-01T10:25:30Z'));
      const ended = await tracker.endLearningSession(sessionId, 7);

      expect(ended).toMatchObject({
        durationMinutes: 25,
        topicsCovered: ['adm_overview', 'preliminary_phase'],
        questionsAsked: 2,
        questionsAnsweredCorrectly: 1,
        conceptsExplained: ['preliminary_phase'],
        comprehensionScore: 0.5,
        satisfactionScore: 5,
        endTime: '2026-03-01T10:25:30.000Z',
      });
      expect(ended?.engagementScore).toBeCloseTo(0.8);

      const profile = await profileService.getProfile(userId);
      expect(profile?.sessionsCompleted).toBe(1);
      expect(profile?.totalStudyTimeMinutes).toBe(25);
      expect(profile?.currentSessionId).toBeNull();
      expect(analytics.records.has(userId)).toBe(true);
    });

    it('should ignore an ended or unknown session', async () => {
      const { sessionId } = await tracker.startLearningSession(userId);
      await tracker.endLearningSession(sessionId);

      expect(await tracker.endLearningSession(sessionId)).toBeNull();
      expect(await tracker.logTopicInteraction(sessionId, 'adm_overview', 'question')).toBe(false);
      expect(await tracker.logTopicInteraction('missing', 'adm_overview', 'question')).toBe(false);
    });

    it('should list a user\'s sessions oldest first', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-02T10:00:00Z'));
      await tracker.startLearningSession(userId, 'general', { sessionId: 'second' });
      vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));
      await tracker.startLearningSession(userId, 'general', { sessionId: 'first' });

      const listed = await tracker.getUserLearningSessions(userId);
      expect(listed.map(session => session.sessionId)).toEqual(['first', 'second']);
    });
  });

  describe('updateTopicProficiency', () => {
    it('should update topic progress, the adaptive path and analytics', async () => {
      const path = await tracker.createAdaptiveLearningPath(userId);
      expect(path.performanceThreshold).toBe(0.6);

      const progress = await tracker.updateTopicProficiency(userId, 'adm_overview', {
        score: 0.75,
        quizScore: 90,
        interactions: ['q1', 'q2'],
      });
      await tracker.updateTopicProficiency(userId, 'data_architecture', { score: 0.3 });

      expect(progress.completionPercentage).toBe(85);
      expect(progress.quizScores).toEqual([90]);
      const stored = await tracker.getAdaptivePath(userId);
      expect(stored?.completedTopics).toEqual(['adm_overview']);
      expect(stored?.priorityTopics).toEqual(['data_architecture']);
      expect(analytics.records.get(userId)?.improvementFocus).toEqual(['data_architecture']);
    });

    it('should leave users without a path alone', async () => {
      expect(await tracker.updateAdaptivePath(userId, 'adm_overview', 0.9)).toBeNull();
    });
  });

  describe('generateProgressAnalytics', () => {
    it('should return the stored snapshot unless refreshed', async () => {
      const first = await tracker.generateProgressAnalytics(userId);
      await profileService.updateProficiencyScore(userId, 'adm_overview', 0.5);
      await profileService.updateTopicProgress(userId, 'adm_overview', { proficiencyScore: 0.5 });

      const cached = await tracker.generateProgressAnalytics(userId);
      const refreshed = await tracker.generateProgressAnalytics(userId, true);

      expect(cached).toEqual(first);
      expect(refreshed?.improvementFocus).toEqual(['adm_overview']);
    });

    it('should return null for an unknown user', async () => {
      expect(await tracker.generateProgressAnalytics('missing')).toBeNull();
    });
  });

  describe('recommendations', () => {
    beforeEach(async () => {
      await profileService.createLearningPlan(userId, 'foundation_beginner');
      await tracker.updateTopicProficiency(userId, 'adm_overview', { score: 0.2 });
    });

    it('should merge sources and keep the best entry per topic', async () => {
      const recommendations = await tracker.getNextRecommendedTopics(userId);

      expect(recommendations).toEqual([
        {
          topicId: 'togaf_introduction',
          reason: 'structured_plan',
          priority: 0.8,
          estimatedDurationMinutes: 54,
          difficulty: 'planned',
        },
        {
          topicId: 'adm_overview',
          reason: 'adaptive_suggestion',
          priority: 0.6,
          estimatedDurationMinutes: 58,
          difficulty: 'adaptive',
        },
      ]);
    });

    it('should summarize insights', async () => {
      const insights = await tracker.getLearningInsights(userId);

      expect(insights?.performanceSummary.learningVelocity).toBe('Moderate');
      expect(insights?.performanceSummary.consistency).toBe('Needs Improvement');
      expect(insights?.certificationReadiness.foundation).toEqual({
        score: '20.0%',
        status: 'Not Ready',
        recommendation: 'Build stronger foundation before attempting the exam.',
      });
      expect(insights?.learningOptimization.recommendedApproach).toBe('Focus on building a consistent daily study habit');
      expect(insights?.focusAreas.nextPriorities).toEqual(['togaf_introduction', 'adm_overview']);
    });

    it('should return nothing for an unknown user', async () => {
      expect(await tracker.getNextRecommendedTopics('missing')).toEqual([]);
      expect(await tracker.getLearningInsights('missing')).toBeNull();
    });
  });
});
