import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base/BaseService';
import { NotFoundError } from './base/ServiceError';
import type { IRecordStore } from './interfaces';
import type { ProfileService } from './ProfileService';
import type { ExperienceLevel, TopicProgress, UserProfile } from '../shared/types/profile.types';
import type {
  AdaptiveLearningPath,
  InteractionType,
  LearningInsights,
  LearningPathType,
  LearningSession,
  ProgressAnalytics,
  TopicPerformance,
  TopicRecommendation,
} from '../shared/types/progress.types';

const GAP_THRESHOLD = 0.7;
const IMPROVEMENT_FOCUS_SIZE = 5;
const CONSISTENCY_STREAK_DAYS = 30;
const MAX_ADAPTIVE_TOPICS = 5;
const BASE_TOPIC_MINUTES = 45;
const DEFAULT_SESSION_MINUTES = 30;

const FOUNDATION_CORE_TOPICS = [
  'adm_overview',
  'preliminary_phase',
  'phase_a_vision',
  'business_architecture',
  'data_architecture',
];

const DURATION_MULTIPLIER: Record<ExperienceLevel, number> = {
  beginner: 1.3,
  intermediate: 1.0,
  advanced: 0.8,
  expert: 0.6,
};

interface ProgressTrackerServiceDeps {
  profileService: ProfileService;
  /** Learning sessions by session id; an open session has `endTime: null`. */
  sessions: IRecordStore<LearningSession>;
  /** Latest analytics snapshot by user id. */
  analytics: IRecordStore<ProgressAnalytics>;
  /** One adaptive path per user, by user id. */
  paths: IRecordStore<AdaptiveLearningPath>;
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function engagementScore(session: Pick<LearningSession, 'questionsAsked' | 'topicsCovered'>): number {
  let score = 0.5;
  if (session.questionsAsked > 0) score += Math.min(0.3, session.questionsAsked * 0.1);
  if (session.topicsCovered.length > 0) score += Math.min(0.2, session.topicsCovered.length * 0.05);
  return Math.min(1, score);
}

/** Answer accuracy; 0.7 for a session without questions. */
export function comprehensionScore(session: Pick<LearningSession, 'questionsAsked' | 'questionsAnsweredCorrectly'>): number {
  if (session.questionsAsked === 0) return 0.7;
  return session.questionsAnsweredCorrectly / session.questionsAsked;
}

export function estimateTopicDuration(level: ExperienceLevel): number {
  return Math.floor(BASE_TOPIC_MINUTES * DURATION_MULTIPLIER[level]);
}

/**
 * The two weakest topics, then for Foundation candidates the core ADM topics
 * not yet completed, up to five in all.
 */
export function generateAdaptiveTopics(profile: UserProfile, improvementFocus: readonly string[]): string[] {
  const suggestions = improvementFocus.slice(0, 2);
  if (profile.targetCertification === 'foundation') {
    const completed = new Set(
      Object.values(profile.topicProgress).filter(progress => progress.status === 'completed').map(progress => progress.topicId)
    );
    for (const topicId of FOUNDATION_CORE_TOPICS) {
      if (suggestions.length >= MAX_ADAPTIVE_TOPICS) break;
      if (!completed.has(topicId) && !suggestions.includes(topicId)) {
        suggestions.push(topicId);
      }
    }
  }
  return suggestions;
}

/**
 * Derives analytics from the profile alone. The constants are heuristics:
 * a 30-day streak is full consistency and velocity is topics per study hour.
 */
export function calculateProgressAnalytics(profile: UserProfile, now = new Date()): ProgressAnalytics {
  const progress: TopicProgress[] = Object.values(profile.topicProgress);

  const studyHours = profile.totalStudyTimeMinutes / 60;
  const learningVelocity = studyHours > 0 ? clamp(progress.length / studyHours, 0.1, 5) : 1;

  const quizScores = progress.flatMap(topic => topic.quizScores);
  const retentionRate = quizScores.length > 0
    ? clamp(quizScores.reduce((sum, score) => sum + score, 0) / (quizScores.length * 100), 0, 1)
    : 0;

  const knowledgeGaps: Record<string, number> = {};
  for (const topic of progress) {
    if (topic.proficiencyScore < GAP_THRESHOLD) {
      knowledgeGaps[topic.topicId] = 1 - topic.proficiencyScore;
    }
  }
  // Stable sort keeps insertion order among equal gaps.
  const improvementFocus = Object.keys(knowledgeGaps)
    .sort((a, b) => knowledgeGaps[b] - knowledgeGaps[a])
    .slice(0, IMPROVEMENT_FOCUS_SIZE);

  const readiness = (level: TopicProgress['certificationLevel']) =>
    mean(progress.filter(topic => topic.certificationLevel === level).map(topic => topic.proficiencyScore));

  return {
    userId: profile.userId,
    analysisDate: now.toISOString(),
    overallCompletion: mean(progress.map(topic => topic.completionPercentage)),
    studyConsistency: Math.min(1, profile.streakDays / CONSISTENCY_STREAK_DAYS),
    learningVelocity,
    retentionRate,
    foundationReadiness: readiness('foundation'),
    practitionerReadiness: readiness('practitioner'),
    peakPerformanceTimes: profile.preferredLearningTimes.length > 0 ? [...profile.preferredLearningTimes] : ['morning'],
    optimalSessionLengthMinutes: profile.averageSessionDurationMinutes > 0
      ? Math.floor(profile.averageSessionDurationMinutes)
      : profile.sessionPreferences.preferredDurationMinutes || DEFAULT_SESSION_MINUTES,
    suggestedNextTopics: generateAdaptiveTopics(profile, improvementFocus),
    knowledgeGaps,
    improvementFocus,
  };
}

export function interpretLearningVelocity(velocity: number): string {
  if (velocity >= 2) return 'Very Fast';
  if (velocity >= 1.5) return 'Fast';
  if (velocity >= 1) return 'Moderate';
  if (velocity >= 0.5) return 'Steady';
  return 'Slow';
}

export function interpretConsistency(consistency: number): string {
  if (consistency >= 0.8) return 'Excellent';
  if (consistency >= 0.6) return 'Good';
  if (consistency >= 0.4) return 'Fair';
  return 'Needs Improvement';
}

export function readinessStatus(readiness: number): string {
  if (readiness >= 0.85) return 'Ready';
  if (readiness >= 0.7) return 'Almost Ready';
  if (readiness >= 0.5) return 'Needs More Study';
  return 'Not Ready';
}

export function certificationRecommendation(readiness: number): string {
  if (readiness >= 0.85) return "You're ready to take the exam! Schedule it soon.";
  if (readiness >= 0.7) return 'Review weak areas and take a few practice exams.';
  if (readiness >= 0.5) return 'Continue studying and focus on improvement areas.';
  return 'Build stronger foundation before attempting the exam.';
}

export function approachRecommendation(analytics: ProgressAnalytics): string {
  if (analytics.studyConsistency < 0.5) return 'Focus on building a consistent daily study habit';
  if (Object.keys(analytics.knowledgeGaps).length > 5) return 'Review fundamentals before advancing to new topics';
  if (analytics.learningVelocity < 0.5) return 'Consider shorter, more frequent study sessions';
  return "Continue with your current approach - it's working well!";
}

/**
 * Tracks learning sessions and topic performance, derives per-user analytics
 * snapshots and keeps an adaptive learning path in step with assessed scores.
 */
export class ProgressTrackerService extends BaseService<ProgressTrackerServiceDeps> {
  constructor(deps: ProgressTrackerServiceDeps) {
    super('ProgressTrackerService', deps);
  }

  /**
   * Opens a learning session for the user. Pass `sessionId` to share the id of
   * the conversation session the learning session shadows.
   */
  async startLearningSession(userId: string, sessionType = 'general', options: { sessionId?: string } = {}): Promise<LearningSession> {
    return this.execute('startLearningSession', async () => {
      const { profileService, sessions } = this.deps;
      const profile = await profileService.getProfile(userId);
      if (!profile) {
        throw new NotFoundError('User', userId);
      }

      const session: LearningSession = {
        sessionId: options.sessionId ?? uuidv4(),
        userId,
        sessionType,
        startTime: new Date().toISOString(),
        endTime: null,
        durationMinutes: 0,
        topicsCovered: [],
        questionsAsked: 0,
        questionsAnsweredCorrectly: 0,
        conceptsExplained: [],
        engagementScore: 0,
        comprehensionScore: 0,
        satisfactionScore: null,
      };
      await sessions.put(session.sessionId, session);

      profile.currentSessionId = session.sessionId;
      await profileService.saveProfile(profile);
      this.logInfo(`Started ${sessionType} learning session ${session.sessionId} for ${userId}`);
      return session;
    }, { userId, sessionType });
  }

  async getLearningSession(sessionId: string): Promise<LearningSession | null> {
    return this.deps.sessions.get(sessionId);
  }

  /** @returns false when the session is unknown or already ended */
  async logTopicInteraction(sessionId: string, topicId: string, interactionType: InteractionType, success = true): Promise<boolean> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session || session.endTime !== null) {
      return false;
    }

    if (!session.topicsCovered.includes(topicId)) {
      session.topicsCovered.push(topicId);
    }
    if (interactionType === 'question') {
      session.questionsAsked += 1;
      if (success) session.questionsAnsweredCorrectly += 1;
    } else if (interactionType === 'concept_explained' && !session.conceptsExplained.includes(topicId)) {
      session.conceptsExplained.push(topicId);
    }

    await this.deps.sessions.put(sessionId, session);
    return true;
  }

  /**
   * Closes a session, scores it, folds it into the profile's activity
   * counters and refreshes the user's analytics.
   * @returns the closed session, or null when it is unknown or already ended
   */
  async endLearningSession(sessionId: string, satisfactionScore?: number): Promise<LearningSession | null> {
    return this.execute('endLearningSession', async () => {
      const { profileService, sessions } = this.deps;
      const session = await sessions.get(sessionId);
      if (!session || session.endTime !== null) {
        return null;
      }

      const end = new Date();
      session.endTime = end.toISOString();
      session.durationMinutes = Math.max(0, Math.floor((end.getTime() - Date.parse(session.startTime)) / 60000));
      if (satisfactionScore !== undefined) {
        session.satisfactionScore = clamp(satisfactionScore, 0, 5);
      }
      session.engagementScore = engagementScore(session);
      session.comprehensionScore = comprehensionScore(session);
      await sessions.put(sessionId, session);

      const profile = await profileService.updateSessionStats(session.userId, session.durationMinutes, session.topicsCovered);
      if (profile.currentSessionId === sessionId) {
        profile.currentSessionId = null;
        await profileService.saveProfile(profile);
      }
      await this.generateProgressAnalytics(session.userId, true);

      this.logInfo(`Ended learning session ${sessionId} after ${session.durationMinutes} min`);
      return session;
    }, { sessionId });
  }

  async getUserLearningSessions(userId: string): Promise<LearningSession[]> {
    const all = await this.deps.sessions.list();
    return all
      .filter(session => session.userId === userId)
      .sort((a, b) => a.startTime.localeCompare(b.startTime));
  }

  /**
   * Applies an assessed performance to a topic: the score feeds the profile's
   * proficiency model, completion is derived from score and interaction count,
   * and the adaptive path and analytics are brought up to date.
   */
  async updateTopicProficiency(userId: string, topicId: string, performance: TopicPerformance): Promise<TopicProgress> {
    return this.execute('updateTopicProficiency', async () => {
      const { profileService } = this.deps;
      const score = clamp(performance.score, 0, 1);
      const profile = await profileService.updateProficiencyScore(userId, topicId, score, performance.type ?? 'interaction');

      const priorQuizScores = performance.quizScores ?? profile.topicProgress[topicId]?.quizScores ?? [];
      const progress = await profileService.updateTopicProgress(userId, topicId, {
        proficiencyScore: score,
        completionPercentage: Math.min(100, score * 100 + (performance.interactions?.length ?? 0) * 5),
        quizScores: performance.quizScore !== undefined ? [...priorQuizScores, performance.quizScore] : undefined,
        masteryIndicators: performance.masteryIndicators,
      });

      await this.updateAdaptivePath(userId, topicId, score);
      await this.generateProgressAnalytics(userId, true);
      return progress;
    }, { userId, topicId, score: performance.score });
  }

  /**
   * Returns the stored snapshot unless `forceRefresh` is set or none exists.
   * @returns null for an unknown user
   */
  async generateProgressAnalytics(userId: string, forceRefresh = false): Promise<ProgressAnalytics | null> {
    const { analytics, profileService } = this.deps;
    if (!forceRefresh) {
      const stored = await analytics.get(userId);
      if (stored) return stored;
    }
    const profile = await profileService.getProfile(userId);
    if (!profile) return null;

    const snapshot = calculateProgressAnalytics(profile);
    await analytics.put(userId, snapshot);
    return snapshot;
  }

  /** Replaces any path the user already has. */
  async createAdaptiveLearningPath(userId: string, pathType: LearningPathType = 'adaptive'): Promise<AdaptiveLearningPath> {
    return this.execute('createAdaptiveLearningPath', async () => {
      const profile = await this.deps.profileService.getProfile(userId);
      const analytics = await this.generateProgressAnalytics(userId);
      if (!profile || !analytics) {
        throw new NotFoundError('User', userId);
      }

      const now = new Date().toISOString();
      const tuning = profile.experienceLevel === 'beginner'
        ? { performanceThreshold: 0.6, adaptationSensitivity: 0.3, reviewFrequency: 2 }
        : profile.experienceLevel === 'expert'
          ? { performanceThreshold: 0.8, adaptationSensitivity: 0.7, reviewFrequency: 5 }
          : { performanceThreshold: 0.7, adaptationSensitivity: 0.5, reviewFrequency: 3 };

      const path: AdaptiveLearningPath = {
        pathId: uuidv4(),
        userId,
        pathType,
        createdDate: now,
        lastUpdated: now,
        targetCertification: profile.targetCertification ?? 'foundation',
        estimatedCompletionWeeks: 8,
        currentTopics: generateAdaptiveTopics(profile, analytics.improvementFocus),
        completedTopics: [],
        priorityTopics: analytics.improvementFocus.slice(0, 3),
        ...tuning,
      };
      await this.deps.paths.put(userId, path);
      return path;
    }, { userId, pathType });
  }

  async getAdaptivePath(userId: string): Promise<AdaptiveLearningPath | null> {
    return this.deps.paths.get(userId);
  }

  /**
   * A score at or above the path's threshold moves the topic to completed;
   * anything lower queues it for review. No-op for users without a path.
   */
  async updateAdaptivePath(userId: string, topicId: string, score: number): Promise<AdaptiveLearningPath | null> {
    const path = await this.deps.paths.get(userId);
    if (!path) return null;

    if (score >= path.performanceThreshold) {
      if (!path.completedTopics.includes(topicId)) path.completedTopics.push(topicId);
      path.currentTopics = path.currentTopics.filter(id => id !== topicId);
    } else if (!path.priorityTopics.includes(topicId)) {
      path.priorityTopics.push(topicId);
    }
    path.lastUpdated = new Date().toISOString();

    await this.deps.paths.put(userId, path);
    return path;
  }

  /**
   * Merges knowledge gaps, the active plan's current topic and adaptive
   * suggestions, one entry per topic, highest priority first.
   */
  async getNextRecommendedTopics(userId: string, count = 3): Promise<TopicRecommendation[]> {
    const { profileService } = this.deps;
    const profile = await profileService.getProfile(userId);
    const analytics = await this.generateProgressAnalytics(userId);
    if (!profile || !analytics) return [];

    const candidates: TopicRecommendation[] = analytics.improvementFocus.slice(0, 2).map((topicId): TopicRecommendation => {
      const gap = analytics.knowledgeGaps[topicId] ?? 0;
      return {
        topicId,
        reason: 'knowledge_gap',
        priority: 1 - gap,
        estimatedDurationMinutes: estimateTopicDuration(profile.experienceLevel),
        difficulty: gap > 0.7 ? 'review' : 'moderate',
      };
    });

    const current = await profileService.getCurrentTopic(userId);
    if (current) {
      candidates.push({
        topicId: current.topic.topicId,
        reason: 'structured_plan',
        priority: 0.8,
        estimatedDurationMinutes: current.topic.estimatedDurationMinutes,
        difficulty: 'planned',
      });
    }

    for (const topicId of analytics.suggestedNextTopics) {
      candidates.push({
        topicId,
        reason: 'adaptive_suggestion',
        priority: 0.6,
        estimatedDurationMinutes: estimateTopicDuration(profile.experienceLevel),
        difficulty: 'adaptive',
      });
    }

    const best = new Map<string, TopicRecommendation>();
    for (const candidate of candidates) {
      const existing = best.get(candidate.topicId);
      if (!existing || candidate.priority > existing.priority) {
        best.set(candidate.topicId, candidate);
      }
    }
    return [...best.values()].sort((a, b) => b.priority - a.priority).slice(0, count);
  }

  async getLearningInsights(userId: string): Promise<LearningInsights | null> {
    const profile = await this.deps.profileService.getProfile(userId);
    const analytics = await this.generateProgressAnalytics(userId);
    if (!profile || !analytics) return null;

    const nextPriorities = await this.getNextRecommendedTopics(userId, 3);
    return {
      performanceSummary: {
        overallProgress: `${analytics.overallCompletion.toFixed(1)}%`,
        learningVelocity: interpretLearningVelocity(analytics.learningVelocity),
        consistency: interpretConsistency(analytics.studyConsistency),
        retention: percent(analytics.retentionRate),
      },
      certificationReadiness: {
        foundation: {
          score: percent(analytics.foundationReadiness),
          status: readinessStatus(analytics.foundationReadiness),
          recommendation: certificationRecommendation(analytics.foundationReadiness),
        },
      },
      learningOptimization: {
        optimalSessionLength: `${analytics.optimalSessionLengthMinutes} minutes`,
        bestStudyTimes: analytics.peakPerformanceTimes,
        recommendedApproach: approachRecommendation(analytics),
      },
      focusAreas: {
        strengths: profile.strengths.slice(0, 3),
        improvementNeeded: analytics.improvementFocus.slice(0, 3),
        nextPriorities: nextPriorities.map(recommendation => recommendation.topicId),
      },
    };
  }
}
