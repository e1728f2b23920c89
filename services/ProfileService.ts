import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import templatesJson from '../shared/data/learningPlanTemplates.json';
import { BaseService } from './base/BaseService';
import { ConflictError, NotFoundError, ValidationError } from './base/ServiceError';
import { PrerequisiteGraph } from './helpers/prerequisiteGraph';
import type { IRecordStore } from './interfaces';
import { LearningPlanTemplateSchema, UserProfileSchema } from '../shared/schemas/profileSchemas';
import {
  PLAN_TYPES,
  RESET_TYPES,
  type ConversationPreferences,
  type CreatePlanOptions,
  type CurrentTopicView,
  type CustomTopicSpec,
  type ExperienceLevel,
  type LearningPlanTemplate,
  type LearningPlanTopic,
  type PlanOverview,
  type PlanType,
  type ResetType,
  type SessionPreferences,
  type StructuredLearningPlan,
  type TopicProgress,
  type TopicProgressUpdate,
  type TopicStatus,
  type TopicTransitionResult,
  type TopicsByStatus,
  type UserProfile,
  type UserStatistics,
} from '../shared/types/profile.types';
import { titleCase } from '../utils/text';

const DAY_MS = 24 * 60 * 60 * 1000;
const CUSTOM_TOPIC_MINUTES = 60;
const NEXT_AVAILABLE_LIMIT = 3;
const PROFILE_VERSION = '2.0';

const BUNDLED_TEMPLATES = z.array(LearningPlanTemplateSchema).parse(templatesJson);

export interface ProfileUpdate {
  email?: string | null;
  targetCertification?: UserProfile['targetCertification'];
  learningApproach?: UserProfile['learningApproach'];
  examPreparationMode?: boolean;
  preferredLearningTimes?: string[];
  strengths?: string[];
  onboardingCompleted?: boolean;
  conversationPreferences?: Partial<ConversationPreferences>;
  sessionPreferences?: Partial<SessionPreferences>;
}

interface ProfileServiceDeps {
  profiles: IRecordStore<UserProfile>;
  templates?: readonly LearningPlanTemplate[];
}

/** ≥0.8 expert, ≥0.6 advanced, ≥0.4 intermediate, otherwise beginner. */
export function experienceLevelFor(proficiency: number): ExperienceLevel {
  if (proficiency >= 0.8) return 'expert';
  if (proficiency >= 0.6) return 'advanced';
  if (proficiency >= 0.4) return 'intermediate';
  return 'beginner';
}

export function createDefaultProfile(username: string, email: string | null = null): UserProfile {
  const now = new Date().toISOString();
  return {
    userId: uuidv4(),
    username,
    email,
    createdAt: now,
    lastActive: now,
    experienceLevel: 'beginner',
    proficiencyScores: {},
    overallProficiency: 0,
    learningApproach: 'hybrid',
    structuredWeight: 0.7,
    examPreparationMode: false,
    targetCertification: null,
    examReadinessScore: 0,
    certificationDeadline: null,
    learningPlans: {},
    activePlanId: null,
    learningGoals: [],
    topicProgress: {},
    conversationPreferences: {
      learningStyle: 'reading_writing',
      explanationDepth: 'moderate',
      useExamples: true,
      useDiagrams: true,
      interactiveMode: true,
      questionDifficulty: 'adaptive',
      preferredResponseLength: 'moderate',
    },
    sessionPreferences: {
      preferredDurationMinutes: 30,
      sessionIntensity: 'moderate',
      breakFrequencyMinutes: 20,
      reminderNotifications: true,
      progressTracking: true,
    },
    totalStudyTimeMinutes: 0,
    sessionsCompleted: 0,
    averageSessionDurationMinutes: 0,
    streakDays: 0,
    lastStudyDate: null,
    strengths: [],
    areasForImprovement: [],
    learningVelocity: 1,
    retentionScore: 0,
    preferredLearningTimes: [],
    knowledgeGaps: {},
    lastAssessmentDate: null,
    assessmentHistory: [],
    currentSessionId: null,
    currentTopicFocus: null,
    profileVersion: PROFILE_VERSION,
    onboardingCompleted: false,
  };
}

export function isPlanType(value: string): value is PlanType {
  return (PLAN_TYPES as readonly string[]).includes(value);
}

export function isResetType(value: string): value is ResetType {
  return (RESET_TYPES as readonly string[]).includes(value);
}

function freshTopic(
  spec: Omit<LearningPlanTopic, 'orderIndex' | 'status' | 'completionDate' | 'userMarkedComplete'>,
  orderIndex: number
): LearningPlanTopic {
  return { ...spec, orderIndex, status: 'not_started', completionDate: null, userMarkedComplete: false };
}

export function planGraph(plan: Pick<StructuredLearningPlan, 'topics'>): PrerequisiteGraph {
  return new PrerequisiteGraph(plan.topics);
}

function completedLookup(plan: StructuredLearningPlan): (topicId: string) => boolean {
  const completed = new Set(plan.topics.filter(topic => topic.status === 'completed').map(topic => topic.topicId));
  return topicId => completed.has(topicId);
}

function isPending(status: TopicStatus): boolean {
  return status === 'not_started' || status === 'in_progress';
}

export function canProceedToTopic(plan: StructuredLearningPlan, topicId: string, graph = planGraph(plan)): boolean {
  return !plan.enforcePrerequisites || graph.isEligible(topicId, completedLookup(plan));
}

/**
 * The first pending topic whose prerequisites are met; failing that the first
 * pending topic; `topics.length` once nothing is pending.
 */
export function nextTopicIndex(plan: StructuredLearningPlan, graph = planGraph(plan)): number {
  const eligible = plan.topics.findIndex(topic =>
    isPending(topic.status) && canProceedToTopic(plan, topic.topicId, graph));
  if (eligible >= 0) return eligible;
  const pending = plan.topics.findIndex(topic => isPending(topic.status));
  return pending >= 0 ? pending : plan.topics.length;
}

export function recomputePlanProgress(plan: StructuredLearningPlan): void {
  const completed = plan.topics.filter(topic => topic.status === 'completed').length;
  plan.topicsCompleted = completed;
  plan.completionPercentage = plan.topics.length > 0 ? (completed / plan.topics.length) * 100 : 0;
  plan.currentTopicIndex = nextTopicIndex(plan);
}

function totalDuration(topics: readonly LearningPlanTopic[]): number {
  return topics.reduce((sum, topic) => sum + topic.estimatedDurationMinutes, 0);
}

export function planFromTemplate(template: LearningPlanTemplate): StructuredLearningPlan {
  const topics = template.topics.map((topic, index) => freshTopic(topic, index));
  const plan: StructuredLearningPlan = {
    planId: uuidv4(),
    planName: template.planName,
    planType: template.planType,
    description: template.description,
    targetCertification: template.targetCertification,
    createdDate: new Date().toISOString(),
    estimatedTotalDurationMinutes: totalDuration(topics),
    topics,
    currentTopicIndex: 0,
    isActive: true,
    completionPercentage: 0,
    topicsCompleted: 0,
    totalTimeSpentMinutes: 0,
    allowTopicSkipping: template.allowTopicSkipping,
    enforcePrerequisites: template.enforcePrerequisites,
  };
  planGraph(plan);
  return plan;
}

export function customPlan(specs: readonly CustomTopicSpec[], planName: string, enforcePrerequisites = false): StructuredLearningPlan {
  if (specs.length === 0) {
    throw new ValidationError('A custom plan needs at least one topic');
  }
  const topics = specs.map((spec, index) => {
    const { topicId, title, prerequisites } = typeof spec === 'string' ? { topicId: spec, title: undefined, prerequisites: undefined } : spec;
    return freshTopic({
      topicId,
      title: title ?? titleCase(topicId),
      description: `Custom topic: ${topicId}`,
      certificationLevel: 'foundation',
      estimatedDurationMinutes: CUSTOM_TOPIC_MINUTES,
      prerequisites: prerequisites ?? [],
      isOptional: false,
    }, index);
  });
  const plan: StructuredLearningPlan = {
    planId: uuidv4(),
    planName,
    planType: 'custom_topics',
    description: 'Custom learning plan based on user-selected topics',
    targetCertification: 'foundation',
    createdDate: new Date().toISOString(),
    estimatedTotalDurationMinutes: topics.length * CUSTOM_TOPIC_MINUTES,
    topics,
    currentTopicIndex: 0,
    isActive: true,
    completionPercentage: 0,
    topicsCompleted: 0,
    totalTimeSpentMinutes: 0,
    allowTopicSkipping: true,
    enforcePrerequisites,
  };
  planGraph(plan);
  plan.currentTopicIndex = nextTopicIndex(plan);
  return plan;
}

/**
 * Beginners get 20% more time per topic. Advanced and expert learners get 20%
 * less, and may skip topics and take them in any order.
 */
export function adjustPlanForExperience(plan: StructuredLearningPlan, level: ExperienceLevel): void {
  if (level === 'beginner') {
    plan.topics.forEach(topic => { topic.estimatedDurationMinutes = Math.floor(topic.estimatedDurationMinutes * 1.2); });
  } else if (level === 'advanced' || level === 'expert') {
    plan.topics.forEach(topic => { topic.estimatedDurationMinutes = Math.floor(topic.estimatedDurationMinutes * 0.8); });
    plan.allowTopicSkipping = true;
    plan.enforcePrerequisites = false;
  }
  plan.estimatedTotalDurationMinutes = totalDuration(plan.topics);
  plan.currentTopicIndex = nextTopicIndex(plan);
}

/** Whole UTC days from `earlier` to `later`. */
function daysBetween(earlier: string, later: Date): number {
  const from = Date.parse(earlier.slice(0, 10));
  const to = Date.parse(later.toISOString().slice(0, 10));
  return Math.round((to - from) / DAY_MS);
}

function emptyTopicProgress(profile: UserProfile, topicId: string, certificationLevel: TopicProgress['certificationLevel']): TopicProgress {
  return {
    topicId,
    certificationLevel,
    experienceLevel: profile.experienceLevel,
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
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Owns user profiles and their structured learning plans: plan creation from
 * templates, prerequisite-gated topic transitions, proficiency and activity
 * counters, and the staged progress resets.
 */
export class ProfileService extends BaseService<ProfileServiceDeps> {
  private readonly templates: ReadonlyMap<PlanType, LearningPlanTemplate>;

  constructor(deps: ProfileServiceDeps) {
    super('ProfileService', deps);
    this.templates = new Map((deps.templates ?? BUNDLED_TEMPLATES).map(template => [template.planType, template]));
  }

  getPlanTemplates(): LearningPlanTemplate[] {
    return [...this.templates.values()];
  }

  async createProfile(username: string, email: string | null = null): Promise<UserProfile> {
    return this.execute('createProfile', async () => {
      const trimmed = username.trim();
      if (!trimmed) {
        throw new ValidationError('Username must not be empty');
      }
      if (await this.getProfileByUsername(trimmed)) {
        throw new ConflictError('user', `User '${trimmed}' already exists`);
      }
      const profile = createDefaultProfile(trimmed, email);
      await this.deps.profiles.put(profile.userId, profile);
      this.logInfo(`Created profile ${profile.userId} for ${trimmed}`);
      return profile;
    }, { username });
  }

  async getProfile(userId: string): Promise<UserProfile | null> {
    return this.deps.profiles.get(userId);
  }

  async getProfileByUsername(username: string): Promise<UserProfile | null> {
    const profiles = await this.deps.profiles.list();
    return profiles.find(profile => profile.username === username) ?? null;
  }

  async saveProfile(profile: UserProfile): Promise<void> {
    profile.lastActive = new Date().toISOString();
    await this.deps.profiles.put(profile.userId, profile);
  }

  /** Most recently active first. */
  async listProfiles(): Promise<UserProfile[]> {
    const profiles = await this.deps.profiles.list();
    return profiles.sort((a, b) => b.lastActive.localeCompare(a.lastActive));
  }

  async deleteProfile(userId: string): Promise<boolean> {
    const deleted = await this.deps.profiles.delete(userId);
    if (deleted) {
      this.logInfo(`Deleted profile ${userId}`);
    }
    return deleted;
  }

  async updateProfile(userId: string, updates: ProfileUpdate): Promise<UserProfile> {
    return this.execute('updateProfile', async () => {
      const profile = await this.requireProfile(userId);
      const { conversationPreferences, sessionPreferences, ...fields } = updates;
      const candidate = {
        ...profile,
        ...fields,
        conversationPreferences: { ...profile.conversationPreferences, ...conversationPreferences },
        sessionPreferences: { ...profile.sessionPreferences, ...sessionPreferences },
      };
      const parsed = UserProfileSchema.safeParse(candidate);
      if (!parsed.success) {
        throw new ValidationError('Invalid profile update', parsed.error.issues);
      }
      await this.saveProfile(parsed.data);
      return parsed.data;
    }, { userId });
  }

  /**
   * Adds a plan built from the plan type's template, or from `customTopics`
   * for custom plans, scaled to the learner's experience. The first plan a
   * user creates becomes the active one.
   */
  async createLearningPlan(userId: string, planType: string, options: CreatePlanOptions = {}): Promise<StructuredLearningPlan> {
    return this.execute('createLearningPlan', async () => {
      if (!isPlanType(planType)) {
        throw new ValidationError(`Unknown plan type '${planType}'`);
      }
      const profile = await this.requireProfile(userId);

      let plan: StructuredLearningPlan;
      if (planType === 'custom_topics') {
        plan = customPlan(options.customTopics ?? [], options.planName ?? 'Custom Learning Plan', options.enforcePrerequisites);
      } else {
        const template = this.templates.get(planType);
        if (!template) {
          throw new ValidationError(`No template for plan type '${planType}'`);
        }
        plan = planFromTemplate(template);
        if (options.planName) plan.planName = options.planName;
      }

      adjustPlanForExperience(plan, profile.experienceLevel);
      plan.isActive = profile.activePlanId === null;
      profile.learningPlans[plan.planId] = plan;
      if (plan.isActive) {
        profile.activePlanId = plan.planId;
      }

      await this.saveProfile(profile);
      this.logInfo(`Created ${planType} plan ${plan.planId} (${plan.topics.length} topics) for ${userId}`);
      return plan;
    }, { userId, planType });
  }

  async setActivePlan(userId: string, planId: string): Promise<StructuredLearningPlan> {
    const profile = await this.requireProfile(userId);
    const plan = profile.learningPlans[planId];
    if (!plan) {
      throw new NotFoundError('Learning plan', planId);
    }
    for (const other of Object.values(profile.learningPlans)) {
      other.isActive = other.planId === planId;
    }
    profile.activePlanId = planId;
    await this.saveProfile(profile);
    return plan;
  }

  async markTopicComplete(userId: string, topicId: string, userInitiated = true): Promise<TopicTransitionResult> {
    return this.transitionTopic(userId, topicId, 'completed', userInitiated);
  }

  async skipTopic(userId: string, topicId: string): Promise<TopicTransitionResult> {
    return this.transitionTopic(userId, topicId, 'skipped', true);
  }

  async getCurrentTopic(userId: string): Promise<CurrentTopicView | null> {
    const profile = await this.getProfile(userId);
    const plan = profile ? this.activePlan(profile) : null;
    if (!plan || plan.currentTopicIndex >= plan.topics.length) {
      return null;
    }
    const graph = planGraph(plan);
    const topic = plan.topics[plan.currentTopicIndex];
    return {
      topic,
      planProgress: {
        currentIndex: plan.currentTopicIndex,
        totalTopics: plan.topics.length,
        completionPercentage: plan.completionPercentage,
      },
      canProceed: canProceedToTopic(plan, topic.topicId, graph),
      nextAvailableTopics: plan.topics
        .filter(candidate => candidate.status === 'not_started' && canProceedToTopic(plan, candidate.topicId, graph))
        .slice(0, NEXT_AVAILABLE_LIMIT),
    };
  }

  async getPlanOverview(userId: string, planId?: string): Promise<PlanOverview | null> {
    const profile = await this.getProfile(userId);
    if (!profile) return null;
    const targetId = planId ?? profile.activePlanId;
    const plan = targetId ? profile.learningPlans[targetId] : undefined;
    if (!plan) return null;

    const graph = planGraph(plan);
    const topicsByStatus: TopicsByStatus = { completed: [], inProgress: [], available: [], locked: [], skipped: [] };
    plan.topics.forEach((topic, index) => {
      if (topic.status === 'completed') {
        topicsByStatus.completed.push(topic);
      } else if (topic.status === 'skipped') {
        topicsByStatus.skipped.push(topic);
      } else if (topic.status === 'in_progress' || index === plan.currentTopicIndex) {
        topicsByStatus.inProgress.push(topic);
      } else if (canProceedToTopic(plan, topic.topicId, graph)) {
        topicsByStatus.available.push(topic);
      } else {
        topicsByStatus.locked.push(topic);
      }
    });

    return {
      plan,
      topicsByStatus,
      progressSummary: {
        completionPercentage: plan.completionPercentage,
        topicsCompleted: plan.topicsCompleted,
        totalTopics: plan.topics.length,
        estimatedTimeRemainingMinutes: totalDuration(plan.topics.filter(topic => isPending(topic.status))),
        currentTopicIndex: plan.currentTopicIndex,
      },
    };
  }

  /**
   * Records an assessed score for a topic, then re-derives overall
   * proficiency as the mean of all topic scores and the experience level
   * from it.
   */
  async updateProficiencyScore(userId: string, topicId: string, score: number, assessmentType = 'general'): Promise<UserProfile> {
    return this.execute('updateProficiencyScore', async () => {
      const profile = await this.requireProfile(userId);
      const now = new Date().toISOString();

      profile.proficiencyScores[topicId] = clamp(score, 0, 1);
      const scores = Object.values(profile.proficiencyScores);
      profile.overallProficiency = scores.reduce((sum, value) => sum + value, 0) / scores.length;
      profile.experienceLevel = experienceLevelFor(profile.overallProficiency);
      profile.lastAssessmentDate = now;
      profile.assessmentHistory.push({
        timestamp: now,
        topicId,
        score,
        assessmentType,
        overallProficiency: profile.overallProficiency,
      });

      await this.saveProfile(profile);
      return profile;
    }, { userId, topicId, score });
  }

  async updateTopicProgress(userId: string, topicId: string, updates: TopicProgressUpdate): Promise<TopicProgress> {
    const profile = await this.requireProfile(userId);
    const progress = this.topicProgressFor(profile, topicId);

    if (updates.status !== undefined) progress.status = updates.status;
    if (updates.completionPercentage !== undefined) progress.completionPercentage = clamp(updates.completionPercentage, 0, 100);
    if (updates.proficiencyScore !== undefined) progress.proficiencyScore = clamp(updates.proficiencyScore, 0, 1);
    if (updates.timeSpentMinutes !== undefined) progress.timeSpentMinutes += Math.max(0, Math.round(updates.timeSpentMinutes));
    if (updates.quizScores !== undefined) progress.quizScores = [...updates.quizScores];
    if (updates.masteryIndicators !== undefined) progress.masteryIndicators = { ...progress.masteryIndicators, ...updates.masteryIndicators };
    if (updates.notes !== undefined) progress.notes = updates.notes;
    progress.experienceLevel = profile.experienceLevel;
    progress.lastAccessed = new Date().toISOString();

    await this.saveProfile(profile);
    return progress;
  }

  /**
   * Folds a finished learning session into the activity counters. Studying on
   * consecutive days extends the streak; a gap restarts it at one.
   */
  async updateSessionStats(userId: string, durationMinutes: number, topicsCovered: readonly string[]): Promise<UserProfile> {
    return this.execute('updateSessionStats', async () => {
      const profile = await this.requireProfile(userId);
      const now = new Date();
      const nowIso = now.toISOString();

      profile.sessionsCompleted += 1;
      profile.totalStudyTimeMinutes += Math.max(0, Math.round(durationMinutes));
      profile.averageSessionDurationMinutes = profile.totalStudyTimeMinutes / profile.sessionsCompleted;

      const gap = profile.lastStudyDate ? daysBetween(profile.lastStudyDate, now) : null;
      if (gap === 1) {
        profile.streakDays += 1;
      } else if (gap !== 0) {
        profile.streakDays = 1;
      }
      profile.lastStudyDate = nowIso;

      const plan = this.activePlan(profile);
      for (const topicId of new Set(topicsCovered)) {
        const progress = this.topicProgressFor(profile, topicId);
        if (progress.status === 'not_started') progress.status = 'in_progress';
        progress.lastAccessed = nowIso;
        const planTopic = plan?.topics.find(topic => topic.topicId === topicId);
        if (planTopic && planTopic.status === 'not_started') {
          planTopic.status = 'in_progress';
        }
      }
      if (plan) {
        plan.totalTimeSpentMinutes += Math.max(0, Math.round(durationMinutes));
        recomputePlanProgress(plan);
      }

      await this.saveProfile(profile);
      return profile;
    }, { userId, durationMinutes });
  }

  async resetProgress(userId: string, resetType: string = 'progress_only'): Promise<UserProfile> {
    return this.execute('resetProgress', async () => {
      if (!isResetType(resetType)) {
        throw new ValidationError(`Unknown reset type '${resetType}'`, { allowed: RESET_TYPES });
      }
      const profile = await this.requireProfile(userId);

      switch (resetType) {
        case 'progress_only':
          this.resetProgressOnly(profile);
          break;
        case 'learning_plans':
          profile.learningPlans = {};
          profile.activePlanId = null;
          profile.learningGoals = [];
          this.resetProgressOnly(profile);
          break;
        case 'full_reset':
          this.resetToDefaults(profile);
          break;
        case 'refresh_current_plan':
          this.refreshCurrentPlan(profile);
          break;
      }

      await this.saveProfile(profile);
      this.logInfo(`Reset (${resetType}) applied to ${userId}`);
      return profile;
    }, { userId, resetType });
  }

  async getUserStatistics(userId: string): Promise<UserStatistics | null> {
    const profile = await this.getProfile(userId);
    if (!profile) return null;

    const plan = this.activePlan(profile);
    const topicsStudied = plan
      ? plan.topics.filter(topic => topic.status === 'completed' || topic.status === 'in_progress').length
      : 0;
    const currentStreak = profile.lastStudyDate && daysBetween(profile.lastStudyDate, new Date()) <= 1
      ? profile.streakDays
      : 0;

    return {
      profile: {
        userId: profile.userId,
        username: profile.username,
        experienceLevel: profile.experienceLevel,
        overallProficiency: profile.overallProficiency,
        targetCertification: profile.targetCertification,
        onboardingCompleted: profile.onboardingCompleted,
      },
      activity: {
        totalSessions: profile.sessionsCompleted,
        totalStudyTimeMinutes: profile.totalStudyTimeMinutes,
        averageSessionDurationMinutes: profile.averageSessionDurationMinutes,
        currentStreak,
        lastStudyDate: profile.lastStudyDate,
        lastActive: profile.lastActive,
      },
      progress: {
        topicsStudied,
        activePlanId: profile.activePlanId,
        activePlanName: plan?.planName ?? null,
        activePlanCompletion: plan?.completionPercentage ?? 0,
        learningPlansCount: Object.keys(profile.learningPlans).length,
        learningGoalsCount: profile.learningGoals.length,
        topicProgressCount: Object.keys(profile.topicProgress).length,
        assessmentHistoryCount: profile.assessmentHistory.length,
      },
      preferences: {
        learningApproach: profile.learningApproach,
        examPreparationMode: profile.examPreparationMode,
        preferredSessionDurationMinutes: profile.sessionPreferences.preferredDurationMinutes,
        learningStyle: profile.conversationPreferences.learningStyle,
      },
    };
  }

  activePlan(profile: UserProfile): StructuredLearningPlan | null {
    return profile.activePlanId ? profile.learningPlans[profile.activePlanId] ?? null : null;
  }

  private async requireProfile(userId: string): Promise<UserProfile> {
    const profile = await this.getProfile(userId);
    if (!profile) {
      throw new NotFoundError('User', userId);
    }
    return profile;
  }

  private topicProgressFor(profile: UserProfile, topicId: string): TopicProgress {
    const existing = profile.topicProgress[topicId];
    if (existing) return existing;
    const planTopic = this.activePlan(profile)?.topics.find(topic => topic.topicId === topicId);
    const created = emptyTopicProgress(profile, topicId, planTopic?.certificationLevel ?? profile.targetCertification ?? 'foundation');
    profile.topicProgress[topicId] = created;
    return created;
  }

  private async transitionTopic(
    userId: string,
    topicId: string,
    target: 'completed' | 'skipped',
    userInitiated: boolean
  ): Promise<TopicTransitionResult> {
    const profile = await this.getProfile(userId);
    if (!profile) {
      return { success: false, message: `User '${userId}' not found` };
    }
    const plan = this.activePlan(profile);
    if (!plan) {
      return { success: false, message: 'No active learning plan' };
    }
    const topic = plan.topics.find(candidate => candidate.topicId === topicId);
    if (!topic) {
      return { success: false, message: `Topic '${topicId}' is not part of the active plan` };
    }
    if (topic.status === target) {
      return { success: true, message: `Topic '${topicId}' is already ${target}` };
    }
    if (!isPending(topic.status)) {
      return { success: false, message: `Topic '${topicId}' is already ${topic.status}` };
    }
    if (target === 'skipped' && !plan.allowTopicSkipping) {
      return { success: false, message: 'This plan does not allow skipping topics' };
    }
    if (plan.enforcePrerequisites) {
      const unmet = planGraph(plan).unmetPrerequisites(topicId, completedLookup(plan));
      if (unmet.length > 0) {
        return { success: false, message: `Complete ${unmet.join(', ')} first`, unmetPrerequisites: unmet };
      }
    }

    const now = new Date().toISOString();
    topic.status = target;
    const progress = this.topicProgressFor(profile, topicId);
    progress.status = target;
    progress.isPartOfPlan = true;
    progress.planId = plan.planId;
    if (target === 'completed') {
      topic.completionDate = now;
      topic.userMarkedComplete = userInitiated;
      progress.completionPercentage = 100;
      progress.completionDate = now;
      progress.markedCompleteByUser = userInitiated;
    }
    recomputePlanProgress(plan);

    await this.saveProfile(profile);
    this.logInfo(`Topic ${topicId} ${target} in plan ${plan.planId} (${plan.completionPercentage.toFixed(1)}%)`);
    return { success: true, message: `Topic '${topicId}' marked ${target}` };
  }

  private resetProgressOnly(profile: UserProfile): void {
    for (const plan of Object.values(profile.learningPlans)) {
      for (const topic of plan.topics) {
        topic.status = 'not_started';
        topic.completionDate = null;
        topic.userMarkedComplete = false;
      }
      plan.totalTimeSpentMinutes = 0;
      recomputePlanProgress(plan);
    }
    profile.topicProgress = {};
    profile.totalStudyTimeMinutes = 0;
    profile.sessionsCompleted = 0;
    profile.averageSessionDurationMinutes = 0;
    profile.streakDays = 0;
    profile.lastStudyDate = null;
    profile.assessmentHistory = [];
  }

  // Everything except identity and stated preferences goes back to defaults.
  private resetToDefaults(profile: UserProfile): void {
    const defaults = createDefaultProfile(profile.username, profile.email);
    Object.assign(profile, {
      ...defaults,
      userId: profile.userId,
      createdAt: profile.createdAt,
      conversationPreferences: profile.conversationPreferences,
      sessionPreferences: profile.sessionPreferences,
      learningApproach: 'structured',
      onboardingCompleted: false,
    } satisfies UserProfile);
  }

  private refreshCurrentPlan(profile: UserProfile): void {
    const plan = this.activePlan(profile);
    if (!plan) return;
    const template = this.templates.get(plan.planType);
    if (!template) {
      this.logWarn(`No template to refresh plan ${plan.planId} (${plan.planType})`);
      return;
    }
    const fresh = planFromTemplate(template);
    plan.topics = fresh.topics;
    plan.allowTopicSkipping = fresh.allowTopicSkipping;
    plan.enforcePrerequisites = fresh.enforcePrerequisites;
    plan.estimatedTotalDurationMinutes = fresh.estimatedTotalDurationMinutes;
    plan.totalTimeSpentMinutes = 0;
    recomputePlanProgress(plan);
  }
}
