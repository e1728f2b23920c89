import type { AgentResponse } from './agent.types';
import type { ConversationSession } from './conversation.types';
import type { CertificationLevel } from './metadata.types';
import type {
  CurrentTopicView,
  ExperienceLevel,
  PlanOverview,
  StructuredLearningPlan,
  TopicProgress,
  UserStatistics,
} from './profile.types';
import type {
  LearningInsights,
  LearningSession,
  ProgressAnalytics,
  TopicRecommendation,
} from './progress.types';
import type { EnhancedSearchResult } from './search.types';
import type { ServiceHealthResult } from '../../services/interfaces';

export interface StartedSession {
  /** Shared by the conversation session and the learning session it tracks. */
  sessionId: string;
  session: ConversationSession;
  learningSession: LearningSession;
  welcomeMessage: string;
}

export interface TutorReply {
  response: AgentResponse;
  userMessageId: string;
  agentMessageId: string | null;
  searchResultCount: number;
}

export interface EndedSession {
  conversationEnded: boolean;
  learningSession: LearningSession | null;
}

export interface UserDashboard {
  userProfile: {
    userId: string;
    username: string;
    experienceLevel: ExperienceLevel;
    overallProficiency: number;
    targetCertification: CertificationLevel | null;
    examPreparationMode: boolean;
  };
  analytics: ProgressAnalytics | null;
  insights: LearningInsights | null;
  statistics: UserStatistics | null;
  currentTopic: CurrentTopicView | null;
  recommendations: TopicRecommendation[];
}

export interface ProgressUpdateResult {
  topicProgress: TopicProgress;
  analytics: ProgressAnalytics | null;
  recommendations: TopicRecommendation[];
}

export interface CreatedPlan {
  plan: StructuredLearningPlan;
  overview: PlanOverview | null;
}

export interface LearningPlanStatus {
  overview: PlanOverview;
  currentTopic: CurrentTopicView | null;
  recommendations: TopicRecommendation[];
}

export interface KnowledgeBaseSearchOptions {
  userId?: string;
  certificationLevel?: CertificationLevel;
  /** Defaults to 5. */
  limit?: number;
}

export interface KnowledgeBaseSearchResult {
  query: string;
  results: EnhancedSearchResult[];
  resultCount: number;
}

export interface SystemStatus {
  timestamp: string;
  components: ServiceHealthResult[];
  users: { total: number; onboarded: number };
}
