import type { DifficultyLevel } from './metadata.types';
import type { ExplanationDepth } from './profile.types';

export const RESPONSE_STYLES = ['concise', 'detailed', 'conversational', 'instructional', 'socratic'] as const;
export type ResponseStyle = typeof RESPONSE_STYLES[number];

export type TechnicalDetail = 'minimal' | 'balanced' | 'comprehensive';

/** How a response is pitched for one learner at one point in a conversation. */
export interface ContentAdaptation {
  difficultyLevel: DifficultyLevel;
  explanationDepth: ExplanationDepth;
  technicalDetail: TechnicalDetail;
  useExamples: boolean;
  useAnalogies: boolean;
  useVisualAids: boolean;
  includeDiagrams: boolean;
  askFollowUpQuestions: boolean;
  providePracticeOpportunities: boolean;
  referenceUserExperience: boolean;
}

/** A passage of retrieved content cited by a response. */
export interface ContentReference {
  chunkId: string;
  source: string;
  pages: string;
  relevanceScore: number;
}

export interface AgentResponse {
  responseId: string;
  userId: string;
  sessionId: string;
  timestamp: string;
  content: string;
  /** Mermaid diagram block, when the learner prefers visual material. */
  visualContent: string | null;
  topicsAddressed: string[];
  conceptsExplained: string[];
  difficultyLevel: DifficultyLevel;
  responseStyle: ResponseStyle;
  adaptation: ContentAdaptation;
  userContextUsed: Record<string, string | boolean | null>;
  suggestedNextQuestions: string[];
  references: ContentReference[];
}

export type ExamOptionKey = 'A' | 'B' | 'C' | 'D';

export interface ExamQuestion {
  topicId: string;
  difficulty: DifficultyLevel;
  question: string;
  options: Record<ExamOptionKey, string>;
  correctAnswer: ExamOptionKey;
  explanation: string;
  /** False when the model's output could not be parsed and a placeholder was returned. */
  generated: boolean;
}

export interface ExamQuestionOptions {
  topicId?: string;
  difficulty?: DifficultyLevel;
}

/** 'adaptive' picks a depth from the learner's experience level. */
export type ExplanationDetail = ExplanationDepth | 'concise' | 'adaptive';
