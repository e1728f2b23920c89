import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base/BaseService';
import { ExternalServiceError, NotFoundError } from './base/ServiceError';
import type { ProgressTrackerService } from './ProgressTrackerService';
import type { SemanticSearchService } from './SemanticSearchService';
import type { SessionManagerService } from './SessionManagerService';
import type { IChatProvider, ILLMCompletionOptions, ILLMContext } from '../shared/llm-types';
import { ExamQuestionPayloadSchema } from '../shared/schemas/agentSchemas';
import { parseLLMResponse } from '../shared/schemas/profileSchemas';
import type {
  AgentResponse,
  ContentAdaptation,
  ContentReference,
  ExamQuestion,
  ExamQuestionOptions,
  ExplanationDetail,
  ResponseStyle,
  TechnicalDetail,
} from '../shared/types/agent.types';
import type { ConversationContext, SessionContextView } from '../shared/types/conversation.types';
import type { DifficultyLevel } from '../shared/types/metadata.types';
import type { ExperienceLevel, ExplanationDepth } from '../shared/types/profile.types';
import type { EnhancedSearchResult } from '../shared/types/search.types';
import { titleCase } from '../utils/text';

interface AdaptiveAgentServiceDeps {
  chat: IChatProvider;
  search: SemanticSearchService;
  progressTracker: ProgressTrackerService;
  sessionManager: SessionManagerService;
}

const DIFFICULTY_FOR_EXPERIENCE: Record<ExperienceLevel, DifficultyLevel> = {
  beginner: 'basic',
  intermediate: 'intermediate',
  advanced: 'advanced',
  expert: 'advanced',
};

const MAX_TOKENS_BY_DEPTH: Record<ExplanationDepth, number> = {
  brief: 300,
  moderate: 600,
  detailed: 1000,
};

const RESPONSE_SEARCH_RESULTS = 5;
const EXAM_SEARCH_RESULTS = 3;
const SNIPPET_LENGTH = 300;
const DIAGRAM_CONTENT_LENGTH = 500;
const MAX_FOLLOW_UPS = 3;
const RECENT_TOPICS_IN_PROMPT = 5;
const DEFAULT_EXAM_TOPIC = 'adm_overview';

const DIAGRAM_KEYWORDS = ['process', 'flow', 'architecture', 'relationship', 'structure', 'phases'];

const TOGAF_TOPICS = [
  'ADM', 'Preliminary Phase', 'Phase A', 'Phase B', 'Phase C', 'Phase D',
  'Phase E', 'Phase F', 'Phase G', 'Phase H', 'Requirements Management',
  'Business Architecture', 'Data Architecture', 'Application Architecture',
  'Technology Architecture', 'Architecture Governance', 'Implementation',
  'Migration', 'Architecture Board', 'Architecture Compliance',
];

const DEFINITION_PATTERN = /\b([A-Za-z][\w-]*(?:\s+[A-Za-z][\w-]*){0,3})\s+(?:is defined as|refers to|means)\b/gi;

// ---------------------------------------------------------------------------
// Adaptation rules
// ---------------------------------------------------------------------------

/** Advanced and expert learners asking for detailed answers get the full technical treatment. */
export function technicalDetailFor(experienceLevel: ExperienceLevel, depth: ExplanationDepth): TechnicalDetail {
  if (experienceLevel === 'beginner') return 'minimal';
  if (depth === 'detailed' && (experienceLevel === 'advanced' || experienceLevel === 'expert')) return 'comprehensive';
  return 'balanced';
}

export function determineContentAdaptation(view: SessionContextView): ContentAdaptation {
  const { experienceLevel, examPreparationMode } = view.userProfile;
  const preferences = view.learningPreferences;
  const visual = preferences.learningStyle === 'visual';

  return {
    difficultyLevel: DIFFICULTY_FOR_EXPERIENCE[experienceLevel],
    explanationDepth: preferences.explanationDepth,
    technicalDetail: technicalDetailFor(experienceLevel, preferences.explanationDepth),
    useExamples: experienceLevel === 'beginner' || experienceLevel === 'intermediate',
    useAnalogies: experienceLevel === 'beginner',
    useVisualAids: visual,
    includeDiagrams: visual && preferences.useDiagrams,
    askFollowUpQuestions: preferences.interactiveMode,
    providePracticeOpportunities: examPreparationMode,
    referenceUserExperience: experienceLevel === 'advanced' || experienceLevel === 'expert',
  };
}

export function determineResponseStyle(adaptation: ContentAdaptation): ResponseStyle {
  if (adaptation.askFollowUpQuestions) return 'socratic';
  if (adaptation.explanationDepth === 'detailed') return 'instructional';
  if (adaptation.explanationDepth === 'brief') return 'concise';
  return 'conversational';
}

export function generationOptions(adaptation: ContentAdaptation): ILLMCompletionOptions {
  return {
    temperature: adaptation.technicalDetail === 'comprehensive' ? 0.3 : 0.7,
    maxTokens: MAX_TOKENS_BY_DEPTH[adaptation.explanationDepth],
  };
}

/** Exam difficulty from overall plan completion (0-100). */
export function difficultyForCompletion(overallCompletion: number): DifficultyLevel {
  const proficiency = overallCompletion / 100;
  if (proficiency < 0.4) return 'basic';
  if (proficiency < 0.7) return 'intermediate';
  return 'advanced';
}

export function explanationDepthFor(
  detail: ExplanationDetail,
  experienceLevel: ExperienceLevel,
  preferred: ExplanationDepth
): ExplanationDepth {
  if (detail === 'concise') return 'brief';
  if (detail !== 'adaptive') return detail;
  if (experienceLevel === 'beginner') return 'detailed';
  if (experienceLevel === 'expert') return 'brief';
  return preferred;
}

export function wantsDiagram(query: string, content: string, adaptation: ContentAdaptation): boolean {
  if (!adaptation.includeDiagrams) return false;
  const haystack = `${query} ${content}`.toLowerCase();
  return DIAGRAM_KEYWORDS.some(keyword => haystack.includes(keyword));
}

// ---------------------------------------------------------------------------
// Content analysis
// ---------------------------------------------------------------------------

export function extractTopics(content: string): string[] {
  const lower = content.toLowerCase();
  return TOGAF_TOPICS.filter(topic => lower.includes(topic.toLowerCase()));
}

/** Terms the response defines ("X is defined as", "X refers to", "X means"). */
export function extractConcepts(content: string): string[] {
  const concepts = new Set<string>();
  for (const match of content.matchAll(DEFINITION_PATTERN)) {
    concepts.add(match[1].trim());
  }
  return [...concepts];
}

/** Parses one question per line, dropping list markers and lines that are not questions. */
export function parseFollowUpQuestions(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.trim().replace(/^(?:\d+[.)]|[-*•])\s*/, ''))
    .filter(line => line.length > 0 && line.includes('?'))
    .slice(0, MAX_FOLLOW_UPS);
}

export function defaultFollowUpQuestions(topics: readonly string[]): string[] {
  const topic = topics[0];
  if (!topic) return [];
  return [
    `Can you provide a practical example of ${topic}?`,
    `How does ${topic} relate to other TOGAF concepts?`,
    `What are common challenges with ${topic}?`,
  ];
}

function metadataString(result: EnhancedSearchResult, key: string): string {
  const value = result.metadata[key];
  return typeof value === 'string' ? value : '';
}

export function formatSearchResults(results: readonly EnhancedSearchResult[]): string {
  if (results.length === 0) {
    return 'No specific content found.';
  }
  return results
    .map((result, index) => {
      const source = metadataString(result, 'source_file');
      const line = `${index + 1}. ${result.content.slice(0, SNIPPET_LENGTH)}...`;
      return source ? `${line} (Source: ${source})` : line;
    })
    .join('\n\n');
}

export function toReferences(results: readonly EnhancedSearchResult[]): ContentReference[] {
  return results.map(result => {
    const start = result.metadata.start_page;
    const end = result.metadata.end_page;
    return {
      chunkId: result.chunkId,
      source: metadataString(result, 'source_file'),
      pages: start === end ? `${start ?? ''}` : `${start ?? ''}-${end ?? ''}`,
      relevanceScore: result.relevanceScore,
    };
  });
}

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

export function buildSystemPrompt(view: SessionContextView, adaptation: ContentAdaptation): string {
  const profile = view.userProfile;
  const sections = [`You are an expert TOGAF tutor specializing in enterprise architecture education.

User Context:
- Experience Level: ${titleCase(profile.experienceLevel)}
- Target Certification: ${titleCase(profile.targetCertification ?? 'foundation')}
- Exam Preparation Mode: ${profile.examPreparationMode ? 'Yes' : 'No'}
- Learning Approach: ${titleCase(profile.learningApproach)}

Content Adaptation Rules:
- Explanation Depth: ${adaptation.explanationDepth}
- Technical Detail: ${adaptation.technicalDetail}
- Difficulty Level: ${adaptation.difficultyLevel}`];

  if (profile.experienceLevel === 'beginner') {
    sections.push(`Teaching Style for Beginners:
- Use simple, clear language
- Provide step-by-step explanations
- Include real-world examples and analogies
- Define technical terms when first used
- Build concepts incrementally
- Encourage questions and interaction`);
  } else if (profile.experienceLevel === 'expert') {
    sections.push(`Teaching Style for Experts:
- Use precise, technical language
- Focus on advanced concepts and edge cases
- Reference latest industry practices
- Discuss implementation challenges
- Provide comparative analysis
- Engage in peer-level discussion`);
  }

  if (adaptation.askFollowUpQuestions) {
    sections.push(`Interaction Guidelines:
- Ask thoughtful follow-up questions to gauge understanding
- Encourage deeper exploration of concepts
- Suggest practical applications`);
  }

  if (adaptation.providePracticeOpportunities) {
    sections.push(`Exam Preparation:
- Highlight points that are commonly examined
- Offer a short practice question where it fits`);
  }

  if (adaptation.useVisualAids) {
    sections.push(`Visual Content:
- Include mermaid diagrams when helpful
- Use ASCII charts for simple visualizations
- Structure content with clear headings and bullet points`);
  }

  return sections.join('\n\n');
}

export function buildUserPrompt(
  query: string,
  results: readonly EnhancedSearchResult[],
  context: ConversationContext
): string {
  let prompt = `User Question: ${query}\n\n`;

  if (context.currentTopic) {
    prompt += `Current Topic Context: ${context.currentTopic}\n\n`;
  }

  if (results.length > 0) {
    prompt += `Relevant TOGAF Content:\n${formatSearchResults(results)}\n\n`;
  }

  if (context.topicsDiscussed.length > 0) {
    prompt += `Previously Discussed Topics: ${context.topicsDiscussed.slice(-RECENT_TOPICS_IN_PROMPT).join(', ')}\n\n`;
  }

  return `${prompt}Please provide a helpful, personalized response based on the user's question and context.`;
}

function examQuestionPrompt(topicId: string, difficulty: DifficultyLevel, results: readonly EnhancedSearchResult[]): string {
  return `Generate a TOGAF certification exam question about ${topicId}.

Difficulty Level: ${difficulty}
Content Context: ${formatSearchResults(results)}

Requirements:
1. Multiple choice question with 4 options (A, B, C, D)
2. Only one correct answer
3. Plausible distractors that test understanding
4. Clear, unambiguous wording
5. Explanation for the correct answer

Format your response as JSON:
{
  "question": "Question text here?",
  "options": { "A": "...", "B": "...", "C": "...", "D": "..." },
  "correct_answer": "A",
  "explanation": "Explanation of why A is correct and others are wrong"
}`;
}

function explanationSystemPrompt(adaptation: ContentAdaptation, experienceLevel: ExperienceLevel): string {
  const steps = ['Clear definition', 'Context within TOGAF framework'];
  if (adaptation.useExamples) steps.push('Practical examples');
  if (adaptation.useAnalogies && experienceLevel === 'beginner') steps.push('Simple analogies to familiar concepts');

  return `You are a TOGAF expert providing concept explanations.

User Experience Level: ${titleCase(experienceLevel)}
Explanation Depth: ${adaptation.explanationDepth}
Use Examples: ${adaptation.useExamples}
Use Analogies: ${adaptation.useAnalogies}

Explanation Structure:
${steps.map((step, index) => `${index + 1}. ${step}`).join('\n')}

Adapt your language and depth to a ${experienceLevel} level user.`;
}

/**
 * Produces tutoring responses, explanations and exam questions pitched at the
 * learner's tracked experience, preferences and progress.
 */
export class AdaptiveAgentService extends BaseService<AdaptiveAgentServiceDeps> {
  constructor(deps: AdaptiveAgentServiceDeps) {
    super('AdaptiveAgentService', deps);
  }

  /**
   * Answers a learner's message. When `searchResults` is omitted the agent
   * retrieves content itself, scoped by the session's current topic.
   */
  async generateResponse(
    sessionId: string,
    userMessage: string,
    searchResults?: EnhancedSearchResult[]
  ): Promise<AgentResponse> {
    return this.execute('generateResponse', async () => {
      const view = await this.requireContext(sessionId);
      const userId = view.sessionInfo.userId;
      const adaptation = determineContentAdaptation(view);
      const results = searchResults ?? await this.searchRelevantContent(userMessage, view);

      const content = await this.complete(
        buildSystemPrompt(view, adaptation),
        buildUserPrompt(userMessage, results, view.conversationContext),
        { userId, sessionId, taskType: 'tutor_response' },
        generationOptions(adaptation)
      );

      const topicsAddressed = extractTopics(content);
      const visualContent = adaptation.useVisualAids || adaptation.includeDiagrams
        ? await this.generateDiagram(userMessage, content, adaptation, { userId, sessionId, taskType: 'diagram' })
        : null;
      const suggestedNextQuestions = adaptation.askFollowUpQuestions
        ? await this.suggestFollowUps(userMessage, topicsAddressed, view.conversationContext, { userId, sessionId, taskType: 'follow_up_questions' })
        : [];

      return {
        responseId: uuidv4(),
        userId,
        sessionId,
        timestamp: new Date().toISOString(),
        content,
        visualContent,
        topicsAddressed,
        conceptsExplained: extractConcepts(content),
        difficultyLevel: adaptation.difficultyLevel,
        responseStyle: determineResponseStyle(adaptation),
        adaptation,
        userContextUsed: {
          experienceLevel: view.userProfile.experienceLevel,
          targetCertification: view.userProfile.targetCertification,
          learningStyle: view.learningPreferences.learningStyle,
          currentTopic: view.conversationContext.currentTopic,
          conversationMode: view.sessionInfo.conversationMode,
        },
        suggestedNextQuestions,
        references: toReferences(results),
      };
    }, { sessionId });
  }

  /**
   * Generates a multiple-choice question. The topic defaults to the learner's
   * first improvement area and the difficulty follows overall completion.
   */
  async generateExamQuestion(sessionId: string, options: ExamQuestionOptions = {}): Promise<ExamQuestion> {
    return this.execute('generateExamQuestion', async () => {
      const view = await this.requireContext(sessionId);
      const userId = view.sessionInfo.userId;
      const analytics = await this.deps.progressTracker.generateProgressAnalytics(userId);
      if (!analytics) {
        throw new NotFoundError('User', userId);
      }

      const topicId = options.topicId ?? analytics.improvementFocus[0] ?? DEFAULT_EXAM_TOPIC;
      const difficulty = options.difficulty ?? difficultyForCompletion(analytics.overallCompletion);

      const results = await this.deps.search.searchWithContext(`TOGAF ${topicId} concepts and principles`, {
        userLevel: view.userProfile.experienceLevel,
        certificationGoal: view.userProfile.targetCertification ?? 'foundation',
        nResults: EXAM_SEARCH_RESULTS,
      });

      const raw = await this.complete(
        'You are an expert TOGAF exam question generator.',
        examQuestionPrompt(topicId, difficulty, results),
        { userId, sessionId, taskType: 'exam_question' },
        { temperature: 0.7, maxTokens: 800, outputFormat: 'json_object' }
      );

      const payload = parseLLMResponse(raw, ExamQuestionPayloadSchema, 'exam question');
      if (!payload) {
        this.logWarn(`Unparseable exam question for topic ${topicId}`);
        return {
          topicId,
          difficulty,
          question: 'Failed to generate question',
          options: { A: 'Error', B: 'Error', C: 'Error', D: 'Error' },
          correctAnswer: 'A',
          explanation: 'Question generation failed',
          generated: false,
        };
      }

      return {
        topicId,
        difficulty,
        question: payload.question,
        options: payload.options,
        correctAnswer: payload.correct_answer,
        explanation: payload.explanation,
        generated: true,
      };
    }, { sessionId, topicId: options.topicId });
  }

  async provideExplanation(sessionId: string, concept: string, detail: ExplanationDetail = 'adaptive'): Promise<AgentResponse> {
    return this.execute('provideExplanation', async () => {
      const view = await this.requireContext(sessionId);
      const userId = view.sessionInfo.userId;
      const { experienceLevel, targetCertification, examPreparationMode } = view.userProfile;
      const preferences = view.learningPreferences;
      const depth = explanationDepthFor(detail, experienceLevel, preferences.explanationDepth);

      const results = await this.deps.search.searchWithContext(`TOGAF ${concept} definition explanation examples`, {
        userLevel: experienceLevel,
        certificationGoal: targetCertification ?? 'foundation',
        nResults: RESPONSE_SEARCH_RESULTS,
      });

      const adaptation: ContentAdaptation = {
        difficultyLevel: experienceLevel === 'beginner' ? 'basic' : 'intermediate',
        explanationDepth: depth,
        technicalDetail: technicalDetailFor(experienceLevel, depth),
        useExamples: true,
        useAnalogies: experienceLevel === 'beginner' || experienceLevel === 'intermediate',
        useVisualAids: false,
        includeDiagrams: preferences.learningStyle === 'visual',
        askFollowUpQuestions: preferences.interactiveMode,
        providePracticeOpportunities: examPreparationMode,
        referenceUserExperience: experienceLevel === 'advanced' || experienceLevel === 'expert',
      };

      const content = await this.complete(
        explanationSystemPrompt(adaptation, experienceLevel),
        `Explain the TOGAF concept '${concept}' using this context:\n\n${formatSearchResults(results)}`,
        { userId, sessionId, taskType: 'explanation' },
        generationOptions(adaptation)
      );

      return {
        responseId: uuidv4(),
        userId,
        sessionId,
        timestamp: new Date().toISOString(),
        content,
        visualContent: null,
        topicsAddressed: [concept],
        conceptsExplained: [concept],
        difficultyLevel: adaptation.difficultyLevel,
        responseStyle: 'instructional',
        adaptation,
        userContextUsed: { conceptRequested: concept, detailLevel: depth },
        suggestedNextQuestions: [],
        references: toReferences(results),
      };
    }, { sessionId, concept });
  }

  private async requireContext(sessionId: string): Promise<SessionContextView> {
    const view = await this.deps.sessionManager.getSessionContext(sessionId);
    if (!view) {
      throw new NotFoundError('Session', sessionId);
    }
    return view;
  }

  private async searchRelevantContent(query: string, view: SessionContextView): Promise<EnhancedSearchResult[]> {
    const topic = view.conversationContext.currentTopic;
    return this.deps.search.searchWithContext(topic ? `${topic} ${query}` : query, {
      userLevel: view.userProfile.experienceLevel,
      certificationGoal: view.userProfile.targetCertification ?? 'foundation',
      nResults: RESPONSE_SEARCH_RESULTS,
    });
  }

  private async complete(
    systemPrompt: string,
    userPrompt: string,
    context: ILLMContext,
    options: ILLMCompletionOptions
  ): Promise<string> {
    const { chat } = this.deps;
    try {
      const text = await chat.chat([new SystemMessage(systemPrompt), new HumanMessage(userPrompt)], context, options);
      return text.trim();
    } catch (error) {
      throw new ExternalServiceError(chat.providerName, error instanceof Error ? error.message : String(error), { taskType: context.taskType });
    }
  }

  private async generateDiagram(
    query: string,
    content: string,
    adaptation: ContentAdaptation,
    context: ILLMContext
  ): Promise<string | null> {
    if (!wantsDiagram(query, content, adaptation)) {
      return null;
    }

    const prompt = `Create a mermaid diagram to visualize the following TOGAF content:

Query: ${query}
Content: ${content.slice(0, DIAGRAM_CONTENT_LENGTH)}...

Return only the mermaid diagram code, starting with \`\`\`mermaid and ending with \`\`\`.`;

    try {
      const diagram = await this.complete(
        'You are an expert at creating clear, informative mermaid diagrams for TOGAF concepts.',
        prompt,
        context,
        { temperature: 0.3, maxTokens: 400 }
      );
      return diagram.includes('```mermaid') ? diagram : null;
    } catch (error) {
      this.logWarn('Diagram generation failed', error);
      return null;
    }
  }

  private async suggestFollowUps(
    query: string,
    topics: readonly string[],
    conversation: ConversationContext,
    context: ILLMContext
  ): Promise<string[]> {
    const prompt = `Based on this TOGAF learning interaction, suggest 2-3 relevant follow-up questions:

Original Question: ${query}
Response Topics: ${topics.join(', ')}
User Context: ${conversation.currentTopic ?? 'general TOGAF learning'}

Provide questions that would naturally extend the learning or clarify understanding.`;

    try {
      const text = await this.complete(
        'Generate helpful follow-up questions for TOGAF learning.',
        prompt,
        context,
        { temperature: 0.7, maxTokens: 200 }
      );
      return parseFollowUpQuestions(text);
    } catch (error) {
      this.logWarn('Follow-up generation failed, using defaults', error);
      return defaultFollowUpQuestions(topics);
    }
  }
}
