import { z } from 'zod';

const OptionTextSchema = z.string().min(1);

/**
 * Shape the model is asked to return for a generated exam question.
 */
export const ExamQuestionPayloadSchema = z.object({
  question: z.string().min(1),
  options: z.object({
    A: OptionTextSchema,
    B: OptionTextSchema,
    C: OptionTextSchema,
    D: OptionTextSchema,
  }),
  correct_answer: z.enum(['A', 'B', 'C', 'D']),
  explanation: z.string(),
});

export type ExamQuestionPayload = z.infer<typeof ExamQuestionPayloadSchema>;
