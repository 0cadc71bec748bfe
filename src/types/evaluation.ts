import { z } from 'zod';

/**
 * Schemas for the structured payloads the inference service returns.
 *
 * Each prompt template validates its response against one of these before
 * anything reaches a candidate record.
 */

export const experienceEntrySchema = z.object({
    company: z.string(),
    position: z.string(),
    duration: z.string().default(''),
    description: z.string().default('')
});

// Stage: profile parsing
export const candidateProfileSchema = z.object({
    name: z.string().trim().min(1, 'Candidate name is required'),
    email: z.string().default(''),
    phone: z.string().default(''),
    skills: z.array(z.string()).default([]),
    education: z.array(z.string()).default([]),
    experience: z.array(experienceEntrySchema).default([]),
    summary: z.string().default('')
});

export const RECOMMENDATIONS = ['hire', 'maybe', 'pass'] as const;

// Stage: scoring. Out-of-range scores are rejected, never clamped.
export const scoreResultSchema = z.object({
    score: z.number().min(0, 'Score must be between 0 and 100').max(100, 'Score must be between 0 and 100'),
    recommendation: z.enum(RECOMMENDATIONS),
    reasoning: z.string().default(''),
    strengths: z.array(z.string()).default([]),
    concerns: z.array(z.string()).default([])
});

export const QUESTION_LEVELS = ['Easy', 'Medium', 'Hard'] as const;
export const QUESTIONS_PER_LEVEL = 2;

export const interviewQuestionSchema = z
    .object({
        level: z.enum(QUESTION_LEVELS),
        question: z.string().trim().min(1),
        type: z.enum(['technical', 'behavioral'])
    })
    .transform(raw => ({ level: raw.level, text: raw.question, type: raw.type }));

// Stage: question generation. Exactly two questions per level.
export const questionSetSchema = z
    .object({
        questions: z.array(interviewQuestionSchema).length(QUESTION_LEVELS.length * QUESTIONS_PER_LEVEL)
    })
    .superRefine((value, ctx) => {
        for (const level of QUESTION_LEVELS) {
            const count = value.questions.filter(question => question.level === level).length;
            if (count !== QUESTIONS_PER_LEVEL) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['questions'],
                    message: `Expected ${QUESTIONS_PER_LEVEL} ${level} questions, received ${count}`
                });
            }
        }
    })
    .transform(value => value.questions);

export type ExperienceEntry = z.infer<typeof experienceEntrySchema>;
export type CandidateProfile = z.infer<typeof candidateProfileSchema>;
export type Recommendation = (typeof RECOMMENDATIONS)[number];
export type ScoreResult = z.infer<typeof scoreResultSchema>;
export type QuestionLevel = (typeof QUESTION_LEVELS)[number];
export type InterviewQuestion = z.infer<typeof interviewQuestionSchema>;
