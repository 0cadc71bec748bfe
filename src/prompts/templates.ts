import type { z } from 'zod';
import {
    CandidateProfile,
    InterviewQuestion,
    ScoreResult,
    candidateProfileSchema,
    questionSetSchema,
    scoreResultSchema
} from '../types/evaluation';

/**
 * Prompt templates sent to the inference service.
 *
 * A template binds its named text inputs, the system/user messages built
 * from them, and the schema its JSON response must satisfy.
 */
export interface TemplateContract {
    'profile-extraction': {
        inputs: { candidateText: string };
        output: CandidateProfile;
    };
    'scoring': {
        inputs: { jobDescription: string; candidateProfile: string };
        output: ScoreResult;
    };
    'question-generation': {
        inputs: { jobDescription: string };
        output: InterviewQuestion[];
    };
}

export type PromptTemplateId = keyof TemplateContract;
export type TemplateInputs<K extends PromptTemplateId> = TemplateContract[K]['inputs'];
export type TemplateOutput<K extends PromptTemplateId> = TemplateContract[K]['output'];

export interface PromptTemplate<K extends PromptTemplateId> {
    id: K;
    system: string;
    render(inputs: TemplateInputs<K>): string;
    schema: z.ZodType<TemplateOutput<K>, z.ZodTypeDef, unknown>;
}

const profileExtraction: PromptTemplate<'profile-extraction'> = {
    id: 'profile-extraction',
    system: `You are a resume parser. Extract the candidate's details from the resume text and return only a JSON object with this structure:
{
    "name": string,
    "email": string,
    "phone": string,
    "skills": string[],
    "education": string[],
    "experience": [{ "company": string, "position": string, "duration": string, "description": string }],
    "summary": string
}
Use empty strings or empty arrays for anything the resume does not state.`,
    render: ({ candidateText }) => `Resume to parse:

${candidateText}`,
    schema: candidateProfileSchema
};

const scoring: PromptTemplate<'scoring'> = {
    id: 'scoring',
    system: `You are an experienced technical recruiter. Compare the candidate profile with the job description and return only a JSON object with this structure:
{
    "score": number (0-100),
    "recommendation": "hire" | "maybe" | "pass",
    "reasoning": string,
    "strengths": string[],
    "concerns": string[]
}`,
    render: ({ jobDescription, candidateProfile }) => `Job Description:
${jobDescription}

Candidate Profile:
${candidateProfile}

Score how well this candidate fits the role.`,
    schema: scoreResultSchema
};

const questionGeneration: PromptTemplate<'question-generation'> = {
    id: 'question-generation',
    system: `You are an interviewer preparing for a hiring loop. Write exactly six interview questions for the role: two Easy, two Medium and two Hard. Return only a JSON object with this structure:
{
    "questions": [{ "level": "Easy" | "Medium" | "Hard", "question": string, "type": "technical" | "behavioral" }]
}`,
    render: ({ jobDescription }) => `Job Description:

${jobDescription}`,
    schema: questionSetSchema
};

export const PROMPT_TEMPLATES: { [K in PromptTemplateId]: PromptTemplate<K> } = {
    'profile-extraction': profileExtraction,
    'scoring': scoring,
    'question-generation': questionGeneration
};
