/**
 * Query Processor Service
 *
 * Validates what comes in over the API before it reaches the engine.
 * Every request shape has a zod schema; parseRequest turns a failed parse
 * into a RequestValidationError listing each offending field.
 *
 * Key responsibilities:
 * - Reject empty or whitespace-only questions before any embedding call
 * - Bound k, context budget and history limit to sane ranges
 * - Check the optional declared format of an upload
 * - Check the URL and question list of a batch request
 */

import { z } from 'zod';
import { RequestValidationError } from '../errors';
import { DocumentFormat } from '../../shared/types';

/**
 * Result of validating a question.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

export const MAX_QUESTION_LENGTH = 4000;
export const MAX_K = 50;
export const MAX_CONTEXT_BUDGET = 100000;
export const MAX_BATCH_QUESTIONS = 50;

/**
 * Validates a user question before processing.
 *
 * Prevents unnecessary calls to the embedding model for questions that
 * can't be answered.
 */
export function validateQuery(query: string | null | undefined): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: 'Question is required',
        };
    }

    // trim() handles spaces, tabs, newlines and other whitespace chars
    if (query.trim().length === 0) {
        return {
            valid: false,
            error: 'Question cannot be empty or contain only whitespace',
        };
    }

    if (query.length > MAX_QUESTION_LENGTH) {
        return {
            valid: false,
            error: `Question is longer than ${MAX_QUESTION_LENGTH} characters`,
        };
    }

    return {
        valid: true,
    };
}

const questionSchema = z.string().superRefine((value, ctx) => {
    const result = validateQuery(value);
    if (!result.valid) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error ?? 'Invalid question' });
    }
});

/**
 * Body of POST /api/query
 */
export const queryRequestSchema = z.object({
    question: questionSchema,
    k: z.number().int().min(1).max(MAX_K).optional(),
    contextBudget: z.number().int().min(1).max(MAX_CONTEXT_BUDGET).optional(),
    sessionId: z.string().min(1).max(128).optional(),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

/**
 * Body of POST /api/url-query
 */
export const urlQueryRequestSchema = z.object({
    url: z
        .string()
        .url()
        .refine((value) => /^https?:\/\//i.test(value), { message: 'Only http and https URLs are supported' }),
    questions: z.array(questionSchema).min(1).max(MAX_BATCH_QUESTIONS),
});

export type UrlQueryRequest = z.infer<typeof urlQueryRequestSchema>;

const formatSchema: z.ZodType<DocumentFormat> = z.enum(['text', 'markdown', 'pdf', 'docx']);

/**
 * Multipart fields sent along with an upload.
 */
export const uploadFieldsSchema = z.object({
    format: formatSchema.optional(),
});

export type UploadFields = z.infer<typeof uploadFieldsSchema>;

/**
 * Query string of GET /api/sessions/:id/history
 */
export const historyQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export type HistoryQuery = z.infer<typeof historyQuerySchema>;

/**
 * Parses input against a schema.
 *
 * @throws RequestValidationError with one entry per problem
 */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => ({
            field: issue.path.join('.') || '(root)',
            message: issue.message,
        }));
        const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
        throw new RequestValidationError(`Invalid request: ${summary}`, { issues });
    }
    return result.data;
}
