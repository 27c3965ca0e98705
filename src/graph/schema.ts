/**
 * Zod schemas for graph options and the JSON checkpoint format.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../lib/logger';
import type { ValidationErrorItem } from '../lib/errors';

export const DEFAULT_MAX_ITERATIONS = 100;

export const StateGraphOptionsSchema = z.object({
    name: z.string().min(1).default('StateGraph'),
    maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
    logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type ResolvedGraphOptions = z.infer<typeof StateGraphOptionsSchema>;

export const InvokeOptionsSchema = z.object({
    maxIterations: z.number().int().positive().optional(),
});

export const JsonCheckpointSchema = z.object({
    state: z.record(z.string(), z.unknown()),
    current_node: z.string().min(1),
    path: z.array(z.string()),
    iteration: z.number().int().nonnegative(),
    timestamp: z.string().datetime({ offset: true, local: true }).optional(),
    metadata: z.record(z.string(), z.unknown()).default({}),
});

export type JsonCheckpoint = z.infer<typeof JsonCheckpointSchema>;

export function toValidationErrors(error: z.ZodError): ValidationErrorItem[] {
    return error.issues.map(issue => ({
        path: issue.path,
        message: issue.message,
    }));
}

export function formatValidationErrors(items: ValidationErrorItem[]): string {
    return items
        .map(item => (item.path.length > 0 ? `${item.path.join('.')}: ${item.message}` : item.message))
        .join('; ');
}
