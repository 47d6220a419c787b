/**
 * Run configuration: carried beside the state, never inside it.
 */

import { z } from 'zod';
import { InvalidConfigError } from '../lib/errors';

export const runConfigSchema = z.object({
    /** Isolation unit for checkpoints; required for persistence and resume */
    threadId: z.string().min(1, 'threadId must not be empty').optional(),
    /** Resume from (fork) this historical checkpoint instead of the latest */
    checkpointId: z.string().min(1).optional(),
    /** Caller metadata copied onto every checkpoint written by the run */
    metadata: z.record(z.unknown()).optional(),
    signal: z.instanceof(AbortSignal).optional(),
}).strict();

export type RunConfig = z.infer<typeof runConfigSchema>;

/**
 * Validate a caller-supplied config.
 * @throws InvalidConfigError
 */
export function parseRunConfig(config: unknown = {}): RunConfig {
    const result = runConfigSchema.safeParse(config ?? {});
    if (!result.success) {
        throw new InvalidConfigError(
            result.error.issues.map(issue => ({ path: issue.path, message: issue.message })),
        );
    }
    if (result.data.checkpointId !== undefined && result.data.threadId === undefined) {
        throw new InvalidConfigError([{ path: ['checkpointId'], message: 'checkpointId requires a threadId' }]);
    }
    return result.data;
}

// ============================================================================
// Stream modes
// ============================================================================

export const streamModeSchema = z.enum(['values', 'updates', 'messages', 'debug']);

/**
 * What a stream event carries: the full state, the node's update, the
 * messages the node added, or a debug record with timing.
 */
export type StreamMode = z.infer<typeof streamModeSchema>;

const streamModesSchema = z.union([
    streamModeSchema,
    z.array(streamModeSchema).min(1, 'at least one stream mode is required'),
]);

/**
 * Normalize the `mode` option of `stream()` into a de-duplicated list.
 * @throws InvalidConfigError
 */
export function parseStreamModes(mode: unknown = 'values'): StreamMode[] {
    const result = streamModesSchema.safeParse(mode);
    if (!result.success) {
        throw new InvalidConfigError(
            result.error.issues.map(issue => ({ path: ['mode', ...issue.path], message: issue.message })),
        );
    }
    return Array.from(new Set(typeof result.data === 'string' ? [result.data] : result.data));
}
