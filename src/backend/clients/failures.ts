import { UpstreamError } from '../errors';
import { isTransientOllamaError } from './ollamaClient';

/**
 * Retry predicate for calls to any provider. Providers that raise
 * UpstreamError say themselves whether a failure is transient.
 */
export function isTransientProviderError(error: unknown): boolean {
    if (error instanceof UpstreamError) {
        return error.transient;
    }
    return isTransientOllamaError(error);
}
