/**
 * File system error checks
 *
 * Errors raised by fs can come from another realm (Jest sandboxes do
 * this), so they are recognised by their `code`, not by `instanceof`.
 */

export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function isMissingFileError(error: unknown): boolean {
    return errorCode(error) === 'ENOENT';
}
