/**
 * Raised when a generation request is missing something it needs.
 * Always thrown before any network activity.
 */
export class PreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionError';
    }
}
