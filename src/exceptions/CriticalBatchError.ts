/**
 * An error in the install loop itself rather than in one package's command.
 */
export class CriticalBatchError extends Error {
    constructor(message: string, cause: unknown) {
        super(message, { cause });
        this.name = 'CriticalBatchError';
    }
}
