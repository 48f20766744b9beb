/**
 * A single unusable table row. Logged and skipped, never thrown out of a parse.
 */
export class RowParseError extends Error {
    readonly line: string;

    constructor(message: string, line: string) {
        super(message);
        this.name = 'RowParseError';
        this.line = line;
    }
}
