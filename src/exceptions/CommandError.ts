export class CommandError extends Error {
    readonly command: string;
    readonly exitCode: number | null;
    readonly stderr: string;

    constructor(message: string, command: string, exitCode: number | null, stderr: string) {
        super(message);
        this.name = 'CommandError';
        this.command = command;
        this.exitCode = exitCode;
        this.stderr = stderr;
    }

    /**
     * Captured diagnostic text, falling back to the exit code when winget wrote nothing to stderr
     */
    getDiagnostic(): string {
        const stderr = this.stderr.trim();
        if (stderr) return stderr;
        return this.exitCode === null ? this.message : `Process exited with code ${this.exitCode}`;
    }
}
