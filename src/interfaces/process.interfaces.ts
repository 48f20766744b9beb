export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/**
 * A child process whose standard output is consumed line by line.
 */
export interface LaunchedProcess {
    readonly stdoutLines: AsyncIterable<string>;
    /** Resolves once the process has exited and its streams are closed. */
    readonly exited: Promise<number>;
    stderrText(): string;
    kill(): void;
}

export interface ProcessLauncher {
    /** Runs a command to completion and buffers its output. Rejects only when it cannot be started. */
    run(command: string, args: string[]): Promise<CommandResult>;
    /** Resolves once the process has spawned; rejects when it cannot be started. */
    launch(command: string, args: string[]): Promise<LaunchedProcess>;
}
