import {
    CommandResult,
    DiagnosticEvent,
    DiagnosticSink,
    ExplicitUpdate,
    LaunchedProcess,
    PackageUpdate,
    ProcessLauncher,
    RegularUpdate,
    UnknownVersionUpdate,
} from '../../src/interfaces/index.js';

export class RecordingSink implements DiagnosticSink {
    events: DiagnosticEvent[] = [];

    record(event: DiagnosticEvent): void {
        this.events.push(event);
    }

    messages(level: DiagnosticEvent['level']): string[] {
        return this.events.filter((event) => event.level === level).map((event) => event.message);
    }
}

export interface ScriptedProcess {
    stdout?: string[];
    stderr?: string;
    exitCode?: number;
    launchError?: Error;
    /** Rejects `exited` instead of reporting an exit code */
    exitError?: Error;
    /** Keep stdout open after the scripted lines until killed */
    hang?: boolean;
}

class FakeProcess implements LaunchedProcess {
    readonly stdoutLines: AsyncIterable<string>;
    killed = false;
    private release: () => void = () => undefined;
    private readonly released: Promise<void>;

    constructor(private script: ScriptedProcess) {
        this.released = new Promise((resolve) => {
            this.release = resolve;
        });
        this.stdoutLines = this.lines();
    }

    private async *lines(): AsyncGenerator<string> {
        for (const line of this.script.stdout ?? []) {
            if (this.killed) return;
            yield line;
        }
        if (this.script.hang && !this.killed) {
            await this.released;
        }
    }

    get exited(): Promise<number> {
        if (this.script.exitError) return Promise.reject(this.script.exitError);
        return Promise.resolve(this.killed ? 1 : this.script.exitCode ?? 0);
    }

    stderrText(): string {
        return this.script.stderr ?? '';
    }

    kill(): void {
        this.killed = true;
        this.release();
    }
}

/**
 * In-process stand-in for child_process: scripted results, recorded calls
 */
export class FakeLauncher implements ProcessLauncher {
    runs: Array<{ command: string; args: string[] }> = [];
    launches: Array<{ command: string; args: string[] }> = [];
    processes: FakeProcess[] = [];

    constructor(
        private scripts: ScriptedProcess[] = [],
        private runResults: Array<CommandResult | Error> = []
    ) {}

    async run(command: string, args: string[]): Promise<CommandResult> {
        this.runs.push({ command, args });
        const next = this.runResults.shift();
        if (next === undefined) {
            throw new Error(`Unexpected run: ${command} ${args.join(' ')}`);
        }
        if (next instanceof Error) throw next;
        return next;
    }

    async launch(command: string, args: string[]): Promise<LaunchedProcess> {
        this.launches.push({ command, args });
        const script = this.scripts.shift() ?? { exitCode: 0 };
        if (script.launchError) throw script.launchError;

        const child = new FakeProcess(script);
        this.processes.push(child);
        return child;
    }
}

export function ok(stdout: string, stderr = ''): CommandResult {
    return { exitCode: 0, stdout, stderr };
}

/**
 * Lay out cells the way winget pads its columns
 */
export function tableLine(widths: readonly number[], cells: readonly string[]): string {
    return cells.map((cell, i) => (i < cells.length - 1 ? cell.padEnd(widths[i]) : cell)).join('');
}

type UpdateFields = { name: string; id: string; version: string; availableVersion: string; source?: string };

export function regularUpdate(fields: UpdateFields): RegularUpdate {
    return { source: 'winget', ...fields, category: 'regular', isUnknownVersion: false, requiresExplicitUpgrade: false };
}

export function explicitUpdate(fields: UpdateFields): ExplicitUpdate {
    return { source: 'winget', ...fields, category: 'explicit', isUnknownVersion: false, requiresExplicitUpgrade: true };
}

export function unknownUpdate(fields: UpdateFields): UnknownVersionUpdate {
    return { source: '', ...fields, category: 'unknown', isUnknownVersion: true, requiresExplicitUpgrade: false };
}

export function ids(updates: readonly PackageUpdate[]): string[] {
    return updates.map((update) => update.id);
}
