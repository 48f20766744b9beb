import { CriticalBatchError } from '../exceptions/CriticalBatchError.js';
import { InstallFailure } from '../exceptions/InstallFailure.js';
import {
    DiagnosticSink,
    InstallCommand,
    InstallEvent,
    InstallFailureEntry,
    InstallOptions,
    InstallRun,
    InstallStatus,
    InstallSummary,
    LaunchedProcess,
    PackageUpdate,
    ProcessLauncher,
} from '../interfaces/index.js';
import { getLogger } from '../utils/logger.utils.js';
import { classifyOutputLine } from '../utils/progress.utils.js';
import {
    createInstallFailedMessage,
    createInstallStartedMessage,
    createInstallSucceededMessage,
    createSummaryMessage,
} from '../utils/template-generator.utils.js';
import { cleanText } from '../utils/text.utils.js';
import { SpawnProcessLauncher } from './process-launcher.service.js';

export interface InstallCommandOptions {
    silent?: boolean;
    executable?: string;
}

/**
 * `upgrade --id <id> --version <available>` when the available version is
 * known (regular and explicit updates), `upgrade --id <id>` otherwise
 */
export function buildInstallCommand(update: PackageUpdate, options: InstallCommandOptions = {}): InstallCommand {
    if (!update.id) {
        throw new Error(`Package ${update.name} has no identifier`);
    }

    const args = ['upgrade', '--id', update.id];
    if (!update.isUnknownVersion) {
        if (!update.availableVersion) {
            throw new Error(`Package ${update.id} has no available version`);
        }
        args.push('--version', update.availableVersion);
    }
    if (options.silent) {
        args.push('--silent');
    }

    return { command: options.executable ?? 'winget', args };
}

type PackageOutcome = { kind: 'succeeded' } | { kind: 'failed'; failure: InstallFailureEntry } | { kind: 'cancelled' };

interface BatchState {
    total: number;
    attempted: number;
    succeeded: number;
    failures: InstallFailureEntry[];
}

export interface UpdateOrchestratorOptions {
    launcher?: ProcessLauncher;
    sink?: DiagnosticSink;
    executable?: string;
}

/**
 * Installs selected updates one after another. Only one winget child process
 * is alive at a time.
 */
export class UpdateOrchestrator {
    private readonly launcher: ProcessLauncher;
    private readonly sink: DiagnosticSink;
    private readonly executable: string;

    constructor(options: UpdateOrchestratorOptions = {}) {
        this.launcher = options.launcher ?? new SpawnProcessLauncher();
        this.sink = options.sink ?? getLogger().child('orchestrator');
        this.executable = options.executable ?? 'winget';
    }

    /**
     * Lazily install `selection` in order, yielding progress events. The
     * generator's return value is the summary, which is also yielded as the
     * last event unless nothing was selected.
     */
    async *install(selection: readonly PackageUpdate[], options: InstallOptions = {}): InstallRun {
        const state: BatchState = { total: selection.length, attempted: 0, succeeded: 0, failures: [] };

        if (selection.length === 0) {
            this.sink.record({ level: 'info', message: 'No packages selected for installation' });
            return this.summarize('nothing-selected', state);
        }

        this.sink.record({ level: 'info', message: 'Starting update batch', metadata: { total: state.total, silent: !!options.silent } });

        try {
            for (const [i, update] of selection.entries()) {
                if (options.signal?.aborted) {
                    return yield* this.finishCancelled(state);
                }

                state.attempted++;
                const outcome = yield* this.installOne(update, i + 1, state.total, options);

                if (outcome.kind === 'succeeded') {
                    state.succeeded++;
                } else if (outcome.kind === 'failed') {
                    state.failures.push(outcome.failure);
                } else {
                    return yield* this.finishCancelled(state);
                }
            }
        } catch (error) {
            const critical = new CriticalBatchError('Update batch halted', error);
            const detail = describeError(error);
            this.sink.record({ level: 'error', message: critical.message, metadata: { error: detail, attempted: state.attempted } });

            yield { type: 'critical', message: `Critical error: ${detail}`, error: detail };
            const summary = this.summarize('aborted', state, detail);
            yield { type: 'summary', message: summary.message, summary };
            return summary;
        }

        const status: InstallStatus = state.succeeded === state.total ? 'all-succeeded' : state.succeeded === 0 ? 'all-failed' : 'partial';
        const summary = this.summarize(status, state);
        this.sink.record({
            level: status === 'all-succeeded' ? 'info' : 'warn',
            message: 'Update batch finished',
            metadata: { status, succeeded: state.succeeded, failed: state.failures.length },
        });

        yield { type: 'summary', message: summary.message, summary };
        return summary;
    }

    private async *installOne(update: PackageUpdate, index: number, total: number, options: InstallOptions): AsyncGenerator<InstallEvent, PackageOutcome, void> {
        let command: InstallCommand;
        try {
            command = buildInstallCommand(update, { silent: options.silent, executable: this.executable });
        } catch (error) {
            return yield* this.fail(update, describeError(error));
        }

        yield { type: 'started', package: update, index, total, command, message: createInstallStartedMessage(update, index, total) };
        this.sink.record({ level: 'info', message: 'Installing update', metadata: { id: update.id, args: command.args } });

        let child: LaunchedProcess;
        try {
            child = await this.launcher.launch(command.command, command.args);
        } catch (error) {
            return yield* this.fail(update, describeError(error));
        }

        const signal = options.signal;
        const onAbort = () => child.kill();
        signal?.addEventListener('abort', onAbort, { once: true });

        let exited = false;
        try {
            let progressShown = false;
            let lastText = '';

            for await (const line of child.stdoutLines) {
                if (signal?.aborted) break;

                const kind = classifyOutputLine(line);
                if (kind === 'empty' || kind === 'noise') continue;

                const text = cleanText(line);
                if (kind === 'progress') {
                    yield { type: 'progress', package: update, line: text, replace: progressShown, message: text };
                    progressShown = true;
                } else {
                    lastText = text;
                    yield { type: 'output', package: update, line: text, message: text };
                }
            }

            if (signal?.aborted) {
                child.kill();
                await child.exited;
                exited = true;
                this.sink.record({ level: 'warn', message: 'Installation cancelled', metadata: { id: update.id } });
                return { kind: 'cancelled' };
            }

            const exitCode = await child.exited;
            exited = true;

            if (exitCode === 0) {
                this.sink.record({ level: 'info', message: 'Update installed', metadata: { id: update.id } });
                yield { type: 'succeeded', package: update, message: createInstallSucceededMessage(update) };
                return { kind: 'succeeded' };
            }

            const stderr = child.stderrText().trim();
            const diagnostic = stderr || (lastText ? `${lastText} (exit code ${exitCode})` : `Process exited with code ${exitCode}`);
            return yield* this.fail(update, diagnostic);
        } finally {
            signal?.removeEventListener('abort', onAbort);
            // The consumer stopped iterating mid-package
            if (!exited) child.kill();
        }
    }

    private async *fail(update: PackageUpdate, diagnostic: string): AsyncGenerator<InstallEvent, PackageOutcome, void> {
        const failure = new InstallFailure(update, diagnostic);
        this.sink.record({ level: 'warn', message: failure.message, metadata: { id: update.id } });

        yield { type: 'failed', package: update, error: diagnostic, message: createInstallFailedMessage(update, diagnostic) };
        return { kind: 'failed', failure: failure.toEntry() };
    }

    private async *finishCancelled(state: BatchState): AsyncGenerator<InstallEvent, InstallSummary, void> {
        const summary = this.summarize('cancelled', state);
        yield { type: 'cancelled', message: summary.message };
        yield { type: 'summary', message: summary.message, summary };
        return summary;
    }

    private summarize(status: InstallStatus, state: BatchState, error?: string): InstallSummary {
        const failures = [...state.failures];
        return {
            status,
            total: state.total,
            attempted: state.attempted,
            succeeded: state.succeeded,
            failures,
            message: createSummaryMessage(status, { ...state, failures, error }),
        };
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Drain a run, keeping every event and the final summary. If `onEvent`
 * throws, the run is closed first so that a running child is killed.
 */
export async function collectInstallRun(
    run: InstallRun,
    onEvent?: (event: InstallEvent, position: number) => Promise<void>
): Promise<{ events: InstallEvent[]; summary: InstallSummary }> {
    const events: InstallEvent[] = [];
    let finished = false;
    try {
        for (;;) {
            const next = await run.next();
            if (next.done) {
                finished = true;
                return { events, summary: next.value };
            }
            events.push(next.value);
            await onEvent?.(next.value, events.length);
        }
    } finally {
        if (!finished) {
            const iterator: AsyncIterator<InstallEvent, InstallSummary, void> = run;
            await iterator.return?.();
        }
    }
}

/**
 * Display lines for a sequence of events. A progress event with `replace`
 * overwrites that package's previous progress line instead of appending.
 */
export function renderTranscript(events: readonly InstallEvent[]): string[] {
    const lines: string[] = [];
    const progressLine = new Map<string, number>();

    for (const event of events) {
        if (event.type === 'progress') {
            const previous = progressLine.get(event.package.id);
            if (event.replace && previous !== undefined) {
                lines[previous] = event.message;
                continue;
            }
            progressLine.set(event.package.id, lines.length);
        }
        lines.push(event.message);
    }

    return lines;
}
