import { PackageUpdate } from './package.interfaces.js';

export interface InstallCommand {
    command: string;
    args: string[];
}

export interface InstallOptions {
    /** Appends `--silent` to every upgrade command. */
    silent?: boolean;
    signal?: AbortSignal;
}

export interface InstallFailureEntry {
    name: string;
    id: string;
    error: string;
}

export type InstallStatus = 'nothing-selected' | 'all-succeeded' | 'partial' | 'all-failed' | 'aborted' | 'cancelled';

export interface InstallSummary {
    status: InstallStatus;
    total: number;
    attempted: number;
    succeeded: number;
    failures: InstallFailureEntry[];
    message: string;
}

interface PackageEvent {
    package: PackageUpdate;
    message: string;
}

export type InstallEvent =
    | (PackageEvent & { type: 'started'; index: number; total: number; command: InstallCommand })
    | (PackageEvent & { type: 'output'; line: string })
    | (PackageEvent & { type: 'progress'; line: string; replace: boolean })
    | (PackageEvent & { type: 'succeeded' })
    | (PackageEvent & { type: 'failed'; error: string })
    | { type: 'cancelled'; message: string }
    | { type: 'critical'; message: string; error: string }
    | { type: 'summary'; message: string; summary: InstallSummary };

export type InstallRun = AsyncGenerator<InstallEvent, InstallSummary, void>;
