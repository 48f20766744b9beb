import { ChildProcess, spawn } from 'child_process';
import { createInterface } from 'readline';
import { CommandResult, LaunchedProcess, ProcessLauncher } from '../interfaces/index.js';
import { ChildLogger, getLogger } from '../utils/logger.utils.js';

function spawnChild(command: string, args: string[]): ChildProcess {
    return spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
    });
}

/**
 * Resolves with the child once it has spawned, rejects with the spawn error
 */
function whenSpawned(child: ChildProcess): Promise<ChildProcess> {
    return new Promise((resolve, reject) => {
        const onError = (error: Error) => {
            child.off('spawn', onSpawn);
            reject(error);
        };
        const onSpawn = () => {
            child.off('error', onError);
            resolve(child);
        };
        child.once('error', onError);
        child.once('spawn', onSpawn);
    });
}

function whenClosed(child: ChildProcess): Promise<number> {
    return new Promise((resolve, reject) => {
        child.once('error', reject);
        // `close` fires after the stdio streams are drained
        child.once('close', (code, signal) => {
            resolve(code ?? (signal ? 1 : 0));
        });
    });
}

/**
 * Runs the package manager through child_process. winget writes UTF-8 when it
 * is not attached to a console, which is the case here.
 */
export class SpawnProcessLauncher implements ProcessLauncher {
    private logger: ChildLogger;

    constructor(logger?: ChildLogger) {
        this.logger = logger ?? getLogger().child('process');
    }

    async run(command: string, args: string[]): Promise<CommandResult> {
        this.logger.debug('Running command', { command, args });

        const child = await whenSpawned(spawnChild(command, args));
        const closed = whenClosed(child);

        let stdout = '';
        let stderr = '';
        child.stdout?.setEncoding('utf8').on('data', (data: string) => {
            stdout += data;
        });
        child.stderr?.setEncoding('utf8').on('data', (data: string) => {
            stderr += data;
        });

        const exitCode = await closed;
        this.logger.debug('Command completed', { command, exitCode, stdoutLength: stdout.length, stderrLength: stderr.length });
        return { exitCode, stdout, stderr };
    }

    async launch(command: string, args: string[]): Promise<LaunchedProcess> {
        this.logger.debug('Launching command', { command, args });

        const child = await whenSpawned(spawnChild(command, args));
        const exited = whenClosed(child);

        let stderr = '';
        child.stderr?.setEncoding('utf8').on('data', (data: string) => {
            stderr += data;
        });

        const stdout = child.stdout;
        if (!stdout) {
            child.kill();
            throw new Error(`No stdout pipe for ${command}`);
        }

        // readline treats a lone \r as a line break, which splits spinner frames apart
        const lines = createInterface({ input: stdout.setEncoding('utf8'), crlfDelay: Infinity });

        return {
            stdoutLines: lines,
            exited,
            stderrText: () => stderr,
            kill: () => {
                lines.close();
                child.kill();
            },
        };
    }
}
