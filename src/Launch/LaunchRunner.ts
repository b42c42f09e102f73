/**
 * Starts the game for a LaunchCommand and reports how it ended.
 * Output is collected for the caller and never interpreted here.
 */
import { spawn, type SpawnOptions } from 'child_process';
import type { EventEmitter } from 'events';
import { constants, setPriority } from 'os';
import type { Readable } from 'stream';
import type { LaunchCommand, LaunchResult, PriorityClass } from '../Domain/Launch.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { ConfigError, ErrorMessage } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';

/** The parts of a child process the runner uses. */
export interface SpawnedProcess extends EventEmitter {
    readonly pid?: number;
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
}

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;

export type PriorityFunction = (pid: number, priority: number) => void;

export interface LaunchRunnerOptions {
    spawn?: SpawnFunction;
    setPriority?: PriorityFunction;
    eventBus?: MainEventBus;
}

/** A started game. */
export interface RunningGame {
    pid?: number;
    /** Settles when the process exits; rejects with ConfigError when it never started. */
    exited: Promise<LaunchResult>;
}

/** OS priority value for a class; null leaves the default. */
export function OsPriority(priority: PriorityClass): number | null {
    switch (priority) {
        case `realtime`:
            return constants.priority.PRIORITY_HIGHEST;
        case `high`:
            return constants.priority.PRIORITY_HIGH;
        default:
            return null;
    }
}

export class LaunchRunner {
    private _spawn: SpawnFunction;
    private _setPriority: PriorityFunction;
    private _eventBus: MainEventBus;

    constructor(options: LaunchRunnerOptions = {}) {
        this._spawn = options.spawn ?? spawn;
        this._setPriority = options.setPriority ?? setPriority;
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
    }

    /**
     * Spawns the game detached from the launcher.
     * A priority the OS refuses (realtime usually needs elevation) is logged and the game keeps running.
     * @throws ConfigError when the process cannot be spawned
     * @example
     * const game = runner.Start(command);
     * const { exitCode } = await game.exited;
     */
    public Start(command: LaunchCommand): RunningGame {
        let child: SpawnedProcess;
        try {
            child = this._spawn(command.executable, command.args, {
                cwd: command.workingDirectory,
                detached: true,
                stdio: [`ignore`, `pipe`, `pipe`],
            });
        } catch (err) {
            throw new ConfigError(`Cannot start ${command.executable}: ${ErrorMessage(err)}`, { path: command.executable }, err);
        }

        const osPriority = OsPriority(command.priority);
        if (child.pid !== undefined && osPriority !== null) {
            try {
                this._setPriority(child.pid, osPriority);
            } catch (err) {
                log.warning(`Cannot set ${command.priority} priority: ${ErrorMessage(err)}`, `LaunchRunner`);
            }
        }

        let stdout = ``;
        let stderr = ``;
        child.stdout?.on(`data`, (chunk: Buffer | string) => {
            stdout += chunk.toString();
        });
        child.stderr?.on(`data`, (chunk: Buffer | string) => {
            stderr += chunk.toString();
        });

        const exited = new Promise<LaunchResult>((resolve, reject) => {
            child.once(`error`, (err: Error) => {
                reject(new ConfigError(`Cannot start ${command.executable}: ${err.message}`, { path: command.executable }, err));
            });
            child.once(`close`, (code: number | null) => {
                const result: LaunchResult = { pid: child.pid, exitCode: code, stdout, stderr };
                log.info(`Game exited with code ${code === null ? `none` : code}`, `LaunchRunner`);
                this._eventBus.Emit(EVENT_NAMES.launchExited, result);
                resolve(result);
            });
        });

        // Callers that only need the pid may never await `exited`.
        void exited.catch((err: unknown) => {
            log.error(ErrorMessage(err), `LaunchRunner`);
        });

        log.info(`Game started${child.pid === undefined ? `` : ` (pid ${child.pid})`}`, `LaunchRunner`);
        this._eventBus.Emit(EVENT_NAMES.launchStarted, { pid: child.pid, command });
        return { pid: child.pid, exited };
    }

    /** Starts the game and waits for it to exit. */
    public async Run(command: LaunchCommand): Promise<LaunchResult> {
        return this.Start(command).exited;
    }
}
