/**
 * Worker Isolator — runs source cells in a worker_thread with hard-kill interruption.
 *
 * The source is evaluated as the body of an async function inside the worker;
 * its return value comes back as a util.inspect() string. On interrupt (abort
 * signal) or hard timeout the worker is terminated, which also stops
 * synchronous loops a cooperative interrupt could never reach. A worker that
 * has reported is terminated too, before the promise settles, so timers the
 * cell left behind never outlive its execution.
 */

import { Worker } from 'worker_threads';
import { createLogger, Logger } from './logger';
import { SourceRunner } from './kernel';
import { describeError, ExecutionInterrupted } from './structured_error';

const WORKER_CODE = `
    const { parentPort, workerData } = require("worker_threads");
    const util = require("util");
    const AsyncFunction = Object.getPrototypeOf(async function () {}).constructor;

    async function run() {
        try {
            const body = new AsyncFunction("require", workerData.source);
            const value = await body(require);
            parentPort.postMessage({
                type: "result",
                value: value === undefined ? null : util.inspect(value, { depth: 4 }),
            });
        } catch (err) {
            parentPort.postMessage({
                type: "error",
                name: err && err.name ? String(err.name) : "Error",
                message: String(err && err.message ? err.message : err),
            });
        }
    }

    run();
`;

type WorkerMessage =
    | { type: 'result'; value: string | null }
    | { type: 'error'; name: string; message: string };

function isWorkerMessage(msg: unknown): msg is WorkerMessage {
    if (typeof msg !== 'object' || msg === null || !('type' in msg)) return false;
    return msg.type === 'result' || msg.type === 'error';
}

export interface WorkerSourceRunnerOptions {
    /** Hard wall-clock limit per cell; 0 or undefined disables it. */
    timeoutMs?: number;
    logger?: Logger;
}

export class WorkerSourceRunner implements SourceRunner {
    private readonly timeoutMs: number;
    private readonly log: Logger;

    constructor(options: WorkerSourceRunnerOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 0;
        this.log = options.logger ?? createLogger('worker-isolator');
    }

    /** Resolves with the inspected return value (undefined when nothing was returned). */
    run(source: string, signal: AbortSignal): Promise<string | undefined> {
        if (signal.aborted) {
            return Promise.reject(signal.reason ?? new ExecutionInterrupted());
        }

        return new Promise<string | undefined>((resolve, reject) => {
            const worker = new Worker(WORKER_CODE, { eval: true, workerData: { source } });
            let settled = false;
            let timer: NodeJS.Timeout | null = null;

            const finish = (): boolean => {
                if (settled) return false;
                settled = true;
                if (timer) clearTimeout(timer);
                signal.removeEventListener('abort', onAbort);
                return true;
            };

            // Cell code may leave timers behind; settle only once the worker is gone
            const release = (settle: () => void): void => {
                worker.terminate().then(
                    () => settle(),
                    (err: unknown) => {
                        this.log.error('Worker terminate failed', { error: describeError(err) });
                        settle();
                    }
                );
            };

            const kill = (reason: unknown, why: string): void => {
                if (!finish()) return;
                this.log.warn(`Terminating worker: ${why}`, { thread_id: worker.threadId });
                release(() => reject(reason));
            };

            const onAbort = () => kill(signal.reason ?? new ExecutionInterrupted(), 'interrupted');
            signal.addEventListener('abort', onAbort, { once: true });

            if (this.timeoutMs > 0) {
                const limit = this.timeoutMs;
                timer = setTimeout(
                    () => kill(new ExecutionInterrupted(`Worker timed out after ${limit}ms`), `timeout after ${limit}ms`),
                    limit
                );
            }

            worker.on('message', (msg: unknown) => {
                if (!isWorkerMessage(msg) || !finish()) return;
                if (msg.type === 'result') {
                    const value = msg.value ?? undefined;
                    release(() => resolve(value));
                } else {
                    const err = new Error(msg.message);
                    err.name = msg.name;
                    release(() => reject(err));
                }
            });

            worker.on('error', (err: Error) => {
                if (!finish()) return;
                const crashed = new Error(`WORKER_CRASHED: ${err.message}`);
                release(() => reject(crashed));
            });

            worker.on('exit', (code: number) => {
                if (!finish()) return;
                if (code !== 0) {
                    reject(new Error(`WORKER_CRASHED: Worker exited with code ${code}`));
                } else {
                    resolve(undefined);
                }
            });
        });
    }
}
