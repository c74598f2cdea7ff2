import { ContinuationFault } from "../Errors";
import { getLogger, type Logger } from "../log/Logger";
import { activeScheduler } from "./ActiveScheduler";
import type { Scheduler } from "./Scheduler";
import type { Awaitable, Coroutine, Resumable } from "./Types";

export type FaultHandler = (fault: ContinuationFault) => void;

/** Default fault action: log and end the process. There is no recovery path. */
export function terminateOnFault(fault: ContinuationFault, log: Logger = getLogger()): never
{
    log.fatal({ err: fault.cause }, fault.message);
    process.exit(1);
}

/**
 * Drives one routine body. Resumption happens synchronously on the caller's
 * stack, so a resume that triggers an event nests the woken continuations inside it.
 */
export class Continuation implements Resumable
{
    private done = false;
    private running = false;
    private destroyRequested = false;

    constructor(
        private readonly body: Coroutine,
        private readonly context: Scheduler | null = null,
    ) {}

    /** Explicit context first, then whatever scheduler is bound right now. */
    public get scheduler(): Scheduler | null
    {
        return this.context ?? activeScheduler();
    }

    public isDone(): boolean
    {
        return this.done;
    }

    public resume(): void
    {
        if (this.done || this.running) return;

        while (true) {
            const step = this.advance();
            if (step === null) return;

            if (step.done) {
                this.done = true;
                return;
            }
            if (this.destroyRequested) {
                this.close();
                return;
            }

            const awaiter = step.value;
            if (awaiter.awaitReady()) continue;
            if (awaiter.awaitSuspend(this, this.scheduler)) continue;
            return;
        }
    }

    /**
     * Ends the routine at its current suspension point, running its `finally` blocks.
     * Queue entries still pointing at it become no-ops.
     */
    public destroy(): void
    {
        if (this.done) return;
        if (this.running) {
            this.destroyRequested = true;
            return;
        }
        this.close();
    }

    /** One `next()` on the body; null when it threw. */
    private advance(): IteratorResult<Awaitable, void> | null
    {
        this.running = true;
        try {
            return this.body.next();
        } catch (err) {
            this.done = true;
            this.fail(err);
            return null;
        } finally {
            this.running = false;
        }
    }

    private close(): void
    {
        this.done = true;
        try {
            this.body.return(undefined);
        } catch (err) {
            this.fail(err);
        }
    }

    private fail(err: unknown): void
    {
        const fault = new ContinuationFault(err);
        const scheduler = this.scheduler;
        if (scheduler) scheduler.reportFault(fault);
        else terminateOnFault(fault);
    }
}

/**
 * Exclusive owner of a continuation. There is no copy: `move()` hands ownership
 * to a new Task and empties this one.
 */
export class Task
{
    private handle: Continuation | null;

    private constructor(handle: Continuation | null)
    {
        this.handle = handle;
    }

    /**
     * Runs `body` up to its first suspension before returning.
     * With a scheduler the routine always suspends on it; without one it follows
     * the active binding at each suspension.
     */
    public static start(body: Coroutine, scheduler?: Scheduler): Task
    {
        const handle = new Continuation(body, scheduler ?? null);
        const task = new Task(handle);
        handle.resume();
        return task;
    }

    public static empty(): Task
    {
        return new Task(null);
    }

    public move(): Task
    {
        const moved = new Task(this.handle);
        this.handle = null;
        return moved;
    }

    /**
     * Gives up ownership without ending the routine. Whoever detaches is
     * responsible for the routine eventually completing.
     */
    public detach(): void
    {
        this.handle = null;
    }

    /** True once the routine completed, or when this Task owns nothing. */
    public isDone(): boolean
    {
        return this.handle === null || this.handle.isDone();
    }

    public resume(): void
    {
        if (this.handle && !this.handle.isDone()) this.handle.resume();
    }

    /** Ends the owned routine if it has not completed, then releases it. */
    public destroy(): void
    {
        const handle = this.handle;
        this.handle = null;
        if (handle && !handle.isDone()) handle.destroy();
    }
}
