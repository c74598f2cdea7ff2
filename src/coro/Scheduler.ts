import { PayloadMismatchError, type ContinuationFault } from "../Errors";
import { getLogger, type Logger } from "../log/Logger";
import { bindScheduler, unbindScheduler } from "./ActiveScheduler";
import { Task, terminateOnFault, type FaultHandler } from "./Task";
import { TimedQueue } from "./TimedQueue";
import {
    eventIdOf,
    type Coroutine,
    type Duration,
    type EventHandler,
    type EventId,
    type EventRef,
    type Resumable,
    type SimTime,
} from "./Types";

export type SchedulerOptions = {
    /** Initial simulated time. Defaults to 0. */
    startTime?: SimTime;
    /** Replaces the default action: log at fatal through `logger`, then exit(1). */
    onFault?: FaultHandler;
    /** Become the active scheduler for contextless suspensions. Defaults to true. */
    bind?: boolean;
    logger?: Logger;
};

export type PendingCounts = {
    ready: number;
    timed: number;
    handlers: number;
};

/**
 * Single-threaded cooperative scheduler over simulated time.
 *
 * Three wake sources: a FIFO ready queue, a timed queue ordered by wake time
 * (insertion order breaks ties) and a registry of one-shot event handlers.
 * Within one stepping call the ready queue always drains before the timed queue
 * is consulted. Time only moves through `setTime`, `advanceTime` and the run loops.
 */
export class Scheduler
{
    private currentTime: SimTime;
    private readonly ready: Resumable[] = [];
    private readonly timed = new TimedQueue<Resumable>();
    // Payload types are erased here; agreement is enforced at the EventKey level.
    private readonly handlers = new Map<EventId, EventHandler<unknown>[]>();
    private readonly onFault: FaultHandler;
    private readonly log: Logger;

    constructor(options: SchedulerOptions = {})
    {
        this.currentTime = options.startTime ?? 0;
        this.log = options.logger ?? getLogger();
        this.onFault = options.onFault ?? ((fault) => terminateOnFault(fault, this.log));
        if (options.bind ?? true) bindScheduler(this);
    }

    /** Releases the active binding if this scheduler still holds it. */
    public dispose(): void
    {
        unbindScheduler(this);
    }

    //#region ---------- Time ----------
    public now(): SimTime
    {
        return this.currentTime;
    }

    /** Not validated: moving time backwards is the caller's problem. */
    public setTime(time: SimTime): void
    {
        this.currentTime = time;
    }

    public advanceTime(delta: Duration): void
    {
        this.currentTime += delta;
    }
    //#endregion

    //#region ---------- Queueing ----------
    /** Starts `body` bound to this scheduler; it runs until its first suspension before this returns. */
    public spawn(body: Coroutine): Task
    {
        return Task.start(body, this);
    }

    public schedule(handle: Resumable): void
    {
        this.ready.push(handle);
    }

    public scheduleAfter(delay: Duration, handle: Resumable): void
    {
        this.timed.push(this.currentTime + delay, handle);
    }

    public registerEventHandler<T>(event: EventRef<T>, handler: EventHandler<T>): void
    {
        const id = eventIdOf(event);
        const list = this.handlers.get(id) ?? [];
        // Handler registry is type-erased, like a component column store.
        list.push(handler as EventHandler<unknown>);
        this.handlers.set(id, list);
    }

    /**
     * Fires `event` once. Every handler registered right now is removed before any
     * of them runs; a handler registering for the same id again only sees the next
     * trigger. With nobody waiting the payload is dropped.
     */
    public triggerEvent<T>(event: EventRef<T>, ...data: [] | [NoInfer<T>]): void
    {
        if (typeof event !== "number" && event.schema && data.length > 0) {
            const parsed = event.schema.safeParse(data[0]);
            if (!parsed.success) throw new PayloadMismatchError(event.name, parsed.error);
        }

        const id = eventIdOf(event);
        const pending = this.handlers.get(id);
        if (!pending) {
            this.log.trace({ simTime: this.currentTime, eventId: id }, "event dropped, no handlers");
            return;
        }
        this.handlers.delete(id);

        const payload = data.length > 0 ? data[0] : undefined;
        for (const handler of pending) handler(payload);
    }
    //#endregion

    //#region ---------- Stepping ----------
    /**
     * Resumes one ready entry, or, with nothing ready, jumps to the earliest wake
     * time and moves every due timed entry to the ready queue without resuming it.
     * Returns false when there was nothing to do.
     */
    public runOneStep(): boolean
    {
        const next = this.ready.shift();
        if (next !== undefined) {
            if (!next.isDone()) next.resume();
            return true;
        }

        const wake = this.timed.peekTime();
        if (wake !== undefined) {
            this.currentTime = wake;
            this.promoteDue();
            return true;
        }
        return false;
    }

    /**
     * Runs until `endTime` or until both queues are empty, then leaves `now()`
     * at `endTime`. A timed entry due exactly at `endTime` is left for the next call.
     */
    public runUntil(endTime: SimTime): void
    {
        this.log.debug({ simTime: this.currentTime, endTime }, "runUntil start");

        while (this.currentTime < endTime && (this.ready.length > 0 || !this.timed.isEmpty())) {
            this.drainReady();

            const wake = this.timed.peekTime();
            if (this.ready.length === 0 && wake !== undefined) {
                if (wake >= endTime) {
                    this.currentTime = endTime;
                    break;
                }
                this.currentTime = wake;
                this.promoteDue();
            }
        }

        if (this.currentTime < endTime) this.currentTime = endTime;

        this.log.debug({ simTime: this.currentTime, ...this.pendingCounts() }, "runUntil end");
    }

    public isEmpty(): boolean
    {
        return this.ready.length === 0 && this.timed.isEmpty() && this.handlers.size === 0;
    }

    public pendingCounts(): PendingCounts
    {
        let handlers = 0;
        for (const list of this.handlers.values()) handlers += list.length;
        return { ready: this.ready.length, timed: this.timed.size, handlers };
    }
    //#endregion

    /** @internal Routes a fault raised inside a continuation bound to this scheduler. */
    public reportFault(fault: ContinuationFault): void
    {
        this.onFault(fault);
    }

    //#region ---------- Internals ----------
    /** Entries queued while draining are picked up in the same pass. */
    private drainReady(): void
    {
        let next = this.ready.shift();
        while (next !== undefined) {
            if (!next.isDone()) next.resume();
            next = this.ready.shift();
        }
    }

    private promoteDue(): void
    {
        for (const handle of this.timed.popDue(this.currentTime)) this.ready.push(handle);
    }
    //#endregion
}
