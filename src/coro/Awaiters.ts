import { copyPayload } from "./EventKey";
import type { Scheduler } from "./Scheduler";
import type { Awaitable, Duration, EventRef, Resumable } from "./Types";

/**
 * Suspends for a span of simulated time. Non-positive durations do not suspend.
 * Outside any scheduler the routine carries on straight away, as if the delay were zero.
 */
export class Delay implements Awaitable
{
    constructor(public readonly duration: Duration)
    {
        if (!Number.isFinite(duration)) {
            throw new RangeError(`Delay duration must be finite, got ${duration}`);
        }
    }

    public awaitReady(): boolean
    {
        return this.duration <= 0;
    }

    public awaitSuspend(handle: Resumable, scheduler: Scheduler | null): boolean
    {
        if (!scheduler) return true;
        scheduler.scheduleAfter(this.duration, handle);
        return false;
    }

    public *[Symbol.iterator](): Generator<Awaitable, void, unknown>
    {
        yield this;
    }
}

/**
 * Always suspends until `event` fires. A copy of that firing's payload is stored
 * here and becomes the result of `yield*`; a firing without data leaves it undefined.
 */
export class EventAwaiter<T> implements Awaitable
{
    private payload: T | undefined = undefined;

    constructor(public readonly event: EventRef<T>) {}

    public awaitReady(): boolean
    {
        return false;
    }

    public awaitSuspend(handle: Resumable, scheduler: Scheduler | null): boolean
    {
        if (!scheduler) return true;
        scheduler.registerEventHandler<T>(this.event, (data) => {
            if (data !== undefined) this.payload = copyPayload(this.event, data);
            handle.resume();
        });
        return false;
    }

    public *[Symbol.iterator](): Generator<Awaitable, T | undefined, unknown>
    {
        yield this;
        return this.payload;
    }
}

/** Waits for an event and ignores whatever payload it carries. */
export class SignalAwaiter implements Awaitable
{
    constructor(public readonly event: EventRef<unknown>) {}

    public awaitReady(): boolean
    {
        return false;
    }

    public awaitSuspend(handle: Resumable, scheduler: Scheduler | null): boolean
    {
        if (!scheduler) return true;
        scheduler.registerEventHandler(this.event, () => handle.resume());
        return false;
    }

    public *[Symbol.iterator](): Generator<Awaitable, void, unknown>
    {
        yield this;
    }
}

export function delay(ms: Duration): Delay
{
    return new Delay(ms);
}

/** `const info = yield* waitForEvent(FAULT_INFO)` */
export function waitForEvent<T>(event: EventRef<T>): EventAwaiter<T>;
/** Same, substituting `fallback` when the event fires without data. */
export function waitForEvent<T>(event: EventRef<T>, fallback: T): Generator<Awaitable, T, unknown>;
export function waitForEvent<T>(event: EventRef<T>, ...fallback: [] | [T]): EventAwaiter<T> | Generator<Awaitable, T, unknown>
{
    const awaiter = new EventAwaiter<T>(event);
    if (fallback.length === 0) return awaiter;
    return withFallback(awaiter, fallback[0]);
}

function* withFallback<T>(awaiter: EventAwaiter<T>, fallback: T): Generator<Awaitable, T, unknown>
{
    const payload = yield* awaiter;
    return payload === undefined ? fallback : payload;
}

export function waitForSignal(event: EventRef<unknown>): SignalAwaiter
{
    return new SignalAwaiter(event);
}
