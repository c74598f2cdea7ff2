import type { ZodType } from "zod";
import type { Scheduler } from "./Scheduler";

/** Simulated milliseconds since the scheduler's epoch. */
export type SimTime = number;

/** A span of simulated milliseconds. */
export type Duration = number;

/**
 * Identifies a class of named occurrences. Carries no payload type on its own;
 * use an {@link EventKey} to attach one.
 */
export type EventId = number;

/**
 * Event id bound to a payload type. `T` only exists at compile time, except when a
 * schema is attached: then the payload is also validated on every trigger.
 */
export interface EventKey<T = void>
{
    readonly id: EventId;
    readonly name: string;
    readonly schema?: ZodType<T>;
    /** Copies a payload for each waiter. Defaults to `structuredClone`, which drops prototypes. */
    clone?(payload: T): T;
    /** @internal phantom field, never set */
    readonly __payload?: T;
}

export type EventRef<T = unknown> = EventKey<T> | EventId;

export type EventHandler<T = unknown> = (data: T | undefined) => void;

/** Anything the ready and timed queues can hold. */
export interface Resumable
{
    resume(): void;
    isDone(): boolean;
}

/**
 * Suspension primitive. A routine evaluates it with `yield*`; the driving
 * continuation asks `awaitReady()` first and only suspends when it returns false.
 * `awaitSuspend` returning true means "resume now": the continuation carries on
 * in its own loop instead of being resumed from inside the call.
 */
export interface Awaitable
{
    awaitReady(): boolean;
    awaitSuspend(handle: Resumable, scheduler: Scheduler | null): boolean;
}

/** The body of a suspendable routine. */
export type Coroutine = Generator<Awaitable, void, unknown>;

export function eventIdOf(ref: EventRef<unknown>): EventId
{
    return typeof ref === "number" ? ref : ref.id;
}
