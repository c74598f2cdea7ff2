import type { Scheduler } from "./Scheduler";

// One binding per isolate. Worker threads each get their own copy of this module.
let active: Scheduler | null = null;

/**
 * The scheduler that contextless suspensions register with, or null.
 * Continuations started through `scheduler.spawn()` never consult this.
 */
export function activeScheduler(): Scheduler | null
{
    return active;
}

/** @internal Called by the Scheduler constructor; replaces any previous binding. */
export function bindScheduler(scheduler: Scheduler): void
{
    active = scheduler;
}

/** @internal Clears the binding only if `scheduler` still holds it. */
export function unbindScheduler(scheduler: Scheduler): void
{
    if (active === scheduler) active = null;
}
