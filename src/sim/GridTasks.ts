import { delay, waitForSignal } from "../coro/Awaiters";
import type { Coroutine } from "../coro/Types";
import type { SimContext } from "./Context";
import { GENERATOR_READY, LOAD_CHANGE, POWER_ADJUST_REQUEST, STABILITY_CONCERN } from "./Events";

export const GENERATOR_STARTUP_MS = 1000;
export const POWER_ADJUST_MS = 300;

export function* generatorTask(ctx: SimContext): Coroutine
{
    const { scheduler, log } = ctx;
    log.info({ simTime: scheduler.now() }, "[Generator] startup sequence initiated");
    yield* delay(GENERATOR_STARTUP_MS);
    log.info({ simTime: scheduler.now() }, "[Generator] online and stable");
    scheduler.triggerEvent(GENERATOR_READY);

    while (true) {
        yield* waitForSignal(POWER_ADJUST_REQUEST);
        log.info({ simTime: scheduler.now() }, "[Generator] adjusting output");
        yield* delay(POWER_ADJUST_MS);
        log.info({ simTime: scheduler.now() }, "[Generator] output adjusted");
    }
}

/** Applies load once the generator is up, then raises it twice. */
export function* loadTask(ctx: SimContext): Coroutine
{
    const { scheduler, log } = ctx;
    log.info({ simTime: scheduler.now() }, "[Load] waiting for generator");
    yield* waitForSignal(GENERATOR_READY);
    log.info({ simTime: scheduler.now() }, "[Load] initial load applied");

    yield* delay(500);
    log.info({ simTime: scheduler.now() }, "[Load] load increased");
    scheduler.triggerEvent(LOAD_CHANGE);

    yield* delay(10000);
    log.info({ simTime: scheduler.now() }, "[Load] load significantly increased");
    scheduler.triggerEvent(LOAD_CHANGE);
    scheduler.triggerEvent(STABILITY_CONCERN);
}
