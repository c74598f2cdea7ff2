import {
    Coroutine,
    LOAD_CHANGE,
    POWER_ADJUST_REQUEST,
    Registry,
    STABILITY_CONCERN,
    Scheduler,
    SimContext,
    createLogger,
    generatorTask,
    loadTask,
    waitForSignal,
} from "../src";
import type { EventKey } from "../src";

function makeContext(): SimContext
{
    return {
        scheduler: new Scheduler({ bind: false }),
        registry: new Registry(),
        log: createLogger("test", "silent"),
    };
}

function* recordFirings(ctx: SimContext, event: EventKey, out: number[]): Coroutine
{
    while (true) {
        yield* waitForSignal(event);
        out.push(ctx.scheduler.now());
    }
}

describe("grid tasks", () => {
    it("load steps up after the generator comes online", () => {
        const ctx = makeContext();
        const loadChanges: number[] = [];
        const concerns: number[] = [];
        ctx.scheduler.spawn(recordFirings(ctx, LOAD_CHANGE, loadChanges));
        ctx.scheduler.spawn(recordFirings(ctx, STABILITY_CONCERN, concerns));

        const load = ctx.scheduler.spawn(loadTask(ctx));
        ctx.scheduler.spawn(generatorTask(ctx));
        ctx.scheduler.runUntil(20000);

        expect(loadChanges).toEqual([1500, 11500]);
        expect(concerns).toEqual([11500]);
        expect(load.isDone()).toBe(true);
    });

    it("the load waits as long as the generator is absent", () => {
        const ctx = makeContext();
        const loadChanges: number[] = [];
        ctx.scheduler.spawn(recordFirings(ctx, LOAD_CHANGE, loadChanges));
        const load = ctx.scheduler.spawn(loadTask(ctx));
        ctx.scheduler.runUntil(20000);

        expect(loadChanges).toEqual([]);
        expect(load.isDone()).toBe(false);
    });

    it("the generator settles a power adjustment 300 ms after the request", () => {
        const ctx = makeContext();
        const info = jest.spyOn(ctx.log, "info");
        ctx.scheduler.spawn(generatorTask(ctx));

        ctx.scheduler.runUntil(2000);
        ctx.scheduler.triggerEvent(POWER_ADJUST_REQUEST);
        expect(info).toHaveBeenLastCalledWith({ simTime: 2000 }, "[Generator] adjusting output");

        ctx.scheduler.runUntil(3000);
        expect(info).toHaveBeenLastCalledWith({ simTime: 2300 }, "[Generator] output adjusted");
    });
});
