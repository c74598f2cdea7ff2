import {
    BreakerOpening,
    Coroutine,
    DistanceRelay,
    ENTITY_TRIP,
    FAULT_INFO,
    FaultInfo,
    NO_TRIP_DELAY_MS,
    OverCurrentRelay,
    ProtectionComponent,
    ProtectionSystem,
    Registry,
    Scheduler,
    SimContext,
    breakerMonitor,
    circuitBreakerAgent,
    createLogger,
    waitForEvent,
} from "../src";

function makeContext(): SimContext
{
    return {
        scheduler: new Scheduler({ bind: false }),
        registry: new Registry(),
        log: createLogger("test", "silent"),
    };
}

describe("FaultInfo", () => {
    it("derives impedance from voltage and current when missing", () => {
        expect(new FaultInfo(2, 3, 220).withImpedance().impedanceOhm).toBeCloseTo(73.3333, 3);
    });

    it("keeps a measured impedance", () => {
        expect(new FaultInfo(1, 15, 220, 4).withImpedance().impedanceOhm).toBe(4);
    });
});

describe("relays", () => {
    it("over-current picks up at or above its threshold", () => {
        const relay = new OverCurrentRelay(5, 200);
        expect(relay.name).toBe("OC");
        expect(relay.pickUp(new FaultInfo(1, 5))).toBe(true);
        expect(relay.pickUp(new FaultInfo(1, 4.9))).toBe(false);
        expect(relay.tripDelayMs()).toBe(200);
    });

    it("distance relay trips by the first zone that reaches the fault", () => {
        const relay = new DistanceRelay(5, 0, 15, 300, 25, 700);
        const local = (z: number) => new FaultInfo(1, 10, 220, z);

        expect(relay.pickUp(local(3), 1)).toBe(true);
        expect(relay.tripDelayMs(local(3))).toBe(0);
        expect(relay.tripDelayMs(local(11))).toBe(300);
        expect(relay.tripDelayMs(local(20))).toBe(700);
        expect(relay.pickUp(local(30), 1)).toBe(false);
        expect(relay.tripDelayMs(local(30))).toBe(NO_TRIP_DELAY_MS);
    });

    it("distance relay only sees remote faults within its outermost zone", () => {
        const relay = new DistanceRelay(5, 0, 15, 300, 25, 700);
        expect(relay.pickUp(new FaultInfo(2, 10, 220, 20), 1)).toBe(true);
        expect(relay.pickUp(new FaultInfo(2, 10, 220, 30), 1)).toBe(false);
    });
});

describe("ProtectionSystem", () => {
    it("a picked-up fault trips the relay's breaker after its delay plus operating time", () => {
        const ctx = makeContext();
        const feeder = ctx.registry.create();
        ctx.registry.add(feeder, ProtectionComponent, new ProtectionComponent([new OverCurrentRelay(5, 200)]));

        const protection = new ProtectionSystem(ctx);
        const openings: BreakerOpening[] = [];
        ctx.scheduler.spawn(protection.run());
        ctx.scheduler.spawn(breakerMonitor(ctx, openings));
        ctx.scheduler.spawn(circuitBreakerAgent(ctx, feeder, "F1"));

        protection.injectFault(new FaultInfo(feeder, 8, 220));
        ctx.scheduler.runUntil(1000);

        expect(openings).toEqual([{ at: 300, entity: feeder }]);
    });

    it("impedance is filled in on the receiver's copy, not on the injected fault", () => {
        const ctx = makeContext();
        const protection = new ProtectionSystem(ctx);
        const received: FaultInfo[] = [];
        function* listener(): Coroutine {
            const info = yield* waitForEvent(FAULT_INFO);
            if (info) received.push(info);
        }
        ctx.scheduler.spawn(protection.run());
        ctx.scheduler.spawn(listener());

        const injected = new FaultInfo(1, 8, 220);
        protection.injectFault(injected);

        expect(injected.impedanceOhm).toBe(0);
        expect(received).toHaveLength(1);
        expect(received[0]).toBeInstanceOf(FaultInfo);
        expect(received[0]).not.toBe(injected);
        expect(received[0]?.currentKA).toBe(8);
    });

    it("a fault below every pickup trips nothing", () => {
        const ctx = makeContext();
        const feeder = ctx.registry.create();
        ctx.registry.add(feeder, ProtectionComponent, new ProtectionComponent([new OverCurrentRelay(5, 200)]));

        const protection = new ProtectionSystem(ctx);
        const openings: BreakerOpening[] = [];
        ctx.scheduler.spawn(protection.run());
        ctx.scheduler.spawn(breakerMonitor(ctx, openings));
        ctx.scheduler.spawn(circuitBreakerAgent(ctx, feeder, "F1"));

        protection.injectFault(new FaultInfo(feeder, 1, 220));
        ctx.scheduler.runUntil(1000);

        expect(openings).toEqual([]);
        expect(ctx.scheduler.pendingCounts().timed).toBe(0);
    });

    it("a breaker ignores trips addressed to other entities", () => {
        const ctx = makeContext();
        const openings: BreakerOpening[] = [];
        ctx.scheduler.spawn(breakerMonitor(ctx, openings));
        ctx.scheduler.spawn(circuitBreakerAgent(ctx, 1, "B1"));

        ctx.scheduler.triggerEvent(ENTITY_TRIP, 2);
        ctx.scheduler.runUntil(500);
        expect(openings).toEqual([]);

        ctx.scheduler.triggerEvent(ENTITY_TRIP, 1);
        ctx.scheduler.runUntil(1000);
        expect(openings).toEqual([{ at: 600, entity: 1 }]);
    });
});
