import { delay, waitForEvent } from "../coro/Awaiters";
import type { Coroutine, SimTime } from "../coro/Types";
import type { Entity } from "../ecs/Types";
import type { SimContext } from "./Context";
import { BREAKER_OPENED, ENTITY_TRIP, FAULT_INFO, FaultInfo } from "./Events";

/** Trip delay reported when a fault lies outside every zone. */
export const NO_TRIP_DELAY_MS = 99999;
export const BREAKER_OPERATING_TIME_MS = 100;

export abstract class ProtectiveRelay
{
    abstract readonly name: string;
    abstract pickUp(fault: FaultInfo, self: Entity): boolean;
    abstract tripDelayMs(fault: FaultInfo): number;
}

export class OverCurrentRelay extends ProtectiveRelay
{
    constructor(
        private readonly pickupKA: number,
        private readonly delayMs: number,
        public readonly name: string = "OC",
    ) {
        super();
    }

    public pickUp(fault: FaultInfo): boolean
    {
        return fault.currentKA >= this.pickupKA;
    }

    public tripDelayMs(): number
    {
        return this.delayMs;
    }
}

export type DistanceZone = Readonly<{ reachOhm: number; delayMs: number }>;

/** Three-zone distance relay. Faults on other entities are only seen by the outermost zone. */
export class DistanceRelay extends ProtectiveRelay
{
    public readonly name = "DIST";
    private readonly zones: readonly [DistanceZone, DistanceZone, DistanceZone];

    constructor(z1Ohm: number, t1Ms: number, z2Ohm: number, t2Ms: number, z3Ohm: number, t3Ms: number)
    {
        super();
        this.zones = [
            { reachOhm: z1Ohm, delayMs: t1Ms },
            { reachOhm: z2Ohm, delayMs: t2Ms },
            { reachOhm: z3Ohm, delayMs: t3Ms },
        ];
    }

    public pickUp(fault: FaultInfo, self: Entity): boolean
    {
        const remote = fault.faultyEntity !== self && fault.faultyEntity !== 0;
        if (remote) return fault.impedanceOhm <= this.zones[2].reachOhm;
        return this.zones.some((zone) => fault.impedanceOhm <= zone.reachOhm);
    }

    public tripDelayMs(fault: FaultInfo): number
    {
        const zone = this.zones.find((z) => fault.impedanceOhm <= z.reachOhm);
        return zone ? zone.delayMs : NO_TRIP_DELAY_MS;
    }
}

/** Relays guarding one entity, evaluated in order. */
export class ProtectionComponent
{
    constructor(public readonly relays: readonly ProtectiveRelay[]) {}
}

export class ProtectionSystem
{
    constructor(private readonly ctx: SimContext) {}

    public injectFault(info: FaultInfo): void
    {
        this.ctx.scheduler.triggerEvent(FAULT_INFO, info);
    }

    /** Every relay that picks up a fault gets its own detached trip timer. */
    public *run(): Coroutine
    {
        const { scheduler, registry, log } = this.ctx;
        log.info({ simTime: scheduler.now() }, "[ProtectionSystem] awaiting fault info");

        while (true) {
            const fault = yield* waitForEvent(FAULT_INFO);
            if (!fault) continue;
            fault.withImpedance();

            log.info({
                simTime: scheduler.now(),
                entity: fault.faultyEntity,
                currentKA: fault.currentKA,
                impedanceOhm: fault.impedanceOhm,
                distanceKm: fault.distanceKm,
            }, "[ProtectionSystem] fault received");

            registry.forEach(ProtectionComponent, (protection, entity) => {
                for (const relay of protection.relays) {
                    if (!relay.pickUp(fault, entity)) continue;
                    const delayMs = relay.tripDelayMs(fault);
                    log.info({ simTime: scheduler.now(), relay: relay.name, entity, delayMs }, "[Prot] picked up");
                    scheduler.spawn(this.tripLater(entity, delayMs, relay.name, fault.faultyEntity)).detach();
                }
            });
        }
    }

    private *tripLater(protectedEntity: Entity, delayMs: number, relayName: string, faultyEntity: Entity): Coroutine
    {
        yield* delay(delayMs);
        this.ctx.log.info(
            { simTime: this.ctx.scheduler.now(), relay: relayName, entity: protectedEntity, faultyEntity },
            "[Prot] tripping",
        );
        this.ctx.scheduler.triggerEvent(ENTITY_TRIP, protectedEntity);
    }
}

/** Injects a line fault at 6 s and a transformer fault 7 s later. */
export function* faultInjector(ctx: SimContext, protection: ProtectionSystem, line: Entity, transformer: Entity): Coroutine
{
    yield* delay(6000);
    ctx.log.info({ simTime: ctx.scheduler.now(), entity: line }, "[FaultInjector] fault #1 on line");
    protection.injectFault(new FaultInfo(line, 15, 220, (220 / 15) * 0.8, 10));

    yield* delay(7000);
    ctx.log.info({ simTime: ctx.scheduler.now(), entity: transformer }, "[FaultInjector] fault #2 on transformer");
    protection.injectFault(new FaultInfo(transformer, 3, 220).withImpedance());
}

/**
 * Opens its breaker 100 ms after a trip addressed to `entity`.
 * Trips arriving while the breaker is operating are not seen.
 */
export function* circuitBreakerAgent(ctx: SimContext, entity: Entity, name: string): Coroutine
{
    ctx.log.info({ simTime: ctx.scheduler.now(), breaker: name, entity }, "[Breaker] awaiting trips");

    while (true) {
        const tripped = yield* waitForEvent(ENTITY_TRIP);
        if (tripped !== entity) continue;

        ctx.log.info({ simTime: ctx.scheduler.now(), breaker: name, entity }, "[Breaker] trip received");
        yield* delay(BREAKER_OPERATING_TIME_MS);
        ctx.log.info({ simTime: ctx.scheduler.now(), breaker: name, entity }, "[Breaker] opened");
        ctx.scheduler.triggerEvent(BREAKER_OPENED, entity);
    }
}

export type BreakerOpening = Readonly<{ at: SimTime; entity: Entity }>;

export function* breakerMonitor(ctx: SimContext, out: BreakerOpening[]): Coroutine
{
    while (true) {
        const entity = yield* waitForEvent(BREAKER_OPENED);
        if (entity !== undefined) out.push({ at: ctx.scheduler.now(), entity });
    }
}
