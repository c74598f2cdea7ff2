import { z } from "zod";
import { defineEvent } from "../coro/EventKey";
import type { Entity } from "../ecs/Types";

export class FaultInfo
{
    constructor(
        public faultyEntity: Entity = 0,
        public currentKA: number = 0,
        public voltageKV: number = 220,
        public impedanceOhm: number = 0,
        public distanceKm: number = 0,
    ) {}

    public clone(): FaultInfo
    {
        return new FaultInfo(this.faultyEntity, this.currentKA, this.voltageKV, this.impedanceOhm, this.distanceKm);
    }

    /** Fills in Z = V / I when no impedance was measured. */
    public withImpedance(): this
    {
        if (this.impedanceOhm === 0 && this.voltageKV > 0 && this.currentKA > 0) {
            this.impedanceOhm = (this.voltageKV * 1000) / (this.currentKA * 1000);
        }
        return this;
    }
}

export type FrequencyInfo = Readonly<{
    simTimeSeconds: number;
    deviationHz: number;
}>;

const EntitySchema = z.number().int().nonnegative();

const FrequencyInfoSchema = z.object({
    simTimeSeconds: z.number(),
    deviationHz: z.number(),
});

// General grid events
export const GENERATOR_READY = defineEvent(1, "GENERATOR_READY");
export const LOAD_CHANGE = defineEvent(2, "LOAD_CHANGE");
export const BREAKER_OPENED = defineEvent<Entity>(6, "BREAKER_OPENED", EntitySchema);
export const STABILITY_CONCERN = defineEvent(7, "STABILITY_CONCERN");
export const LOAD_SHED_REQUEST = defineEvent(8, "LOAD_SHED_REQUEST");
export const POWER_ADJUST_REQUEST = defineEvent(9, "POWER_ADJUST_REQUEST");

// Protection
export const FAULT_INFO = defineEvent<FaultInfo>(100, "FAULT_INFO", z.instanceof(FaultInfo), (info) => info.clone());
export const ENTITY_TRIP = defineEvent<Entity>(101, "ENTITY_TRIP", EntitySchema);

// Frequency response
export const FREQUENCY_UPDATE = defineEvent<FrequencyInfo>(200, "FREQUENCY_UPDATE", FrequencyInfoSchema);
