import { delay, waitForEvent } from "../coro/Awaiters";
import type { Coroutine } from "../coro/Types";
import type { Entity } from "../ecs/Types";
import type { SimContext } from "./Context";
import type { DataRecorder } from "./DataRecorder";
import { FREQUENCY_UPDATE } from "./Events";

export enum DeviceType
{
    EvPile = "EV_PILE",
    EssUnit = "ESS_UNIT",
}

export class PhysicalState
{
    constructor(
        public powerKW: number = 0,
        public soc: number = 0.5,
    ) {}
}

export class FrequencyControlConfig
{
    constructor(
        public readonly type: DeviceType,
        public readonly basePowerKW: number,
        public readonly gainKWPerHz: number,
        public readonly deadbandHz: number,
        public readonly maxOutputKW: number,
        public readonly minOutputKW: number,
        public readonly socMin: number = 0,
        public readonly socMax: number = 1,
    ) {}
}

const BATTERY_CAPACITY_KWH: Record<DeviceType, number> = {
    [DeviceType.EvPile]: 50,
    [DeviceType.EssUnit]: 2000,
};

// Response curve of the reference disturbance.
const P_COEFF = 0.0862;
const M_COEFF = 0.1404;
const M1_COEFF = 0.1577;
const M2_COEFF = 0.0397;
const N_COEFF = 0.125;

const FREQUENCY_CHANGE_THRESHOLD_HZ = 0.01;
const TIME_THRESHOLD_SECONDS = 1.0;

/** Grid frequency deviation (Hz) `tRelative` seconds after the disturbance; 0 before it. */
export function calculateFrequencyDeviation(tRelative: number): number
{
    if (tRelative < 0) return 0;
    return -(M_COEFF + (M1_COEFF * Math.sin(M_COEFF * tRelative) - M_COEFF * Math.cos(M_COEFF * tRelative)))
        / M2_COEFF * Math.exp(-N_COEFF * tRelative) * P_COEFF;
}

/**
 * Droop response with a deadband. Negative power means charging.
 * EV piles stop following the droop when their state of charge leaves the allowed band.
 */
export function responsePower(config: FrequencyControlConfig, soc: number, deviationHz: number): number
{
    const isEv = config.type === DeviceType.EvPile;
    let power = config.basePowerKW;

    if (Math.abs(deviationHz) > config.deadbandHz) {
        if (deviationHz < 0) {
            const effectiveDrop = deviationHz + config.deadbandHz;
            if (!isEv || soc >= config.socMin) {
                power = -config.gainKWPerHz * effectiveDrop;
            } else if (config.basePowerKW < 0) {
                power = 0;
            }
        } else {
            const effectiveRise = deviationHz - config.deadbandHz;
            power = config.basePowerKW - config.gainKWPerHz * effectiveRise;
        }
    }

    power = Math.max(config.minOutputKW, Math.min(config.maxOutputKW, power));

    if (isEv) {
        if (power < 0 && soc >= config.socMax) power = 0;
        if (power > 0 && soc <= config.socMin) power = 0;
    }
    return power;
}

/** Applies `dtSeconds` at the current power to the state of charge, clamped to [0, 1]. */
export function integrateSoc(config: FrequencyControlConfig, state: PhysicalState, dtSeconds: number): void
{
    const energyKWh = state.powerKW * (dtSeconds / 3600);
    state.soc -= energyKWh / BATTERY_CAPACITY_KWH[config.type];
    state.soc = Math.max(0, Math.min(1, state.soc));
}

export function totalPowerKW(ctx: SimContext, entities: readonly Entity[]): number
{
    let total = 0;
    for (const e of entities) total += ctx.registry.get(e, PhysicalState)?.powerKW ?? 0;
    return total;
}

/**
 * Every `stepMs`: publishes the current deviation, then sums the power of every
 * VPP entity. Subscribers react synchronously, so the sum already reflects this step.
 */
export function* frequencyOracle(
    ctx: SimContext,
    entities: readonly Entity[],
    disturbanceStartS: number,
    stepMs: number,
    recorder?: DataRecorder,
): Coroutine
{
    ctx.log.info({ simTime: ctx.scheduler.now(), disturbanceStartS, stepMs }, "[FreqOracle] active");

    while (true) {
        yield* delay(stepMs);

        const simTimeMs = ctx.scheduler.now();
        const simTimeSeconds = simTimeMs / 1000;
        const relativeS = simTimeSeconds - disturbanceStartS;
        const deviationHz = calculateFrequencyDeviation(relativeS);

        ctx.scheduler.triggerEvent(FREQUENCY_UPDATE, { simTimeSeconds, deviationHz });

        recorder?.record(
            simTimeMs.toFixed(0),
            simTimeSeconds.toFixed(3),
            relativeS.toFixed(3),
            deviationHz.toFixed(5),
            totalPowerKW(ctx, entities).toFixed(2),
        );
    }
}

/**
 * Recomputes every managed entity's output when the frequency moved by more than
 * 0.01 Hz or a second has passed since the last full update. Repeated or older
 * updates are ignored.
 */
export function* vppFrequencyResponse(ctx: SimContext, name: string, managed: readonly Entity[]): Coroutine
{
    ctx.log.info({ simTime: ctx.scheduler.now(), vpp: name, entities: managed.length }, "[VPP] awaiting frequency updates");

    let lastEventTimeS = -1;
    let lastFullUpdateS = -1;
    let lastFullUpdateDevHz = 0;

    while (true) {
        const info = yield* waitForEvent(FREQUENCY_UPDATE);
        if (!info || info.simTimeSeconds <= lastEventTimeS) continue;
        lastEventTimeS = info.simTimeSeconds;

        let fullUpdate = false;
        let dtSeconds = 0;
        if (lastFullUpdateS < 0) {
            fullUpdate = true;
        } else {
            dtSeconds = Math.max(0, info.simTimeSeconds - lastFullUpdateS);
            if (Math.abs(info.deviationHz - lastFullUpdateDevHz) > FREQUENCY_CHANGE_THRESHOLD_HZ) fullUpdate = true;
            if (dtSeconds >= TIME_THRESHOLD_SECONDS) fullUpdate = true;
        }
        if (!fullUpdate) continue;

        for (const e of managed) {
            const config = ctx.registry.get(e, FrequencyControlConfig);
            const state = ctx.registry.get(e, PhysicalState);
            if (!config || !state) continue;

            if (lastFullUpdateS >= 0 && dtSeconds > 1e-6) integrateSoc(config, state, dtSeconds);
            state.powerKW = responsePower(config, state.soc, info.deviationHz);
        }

        lastFullUpdateS = info.simTimeSeconds;
        lastFullUpdateDevHz = info.deviationHz;
    }
}
