import { delay, waitForEvent } from "../coro/Awaiters";
import { defineEvent } from "../coro/EventKey";
import { Scheduler } from "../coro/Scheduler";
import type { Coroutine, SimTime } from "../coro/Types";
import { getLogger, type Logger } from "../log/Logger";

export type VoltageData = Readonly<{ voltagePU: number; timestamp: SimTime }>;

export const VOLTAGE_CHANGE = defineEvent<VoltageData>(10000, "VOLTAGE_CHANGE");

export type AvcAction = "CAPACITOR_IN" | "CAPACITOR_OUT" | "NONE";

export type AvcDecision = Readonly<{
    at: SimTime;
    voltagePU: number;
    measuredAt: SimTime;
    action: AvcAction;
}>;

export type VoltageControlReport = {
    finalTime: SimTime;
    sensorDone: boolean;
    avcDone: boolean;
    decisions: AvcDecision[];
};

export function classifyVoltage(voltagePU: number): AvcAction
{
    if (voltagePU < 0.95) return "CAPACITOR_IN";
    if (voltagePU > 1.05) return "CAPACITOR_OUT";
    return "NONE";
}

function* sensor(scheduler: Scheduler, log: Logger): Coroutine
{
    log.info({ simTime: scheduler.now() }, "Sensor: initializing");

    yield* delay(10000);
    log.info({ simTime: scheduler.now(), voltagePU: 0.92 }, "Sensor: voltage drop detected");
    scheduler.triggerEvent(VOLTAGE_CHANGE, { voltagePU: 0.92, timestamp: scheduler.now() });

    yield* delay(10000);
    log.info({ simTime: scheduler.now(), voltagePU: 1.01 }, "Sensor: voltage recovered");
    scheduler.triggerEvent(VOLTAGE_CHANGE, { voltagePU: 1.01, timestamp: scheduler.now() });

    yield* delay(5000);
    log.info({ simTime: scheduler.now() }, "Sensor: shutting down");
}

function* avc(scheduler: Scheduler, log: Logger, decisions: AvcDecision[], maxEvents: number): Coroutine
{
    log.info({ simTime: scheduler.now() }, "AVC: waiting for voltage events");
    while (decisions.length < maxEvents) {
        const data = yield* waitForEvent(VOLTAGE_CHANGE);
        if (!data) continue;
        const action = classifyVoltage(data.voltagePU);
        decisions.push({ at: scheduler.now(), voltagePU: data.voltagePU, measuredAt: data.timestamp, action });
        log.info({ simTime: scheduler.now(), voltagePU: data.voltagePU, action }, "AVC: voltage event handled");
    }
    log.info({ simTime: scheduler.now(), handled: decisions.length }, "AVC: shutting down");
}

/** Sensor/AVC pair on a private scheduler, run for 30 simulated seconds. */
export function runVoltageControlDemo(logger: Logger = getLogger()): VoltageControlReport
{
    const scheduler = new Scheduler({ bind: false, logger });
    const decisions: AvcDecision[] = [];

    const sensorTask = scheduler.spawn(sensor(scheduler, logger));
    const avcTask = scheduler.spawn(avc(scheduler, logger, decisions, 2));

    scheduler.runUntil(scheduler.now() + 30000);

    const report = {
        finalTime: scheduler.now(),
        sensorDone: sensorTask.isDone(),
        avcDone: avcTask.isDone(),
        decisions,
    };
    sensorTask.destroy();
    avcTask.destroy();
    scheduler.dispose();
    return report;
}
