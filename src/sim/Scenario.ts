import type { SimulationConfig } from "../config/Config";
import { Scheduler } from "../coro/Scheduler";
import type { FaultHandler, Task } from "../coro/Task";
import type { SimTime } from "../coro/Types";
import { Registry } from "../ecs/Registry";
import type { Entity } from "../ecs/Types";
import { getLogger, type Logger } from "../log/Logger";
import type { SimContext } from "./Context";
import { DataRecorder } from "./DataRecorder";
import {
    DeviceType,
    FrequencyControlConfig,
    PhysicalState,
    frequencyOracle,
    vppFrequencyResponse,
} from "./FrequencySystem";
import { generatorTask, loadTask } from "./GridTasks";
import {
    DistanceRelay,
    OverCurrentRelay,
    ProtectionComponent,
    ProtectionSystem,
    breakerMonitor,
    circuitBreakerAgent,
    faultInjector,
    type BreakerOpening,
} from "./ProtectionSystem";
import { Random } from "./Random";

export const DATA_HEADER = ["SimTime_ms", "SimTime_s", "RelativeTime_s", "FreqDeviation_Hz", "TotalVppPower_kW"] as const;

export type ScenarioOptions = {
    logger?: Logger;
    onFault?: FaultHandler;
};

export type ScenarioReport = {
    finalTime: SimTime;
    dataRows: number;
    evPiles: number;
    essUnits: number;
    breakerOpenings: BreakerOpening[];
    wallClockMs: number;
    peakRssKB: number;
};

/**
 * The grid model: protection on one line and one transformer, an EV and an ESS
 * virtual power plant following the frequency, plus generator and load tasks.
 * Call `run()` once; tasks are destroyed when it returns.
 */
export class GridScenario
{
    public readonly ctx: SimContext;
    public readonly recorder = new DataRecorder(DATA_HEADER);
    public readonly breakerOpenings: BreakerOpening[] = [];
    public readonly evPiles: Entity[] = [];
    public readonly essUnits: Entity[] = [];

    private readonly tasks: Task[] = [];

    constructor(private readonly config: SimulationConfig, options: ScenarioOptions = {})
    {
        const log = options.logger ?? getLogger();
        const scheduler = new Scheduler({ bind: false, logger: log, onFault: options.onFault });
        this.ctx = { scheduler, registry: new Registry(), log };

        if (config.protection.enabled) this.setupProtection();
        if (config.frequency.enabled) this.setupFrequencyResponse();
        if (config.grid.enabled) {
            this.tasks.push(scheduler.spawn(generatorTask(this.ctx)));
            this.tasks.push(scheduler.spawn(loadTask(this.ctx)));
        }
    }

    public run(): ScenarioReport
    {
        const { scheduler, log } = this.ctx;
        const startedAt = performance.now();
        const endTime = scheduler.now() + this.config.durationMs;

        log.info({ simTime: scheduler.now(), endTime }, "running simulation");
        scheduler.runUntil(endTime);
        const wallClockMs = performance.now() - startedAt;

        for (const task of this.tasks) task.destroy();
        this.tasks.length = 0;
        scheduler.dispose();

        const report: ScenarioReport = {
            finalTime: scheduler.now(),
            dataRows: this.recorder.rows.length,
            evPiles: this.evPiles.length,
            essUnits: this.essUnits.length,
            breakerOpenings: [...this.breakerOpenings],
            wallClockMs,
            peakRssKB: process.resourceUsage().maxRSS,
        };
        log.info({ simTime: report.finalTime, wallClockMs, peakRssKB: report.peakRssKB }, "simulation ended");
        return report;
    }

    private setupProtection(): void
    {
        const { scheduler, registry, log } = this.ctx;
        const protection = new ProtectionSystem(this.ctx);

        const line = registry.create();
        registry.add(line, ProtectionComponent, new ProtectionComponent([
            new OverCurrentRelay(5.0, 200, "OC-L1P-Fast"),
            new DistanceRelay(5.0, 0, 15.0, 300, 25.0, 700),
        ]));
        const transformer = registry.create();
        registry.add(transformer, ProtectionComponent, new ProtectionComponent([
            new OverCurrentRelay(2.5, 300, "OC-T1P-Main"),
        ]));
        log.info({ line, transformer }, "protection entities created");

        this.tasks.push(scheduler.spawn(protection.run()));
        this.tasks.push(scheduler.spawn(breakerMonitor(this.ctx, this.breakerOpenings)));
        this.tasks.push(scheduler.spawn(faultInjector(this.ctx, protection, line, transformer)));
        this.tasks.push(scheduler.spawn(circuitBreakerAgent(this.ctx, line, "Line1_P")));
        this.tasks.push(scheduler.spawn(circuitBreakerAgent(this.ctx, transformer, "T1_P")));
    }

    private setupFrequencyResponse(): void
    {
        const { scheduler, registry, log } = this.ctx;
        const freq = this.config.frequency;
        const rng = new Random(this.config.seed);

        const totalPiles = freq.evStations * freq.pilesPerStation;
        for (let i = 0; i < totalPiles; i++) {
            const pile = registry.create();
            const basePowerKW = i % 3 === 0 ? -5.0 : i % 3 === 1 ? -3.5 : 0.0;
            registry.add(pile, FrequencyControlConfig,
                new FrequencyControlConfig(DeviceType.EvPile, basePowerKW, 4.0, 0.03, 5.0, -5.0, 0.1, 0.95));
            registry.add(pile, PhysicalState, new PhysicalState(basePowerKW, rng.uniform(0.25, 0.9)));
            this.evPiles.push(pile);
        }

        const essGainKWPerHz = 1000.0 / (0.03 * 50.0);
        for (let i = 0; i < freq.essUnits; i++) {
            const ess = registry.create();
            registry.add(ess, FrequencyControlConfig,
                new FrequencyControlConfig(DeviceType.EssUnit, 0.0, essGainKWPerHz, 0.03, 1000.0, -1000.0, 0.05, 0.95));
            registry.add(ess, PhysicalState, new PhysicalState(0.0, 0.7));
            this.essUnits.push(ess);
        }
        log.info({ evPiles: this.evPiles.length, essUnits: this.essUnits.length }, "frequency response entities created");

        const all = [...this.evPiles, ...this.essUnits];
        this.tasks.push(scheduler.spawn(frequencyOracle(this.ctx, all, freq.disturbanceStartS, freq.stepMs, this.recorder)));
        this.tasks.push(scheduler.spawn(vppFrequencyResponse(this.ctx, "EV_VPP", this.evPiles)));
        this.tasks.push(scheduler.spawn(vppFrequencyResponse(this.ctx, "ESS_VPP", this.essUnits)));
    }
}

export function runGridScenario(config: SimulationConfig, options: ScenarioOptions = {}): ScenarioReport
{
    const scenario = new GridScenario(config, options);
    const report = scenario.run();
    if (config.dataFile) scenario.recorder.writeTo(config.dataFile);
    return report;
}
