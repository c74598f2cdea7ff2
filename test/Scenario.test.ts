import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { GridScenario, createLogger, loadConfig, runGridScenario } from "../src";

const log = createLogger("test", "silent");

describe("GridScenario", () => {
    it("protection trips the line, then the transformer twice", () => {
        const config = loadConfig({
            env: {},
            overrides: {
                durationMs: 20000,
                dataFile: null,
                frequency: { enabled: false },
                grid: { enabled: false },
            },
        });
        const report = runGridScenario(config, { logger: log });

        expect(report.finalTime).toBe(20000);
        expect(report.breakerOpenings).toEqual([
            { at: 6300, entity: 1 },
            { at: 6400, entity: 2 },
            { at: 13400, entity: 2 },
        ]);
        expect(report.dataRows).toBe(0);
    });

    it("frequency response records one row per oracle step before the end time", () => {
        const config = loadConfig({
            env: {},
            overrides: {
                durationMs: 1000,
                dataFile: null,
                frequency: { stepMs: 100, evStations: 1, pilesPerStation: 3, essUnits: 2 },
                protection: { enabled: false },
                grid: { enabled: false },
            },
        });
        const scenario = new GridScenario(config, { logger: log });
        const report = scenario.run();

        expect(scenario.evPiles).toEqual([1, 2, 3]);
        expect(scenario.essUnits).toEqual([4, 5]);
        expect(report.evPiles).toBe(3);
        expect(report.essUnits).toBe(2);
        expect(report.dataRows).toBe(9);
        expect(report.finalTime).toBe(1000);
        expect(scenario.recorder.rows[0]).toMatch(/^100\t0\.100\t-4\.900\t0\.00000\t/);
    });

    it("the same seed replays the same data", () => {
        const config = loadConfig({
            env: {},
            overrides: {
                durationMs: 8000,
                seed: 11,
                dataFile: null,
                frequency: { stepMs: 500, disturbanceStartS: 1, evStations: 2, pilesPerStation: 3, essUnits: 1 },
                protection: { enabled: false },
                grid: { enabled: false },
            },
        });
        const first = new GridScenario(config, { logger: log });
        first.run();
        const second = new GridScenario(config, { logger: log });
        second.run();

        expect(second.recorder.rows).toEqual(first.recorder.rows);
        expect(first.recorder.rows).toHaveLength(15);
    });

    it("writes the data file when one is configured", () => {
        const dir = mkdtempSync(join(tmpdir(), "simcoro-data-"));
        try {
            const dataFile = join(dir, "freq.tsv");
            const config = loadConfig({
                env: {},
                overrides: {
                    durationMs: 300,
                    dataFile,
                    frequency: { stepMs: 100, evStations: 0, essUnits: 1 },
                    protection: { enabled: false },
                    grid: { enabled: false },
                },
            });
            runGridScenario(config, { logger: log });

            const lines = readFileSync(dataFile, "utf-8").split("\n");
            expect(lines[0]).toBe("# SimTime_ms\tSimTime_s\tRelativeTime_s\tFreqDeviation_Hz\tTotalVppPower_kW");
            expect(lines).toHaveLength(4);
            expect(lines[3]).toBe("");
        } finally {
            rmSync(dir, { recursive: true, force: true });
        }
    });

    it("tasks are torn down after the run", () => {
        const config = loadConfig({ env: {}, overrides: { durationMs: 100, dataFile: null, frequency: { enabled: false } } });
        const scenario = new GridScenario(config, { logger: log });
        scenario.run();

        // Stopped routines leave their registrations behind but never run again.
        expect(scenario.ctx.scheduler.pendingCounts().timed).toBeGreaterThan(0);
        scenario.ctx.scheduler.runUntil(30000);
        expect(scenario.breakerOpenings).toEqual([]);
    });
});
