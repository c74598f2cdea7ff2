#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { loadConfig, type SimulationConfigInput } from "./config/Config";
import { SimulationError } from "./Errors";
import { createLogger, defaultLogLevel, isLogLevel, setLogger } from "./log/Logger";
import { runGridScenario } from "./sim/Scenario";
import { runVoltageControlDemo } from "./sim/VoltageControl";

function parseInteger(value: string): number
{
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) throw new InvalidArgumentError("Not an integer.");
    return parsed;
}

function parseLevel(value: string): string
{
    if (!isLogLevel(value)) throw new InvalidArgumentError(`Unknown log level "${value}".`);
    return value;
}

type RunOptions = {
    config?: string;
    until?: number;
    data?: string | false;
    seed?: number;
    logLevel?: string;
};

export function buildProgram(): Command
{
    const program = new Command();
    program
        .name("simcoro")
        .description("Discrete-event grid simulation on a cooperative scheduler")
        .version("0.1.0");

    program
        .command("run")
        .description("Run the grid frequency and protection scenario")
        .option("-c, --config <path>", "YAML or JSON configuration file")
        .option("-u, --until <ms>", "simulated duration in ms", parseInteger)
        .option("-d, --data <path>", "TSV file for frequency response data")
        .option("--no-data", "do not write the data file")
        .option("-s, --seed <n>", "seed for initial EV state of charge", parseInteger)
        .option("-l, --log-level <level>", "pino log level", parseLevel)
        .action((opts: RunOptions) => {
            const overrides: SimulationConfigInput = {
                durationMs: opts.until,
                seed: opts.seed,
                dataFile: opts.data === false ? null : opts.data,
            };
            const config = loadConfig({ file: opts.config, overrides });
            const level = opts.logLevel ?? config.logLevel;
            setLogger(createLogger("simcoro", level !== undefined && isLogLevel(level) ? level : defaultLogLevel()));

            const report = runGridScenario(config);
            process.stdout.write(JSON.stringify(report, null, 2) + "\n");
        });

    program
        .command("avc")
        .description("Run the sensor / automatic voltage control demo")
        .action(() => {
            const report = runVoltageControlDemo(createLogger("avc", defaultLogLevel()));
            process.stdout.write(JSON.stringify(report, null, 2) + "\n");
        });

    return program;
}

if (require.main === module) {
    try {
        buildProgram().parse(process.argv);
    } catch (err) {
        if (err instanceof SimulationError) {
            process.stderr.write(`${err.name}: ${err.message}\n`);
            process.exit(2);
        }
        throw err;
    }
}
