import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "../Errors";
import { LOG_LEVELS } from "../log/Logger";

const LogLevelSchema = z.enum(LOG_LEVELS);

export const SimulationConfigSchema = z.object({
    /** Simulated run length in ms. */
    durationMs: z.number().int().positive().default(70000),
    seed: z.number().int().nonnegative().default(1),
    /** Unset: follow SIMCORO_LOG_LEVEL / NODE_ENV. */
    logLevel: LogLevelSchema.optional(),
    /** Null disables the TSV data file. */
    dataFile: z.string().min(1).nullable().default("vpp_freq_response_data.tsv"),
    frequency: z.object({
        enabled: z.boolean().default(true),
        stepMs: z.number().positive().default(20),
        disturbanceStartS: z.number().nonnegative().default(5),
        evStations: z.number().int().nonnegative().default(10),
        pilesPerStation: z.number().int().nonnegative().default(5),
        essUnits: z.number().int().nonnegative().default(100),
    }).default({}),
    protection: z.object({
        enabled: z.boolean().default(true),
    }).default({}),
    grid: z.object({
        enabled: z.boolean().default(true),
    }).default({}),
});

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

export type LoadConfigOptions = {
    file?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: SimulationConfigInput;
};

function isRecord(value: unknown): value is Record<string, unknown>
{
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown>
{
    const out: Record<string, unknown> = { ...target };
    for (const [key, value] of Object.entries(source)) {
        if (value === undefined) continue;
        const current = out[key];
        out[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
    }
    return out;
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown>
{
    const out: Record<string, unknown> = {};
    if (env.SIMCORO_DURATION_MS !== undefined) out.durationMs = Number(env.SIMCORO_DURATION_MS);
    if (env.SIMCORO_SEED !== undefined) out.seed = Number(env.SIMCORO_SEED);
    if (env.SIMCORO_DATA_FILE !== undefined) out.dataFile = env.SIMCORO_DATA_FILE === "" ? null : env.SIMCORO_DATA_FILE;
    if (env.SIMCORO_LOG_LEVEL !== undefined) out.logLevel = env.SIMCORO_LOG_LEVEL;
    return out;
}

function readFile(file: string): Record<string, unknown>
{
    if (!existsSync(file)) {
        throw new ConfigError(`Config file not found: ${file}`);
    }
    let parsed: unknown;
    try {
        parsed = parseYaml(readFileSync(file, "utf-8"));
    } catch (err) {
        throw new ConfigError(`Failed to parse config at ${file}`, err);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
        throw new ConfigError(`Config at ${file} must be a mapping`);
    }
    return parsed;
}

/**
 * Merged in order: defaults <- file (YAML or JSON) <- SIMCORO_* environment <- overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): SimulationConfig
{
    let raw: Record<string, unknown> = options.file ? readFile(options.file) : {};
    raw = deepMerge(raw, fromEnv(options.env ?? process.env));
    if (options.overrides) raw = deepMerge(raw, options.overrides);

    const result = SimulationConfigSchema.safeParse(raw);
    if (!result.success) {
        const detail = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
        throw new ConfigError(`Invalid configuration: ${detail}`, result.error);
    }
    return result.data;
}
