export type SimulationErrorCode =
    | "CONFIG_ERROR"
    | "EVENT_DEFINITION_ERROR"
    | "PAYLOAD_MISMATCH"
    | "CONTINUATION_FAULT";

export class SimulationError extends Error
{
    constructor(
        message: string,
        public readonly code: SimulationErrorCode,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "SimulationError";
    }
}

export class ConfigError extends SimulationError
{
    constructor(message: string, cause?: unknown)
    {
        super(message, "CONFIG_ERROR", { cause });
        this.name = "ConfigError";
    }
}

/** The same event id was defined twice under different names. */
export class EventDefinitionError extends SimulationError
{
    constructor(public readonly eventId: number, existing: string, attempted: string)
    {
        super(
            `Event id ${eventId} is already defined as "${existing}", cannot redefine it as "${attempted}"`,
            "EVENT_DEFINITION_ERROR",
        );
        this.name = "EventDefinitionError";
    }
}

export class PayloadMismatchError extends SimulationError
{
    constructor(public readonly eventName: string, cause: unknown)
    {
        super(`Payload rejected by the schema of event "${eventName}"`, "PAYLOAD_MISMATCH", { cause });
        this.name = "PayloadMismatchError";
    }
}

/** An exception escaped a routine body. Always fatal for the run. */
export class ContinuationFault extends SimulationError
{
    constructor(cause: unknown)
    {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Unhandled fault in continuation: ${detail}`, "CONTINUATION_FAULT", { cause });
        this.name = "ContinuationFault";
    }
}
