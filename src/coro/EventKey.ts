import type { ZodType } from "zod";
import { EventDefinitionError } from "../Errors";
import type { EventId, EventKey, EventRef } from "./Types";

const definedNames = new Map<EventId, string>();

/**
 * Declares the payload type carried by an event id.
 * Redefining an id under the same name returns an equivalent key; under another
 * name it throws, so two subsystems cannot silently share an id with different payloads.
 */
export function defineEvent<T = void>(
    id: EventId,
    name: string,
    schema?: ZodType<T>,
    clone?: (payload: T) => T,
): EventKey<T>
{
    if (!Number.isInteger(id) || id < 0) {
        throw new RangeError(`Event id must be a non-negative integer, got ${id}`);
    }
    const existing = definedNames.get(id);
    if (existing !== undefined && existing !== name) {
        throw new EventDefinitionError(id, existing, name);
    }
    definedNames.set(id, name);
    return {
        id,
        name,
        ...(schema ? { schema } : {}),
        ...(clone ? { clone } : {}),
    };
}

/** The copy of `payload` a waiter keeps; raw ids and keys without `clone` use `structuredClone`. */
export function copyPayload<T>(event: EventRef<T>, payload: T): T
{
    const clone = typeof event === "number" ? undefined : event.clone;
    return clone ? clone(payload) : structuredClone(payload);
}
