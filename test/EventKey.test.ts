import { z } from "zod";
import { EventDefinitionError, Scheduler, defineEvent, eventIdOf } from "../src";

describe("defineEvent", () => {
    it("builds a key carrying id and name", () => {
        const key = defineEvent<number>(9301, "TEST_KEY");
        expect(key).toEqual({ id: 9301, name: "TEST_KEY" });
        expect(eventIdOf(key)).toBe(9301);
        expect(eventIdOf(9301)).toBe(9301);
    });

    it("returns an equivalent key when the same id is redefined under the same name", () => {
        const a = defineEvent<string>(9302, "TEST_SAME");
        const b = defineEvent<string>(9302, "TEST_SAME");
        expect(b).toEqual(a);
    });

    it("refuses an id already taken by another name", () => {
        defineEvent(9303, "TEST_OWNER");
        expect(() => defineEvent(9303, "TEST_INTRUDER")).toThrow(EventDefinitionError);
    });

    it("rejects negative or fractional ids", () => {
        expect(() => defineEvent(-1, "TEST_NEG")).toThrow(RangeError);
        expect(() => defineEvent(1.5, "TEST_FRAC")).toThrow(RangeError);
    });

    it("a raw id and its key address the same handlers", () => {
        const key = defineEvent<number>(9304, "TEST_ALIAS");
        const s = new Scheduler({ bind: false });
        const seen: (number | undefined)[] = [];
        s.registerEventHandler(key, (v) => seen.push(v));

        s.triggerEvent(9304, 3);
        expect(seen).toEqual([3]);
    });

    it("validates payloads only when a schema is attached", () => {
        const checked = defineEvent(9305, "TEST_CHECKED", z.string().min(1));
        const s = new Scheduler({ bind: false });
        const seen: (string | undefined)[] = [];
        s.registerEventHandler(checked, (v) => seen.push(v));

        expect(() => s.triggerEvent(checked, "")).toThrow(/TEST_CHECKED/);
        expect(seen).toEqual([]);

        s.triggerEvent(checked, "ok");
        expect(seen).toEqual(["ok"]);
    });
});
