import { classifyVoltage, createLogger, runVoltageControlDemo } from "../src";

describe("voltage control", () => {
    it("classifies voltage against the 0.95 to 1.05 pu band", () => {
        expect(classifyVoltage(0.92)).toBe("CAPACITOR_IN");
        expect(classifyVoltage(0.95)).toBe("NONE");
        expect(classifyVoltage(1.05)).toBe("NONE");
        expect(classifyVoltage(1.08)).toBe("CAPACITOR_OUT");
    });

    it("the AVC handles both sensor readings and both routines finish", () => {
        const report = runVoltageControlDemo(createLogger("test", "silent"));

        expect(report).toEqual({
            finalTime: 30000,
            sensorDone: true,
            avcDone: true,
            decisions: [
                { at: 10000, voltagePU: 0.92, measuredAt: 10000, action: "CAPACITOR_IN" },
                { at: 20000, voltagePU: 1.01, measuredAt: 20000, action: "NONE" },
            ],
        });
    });
});
