import { buildProgram } from "../src/cli";

describe("cli", () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("registers the run and avc commands", () => {
        const names = buildProgram().commands.map((c) => c.name());
        expect(names).toEqual(["run", "avc"]);
    });

    it("run prints the scenario report as JSON", () => {
        const write = jest.spyOn(process.stdout, "write").mockImplementation(() => true);

        buildProgram().parse(["node", "simcoro", "run", "--no-data", "--until", "200", "--log-level", "silent"]);

        expect(write).toHaveBeenCalledTimes(1);
        const report: unknown = JSON.parse(String(write.mock.calls[0]?.[0]));
        expect(report).toMatchObject({
            finalTime: 200,
            dataRows: 9,
            evPiles: 50,
            essUnits: 100,
            breakerOpenings: [],
        });
    });

    it("avc prints both decisions", () => {
        const write = jest.spyOn(process.stdout, "write").mockImplementation(() => true);

        buildProgram().parse(["node", "simcoro", "avc"]);

        const report: unknown = JSON.parse(String(write.mock.calls[0]?.[0]));
        expect(report).toMatchObject({
            finalTime: 30000,
            decisions: [{ action: "CAPACITOR_IN" }, { action: "NONE" }],
        });
    });
});
