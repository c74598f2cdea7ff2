import { writeFileSync } from "fs";

/**
 * Buffers tab-separated rows in memory; nothing touches the disk until `writeTo`.
 */
export class DataRecorder
{
    private readonly _rows: string[] = [];

    constructor(public readonly header: readonly string[]) {}

    public record(...cells: (string | number)[]): void
    {
        this._rows.push(cells.join("\t"));
    }

    public get rows(): readonly string[]
    {
        return this._rows;
    }

    public toText(): string
    {
        return ["# " + this.header.join("\t"), ...this._rows].join("\n") + "\n";
    }

    public writeTo(path: string): void
    {
        writeFileSync(path, this.toText(), "utf-8");
    }
}
