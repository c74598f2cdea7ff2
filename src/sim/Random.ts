/**
 * Small seeded PRNG (mulberry32) so a scenario replays identically for a given seed.
 */
export class Random
{
    private state: number;

    constructor(seed: number)
    {
        this.state = seed >>> 0;
    }

    /** Uniform in [0, 1). */
    public next(): number
    {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** Uniform in [min, max). */
    public uniform(min: number, max: number): number
    {
        return min + (max - min) * this.next();
    }
}
