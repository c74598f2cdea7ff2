import type { SimTime } from "./Types";

interface TimedEntry<T>
{
    at: SimTime;
    seq: number;
    value: T;
}

/**
 * Min-heap keyed by wake time. Entries sharing a wake time come out in the
 * order they were pushed.
 */
export class TimedQueue<T>
{
    private readonly heap: TimedEntry<T>[] = [];
    private nextSeq = 0;

    public get size(): number
    {
        return this.heap.length;
    }

    public isEmpty(): boolean
    {
        return this.heap.length === 0;
    }

    public push(at: SimTime, value: T): void
    {
        this.heap.push({ at, seq: this.nextSeq++, value });
        this.bubbleUp(this.heap.length - 1);
    }

    /** Earliest wake time, or undefined when empty. */
    public peekTime(): SimTime | undefined
    {
        return this.heap[0]?.at;
    }

    public pop(): T | undefined
    {
        const top = this.heap[0];
        const last = this.heap.pop();
        if (top === undefined || last === undefined) return undefined;
        if (this.heap.length > 0) {
            this.heap[0] = last;
            this.bubbleDown(0);
        }
        return top.value;
    }

    /** Removes every entry with `at <= time`, in queue order. */
    public popDue(time: SimTime): T[]
    {
        const out: T[] = [];
        let head = this.heap[0];
        while (head !== undefined && head.at <= time) {
            this.pop();
            out.push(head.value);
            head = this.heap[0];
        }
        return out;
    }

    private before(a: TimedEntry<T>, b: TimedEntry<T>): boolean
    {
        return a.at < b.at || (a.at === b.at && a.seq < b.seq);
    }

    private swap(i: number, j: number): void
    {
        const a = this.heap[i];
        const b = this.heap[j];
        if (a === undefined || b === undefined) return;
        this.heap[i] = b;
        this.heap[j] = a;
    }

    private bubbleUp(idx: number): void
    {
        while (idx > 0) {
            const parentIdx = Math.floor((idx - 1) / 2);
            const parent = this.heap[parentIdx];
            const node = this.heap[idx];
            if (parent === undefined || node === undefined || !this.before(node, parent)) break;
            this.swap(parentIdx, idx);
            idx = parentIdx;
        }
    }

    private bubbleDown(idx: number): void
    {
        while (true) {
            let smallest = idx;
            let smallestNode = this.heap[idx];
            if (smallestNode === undefined) return;

            const left = this.heap[2 * idx + 1];
            if (left !== undefined && this.before(left, smallestNode)) {
                smallest = 2 * idx + 1;
                smallestNode = left;
            }
            const right = this.heap[2 * idx + 2];
            if (right !== undefined && this.before(right, smallestNode)) {
                smallest = 2 * idx + 2;
            }
            if (smallest === idx) break;
            this.swap(idx, smallest);
            idx = smallest;
        }
    }
}
