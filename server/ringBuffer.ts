/**
 * Fixed-capacity FIFO that keeps the most recent `capacity` items.
 * Pushing into a full buffer overwrites the oldest item.
 */
export class RingBuffer<T> {
    private items: (T | undefined)[];
    private writePos = 0;
    private size = 0;
    private readonly capacity: number;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error('Capacity must be a positive integer');
        }
        this.capacity = capacity;
        this.items = new Array<T | undefined>(capacity);
    }

    push(item: T): void {
        this.items[this.writePos] = item;
        this.writePos = (this.writePos + 1) % this.capacity;
        this.size = Math.min(this.size + 1, this.capacity);
    }

    /**
     * Items oldest → newest. With `limit`, only the newest `limit` items.
     */
    toArray(limit?: number): T[] {
        const count = limit === undefined ? this.size : Math.max(0, Math.min(limit, this.size));
        const result: T[] = [];
        const oldest = (this.writePos - this.size + this.capacity) % this.capacity;
        const start = this.size - count;

        for (let i = start; i < this.size; i++) {
            const item = this.items[(oldest + i) % this.capacity];
            if (item !== undefined) {
                result.push(item);
            }
        }
        return result;
    }

    last(): T | undefined {
        if (this.size === 0) return undefined;
        return this.items[(this.writePos - 1 + this.capacity) % this.capacity];
    }

    clear(): void {
        this.items = new Array<T | undefined>(this.capacity);
        this.writePos = 0;
        this.size = 0;
    }

    get length(): number {
        return this.size;
    }

    get maxSize(): number {
        return this.capacity;
    }
}
