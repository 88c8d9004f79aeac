// src/engine/minHeap.ts

/**
 * Binary min-heap ordered by a caller-supplied comparator
 *
 * Performance:
 * - push: O(log n)
 * - pop: O(log n)
 * - peek: O(1)
 * - toSortedArray: O(n log n), non-destructive
 * - countWhere: O(n), non-destructive
 *
 * The comparator must define a strict total order for deterministic pops;
 * callers add a sequence number when their primary key can tie.
 */
export class MinHeap<T> {
    private items: T[] = [];

    constructor(private readonly compare: (a: T, b: T) => number) {}

    get size(): number {
        return this.items.length;
    }

    push(item: T): void {
        this.items.push(item);
        this.siftUp(this.items.length - 1);
    }

    peek(): T | undefined {
        return this.items[0];
    }

    pop(): T | undefined {
        const top = this.items[0];
        const last = this.items.pop();
        if (top === undefined || last === undefined) {
            return undefined;
        }

        if (this.items.length > 0) {
            this.items[0] = last;
            this.siftDown(0);
        }

        return top;
    }

    /**
     * Copy of the contents in pop order, heap untouched
     */
    toSortedArray(): T[] {
        return [...this.items].sort(this.compare);
    }

    countWhere(predicate: (item: T) => boolean): number {
        let count = 0;
        for (const item of this.items) {
            if (predicate(item)) {
                count++;
            }
        }
        return count;
    }

    private siftUp(index: number): void {
        let child = index;
        while (child > 0) {
            const parent = (child - 1) >> 1;
            if (this.compare(this.items[child], this.items[parent]) >= 0) {
                break;
            }
            this.swap(child, parent);
            child = parent;
        }
    }

    private siftDown(index: number): void {
        const n = this.items.length;
        let parent = index;

        while (true) {
            const left = 2 * parent + 1;
            const right = left + 1;
            let smallest = parent;

            if (left < n && this.compare(this.items[left], this.items[smallest]) < 0) {
                smallest = left;
            }
            if (right < n && this.compare(this.items[right], this.items[smallest]) < 0) {
                smallest = right;
            }
            if (smallest === parent) {
                break;
            }

            this.swap(parent, smallest);
            parent = smallest;
        }
    }

    private swap(i: number, j: number): void {
        const tmp = this.items[i];
        this.items[i] = this.items[j];
        this.items[j] = tmp;
    }
}
