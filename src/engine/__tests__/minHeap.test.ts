/**
 * MinHeap — Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MinHeap } from '../minHeap';

describe('MinHeap', () => {
    it('pops in ascending order', () => {
        const heap = new MinHeap<number>((a, b) => a - b);
        for (const n of [5, 3, 8, 1, 9, 2, 7]) {
            heap.push(n);
        }

        const popped: number[] = [];
        while (heap.size > 0) {
            const next = heap.pop();
            if (next !== undefined) {
                popped.push(next);
            }
        }

        assert.deepEqual(popped, [1, 2, 3, 5, 7, 8, 9]);
    });

    it('returns undefined when empty', () => {
        const heap = new MinHeap<number>((a, b) => a - b);
        assert.equal(heap.pop(), undefined);
        assert.equal(heap.peek(), undefined);
        assert.equal(heap.size, 0);
    });

    it('peeks without removing', () => {
        const heap = new MinHeap<number>((a, b) => a - b);
        heap.push(4);
        heap.push(2);
        assert.equal(heap.peek(), 2);
        assert.equal(heap.size, 2);
    });

    it('snapshots in order without touching the heap', () => {
        const heap = new MinHeap<number>((a, b) => a - b);
        [6, 4, 5].forEach(n => heap.push(n));

        assert.deepEqual(heap.toSortedArray(), [4, 5, 6]);
        assert.equal(heap.size, 3);
        assert.equal(heap.pop(), 4);
    });

    it('counts matching items without reordering', () => {
        const heap = new MinHeap<number>((a, b) => a - b);
        [7, 3, 9, 1, 5].forEach(n => heap.push(n));

        assert.equal(heap.countWhere(n => n < 5), 2);
        assert.equal(heap.countWhere(n => n > 100), 0);
        assert.deepEqual(heap.toSortedArray(), [1, 3, 5, 7, 9]);
    });
});
