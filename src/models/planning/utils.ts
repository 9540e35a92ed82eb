/**
 * @module planning/utils
 * @description Frontier queue and bounded position history for path extraction
 */

import { positionsEqual } from '../grid/grid';
import type { Position } from '../grid/types';

// ==================== Priority Queue ====================

/**
 * Entry in the priority queue
 */
export interface PriorityQueueEntry<T> {
    item: T;
    priority: number;
    /** Insertion counter; orders entries with equal priority */
    sequence: number;
}

/**
 * Binary min-heap ordered by `(priority, sequence)`.
 *
 * Entries with equal priority leave in insertion order, so the search
 * result does not depend on heap layout.
 *
 * @example
 * ```typescript
 * const pq = new PriorityQueue<string>();
 * pq.push('a', 5.0);
 * pq.push('b', 3.0);
 * pq.push('c', 3.0);
 * pq.pop()?.item; // 'b'
 * pq.pop()?.item; // 'c'
 * ```
 */
export class PriorityQueue<T> {
    private heap: PriorityQueueEntry<T>[] = [];
    private nextSequence = 0;

    push(item: T, priority: number): void {
        this.heap.push({ item, priority, sequence: this.nextSequence++ });
        this.bubbleUp(this.heap.length - 1);
    }

    pop(): PriorityQueueEntry<T> | undefined {
        const min = this.heap[0];
        const last = this.heap.pop();
        if (last !== undefined && this.heap.length > 0) {
            this.heap[0] = last;
            this.bubbleDown(0);
        }
        return min;
    }

    isEmpty(): boolean {
        return this.heap.length === 0;
    }

    size(): number {
        return this.heap.length;
    }

    private less(i: number, j: number): boolean {
        const a = this.heap[i];
        const b = this.heap[j];
        return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
    }

    private bubbleUp(index: number): void {
        while (index > 0) {
            const parent = Math.floor((index - 1) / 2);
            if (!this.less(index, parent)) break;
            [this.heap[parent], this.heap[index]] = [this.heap[index], this.heap[parent]];
            index = parent;
        }
    }

    private bubbleDown(index: number): void {
        while (true) {
            const left = 2 * index + 1;
            const right = 2 * index + 2;
            let smallest = index;
            if (left < this.heap.length && this.less(left, smallest)) {
                smallest = left;
            }
            if (right < this.heap.length && this.less(right, smallest)) {
                smallest = right;
            }
            if (smallest === index) break;
            [this.heap[smallest], this.heap[index]] = [this.heap[index], this.heap[smallest]];
            index = smallest;
        }
    }
}

// ==================== Position History ====================

/**
 * Fixed-capacity ring buffer of the most recent positions.
 * Appending past capacity overwrites the oldest entry.
 */
export class PositionHistory {
    private readonly buffer: Array<Position | undefined>;
    private head = 0;
    private length = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`PositionHistory capacity must be a positive integer, got ${capacity}`);
        }
        this.buffer = new Array<Position | undefined>(capacity).fill(undefined);
    }

    push(position: Position): void {
        this.buffer[(this.head + this.length) % this.capacity] = position;
        if (this.length < this.capacity) {
            this.length++;
        } else {
            this.head = (this.head + 1) % this.capacity;
        }
    }

    /** Occurrences of `position` currently held */
    count(position: Position): number {
        let n = 0;
        for (let i = 0; i < this.length; i++) {
            const entry = this.buffer[(this.head + i) % this.capacity];
            if (entry !== undefined && positionsEqual(entry, position)) n++;
        }
        return n;
    }

    size(): number {
        return this.length;
    }

    /** Oldest first */
    toArray(): Position[] {
        const result: Position[] = [];
        for (let i = 0; i < this.length; i++) {
            const entry = this.buffer[(this.head + i) % this.capacity];
            if (entry !== undefined) result.push(entry);
        }
        return result;
    }
}

// ==================== Geometry ====================

/**
 * Move cost between 8-connected neighbours: 1 axial, √2 diagonal
 */
export function stepCost(dRow: number, dCol: number): number {
    return dRow !== 0 && dCol !== 0 ? Math.SQRT2 : 1.0;
}
