/**
 * @module core/repro
 * @description Reproducibility helpers
 *
 * Deterministic hashing of planner configurations and a seeded RNG used by
 * the random grid generator and the benchmarks.
 */

// ==================== Hash ====================

/**
 * djb2 string hash, hex encoded
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Create a 32-character hash from a string
 */
export function createHash(data: string): string {
    // Use multiple rounds for better distribution
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    const h3 = simpleHash(h1 + data);
    const h4 = simpleHash(h2 + h3);
    return h1 + h2 + h3 + h4;
}

/**
 * Sort object keys recursively for deterministic serialization
 */
export function sortObjectKeys(obj: unknown): unknown {
    if (obj === null || typeof obj !== 'object') {
        return obj;
    }

    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[key] = sortObjectKeys(value);
    }
    return sorted;
}

/**
 * Hash any JSON-compatible value independent of key order
 */
export function computeObjectHash(value: unknown): string {
    return createHash(JSON.stringify(sortObjectKeys(value)));
}

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32)
 *
 * Use this instead of Math.random() for reproducibility.
 */
export class SeededRandom {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}
