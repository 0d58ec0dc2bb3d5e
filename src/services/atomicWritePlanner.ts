import { treatmentLoggingConfig } from '../config';

export interface WriteChunk<T> {
    index: number;
    /** Only the first chunk carries the day/week/month rollup writes */
    includesRollups: boolean;
    sessions: T[];
}

export interface ChunkPlanOptions {
    maxOperations?: number;
    rollupWrites?: number;
}

/**
 * Splits a bulk write into batches under the per-batch operation ceiling.
 * The first batch holds the rollup writes plus as many sessions as fit; the
 * rest hold sessions only. A bulk with no sessions still yields one chunk so
 * the rollups are written.
 */
export function planWriteChunks<T>(
    sessions: readonly T[],
    options: ChunkPlanOptions = {},
): WriteChunk<T>[] {
    const maxOperations = options.maxOperations ?? treatmentLoggingConfig.maxBatchOperations;
    const rollupWrites = options.rollupWrites ?? treatmentLoggingConfig.rollupWritesPerUnit;
    const firstCapacity = maxOperations - rollupWrites;

    if (firstCapacity < 1) {
        throw new RangeError(`A batch of ${maxOperations} operations cannot hold ${rollupWrites} rollup writes`);
    }

    const chunks: WriteChunk<T>[] = [
        { index: 0, includesRollups: true, sessions: sessions.slice(0, firstCapacity) },
    ];

    for (let start = firstCapacity; start < sessions.length; start += maxOperations) {
        chunks.push({
            index: chunks.length,
            includesRollups: false,
            sessions: sessions.slice(start, start + maxOperations),
        });
    }

    return chunks;
}

export function chunkOperationCount<T>(
    chunk: WriteChunk<T>,
    rollupWrites: number = treatmentLoggingConfig.rollupWritesPerUnit,
): number {
    return chunk.sessions.length + (chunk.includesRollups ? rollupWrites : 0);
}
