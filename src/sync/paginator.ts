import { setTimeout as sleep } from 'node:timers/promises';
import logger from '../util/logger.js';
import type { ODataSource } from '../odata/client.js';
import { parseDocument, type ODataRecord } from '../odata/schemas.js';
import { RemoteUnavailableError } from './errors.js';

// Ranges this small are probed record by record instead of being split again.
export const SINGLE_PROBE_LIMIT = 10;
// Unreadable offsets in a row before the collection is treated as unreachable.
export const DEFAULT_MAX_UNREADABLE_RUN = 500;

export interface NeighborInfo {
    offset: number;
    number: string;
    date: string;
    refKey: string;
}

export interface ProblemRecord {
    entity: string;
    offset: number;
    before?: NeighborInfo;
    after?: NeighborInfo;
}

/** Loads `[skip, skip + top)`; resolves null when the server fails the request. */
export type Probe = (skip: number, top: number) => Promise<ODataRecord[] | null>;

export interface IsolationResult {
    records: ODataRecord[];
    problems: ProblemRecord[];
    // a sub-range came back short or empty: nothing exists past it
    exhausted: boolean;
}

async function neighbor(probe: Probe, offset: number): Promise<NeighborInfo | undefined> {
    if (offset < 0) return undefined;
    const got = await probe(offset, 1);
    const doc = got && got.length ? parseDocument(got[0]) : null;
    if (!doc) return undefined;
    return { offset, number: doc.number, date: doc.date, refKey: doc.refKey };
}

/**
 * Bisects a failing range down to the records the server cannot return.
 * Only talks to the outside world through `probe`, so it can run against a plain function in tests.
 */
export async function isolateFaults(entity: string, start: number, size: number, probe: Probe): Promise<IsolationResult> {
    if (size <= SINGLE_PROBE_LIMIT) {
        const records: ODataRecord[] = [];
        const problems: ProblemRecord[] = [];
        for (let offset = start; offset < start + size; offset++) {
            const got = await probe(offset, 1);
            if (got === null) {
                problems.push({
                    entity,
                    offset,
                    before: await neighbor(probe, offset - 1),
                    after: await neighbor(probe, offset + 1),
                });
                continue;
            }
            if (got.length === 0) return { records, problems, exhausted: true };
            records.push(...got);
        }
        return { records, problems, exhausted: false };
    }

    const half = Math.floor(size / 2);
    const halves: Array<[number, number]> = [
        [start, half],
        [start + half, size - half],
    ];
    const parts: IsolationResult[] = [];
    for (const [from, count] of halves) {
        const got = await probe(from, count);
        const part = got === null
            ? await isolateFaults(entity, from, count, probe)
            : { records: got, problems: [], exhausted: got.length < count };
        parts.push(part);
        if (part.exhausted) break;
    }
    return {
        records: parts.flatMap((p) => p.records),
        problems: parts.flatMap((p) => p.problems),
        exhausted: parts.some((p) => p.exhausted),
    };
}

export interface PaginatorOptions {
    pageDelayMs?: number;
    failureDelayMs?: number;
    maxUnreadableRun?: number;
    progressLogs?: boolean;
}

export interface FetchOptions {
    batchSize: number;
    filter?: string;
}

export interface FetchResult {
    records: ODataRecord[];
    problems: ProblemRecord[];
    pages: number;
}

export class ResilientPaginator {
    constructor(
        private readonly source: Pick<ODataSource, 'fetchPage'>,
        private readonly opts: PaginatorOptions = {}
    ) {}

    private probeFor(entity: string, filter: string | undefined): Probe {
        return async (skip, top) => {
            try {
                return await this.source.fetchPage(entity, { skip, top, filter });
            } catch (err) {
                logger.debug({ entity, skip, top, err }, 'Page request failed');
                return null;
            }
        };
    }

    async fetchAll(entity: string, { batchSize, filter }: FetchOptions): Promise<FetchResult> {
        if (!Number.isInteger(batchSize) || batchSize < 1) {
            throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
        }
        const probe = this.probeFor(entity, filter);
        const maxUnreadableRun = this.opts.maxUnreadableRun ?? DEFAULT_MAX_UNREADABLE_RUN;
        const records: ODataRecord[] = [];
        const problems: ProblemRecord[] = [];
        let skip = 0;
        let pages = 0;
        // a readable record always sits between two non-adjacent problem offsets
        let unreadableRun = 0;
        let lastBadOffset = -2;

        while (true) {
            const page = await probe(skip, batchSize);
            pages += 1;

            if (page === null) {
                logger.warn({ entity, skip, batchSize }, 'Page failed; isolating faulty records');
                const part = await isolateFaults(entity, skip, batchSize, probe);
                records.push(...part.records);
                problems.push(...part.problems);
                for (const p of part.problems) {
                    logger.warn({ entity, offset: p.offset, before: p.before, after: p.after }, 'Problem record skipped');
                    unreadableRun = p.offset === lastBadOffset + 1 ? unreadableRun + 1 : 1;
                    lastBadOffset = p.offset;
                    if (unreadableRun >= maxUnreadableRun) {
                        throw new RemoteUnavailableError(
                            entity,
                            p.offset,
                            `${entity}: ${unreadableRun} consecutive records unreadable (offsets ${p.offset - unreadableRun + 1}..${p.offset})`
                        );
                    }
                }
                if (part.exhausted) break;
                // the failing batch is settled; never revisit it
                skip += batchSize;
                await this.pause(this.opts.failureDelayMs);
                continue;
            }

            if (page.length === 0) break;
            records.push(...page);
            if (this.opts.progressLogs) {
                logger.info({ entity, skip, pageSize: page.length, cumulative: records.length }, 'Fetch progress');
            }
            if (page.length < batchSize) break;
            skip += batchSize;
            await this.pause(this.opts.pageDelayMs);
        }

        if (problems.length) {
            logger.warn({ entity, count: problems.length, offsets: problems.map((p) => p.offset) }, 'Unrecoverable records skipped');
        }
        return { records, problems, pages };
    }

    private async pause(ms: number | undefined) {
        if (ms && ms > 0) await sleep(ms);
    }
}
