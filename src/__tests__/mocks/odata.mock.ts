import { vi } from 'vitest';
import type { ODataSource, PageRequest } from '../../odata/client.js';
import type { ODataRecord } from '../../odata/schemas.js';
import { RemoteRequestError } from '../../sync/errors.js';

export interface FakeCollections {
  [entity: string]: ODataRecord[];
}

/**
 * In-process stand-in for the ERP. A page request that overlaps a faulty offset
 * fails the way the real server does when one record cannot be serialised.
 */
export class FakeODataSource implements ODataSource {
  collections: FakeCollections;
  faulty = new Map<string, Set<number>>();
  down = false;
  failAllPages = false;

  readonly fetchPage = vi.fn(async (entity: string, req: PageRequest): Promise<ODataRecord[]> => {
    if (this.failAllPages) throw new RemoteRequestError(entity, 'HTTP 500', { status: 500 });
    const all = this.collections[entity] ?? [];
    const end = Math.min(req.skip + req.top, all.length);
    const bad = this.faulty.get(entity);
    if (bad) {
      for (let i = req.skip; i < end; i++) {
        if (bad.has(i)) throw new RemoteRequestError(entity, `HTTP 500 at ${i}`, { status: 500 });
      }
    }
    return all.slice(req.skip, end);
  });

  readonly fetchByKey = vi.fn(async (entity: string, key: string): Promise<ODataRecord> => {
    const found = (this.collections[entity] ?? []).find((r) => r.Ref_Key === key);
    if (!found) throw new RemoteRequestError(entity, 'HTTP 404', { status: 404 });
    return found;
  });

  readonly ping = vi.fn(async (): Promise<void> => {
    if (this.down) throw new RemoteRequestError('ping', 'connect ECONNREFUSED', { code: 'ECONNREFUSED' });
  });

  constructor(collections: FakeCollections = {}) {
    this.collections = collections;
  }

  markFaulty(entity: string, ...offsets: number[]) {
    this.faulty.set(entity, new Set(offsets));
  }

  lookupsFor(entity: string): number {
    return this.fetchByKey.mock.calls.filter(([e]) => e === entity).length;
  }
}

export function fakeDocuments(count: number, date = '2024-03-01'): ODataRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    Ref_Key: `doc-${i}`,
    Number: `N-${i}  `,
    Date: `${date}T12:00:00`,
  }));
}
