import { ICoordinationStore } from '../../domain/store/ICoordinationStore';
import { ILogger } from '../../domain/common/ILogger';
import { ValidationError } from '../../domain/common/Errors';

const COUNTER_KEY = 'stable_id:counter';
const BY_LEGACY_KEY = 'stable_id:by_legacy';
const BY_STABLE_KEY = 'stable_id:by_stable';

export const STABLE_ID_PREFIX = 'PRP';

export interface StableIdMapping {
  stableId: string;
  /** Display id the stable id was assigned to. */
  displayId: string;
}

export interface MigrationEntry extends StableIdMapping {
  /** False when the legacy id was already mapped by an earlier run. */
  created: boolean;
}

export function formatStableId(sequence: number): string {
  return `${STABLE_ID_PREFIX}-${String(sequence).padStart(4, '0')}`;
}

/**
 * Mints immutable stable ids and keeps the legacy → stable mapping.
 * Mappings are written with HSETNX, so once written they are never replaced.
 */
export class StableIdService {
  constructor(
    private store: ICoordinationStore,
    private logger: ILogger
  ) {}

  /**
   * Next id from the shared counter: PRP-0001, PRP-0002, ...
   */
  async mint(): Promise<string> {
    return formatStableId(await this.store.incr(COUNTER_KEY));
  }

  /**
   * Mint a stable id for a newly created record.
   */
  async assign(displayId: string): Promise<string> {
    const stableId = await this.mint();
    const written = await this.store.hsetnx(BY_STABLE_KEY, stableId, displayId);
    if (!written) {
      throw new ValidationError(`Stable id ${stableId} is already assigned`);
    }
    return stableId;
  }

  /**
   * One-time mapping of legacy ids. Re-running it returns the existing mappings unchanged.
   */
  async migrate(legacyIds: string[]): Promise<MigrationEntry[]> {
    const results: MigrationEntry[] = [];

    for (const legacyId of legacyIds) {
      const existing = await this.store.hget(BY_LEGACY_KEY, legacyId);
      if (existing) {
        results.push({ stableId: existing, displayId: legacyId, created: false });
        continue;
      }

      const candidate = await this.mint();
      const claimed = await this.store.hsetnx(BY_LEGACY_KEY, legacyId, candidate);
      if (!claimed) {
        // Another migration run mapped it first; the minted id stays unused.
        const winner = await this.store.hget(BY_LEGACY_KEY, legacyId);
        results.push({ stableId: winner ?? candidate, displayId: legacyId, created: false });
        continue;
      }

      await this.store.hsetnx(BY_STABLE_KEY, candidate, legacyId);
      results.push({ stableId: candidate, displayId: legacyId, created: true });
    }

    const created = results.filter(r => r.created).length;
    this.logger.info('Stable id migration finished', { total: legacyIds.length, created });
    return results;
  }

  /**
   * Look up a mapping by stable id or by legacy id.
   */
  async resolve(id: string): Promise<StableIdMapping | null> {
    const displayId = await this.store.hget(BY_STABLE_KEY, id);
    if (displayId) {
      return { stableId: id, displayId };
    }

    const stableId = await this.store.hget(BY_LEGACY_KEY, id);
    if (stableId) {
      return { stableId, displayId: id };
    }

    return null;
  }
}
