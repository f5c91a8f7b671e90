import type { CursorPosition, PageCursor } from '@trawl/shared';
import type { StopReason } from './types';

export type PaginationState =
  | { kind: 'idle' }
  | { kind: 'fetching_page' }
  | { kind: 'has_more' }
  | { kind: 'exhausted' }
  | { kind: 'stopped'; reason: Exclude<StopReason, 'exhausted'> };

export interface PaginationLimits {
  maxPages: number;
  maxRecords?: number;
  maxConsecutivePageFailures: number;
}

export interface PageResult {
  /** Records the extractor produced for the page */
  extracted: number;
  /** Records actually handed to the caller */
  emitted: number;
  hasNextPage: boolean;
  endOfResults: boolean;
  nextToken: string | null;
}

export class PaginationStateError extends Error {
  constructor(operation: string, state: PaginationState['kind']) {
    super(`Cannot ${operation} while ${state}`);
    this.name = 'PaginationStateError';
  }
}

/**
 * Cursor state machine for one target:
 * idle → fetching_page → has_more | exhausted, terminal stopped(reason).
 * The only writer of the cursor.
 */
export class PaginationController {
  private current: PaginationState = { kind: 'idle' };
  private position: CursorPosition = { page: 1, offset: 0, token: null };
  private pagesFetched = 0;
  private pagesSkipped = 0;
  private recordsEmitted = 0;
  private consecutiveFailures = 0;
  private pending: { extracted: number; nextToken: string | null } | null = null;

  constructor(private readonly limits: PaginationLimits) {}

  get state(): PaginationState {
    return this.current;
  }

  get cursor(): PageCursor {
    return Object.freeze({
      position: Object.freeze({ ...this.position }),
      pagesFetched: this.pagesFetched,
      recordsEmitted: this.recordsEmitted,
    });
  }

  get done(): boolean {
    return this.current.kind === 'exhausted' || this.current.kind === 'stopped';
  }

  start(position: Partial<CursorPosition> = {}): void {
    this.expect('start', 'idle');
    this.position = {
      page: position.page ?? 1,
      offset: position.offset ?? 0,
      token: position.token ?? null,
    };
    this.current = { kind: 'fetching_page' };
  }

  /**
   * Record a fetched page. Ends the listing on an end marker or when the
   * extractor reports no next page; otherwise applies the page and record caps.
   */
  completePage(result: PageResult): PaginationState {
    this.expect('complete a page', 'fetching_page');

    this.pagesFetched++;
    this.recordsEmitted += result.emitted;
    this.consecutiveFailures = 0;

    if (result.endOfResults || !result.hasNextPage) {
      this.current = { kind: 'exhausted' };
    } else if (this.capReached()) {
      this.current = { kind: 'stopped', reason: 'cap_reached' };
    } else {
      this.pending = { extracted: result.extracted, nextToken: result.nextToken };
      this.current = { kind: 'has_more' };
    }
    return this.current;
  }

  /**
   * Move the cursor past the completed page. At most once per page.
   */
  advance(): Readonly<CursorPosition> {
    this.expect('advance', 'has_more');
    const pending = this.pending ?? { extracted: 0, nextToken: null };

    this.position = {
      page: this.position.page + 1,
      offset: this.position.offset + pending.extracted,
      token: pending.nextToken,
    };
    this.pending = null;
    this.current = { kind: 'fetching_page' };
    return this.cursor.position;
  }

  /**
   * A page was lost after its retries. Skippable pages are passed over when
   * the cursor does not depend on their content and the failure streak allows it.
   */
  failPage(options: { skippable: boolean }): PaginationState {
    this.expect('fail a page', 'fetching_page');
    this.consecutiveFailures++;

    const canSkip =
      options.skippable &&
      this.position.token === null &&
      this.consecutiveFailures < this.limits.maxConsecutivePageFailures &&
      this.pagesConsumed() + 1 < this.limits.maxPages;

    if (canSkip) {
      this.pagesSkipped++;
      this.position = { ...this.position, page: this.position.page + 1 };
      this.current = { kind: 'fetching_page' };
    } else {
      this.current = { kind: 'stopped', reason: 'aborted' };
    }
    return this.current;
  }

  cancel(): void {
    if (!this.done) {
      this.current = { kind: 'stopped', reason: 'cancelled' };
    }
  }

  /**
   * Records still allowed before the record cap (Infinity when uncapped).
   */
  remainingRecords(): number {
    return this.limits.maxRecords === undefined
      ? Number.POSITIVE_INFINITY
      : Math.max(0, this.limits.maxRecords - this.recordsEmitted);
  }

  /** Pages fetched or skipped; bounded by maxPages */
  private pagesConsumed(): number {
    return this.pagesFetched + this.pagesSkipped;
  }

  private capReached(): boolean {
    return (
      this.pagesConsumed() >= this.limits.maxPages ||
      (this.limits.maxRecords !== undefined && this.recordsEmitted >= this.limits.maxRecords)
    );
  }

  private expect(operation: string, kind: PaginationState['kind']): void {
    if (this.current.kind !== kind) {
      throw new PaginationStateError(operation, this.current.kind);
    }
  }
}
