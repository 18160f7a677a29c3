import { ICounterRepository } from '../repositories/ICounterRepository.js';
import { Result, ok, err } from '../entities/Result.js';
import { TicketError } from '../errors/TicketError.js';
import { withTimeout } from '../../utils/timeout.js';

export const DEFAULT_ALLOCATOR_TIMEOUT_MS = 5000;

/**
 * Sequence Allocator
 * Issues per-category ticket numbers through one atomic increment on the
 * counter store. Each value is handed out at most once; a failed or timed
 * out call may leave a gap but never a duplicate.
 */
export class SequenceAllocator {
  constructor(
    private readonly counters: ICounterRepository,
    private readonly timeoutMs: number = DEFAULT_ALLOCATOR_TIMEOUT_MS
  ) {}

  async allocate(category: string): Promise<Result<number, TicketError>> {
    let value: number;
    try {
      value = await withTimeout(this.counters.increment(category), this.timeoutMs, `Sequence allocation for '${category}'`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(TicketError.allocationFailure(
        `Could not update sequence for '${category}': ${reason}`,
        { category },
        error
      ));
    }

    if (!Number.isSafeInteger(value) || value <= 0) {
      return err(TicketError.allocationFailure(
        `Counter store returned an invalid sequence value for '${category}': ${value}`,
        { category }
      ));
    }

    return ok(value);
  }
}
