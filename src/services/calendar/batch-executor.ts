// src/services/calendar/batch-executor.ts
import type {
  BatchEntry,
  BatchItem,
  BatchOperation,
  BatchRequest,
  BatchResult,
  CalendarItem,
  ToolResult,
} from '../../models/index.js';
import { toToolFailure } from '../../utils/errors.js';
import { mapInChunks } from '../../utils/concurrency.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('batch-executor');

/**
 * Single-item operations a batch is dispatched through
 */
export interface BatchOperations {
  run(operation: BatchOperation, signal?: AbortSignal): Promise<ToolResult<CalendarItem>>;
}

/**
 * Executes batches with per-item failure isolation.
 *
 * Every request item yields exactly one entry at the same index. Items run in
 * request order, at most `concurrency` at a time. After cancellation, items
 * not yet started are reported as cancelled and finished entries are kept.
 */
export class BatchExecutor {
  constructor(
    private readonly operations: BatchOperations,
    private readonly concurrency: number,
  ) {}

  async execute(request: BatchRequest, signal?: AbortSignal): Promise<BatchResult> {
    const entries = await mapInChunks<BatchItem, BatchEntry>(
      request.items,
      this.concurrency,
      (item, index) => this.runItem(item, index, signal),
      { signal, onSkipped: (item, index) => cancelledEntry(item, index) },
    );

    const succeeded = entries.filter((entry) => entry.ok).length;
    const failed = entries.length - succeeded;
    if (failed > 0) {
      logger.info(`Batch finished with ${succeeded} succeeded, ${failed} failed`);
    }

    return { entries, succeeded, failed };
  }

  private async runItem(item: BatchItem, index: number, signal?: AbortSignal): Promise<BatchEntry> {
    if (signal?.aborted) {
      return cancelledEntry(item, index);
    }

    const { correlationId } = item;
    try {
      const result = await this.operations.run(item, signal);
      return result.ok
        ? { index, correlationId, ok: true, item: result.value }
        : { index, correlationId, ok: false, error: result.error };
    } catch (error) {
      logger.error(`Batch item ${correlationId} threw:`, error);
      return { index, correlationId, ok: false, error: toToolFailure(error) };
    }
  }
}

function cancelledEntry(item: BatchItem, index: number): BatchEntry {
  return {
    index,
    correlationId: item.correlationId,
    ok: false,
    error: { kind: 'TransportError', message: 'Operation cancelled before this item was attempted' },
  };
}
