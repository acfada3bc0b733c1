import PQueue from "p-queue";
import { getErrorMessage } from "../shared/errors.js";

export interface QueueItem<T> {
  id: string;
  data: T;
  status: "pending" | "processing" | "completed" | "failed" | "skipped";
  error?: string | undefined;
}

export interface BatchQueueOptions {
  /** Called with the raw error of each failed item. */
  onItemFailed?: ((id: string, error: unknown) => void) | undefined;
}

export interface ProcessOptions {
  /** Checked before each item; once false, the rest are skipped. */
  shouldContinue?: (() => boolean) | undefined;
}

export interface BatchResult {
  completed: number;
  failed: number;
  skipped: number;
  errors: { id: string; error: string }[];
}

/**
 * Runs items one at a time in insertion order. A failing item is recorded
 * and the batch moves on.
 */
export class BatchQueue<T> {
  private items: QueueItem<T>[] = [];
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly onItemFailed: BatchQueueOptions["onItemFailed"];

  constructor(options: BatchQueueOptions = {}) {
    this.onItemFailed = options.onItemFailed;
  }

  add(id: string, data: T): void {
    this.items.push({ id, data, status: "pending" });
  }

  addAll(items: { id: string; data: T }[]): void {
    for (const item of items) {
      this.add(item.id, item.data);
    }
  }

  async process(
    handler: (item: T, id: string) => Promise<void>,
    options: ProcessOptions = {}
  ): Promise<BatchResult> {
    const errors: { id: string; error: string }[] = [];

    const processItem = async (item: QueueItem<T>): Promise<void> => {
      if (options.shouldContinue && !options.shouldContinue()) {
        item.status = "skipped";
        return;
      }

      item.status = "processing";
      try {
        await handler(item.data, item.id);
        item.status = "completed";
      } catch (error) {
        item.status = "failed";
        item.error = getErrorMessage(error);
        errors.push({ id: item.id, error: item.error });
        this.onItemFailed?.(item.id, error);
      }
    };

    await this.queue.addAll(this.items.map((item) => () => processItem(item)));

    const count = (status: QueueItem<T>["status"]) =>
      this.items.filter((i) => i.status === status).length;

    return {
      completed: count("completed"),
      failed: count("failed"),
      skipped: count("skipped"),
      errors,
    };
  }
}
