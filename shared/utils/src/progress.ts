/**
 * Progress notification for long-running operations
 */
export interface ProgressNotification {
  progress: number;
  total?: number;
  message?: string;
}

export type ProgressCallback = (
  notification: ProgressNotification,
) => void | Promise<void>;

/**
 * Reports progress through an optional callback, with sub-ranges for
 * nested steps
 *
 * @example
 * ```typescript
 * const progress = ProgressReporter.from(options.onProgress);
 * await progress?.report({ message: "Scanning content", progress: 10, total: 100 });
 *
 * // Steps reported as 0..n map onto 40..90 of the parent
 * const rendering = progress?.createSub({ scale: { start: 40, end: 90 } });
 * ```
 */
export class ProgressReporter {
  private constructor(private readonly callback: ProgressCallback) {}

  static from(
    callback: ProgressCallback | undefined,
  ): ProgressReporter | undefined {
    if (!callback) return undefined;
    return new ProgressReporter(callback);
  }

  createSub(options?: {
    scale?: { start: number; end: number };
  }): ProgressReporter {
    const scale = options?.scale;
    if (!scale) {
      return new ProgressReporter(this.callback);
    }

    const range = scale.end - scale.start;
    return new ProgressReporter(async (notification) => {
      const fraction =
        notification.total && notification.total > 0
          ? notification.progress / notification.total
          : 0;
      await this.callback({
        ...notification,
        progress: Math.round(scale.start + fraction * range),
        total: 100,
      });
    });
  }

  async report(notification: ProgressNotification): Promise<void> {
    await this.callback(notification);
  }

  toCallback(): ProgressCallback {
    return this.callback;
  }
}
