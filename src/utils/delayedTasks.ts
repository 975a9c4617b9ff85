/**
 * One-shot cancellable tasks (e.g. removing a moderation warning a few seconds
 * after it was posted). Runs on the event loop, so waiting never blocks other
 * updates or scheduler ticks.
 */
export class DelayedTasks {
  private timers = new Set<NodeJS.Timeout>();

  schedule(delayMs: number, task: () => Promise<void>, label: string): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      task().catch((error) => {
        console.error(`[Tasks] Delayed task "${label}" failed:`, error);
      });
    }, delayMs);
    this.timers.add(timer);
  }

  get pending(): number {
    return this.timers.size;
  }

  /** Drop every pending task. Used on shutdown; the affected actions simply never happen. */
  cancelAll(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
