/**
 * Unbounded FIFO queue between the benchmark worker and the render loop.
 * Senders never wait and receivers never block: `drain` hands back whatever
 * has been queued so far, in send order.
 */
export class EventChannel<T> {
  private queue: T[] = [];

  send(event: T): void {
    this.queue.push(event);
  }

  drain(): T[] {
    if (this.queue.length === 0) return [];
    const events = this.queue;
    this.queue = [];
    return events;
  }

  clear(): void {
    this.queue = [];
  }
}
