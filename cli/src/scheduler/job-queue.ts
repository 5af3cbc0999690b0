/**
 * Binary min-heap of timer jobs ordered by fire instant, then by enqueue
 * order, so jobs due at the same instant run first-in first-out.
 */

export interface TimerJob {
  readonly seq: number;
  readonly fireAt: number;
  readonly label: string;
  readonly run: () => void;
  cancelled: boolean;
}

function before(a: TimerJob, b: TimerJob): boolean {
  return a.fireAt < b.fireAt || (a.fireAt === b.fireAt && a.seq < b.seq);
}

export class JobQueue {
  private heap: TimerJob[] = [];

  get size(): number {
    return this.heap.length;
  }

  peek(): TimerJob | undefined {
    return this.heap[0];
  }

  push(job: TimerJob): void {
    this.heap.push(job);
    this.siftUp(this.heap.length - 1);
  }

  pop(): TimerJob | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /** Drop cancelled jobs and rebuild the heap. Returns how many were dropped. */
  removeCancelled(): number {
    const initial = this.heap.length;
    this.heap = this.heap.filter(job => !job.cancelled);
    for (let i = (this.heap.length >> 1) - 1; i >= 0; i--) {
      this.siftDown(i);
    }
    return initial - this.heap.length;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && before(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && before(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}
