/**
 * Priority queue for jobs awaiting batching
 */

import { Job, QueuedJob } from '../types';

/**
 * Min-heap based priority queue for O(log N) operations
 * Ordering is: 1) priority (smaller = first), 2) sequence (input order)
 *
 * The (priority, sequence) key is total, so dequeue order never depends
 * on the heap's internal layout.
 */
export class JobQueue {
  private heap: QueuedJob[];

  constructor() {
    this.heap = [];
  }

  /**
   * Add a job to the queue
   */
  enqueue(job: Job, sequence: number): void {
    // Add to end and bubble up
    this.heap.push({ job, sequence });
    this.bubbleUp(this.heap.length - 1);
  }

  /**
   * Remove and return the most urgent job
   */
  dequeue(): QueuedJob | null {
    if (this.heap.length === 0) {
      return null;
    }

    const item = this.heap[0];

    // Move last item to root
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }

    return item;
  }

  /**
   * Peek at the most urgent job without removing it
   */
  peek(): QueuedJob | null {
    return this.heap.length > 0 ? this.heap[0] : null;
  }

  /**
   * Remove every job, returning them in priority order
   */
  drain(): Job[] {
    const ordered: Job[] = [];
    let item = this.dequeue();
    while (item) {
      ordered.push(item.job);
      item = this.dequeue();
    }
    return ordered;
  }

  /**
   * Get the number of items in the queue
   */
  size(): number {
    return this.heap.length;
  }

  /**
   * Check if the queue is empty
   */
  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  // Private heap operations

  private parent(index: number): number {
    return Math.floor((index - 1) / 2);
  }

  private leftChild(index: number): number {
    return 2 * index + 1;
  }

  private rightChild(index: number): number {
    return 2 * index + 2;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = this.parent(index);
      if (this.compare(index, parentIndex) >= 0) {
        break;
      }
      this.swap(index, parentIndex);
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const left = this.leftChild(index);
      const right = this.rightChild(index);
      let smallest = index;

      if (left < this.heap.length && this.compare(left, smallest) < 0) {
        smallest = left;
      }
      if (right < this.heap.length && this.compare(right, smallest) < 0) {
        smallest = right;
      }

      if (smallest === index) {
        break;
      }

      this.swap(index, smallest);
      index = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const temp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = temp;
  }

  /**
   * Compare two items (returns negative if i runs first)
   */
  private compare(i: number, j: number): number {
    const itemI = this.heap[i];
    const itemJ = this.heap[j];

    if (itemI.job.priority !== itemJ.job.priority) {
      return itemI.job.priority - itemJ.job.priority;
    }

    // Same priority: input order
    return itemI.sequence - itemJ.sequence;
  }
}
