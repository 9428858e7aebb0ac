/**
 * Crawl Frontier
 * Breadth-first queue plus the visited set. A URL is queued at most once
 * at a time and never again once visited.
 */

import { FrontierEntry } from './types';

export class Frontier {
  private queue: FrontierEntry[] = [];
  private pending: Set<string> = new Set();
  private visited: Set<string> = new Set();

  /**
   * Queue a URL. Returns false when it is already visited or pending.
   */
  push(url: string, depth: number): boolean {
    if (this.visited.has(url) || this.pending.has(url)) {
      return false;
    }

    this.queue.push({ url, depth });
    this.pending.add(url);
    return true;
  }

  /**
   * Take the oldest entry (FIFO for BFS)
   */
  pop(): FrontierEntry | undefined {
    const entry = this.queue.shift();
    if (entry) {
      this.pending.delete(entry.url);
    }
    return entry;
  }

  markVisited(url: string): void {
    this.visited.add(url);
  }

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  isPending(url: string): boolean {
    return this.pending.has(url);
  }

  /**
   * Visited or waiting in the queue
   */
  isKnown(url: string): boolean {
    return this.visited.has(url) || this.pending.has(url);
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  size(): number {
    return this.queue.length;
  }

  visitedUrls(): string[] {
    return Array.from(this.visited);
  }

  pendingEntries(): FrontierEntry[] {
    return this.queue.map((entry) => ({ ...entry }));
  }
}
