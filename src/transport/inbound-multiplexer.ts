// This module merges independently arriving HTTP bodies into one ordered stream with exactly one consumer.

import { AppError } from '../utils/errors.js';

/**
 * Unbounded multi-producer, single-consumer async queue.
 *
 * Values come out in the order `publish` was called. `finish()` stops new
 * publishes but lets the consumer drain what is already buffered before it
 * sees `null`. Backpressure lives in the pending-response registry, not here.
 */
export class InboundMultiplexer<T extends object> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private consumer: ((value: T | null) => void) | null = null;
  private finished = false;

  public get isFinished(): boolean {
    return this.finished;
  }

  public get bufferedCount(): number {
    return this.buffer.length;
  }

  // This method appends one value, handing it straight to a parked consumer when there is one.
  public publish(value: T): void {
    if (this.finished) {
      throw new AppError(410, 'stream_finished', 'Inbound stream has been finished; no further messages are accepted.');
    }

    const consumer = this.consumer;
    if (consumer) {
      this.consumer = null;
      consumer(value);
      return;
    }

    this.buffer.push(value);
  }

  // This method marks the stream exhausted and wakes a parked consumer once nothing is buffered.
  public finish(): void {
    if (this.finished) {
      return;
    }

    this.finished = true;
    const consumer = this.consumer;
    if (consumer) {
      this.consumer = null;
      consumer(null);
    }
  }

  // This method yields the next value, or null once the stream is finished and drained.
  public next(): Promise<T | null> {
    if (this.consumer) {
      throw new AppError(500, 'concurrent_consumer', 'Inbound stream supports exactly one consumer at a time.');
    }

    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) {
        return Promise.resolve(value);
      }
    }

    if (this.finished) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      this.consumer = resolve;
    });
  }

  public async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const value = await this.next();
      if (value === null) {
        return;
      }
      yield value;
    }
  }
}
