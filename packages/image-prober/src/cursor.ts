/** Walks start..end inclusive and wraps back to start after end. */
export class ProbeCursor {
  private id: number;

  constructor(
    readonly startId: number,
    readonly endId: number,
  ) {
    if (!Number.isSafeInteger(startId) || !Number.isSafeInteger(endId)) {
      throw new RangeError(`Probe range must be integers, got ${startId} - ${endId}`);
    }
    if (startId > endId) {
      throw new RangeError(`Probe range start ${startId} is greater than end ${endId}`);
    }
    this.id = startId;
  }

  get current(): number {
    return this.id;
  }

  get size(): number {
    return this.endId - this.startId + 1;
  }

  advance(): { id: number; wrapped: boolean } {
    if (this.id >= this.endId) {
      this.id = this.startId;
      return { id: this.id, wrapped: true };
    }
    this.id += 1;
    return { id: this.id, wrapped: false };
  }
}
