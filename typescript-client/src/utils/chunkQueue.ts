// Inbox for bytes arriving from a socket callback, read one chunk at a time

/**
 * Buffers incoming chunks until the connection asks for them.
 * Once ended, queued chunks still drain; after that next() resolves null,
 * or rejects if the stream ended on an error.
 */
export class ChunkQueue {
  private chunks: Buffer[] = [];
  private readers: Array<{ resolve: (chunk: Buffer | null) => void; reject: (error: Error) => void }> = [];
  private endedWith: { error: Error | null } | null = null;

  /**
   * Chunks pushed after end() are dropped
   */
  push(chunk: Buffer): void {
    if (this.endedWith !== null) {
      return;
    }

    const reader = this.readers.shift();
    if (reader) {
      reader.resolve(chunk);
      return;
    }

    this.chunks.push(chunk);
  }

  async next(): Promise<Buffer | null> {
    const chunk = this.chunks.shift();
    if (chunk !== undefined) {
      return chunk;
    }

    if (this.endedWith !== null) {
      if (this.endedWith.error !== null) {
        throw this.endedWith.error;
      }
      return null;
    }

    return new Promise<Buffer | null>((resolve, reject) => {
      this.readers.push({ resolve, reject });
    });
  }

  /**
   * End the stream; waiting readers get null, or the error if one is given
   */
  end(error: Error | null = null): void {
    if (this.endedWith !== null) {
      return;
    }

    this.endedWith = { error };

    const readers = this.readers;
    this.readers = [];
    for (const reader of readers) {
      if (error !== null) {
        reader.reject(error);
      } else {
        reader.resolve(null);
      }
    }
  }
}
