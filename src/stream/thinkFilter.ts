const OPEN_TAG = "<think>";
const CLOSE_TAG = "</think>";

/**
 * Streaming transformer removing `<think>…</think>` spans from generator
 * output. Tags may be split across chunks: a chunk ending in a prefix of the
 * tag being looked for is held back until the next chunk settles it.
 * Whitespace directly following a closing tag is dropped as well.
 */
export class ThinkBlockFilter {
  private buffer = "";
  private insideBlock = false;
  private trimLeading = false;

  /** Feeds {@link chunk} and returns the text that is safe to emit now. */
  push(chunk: string): string {
    this.buffer += chunk;
    let visible = "";

    for (;;) {
      if (this.insideBlock) {
        const end = this.buffer.indexOf(CLOSE_TAG);
        if (end === -1) {
          // Keep only what could still be the start of the closing tag.
          this.buffer = this.buffer.slice(this.buffer.length - partialSuffix(this.buffer, CLOSE_TAG));
          return visible;
        }
        this.buffer = this.buffer.slice(end + CLOSE_TAG.length);
        this.insideBlock = false;
        this.trimLeading = true;
        continue;
      }

      if (this.trimLeading) {
        this.buffer = this.buffer.replace(/^\s+/, "");
        if (this.buffer.length === 0) {
          return visible;
        }
        this.trimLeading = false;
      }

      const start = this.buffer.indexOf(OPEN_TAG);
      if (start !== -1) {
        visible += this.buffer.slice(0, start);
        this.buffer = this.buffer.slice(start + OPEN_TAG.length);
        this.insideBlock = true;
        continue;
      }

      const held = partialSuffix(this.buffer, OPEN_TAG);
      visible += this.buffer.slice(0, this.buffer.length - held);
      this.buffer = this.buffer.slice(this.buffer.length - held);
      return visible;
    }
  }

  /** Ends the stream: a held partial tag is emitted, an unterminated block is dropped. */
  flush(): string {
    const rest = this.insideBlock ? "" : this.buffer;
    this.buffer = "";
    this.insideBlock = false;
    this.trimLeading = false;
    return rest;
  }
}

/** Removes every think block from a complete text. */
export function stripThinkBlocks(text: string): string {
  const filter = new ThinkBlockFilter();
  return filter.push(text) + filter.flush();
}

/** Applies a {@link ThinkBlockFilter} to an async chunk stream, skipping empty outputs. */
export async function* filterThinkStream(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  const filter = new ThinkBlockFilter();
  for await (const chunk of chunks) {
    const visible = filter.push(chunk);
    if (visible.length > 0) {
      yield visible;
    }
  }
  const rest = filter.flush();
  if (rest.length > 0) {
    yield rest;
  }
}

/** Length of the longest suffix of {@link text} that is a proper prefix of {@link tag}. */
function partialSuffix(text: string, tag: string): number {
  const max = Math.min(text.length, tag.length - 1);
  for (let length = max; length > 0; length -= 1) {
    if (tag.startsWith(text.slice(text.length - length))) {
      return length;
    }
  }
  return 0;
}
